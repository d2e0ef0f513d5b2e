import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import {
  ForbiddenErrorSchema,
  ServiceUnavailableErrorSchema,
  SubjectIdParamsSchema,
  SubjectSyncSummarySchema,
  UnauthorizedErrorSchema
} from "@trellis/contracts";
import type { AuthorizationDecisionPoint } from "../../auth/decision-point.js";
import { getRequestAuth } from "../../auth/middleware.js";
import { toSyncSummary } from "../sessions/summary.js";

interface RegisterAdminRoutesOptions {
  decisionPoint: AuthorizationDecisionPoint;
  requireSyncAdmin: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;
}

function wrapAsyncPreHandler(
  handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>
) {
  return (request: FastifyRequest, reply: FastifyReply, done: (error?: Error) => void) => {
    void handler(request, reply).then(
      () => done(),
      (error: unknown) => done(error instanceof Error ? error : new Error(String(error)))
    );
  };
}

export function registerAdminRoutes(app: FastifyInstance, options: RegisterAdminRoutesOptions) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.post(
    "/v1/admin/subjects/:subjectId/sync",
    {
      preHandler: wrapAsyncPreHandler(options.requireSyncAdmin),
      schema: {
        params: SubjectIdParamsSchema,
        response: {
          200: SubjectSyncSummarySchema,
          401: UnauthorizedErrorSchema,
          403: ForbiddenErrorSchema,
          503: ServiceUnavailableErrorSchema
        }
      }
    },
    async (request) => {
      const caller = getRequestAuth(request);
      const result = await options.decisionPoint.forceSync(request.params.subjectId);
      request.log.info(
        {
          subjectId: request.params.subjectId,
          requestedBy: caller.subjectId,
          freshness: result.freshness
        },
        "Forced permission sync"
      );
      return toSyncSummary(result);
    }
  );
}
