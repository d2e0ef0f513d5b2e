import type { FastifyInstance } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import {
  ServiceUnavailableErrorSchema,
  SubjectSyncSummarySchema,
  UnauthorizedErrorSchema
} from "@trellis/contracts";
import type { AuthorizationDecisionPoint } from "../../auth/decision-point.js";
import { abortSignalFor } from "../../auth/middleware.js";
import { parseBearerToken } from "../../auth/token-verifier.js";
import { toSyncSummary } from "./summary.js";

interface RegisterSessionRoutesOptions {
  decisionPoint: AuthorizationDecisionPoint;
}

export function registerSessionRoutes(app: FastifyInstance, options: RegisterSessionRoutesOptions) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.post(
    "/v1/sessions/login",
    {
      schema: {
        response: {
          200: SubjectSyncSummarySchema,
          401: UnauthorizedErrorSchema,
          503: ServiceUnavailableErrorSchema
        }
      }
    },
    async (request, reply) => {
      const token = parseBearerToken(request.headers.authorization);
      const { identity, sync } = await options.decisionPoint.login(token, {
        signal: abortSignalFor(reply)
      });
      request.log.info(
        { subjectId: identity.subjectId, freshness: sync.freshness },
        "Permissions synchronized on login"
      );
      return toSyncSummary(sync);
    }
  );

  typedApp.post(
    "/v1/sessions/logout",
    {
      schema: {
        response: {
          401: UnauthorizedErrorSchema
        }
      }
    },
    async (request, reply) => {
      const token = parseBearerToken(request.headers.authorization);
      await options.decisionPoint.logout(token);
      return reply.status(204).send();
    }
  );
}
