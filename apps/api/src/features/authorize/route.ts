import type { FastifyInstance } from "fastify";
import { type ZodTypeProvider } from "fastify-type-provider-zod";
import { AuthorizeRequestSchema, AuthorizeResponseSchema } from "@trellis/contracts";
import type { AuthorizationDecisionPoint } from "../../auth/decision-point.js";
import { TokenInvalidError } from "../../auth/errors.js";
import { abortSignalFor } from "../../auth/middleware.js";
import { parseBearerToken } from "../../auth/token-verifier.js";

interface RegisterAuthorizeRouteOptions {
  decisionPoint: AuthorizationDecisionPoint;
}

function bearerTokenOrNull(header: string | undefined): string | null {
  try {
    return parseBearerToken(header);
  } catch (error) {
    if (error instanceof TokenInvalidError) {
      return null;
    }
    throw error;
  }
}

export function registerAuthorizeRoute(
  app: FastifyInstance,
  options: RegisterAuthorizeRouteOptions
) {
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.post(
    "/v1/authorize",
    {
      schema: {
        body: AuthorizeRequestSchema,
        response: {
          200: AuthorizeResponseSchema
        }
      }
    },
    async (request, reply) => {
      const token = request.body.token ?? bearerTokenOrNull(request.headers.authorization);
      if (!token) {
        return { allowed: false, reason: "TOKEN_INVALID" as const, degraded: false };
      }

      const decision = await options.decisionPoint.authorize(
        token,
        request.body.resourceId,
        request.body.action,
        { signal: abortSignalFor(reply) }
      );

      return {
        allowed: decision.allowed,
        reason: decision.reason,
        degraded: decision.degraded
      };
    }
  );
}
