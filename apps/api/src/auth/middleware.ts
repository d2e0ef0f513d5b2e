import type { FastifyReply, FastifyRequest } from "fastify";
import type { AuthorizationDecisionPoint } from "./decision-point.js";
import { isAuthzError, StaleAndUnreachableError, tokenInvalid } from "./errors.js";
import { parseBearerToken } from "./token-verifier.js";
import type { VerifiedIdentity } from "./types.js";

/** Aborts when the client goes away before the reply is written. */
export function abortSignalFor(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

interface BuildSyncAdminPreHandlerDependencies {
  decisionPoint: AuthorizationDecisionPoint;
  requiredPermission: string;
}

/** Admits callers whose fresh global permissions include the sync administration grant. */
export function buildSyncAdminPreHandler(deps: BuildSyncAdminPreHandlerDependencies) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const token = parseBearerToken(request.headers.authorization);
      const { identity, allowed } = await deps.decisionPoint.hasPlatformPermission(
        token,
        deps.requiredPermission,
        { signal: abortSignalFor(reply) }
      );

      if (!allowed) {
        request.log.info(
          { subjectId: identity.subjectId, permission: deps.requiredPermission },
          "Sync administration refused"
        );
        return reply.status(403).send({
          code: "permission_denied",
          message: `Missing required permission: ${deps.requiredPermission}`
        });
      }

      request.auth = identity;
    } catch (error) {
      if (error instanceof StaleAndUnreachableError) {
        return reply.status(503).send({ code: "stale_and_unreachable", message: error.message });
      }

      if (isAuthzError(error) && error.code === "token_invalid") {
        return reply.status(401).send({ code: "token_invalid", message: error.message });
      }

      throw error;
    }
  };
}

export function getRequestAuth(request: FastifyRequest): VerifiedIdentity {
  if (!request.auth) {
    throw tokenInvalid("Route requires authenticated context");
  }

  return request.auth;
}
