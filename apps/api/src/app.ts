import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import { serializerCompiler, validatorCompiler } from "fastify-type-provider-zod";
import type { Logger } from "pino";
import type { AuthorizationDecisionPoint } from "./auth/decision-point.js";
import { StaleAndUnreachableError, SyncWaitAbortedError, TokenInvalidError } from "./auth/errors.js";
import { buildSyncAdminPreHandler } from "./auth/middleware.js";
import { registerAdminRoutes } from "./features/admin/route.js";
import { registerAuthorizeRoute } from "./features/authorize/route.js";
import { registerHealthRoute } from "./features/health/route.js";
import { registerOpenApiRoute } from "./features/openapi/route.js";
import { registerSessionRoutes } from "./features/sessions/route.js";

export interface ApiAppOptions {
  logger: Logger;
  decisionPoint: AuthorizationDecisionPoint;
  syncAdminPermission: string;
  now?: () => Date;
}

export function buildApiApp(options: ApiAppOptions) {
  const loggerInstance: FastifyBaseLogger = options.logger;
  const app = Fastify({ loggerInstance });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation || error.statusCode === 400) {
      return reply.status(400).send({ code: "INVALID_REQUEST", message: error.message });
    }

    if (error instanceof TokenInvalidError) {
      return reply.status(401).send({ code: error.code, message: error.message });
    }

    if (error instanceof StaleAndUnreachableError) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(503).send({ code: error.code, message: error.message });
    }

    if (error instanceof SyncWaitAbortedError) {
      request.log.debug("Client went away while permissions were refreshing");
      return reply.status(499).send({ code: error.code, message: error.message });
    }

    if (error.statusCode !== undefined && error.statusCode > 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: error.code, message: error.message });
    }

    request.log.error({ err: error }, "Unhandled API error");
    return reply.status(500).send({
      code: "INTERNAL_SERVER_ERROR",
      message: "Unexpected server error"
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`
    });
  });

  registerHealthRoute(app, options.now ?? (() => new Date()));
  registerOpenApiRoute(app);
  registerAuthorizeRoute(app, { decisionPoint: options.decisionPoint });
  registerSessionRoutes(app, { decisionPoint: options.decisionPoint });
  registerAdminRoutes(app, {
    decisionPoint: options.decisionPoint,
    requireSyncAdmin: buildSyncAdminPreHandler({
      decisionPoint: options.decisionPoint,
      requiredPermission: options.syncAdminPermission
    })
  });

  return app;
}
