import {
  OpenAPIRegistry,
  OpenApiGeneratorV31,
  extendZodWithOpenApi
} from "@asteasolutions/zod-to-openapi";
import { z } from "zod";
import {
  ApiErrorSchema,
  AuthorizeRequestSchema,
  AuthorizeResponseSchema,
  ForbiddenErrorSchema,
  HealthResponseSchema,
  ServiceUnavailableErrorSchema,
  SubjectIdParamsSchema,
  SubjectSyncSummarySchema,
  UnauthorizedErrorSchema
} from "./schemas.js";

export const API_VERSION = "v1";

export type OpenApiDocument = ReturnType<OpenApiGeneratorV31["generateDocument"]>;

let zodExtended = false;

function ensureZodExtended() {
  if (!zodExtended) {
    extendZodWithOpenApi(z);
    zodExtended = true;
  }
}

function jsonContent(schema: z.ZodTypeAny) {
  return {
    "application/json": {
      schema
    }
  };
}

function unauthorizedResponse() {
  return {
    401: {
      description: "Bearer token is missing, malformed, expired or not signed by the identity provider",
      content: jsonContent(UnauthorizedErrorSchema)
    }
  };
}

function unreachableResponse() {
  return {
    503: {
      description: "Identity provider unreachable and no usable cached permissions",
      content: jsonContent(ServiceUnavailableErrorSchema)
    }
  };
}

export function buildOpenApiDocument(): OpenApiDocument {
  ensureZodExtended();
  const registry = new OpenAPIRegistry();

  registry.register("HealthResponse", HealthResponseSchema);
  registry.register("ApiError", ApiErrorSchema);
  registry.register("UnauthorizedError", UnauthorizedErrorSchema);
  registry.register("ForbiddenError", ForbiddenErrorSchema);
  registry.register("ServiceUnavailableError", ServiceUnavailableErrorSchema);
  registry.register("AuthorizeRequest", AuthorizeRequestSchema);
  registry.register("AuthorizeResponse", AuthorizeResponseSchema);
  registry.register("SubjectSyncSummary", SubjectSyncSummarySchema);

  registry.registerPath({
    method: "get",
    path: "/health",
    operationId: "getHealth",
    summary: "Get API health status",
    tags: ["System"],
    responses: {
      200: {
        description: "API health status",
        content: jsonContent(HealthResponseSchema)
      }
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/authorize",
    operationId: "authorize",
    summary: "Decide whether the bearer may perform an action on a resource",
    description:
      "Always answers 200 with a decision. Denials carry a reason code and are never HTTP errors.",
    tags: ["Authorization"],
    security: [{ bearer: [] }],
    request: {
      body: {
        required: true,
        content: jsonContent(AuthorizeRequestSchema)
      }
    },
    responses: {
      200: {
        description: "Authorization decision",
        content: jsonContent(AuthorizeResponseSchema)
      },
      400: {
        description: "Request body failed validation",
        content: jsonContent(ApiErrorSchema)
      }
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/sessions/login",
    operationId: "syncOnLogin",
    summary: "Refresh the caller's permissions from the identity provider",
    tags: ["Sessions"],
    security: [{ bearer: [] }],
    responses: {
      200: {
        description: "Freshly synchronized permissions",
        content: jsonContent(SubjectSyncSummarySchema)
      },
      ...unauthorizedResponse(),
      ...unreachableResponse()
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/sessions/logout",
    operationId: "invalidateOnLogout",
    summary: "Drop the caller's cached permissions",
    tags: ["Sessions"],
    security: [{ bearer: [] }],
    responses: {
      204: {
        description: "Cache entry invalidated"
      },
      ...unauthorizedResponse()
    }
  });

  registry.registerPath({
    method: "post",
    path: "/v1/admin/subjects/{subjectId}/sync",
    operationId: "forceSync",
    summary: "Invalidate and re-fetch a subject's permissions",
    tags: ["Administration"],
    security: [{ bearer: [] }],
    request: {
      params: SubjectIdParamsSchema
    },
    responses: {
      200: {
        description: "Result of the forced synchronization",
        content: jsonContent(SubjectSyncSummarySchema)
      },
      ...unauthorizedResponse(),
      403: {
        description: "Caller lacks the synchronization permission",
        content: jsonContent(ForbiddenErrorSchema)
      },
      ...unreachableResponse()
    }
  });

  const generator = new OpenApiGeneratorV31(registry.definitions);
  const document = generator.generateDocument({
    openapi: "3.1.0",
    info: {
      title: "Trellis Authorization API",
      version: API_VERSION,
      description:
        "Permission decisions for vendors and other tenant-scoped resources, backed by an external identity provider"
    },
    servers: [{ url: "http://localhost:3001" }],
    tags: [
      { name: "System", description: "Platform system endpoints" },
      { name: "Authorization", description: "Permission decisions" },
      { name: "Sessions", description: "Login and logout synchronization triggers" },
      { name: "Administration", description: "Manual re-synchronization" }
    ]
  });

  document.components ??= {};
  document.components.securitySchemes = {
    bearer: {
      type: "http",
      scheme: "bearer",
      bearerFormat: "JWT",
      description: "Access token issued by the identity provider"
    }
  };

  return document;
}
