import type { FastifyInstance } from "fastify";
import { buildOpenApiDocument } from "@trellis/contracts";

export function registerOpenApiRoute(app: FastifyInstance) {
  const document = buildOpenApiDocument();
  app.get("/openapi.json", async () => document);
}
