import type { VerifiedIdentity } from "./types.js";

declare module "fastify" {
  interface FastifyRequest {
    auth?: VerifiedIdentity;
  }
}
