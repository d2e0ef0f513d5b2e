export * from "./schemas.js";
export { API_VERSION, buildOpenApiDocument, type OpenApiDocument } from "./openapi.js";
