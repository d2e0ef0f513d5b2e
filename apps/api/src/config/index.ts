import { z } from "zod";

const BooleanStringSchema = z.enum(["true", "false"]).transform((value) => value === "true");

const CsvStringSchema = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

const StaticMembershipSchema = z.object({
  organizationId: z.string().min(1),
  role: z.string().min(1).nullable().default(null),
  permissions: z.array(z.string().min(1)).optional()
});

const StaticSubjectSchema = z.object({
  subjectId: z.string().min(1),
  roles: z.array(z.string().min(1)).default([]),
  permissions: z.array(z.string().min(1)).default([]),
  organizations: z.array(StaticMembershipSchema).default([])
});

const ResourceSeedSchema = z.object({
  resourceId: z.string().min(1),
  owningOrganizationId: z.string().min(1).nullable().default(null)
});

function jsonArraySchema<T extends z.ZodTypeAny>(variableName: string, itemSchema: T) {
  return z.string().transform((value, ctx) => {
    try {
      const parsed = JSON.parse(value) as unknown;
      return z.array(itemSchema).parse(parsed);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          error instanceof Error
            ? `${variableName} must be a valid JSON array (${error.message})`
            : `${variableName} must be a valid JSON array`
      });
      return z.NEVER;
    }
  });
}

const JsonStaticSubjectsSchema = jsonArraySchema("IDP_STATIC_SUBJECTS_JSON", StaticSubjectSchema);
const JsonResourceSeedsSchema = jsonArraySchema("RESOURCES_JSON", ResourceSeedSchema);

const ApiConfigSchema = z.object({
  nodeEnv: z.enum(["development", "test", "production"]).default("development"),
  port: z.number().int().positive().default(3001),
  host: z.string().min(1).default("0.0.0.0"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  databaseUrl: z.string().min(1).optional(),
  dbPoolMax: z.number().int().positive().default(10),
  dbIdleTimeoutMs: z.number().int().nonnegative().default(10_000),
  dbConnectionTimeoutMs: z.number().int().nonnegative().default(2_000),
  dbSslMode: z.enum(["disable", "require"]).default("disable"),
  dbSslRejectUnauthorized: BooleanStringSchema.default("true"),
  authIssuer: z.string().url().default("https://trellis.local/"),
  authAudience: z.string().min(1).default("https://api.trellis.local"),
  authJwksUri: z.string().url().optional(),
  authLocalJwtSecret: z.string().min(16).optional(),
  authClockToleranceSeconds: z.number().int().nonnegative().default(60),
  authClaimsNamespace: z.string().min(1).default("https://trellis.local/"),
  idpBaseUrl: z.string().url().optional(),
  idpClientId: z.string().min(1).optional(),
  idpClientSecret: z.string().min(1).optional(),
  idpAudience: z.string().min(1).optional(),
  idpTimeoutMs: z.number().int().positive().default(3_000),
  idpStaticSubjects: z.array(StaticSubjectSchema).default([]),
  resourceSeeds: z.array(ResourceSeedSchema).default([]),
  cacheTtlSeconds: z.number().int().positive().default(3_600),
  cacheMaxStaleSeconds: z.number().int().nonnegative().default(86_400),
  cacheMaxEntries: z.number().int().positive().default(10_000),
  sweepIntervalSeconds: z.number().int().nonnegative().default(0),
  sweepRefreshAheadSeconds: z.number().int().nonnegative().default(300),
  highRiskActions: z.array(z.string().min(1)).default(["manage:payments", "view:payments"]),
  syncAdminPermission: z.string().min(1).default("manage:permission_sync")
});

export type StaticSubject = z.infer<typeof StaticSubjectSchema>;
export type ResourceSeed = z.infer<typeof ResourceSeedSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

function defaultLocalJwtSecret(nodeEnv: "development" | "test" | "production") {
  if (nodeEnv === "production") {
    return undefined;
  }

  return "trellis-dev-local-jwt-secret";
}

function optionalNumber(value: string | undefined) {
  return value ? Number(value) : undefined;
}

function normalizeOptionalString(value: string | undefined): string | undefined {
  const normalized = value?.trim();
  return normalized && normalized.length > 0 ? normalized : undefined;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const nodeEnv = z
    .enum(["development", "test", "production"])
    .default("development")
    .parse(env.NODE_ENV);
  const idpBaseUrl = normalizeOptionalString(env.IDP_BASE_URL)?.replace(/\/+$/u, "");

  return ApiConfigSchema.parse({
    nodeEnv,
    port: optionalNumber(env.API_PORT),
    host: env.API_HOST,
    logLevel: env.LOG_LEVEL,
    databaseUrl: normalizeOptionalString(env.DATABASE_URL),
    dbPoolMax: optionalNumber(env.DB_POOL_MAX),
    dbIdleTimeoutMs: optionalNumber(env.DB_IDLE_TIMEOUT_MS),
    dbConnectionTimeoutMs: optionalNumber(env.DB_CONNECTION_TIMEOUT_MS),
    dbSslMode: env.DB_SSL_MODE,
    dbSslRejectUnauthorized: env.DB_SSL_REJECT_UNAUTHORIZED,
    authIssuer: env.AUTH_ISSUER,
    authAudience: env.AUTH_AUDIENCE,
    authJwksUri: normalizeOptionalString(env.AUTH_JWKS_URI),
    authLocalJwtSecret: env.AUTH_LOCAL_JWT_SECRET ?? defaultLocalJwtSecret(nodeEnv),
    authClockToleranceSeconds: optionalNumber(env.AUTH_CLOCK_TOLERANCE_SECONDS),
    authClaimsNamespace: env.AUTH_CLAIMS_NAMESPACE,
    idpBaseUrl,
    idpClientId: normalizeOptionalString(env.IDP_CLIENT_ID),
    idpClientSecret: normalizeOptionalString(env.IDP_CLIENT_SECRET),
    idpAudience:
      normalizeOptionalString(env.IDP_AUDIENCE) ?? (idpBaseUrl ? `${idpBaseUrl}/api/v2/` : undefined),
    idpTimeoutMs: optionalNumber(env.IDP_TIMEOUT_MS),
    idpStaticSubjects: env.IDP_STATIC_SUBJECTS_JSON
      ? JsonStaticSubjectsSchema.parse(env.IDP_STATIC_SUBJECTS_JSON)
      : undefined,
    resourceSeeds: env.RESOURCES_JSON ? JsonResourceSeedsSchema.parse(env.RESOURCES_JSON) : undefined,
    cacheTtlSeconds: optionalNumber(env.PERMISSION_CACHE_TTL_SECONDS),
    cacheMaxStaleSeconds: optionalNumber(env.PERMISSION_CACHE_MAX_STALE_SECONDS),
    cacheMaxEntries: optionalNumber(env.PERMISSION_CACHE_MAX_ENTRIES),
    sweepIntervalSeconds: optionalNumber(env.PERMISSION_SWEEP_INTERVAL_SECONDS),
    sweepRefreshAheadSeconds: optionalNumber(env.PERMISSION_SWEEP_REFRESH_AHEAD_SECONDS),
    highRiskActions: env.HIGH_RISK_ACTIONS ? CsvStringSchema.parse(env.HIGH_RISK_ACTIONS) : undefined,
    syncAdminPermission: normalizeOptionalString(env.SYNC_ADMIN_PERMISSION)
  });
}
