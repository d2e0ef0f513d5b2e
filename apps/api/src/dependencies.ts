import pino, { type Logger } from "pino";
import { AuthorizationDecisionPoint } from "./auth/decision-point.js";
import { createIdentityProvider, type IdentityProviderClient } from "./auth/identity-provider.js";
import { PermissionCache } from "./auth/permission-cache.js";
import {
  InMemoryResourceStore,
  PostgresResourceStore,
  type Queryable,
  type ResourceStore
} from "./auth/resource-store.js";
import { SyncOrchestrator } from "./auth/sync-orchestrator.js";
import { ClaimsVerifier } from "./auth/token-verifier.js";
import type { ApiConfig } from "./config/index.js";

export interface AuthorizationEngine {
  logger: Logger;
  cache: PermissionCache;
  orchestrator: SyncOrchestrator;
  decisionPoint: AuthorizationDecisionPoint;
}

export interface AuthorizationEngineOverrides {
  logger?: Logger;
  db?: Queryable;
  provider?: IdentityProviderClient;
  fetchImpl?: typeof globalThis.fetch;
  now?: () => Date;
}

export function createLogger(config: Pick<ApiConfig, "logLevel">): Logger {
  return pino({ level: config.logLevel, name: "trellis-api" });
}

function createResourceStore(config: ApiConfig, db: Queryable | undefined): ResourceStore {
  return db ? new PostgresResourceStore(db) : new InMemoryResourceStore(config.resourceSeeds);
}

export function createAuthorizationEngine(
  config: ApiConfig,
  overrides: AuthorizationEngineOverrides = {}
): AuthorizationEngine {
  const logger = overrides.logger ?? createLogger(config);
  const now = overrides.now ?? (() => new Date());

  const cache = new PermissionCache({
    ttlMs: config.cacheTtlSeconds * 1000,
    maxStaleMs: config.cacheMaxStaleSeconds * 1000,
    maxEntries: config.cacheMaxEntries,
    now
  });

  const orchestrator = new SyncOrchestrator({
    cache,
    provider: overrides.provider ?? createIdentityProvider(config, logger, overrides.fetchImpl),
    logger,
    refreshAheadMs: config.sweepRefreshAheadSeconds * 1000,
    now
  });

  const decisionPoint = new AuthorizationDecisionPoint({
    verifier: new ClaimsVerifier(config),
    orchestrator,
    resources: createResourceStore(config, overrides.db),
    highRiskActions: config.highRiskActions,
    logger
  });

  return { logger, cache, orchestrator, decisionPoint };
}
