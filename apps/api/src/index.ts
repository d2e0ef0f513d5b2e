import "dotenv/config";
import { Pool } from "pg";
import { buildApiApp } from "./app.js";
import type { Queryable } from "./auth/resource-store.js";
import { loadApiConfig } from "./config/index.js";
import { createAuthorizationEngine, createLogger } from "./dependencies.js";

async function main() {
  const config = loadApiConfig();
  const logger = createLogger(config);

  const pool = config.databaseUrl
    ? new Pool({
        connectionString: config.databaseUrl,
        max: config.dbPoolMax,
        idleTimeoutMillis: config.dbIdleTimeoutMs,
        connectionTimeoutMillis: config.dbConnectionTimeoutMs,
        ssl:
          config.dbSslMode === "require"
            ? { rejectUnauthorized: config.dbSslRejectUnauthorized }
            : undefined
      })
    : null;

  const db: Queryable | undefined = pool
    ? {
        query: <Row extends Record<string, unknown>>(text: string, values?: unknown[]) =>
          pool.query<Row>(text, values)
      }
    : undefined;

  const engine = createAuthorizationEngine(config, { logger, db });
  const app = buildApiApp({
    logger,
    decisionPoint: engine.decisionPoint,
    syncAdminPermission: config.syncAdminPermission
  });

  engine.orchestrator.startSweeper(config.sweepIntervalSeconds * 1000);

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down API");
    engine.orchestrator.stopSweeper();
    try {
      await app.close();
      await pool?.end();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", (signal) => void shutdown(signal));
  process.on("SIGINT", (signal) => void shutdown(signal));

  try {
    await app.listen({ host: config.host, port: config.port });
  } catch (error) {
    logger.error({ err: error }, "Failed to start API");
    await pool?.end();
    process.exit(1);
  }
}

void main();
