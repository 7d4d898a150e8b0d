import { generationRetryOptions, readEnv, redactEnvForLogs } from "./config/env";
import { createLogger, errorMessage } from "./config/logger";
import { buildRedisClient, type RedisConnection } from "./connectivity/redis";
import { runMigrations } from "./db/migrate";
import { checkPgConnection, closePgPool, getPgPool, queryTimeoutMs } from "./db/postgres";
import { createGenerationProvider } from "./generation";
import { startHttpServer } from "./http/server";
import { BookIntelligenceCoordinator } from "./intelligence/coordinator";
import { createRedisFlightLease, MemoryFlightLease, type FlightLease } from "./intelligence/flightLease";
import { LibraryService } from "./library/service";
import { HybridRecommender } from "./recommender/hybrid";
import { FileBookTextSource } from "./stores/fileTextSource";
import type { LibraryStores } from "./stores/interfaces";
import { createMemoryStores } from "./stores/memoryStores";
import { createPostgresStores } from "./stores/postgresStores";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.LIBRARY_LOG_LEVEL);
  const runtimeStartedAt = new Date().toISOString();

  logger.info("library_boot", { env: redactEnvForLogs(env) });

  let stores: LibraryStores;
  const usePostgres = env.LIBRARY_STORE === "postgres";
  if (usePostgres) {
    const pool = getPgPool(env);
    logger.info("library_migrations_start", {});
    const migrationResult = await runMigrations(pool, logger, queryTimeoutMs(env));
    logger.info("library_migrations_complete", {
      appliedCount: migrationResult.applied.length,
      applied: migrationResult.applied,
    });
    stores = createPostgresStores(pool, queryTimeoutMs(env));
  } else {
    logger.warn("library_memory_store_enabled", { note: "data is lost on restart" });
    stores = createMemoryStores();
  }

  let redis: RedisConnection | null = null;
  let lease: FlightLease = new MemoryFlightLease();
  if (env.SINGLE_FLIGHT_BACKEND === "redis") {
    redis = buildRedisClient(
      {
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
        username: env.REDIS_USERNAME,
        password: env.REDIS_PASSWORD,
        connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
        commandTimeoutMs: env.REDIS_COMMAND_TIMEOUT_MS,
      },
      logger
    );
    await redis.connect();
    lease = createRedisFlightLease(redis, env.SINGLE_FLIGHT_LEASE_MS, logger);
  }

  const provider = createGenerationProvider(env, logger);
  const coordinator = new BookIntelligenceCoordinator({
    catalog: stores.catalog,
    reviews: stores.reviews,
    textSource: new FileBookTextSource(env.BOOK_TEXT_ROOT),
    provider,
    logger,
    lease,
    leaseWaitMs: env.SINGLE_FLIGHT_LEASE_MS,
    generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
    retry: generationRetryOptions(env),
  });
  const recommender = new HybridRecommender({
    catalog: stores.catalog,
    interactions: stores.interactions,
    preferences: stores.preferences,
    logger,
    alpha: env.RECOMMENDATION_ALPHA,
  });
  const service = new LibraryService({
    stores,
    intelligence: coordinator,
    recommender,
    logger,
    reviewPolicy: env.REVIEW_POLICY,
  });

  const activeRedis = redis;
  const server = startHttpServer({
    host: env.LIBRARY_HOST,
    port: env.LIBRARY_PORT,
    logger,
    service,
    pgCheck: usePostgres ? () => checkPgConnection(logger, env) : undefined,
    redisCheck: activeRedis ? () => activeRedis.healthcheck() : undefined,
    getRuntimeStatus: () => ({
      startedAt: runtimeStartedAt,
      store: env.LIBRARY_STORE,
      provider: provider.name,
      singleFlightBackend: env.SINGLE_FLIGHT_BACKEND,
      recommendationAlpha: recommender.alpha,
      intelligence: coordinator.getStats(),
    }),
    allowedOrigins: env.LIBRARY_ALLOWED_ORIGINS
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("library_shutdown_start", { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await coordinator.whenIdle();
    if (activeRedis) {
      await activeRedis.close();
    }
    if (usePostgres) {
      await closePgPool();
    }
    logger.info("library_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  const shutdownOrLog = (signal: string, exitCode?: number): void => {
    shutdown(signal, exitCode).catch((error: unknown) => {
      logger.error("library_shutdown_failed", { signal, message: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on("SIGINT", () => shutdownOrLog("SIGINT"));
  process.on("SIGTERM", () => shutdownOrLog("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("library_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    shutdownOrLog("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("library_unhandled_rejection", { message: errorMessage(reason) });
    shutdownOrLog("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`library-intelligence fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
