import "dotenv/config";
import { createChatServerApp } from "./app.js";
import { applyMigrations, createPostgresPool } from "./adapters/postgres-pool.js";
import { loadConfig } from "./config.js";
import { createLogger, describeError } from "./observability/logger.js";
import { PostgresConversationRepository } from "./repositories/postgres-conversation-repository.js";
import { PostgresUserRepository } from "./repositories/postgres-user-repository.js";

const config = loadConfig();
const logger = createLogger({ component: "chat-server" }, { debug: config.debug });

const pool = config.storage === "postgres" ? createPostgresPool() : null;
if (pool) {
  await applyMigrations(pool);
}

const { app, sessionStore } = createChatServerApp({
  config,
  logger,
  ...(pool
    ? {
        conversationRepository: new PostgresConversationRepository(
          pool,
          config.conversationListLimit,
          logger.child({ component: "postgres" }),
        ),
        userRepository: new PostgresUserRepository(pool),
      }
    : {}),
});

sessionStore.init();

const server = app.listen(config.port, config.host, () => {
  logger.info("listening", {
    host: config.host,
    port: config.port,
    storage: config.storage,
    assistantDriver: config.assistantDriver,
  });
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info("shutting down", { signal });
  sessionStore.clear();
  server.close((error) => {
    if (error) {
      logger.error("server close failed", describeError(error));
    }
    if (!pool) {
      return;
    }
    pool.end().catch((poolError: unknown) => {
      logger.error("pool close failed", describeError(poolError));
    });
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);
