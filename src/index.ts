import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { loadConfig } from "./config";
import { initLogger, logger } from "./logger";
import { AdapterRegistry } from "./bulk/adapter-registry";
import { BulkController } from "./bulk/bulk-controller";
import { BulkSessionService } from "./bulk/bulk-session-service";
import { ApiClient } from "./clients/api-client";
import { HttpMailClient } from "./clients/mail-client";
import { HttpBoardClient } from "./clients/board-client";
import { MailboxBulkAdapter } from "./adapters/mailbox-adapter";
import { TaskBoardBulkAdapter } from "./adapters/task-board-adapter";
import { SqliteSessionStore } from "./store/session-store";
import { startServer } from "./http/server";

async function main() {
  // 1. Configuration
  const config = loadConfig();

  // 2. Logger (must come after config)
  initLogger(config.logLevel);

  logger.info({ limits: config.bulk }, "Starting bulk turn engine");

  // 3. Adapters
  const registry = new AdapterRegistry();
  if (config.mail) {
    const api = new ApiClient({
      name: "mail",
      baseUrl: config.mail.baseUrl,
      auth: {
        kind: "password",
        tokenPath: "/auth/token",
        username: config.mail.username,
        password: config.mail.password,
      },
    });
    registry.register(new MailboxBulkAdapter(new HttpMailClient(api)));
  }
  if (config.board) {
    const api = new ApiClient({
      name: "board",
      baseUrl: config.board.baseUrl,
      auth: { kind: "apiKey", apiKey: config.board.apiKey },
    });
    registry.register(new TaskBoardBulkAdapter(new HttpBoardClient(api)));
  }
  if (registry.domains().length === 0) {
    logger.warn("No bulk adapters configured; every start request will be rejected");
  }

  // 4. Session store
  if (config.sessions.dbPath !== ":memory:") {
    mkdirSync(dirname(config.sessions.dbPath), { recursive: true });
  }
  const store = new SqliteSessionStore(config.sessions.dbPath, {
    ttlSeconds: config.sessions.ttlSeconds,
  });

  // 5. Controller + session service
  const controller = new BulkController({ limits: config.bulk });
  const sessions = new BulkSessionService(store, registry, controller, config.bulk);

  // 6. HTTP front end
  const server = await startServer({
    port: config.http.port,
    apiKey: config.http.apiKey,
    sessions,
    registry,
  });

  // 7. Expired session eviction
  const purgeInterval = setInterval(() => {
    try {
      const purged = store.purgeExpired();
      if (purged > 0) {
        logger.info({ tag: "Store", purged }, "Expired bulk sessions purged");
      }
    } catch (err) {
      logger.error({ tag: "Store", err }, "Failed to purge expired sessions");
    }
  }, config.sessions.purgeIntervalMs);

  // 8. Graceful shutdown
  const SHUTDOWN_TIMEOUT_MS = 10_000;
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    clearInterval(purgeInterval);
    let exitCode = 0;
    try {
      const graceful = async () => {
        await server.close();
        store.close();
        logger.info("Server closed");
      };
      const timeout = new Promise<never>((_, reject) =>
        setTimeout(() => reject(new Error("Shutdown timed out")), SHUTDOWN_TIMEOUT_MS)
      );
      await Promise.race([graceful(), timeout]);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
