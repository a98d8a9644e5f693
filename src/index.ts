import "./infra/envBootstrap.js"; // Load environment (.env) before anything else
import { createServer as createHttpServer, type Server as HttpServer } from "node:http";
import { fileURLToPath } from "node:url";
import { createApp } from "./api/app.js";
import { getAppLogger } from "./logging/logger.js";
import { initializeContainer, shutdownContainer } from "./infra/container.js";
import { runMigrations } from "./scripts/run-migrations.js";

export interface StartedServer {
  port: number;
  httpServer: HttpServer;
  stop: () => Promise<void>;
}

let activeServer: StartedServer | null = null;

export async function start(): Promise<StartedServer> {
  if (activeServer) {
    return activeServer;
  }

  const container = await initializeContainer();
  const { config } = container;
  const logger = getAppLogger();

  if (container.postgres) {
    try {
      await runMigrations({ logger, pool: container.postgres });
    } catch (error) {
      logger.error?.({ err: error }, "migrations.failed");
      await shutdownContainer();
      throw error;
    }
  }

  const httpServer = createHttpServer(createApp(container));

  const port = await new Promise<number>((resolve, reject) => {
    const onError = (error: Error) => {
      httpServer.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      httpServer.off("error", onError);
      const address = httpServer.address();
      resolve(address && typeof address === "object" ? address.port : config.port);
    };
    httpServer.once("error", onError);
    httpServer.once("listening", onListening);
    httpServer.listen(config.port);
  }).catch(async (error: unknown) => {
    await shutdownContainer();
    throw error;
  });

  // Readers get NotFound until the first refresh of each type lands.
  container.scheduler.start();

  let stopped = false;
  const stop = async () => {
    if (stopped) {
      return;
    }
    stopped = true;
    container.scheduler.stop();

    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    }).catch((error: unknown) => logger.warn?.({ err: error }, "server.close_failed"));

    await shutdownContainer();
    activeServer = null;
  };

  activeServer = { port, httpServer, stop } satisfies StartedServer;
  logger.info?.({ port, snapshotStore: config.snapshotStore, leaseStore: config.leaseStore }, "server.start");

  return activeServer;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const logger = getAppLogger();

  const shutdown = (signal: string) => {
    logger.info?.({ signal }, "server.shutdown_requested");
    const pending = activeServer ? activeServer.stop() : Promise.resolve();
    pending
      .catch((error: unknown) => logger.error?.({ err: error }, "server.stop_failed"))
      .finally(() => process.exit(0));
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  start().catch((error: unknown) => {
    logger.error?.({ err: error }, "server.start_failed");
    process.exitCode = 1;
  });
}
