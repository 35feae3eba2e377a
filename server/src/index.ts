import dotenv from "dotenv";
import type { Server } from "http";
import { createApp } from "./app";
import type { Job } from "./models/job.model";
import type { RawNotification } from "./models/notification.model";
import { AsyncQueue } from "./services/queue.service";
import { SubscriptionTable } from "./services/subscription.service";
import { StorageService } from "./services/storage.service";
import { DownloadService } from "./services/download.service";
import { BrokerService } from "./services/broker.service";
import { IngestionService } from "./services/ingestion.service";
import { WorkerPool } from "./services/worker.service";
import { startQueueReporter } from "./services/monitor.service";
import { ConfigError } from "./utils/errors";
import { loadConfig, resolveConfigPath } from "./utils/config";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

interface Runtime {
  inbox: AsyncQueue<RawNotification>;
  broker: BrokerService;
  server: Server;
  stopReporter: () => void;
}

let runtime: Runtime | null = null;

async function startServer(): Promise<void> {
  try {
    const config = loadConfig(resolveConfigPath(process.argv.slice(2)));

    const storage = new StorageService();
    try {
      await storage.assertWritableDirectory(config.downloadDirectory);
    } catch (error) {
      throw new ConfigError(
        "Specified download directory does not exist or is not writable.",
        { cause: error },
      );
    }

    // Initialize services
    logger.info("Initializing services...");

    const jobs = new AsyncQueue<Job>();
    const inbox = new AsyncQueue<RawNotification>();
    const subscriptions = new SubscriptionTable(config.downloadDirectory);
    const broker = new BrokerService({ url: config.broker, inbox });
    const ingestion = new IngestionService({
      queue: jobs,
      subscriptions,
      transport: broker,
      storage,
    });
    const pool = new WorkerPool({
      queue: jobs,
      subscriptions,
      storage,
      downloader: new DownloadService({ timeoutMs: config.downloadTimeoutMs }),
    });

    await broker.connect();

    ingestion.consume(inbox).catch((error) => {
      logger.error("Notification consumer stopped:", error);
    });

    for (const topic of config.topics) {
      await ingestion.addSubscription(topic);
    }

    pool.start();

    const app = createApp({
      ingestion,
      queue: jobs,
      workerCount: pool.workerCount,
      apiKey: config.apiKey,
    });

    // Start HTTP server
    const server = app.listen(config.port, config.host, () => {
      const address = server.address();
      const port =
        address && typeof address === "object" ? address.port : config.port;
      logger.info(`Server listening on ${config.host}:${port}`);
      logger.info("Server ready to accept requests");
    });

    const stopReporter = startQueueReporter(jobs, config.queueReportIntervalMs);

    runtime = { inbox, broker, server, stopReporter };
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);
  if (runtime) {
    runtime.stopReporter();
    runtime.inbox.close();
    await runtime.broker.disconnect();
    runtime.server.close();
  }
  process.exit(0);
}

// Graceful shutdown
for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    });
  });
}

startServer().catch((error) => {
  logger.error("Unexpected startup failure:", error);
  process.exit(1);
});
