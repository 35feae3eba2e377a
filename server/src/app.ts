import express, { type Express, type Request, type Response } from "express";
import cors from "cors";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { createSubscriptionController } from "./controllers/subscription.controller";
import type { IngestionService } from "./services/ingestion.service";
import type { SizedQueue } from "./services/monitor.service";
import defaultLogger, { type AppLogger } from "./utils/logger";

export interface AppDeps {
  ingestion: IngestionService;
  queue: SizedQueue;
  workerCount: number;
  apiKey?: string;
  logger?: AppLogger;
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? defaultLogger;
  const subscriptions = createSubscriptionController(deps.ingestion, logger);
  const auth = createAuthMiddleware(deps.apiKey, logger);

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Public routes
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      queueSize: deps.queue.size,
      workers: deps.workerCount,
      subscriptions: Object.keys(deps.ingestion.listSubscriptions()).length,
    });
  });

  // Control surface
  app.get("/wis2/subscriptions/list", auth, subscriptions.list);
  app.get("/wis2/subscriptions/add", auth, subscriptions.add);
  app.get("/wis2/subscriptions/delete", auth, subscriptions.remove);

  return app;
}
