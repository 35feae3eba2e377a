import { Request, Response } from "express";
import Joi from "joi";
import defaultLogger, { type AppLogger } from "../utils/logger";
import { InvalidDirectoryError } from "../utils/errors";
import type { IngestionService } from "../services/ingestion.service";

interface AddQuery {
  topic: string;
  directory?: string;
}

interface DeleteQuery {
  topic: string;
}

// Validation schemas
const topicSchema = Joi.string().trim().min(1).max(1024).required();

const addQuerySchema = Joi.object<AddQuery>({
  topic: topicSchema,
  directory: Joi.string().min(1).optional(),
}).unknown(true);

const deleteQuerySchema = Joi.object<DeleteQuery>({
  topic: topicSchema,
}).unknown(true);

function isMissingTopic(error: Joi.ValidationError): boolean {
  return error.details.some((detail) => detail.path[0] === "topic");
}

export interface SubscriptionController {
  list(req: Request, res: Response): Promise<void>;
  add(req: Request, res: Response): Promise<void>;
  remove(req: Request, res: Response): Promise<void>;
}

export function createSubscriptionController(
  ingestion: IngestionService,
  logger: AppLogger = defaultLogger,
): SubscriptionController {
  return {
    async list(_req: Request, res: Response): Promise<void> {
      res.status(200).json(ingestion.listSubscriptions());
    },

    async add(req: Request, res: Response): Promise<void> {
      const { error, value } = addQuerySchema.validate(req.query);
      if (error || !value) {
        res.status(400).json(
          error && !isMissingTopic(error)
            ? { error: "Invalid request", details: error.message }
            : { error: "No topic passed" },
        );
        return;
      }

      try {
        const result = await ingestion.addSubscription(
          value.topic,
          value.directory,
        );
        res.status(200).json(result.subscriptions);
      } catch (err) {
        if (err instanceof InvalidDirectoryError) {
          res.status(400).json({ error: err.message });
          return;
        }
        logger.error("Error in addSubscription controller:", err);
        res.status(502).json({ error: "Broker subscribe failed" });
      }
    },

    async remove(req: Request, res: Response): Promise<void> {
      const { error, value } = deleteQuerySchema.validate(req.query);
      if (error || !value) {
        res.status(400).json({ error: "No topic passed" });
        return;
      }

      try {
        const result = await ingestion.deleteSubscription(value.topic);
        res.status(200).json(result.subscriptions);
      } catch (err) {
        logger.error("Error in deleteSubscription controller:", err);
        res.status(502).json({ error: "Broker unsubscribe failed" });
      }
    },
  };
}
