import type { Request, Response, NextFunction, RequestHandler } from "express";
import defaultLogger, { type AppLogger } from "../utils/logger";

/**
 * Bearer-token guard for the control surface. Without a configured key the
 * routes are left open, matching a loopback-only deployment.
 */
export function createAuthMiddleware(
  apiKey: string | undefined,
  logger: AppLogger = defaultLogger,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn(
        "Authentication failed: missing or invalid authorization header",
      );
      res
        .status(401)
        .json({ error: "Unauthorized: missing or invalid authorization header" });
      return;
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix

    if (token !== apiKey) {
      logger.warn("Authentication failed: invalid API key");
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
