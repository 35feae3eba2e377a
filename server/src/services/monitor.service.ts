import defaultLogger, { type AppLogger } from "../utils/logger";

export interface SizedQueue {
  readonly size: number;
}

/**
 * Logs the queue backlog every `intervalMs`. Only reads `size`; returns a
 * function that stops the reporter.
 */
export function startQueueReporter(
  queue: SizedQueue,
  intervalMs: number,
  logger: AppLogger = defaultLogger,
): () => void {
  const report = () => logger.info(`Current queue size: ${queue.size}`);

  report();
  const timer = setInterval(report, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
