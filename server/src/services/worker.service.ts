import os from "os";
import path from "path";
import defaultLogger, { type AppLogger } from "../utils/logger";
import { QueueClosedError, errorMessage } from "../utils/errors";
import {
  CANONICAL_RELATION,
  type Job,
  type JobLink,
  type LinkOutcome,
  type VerificationResult,
} from "../models/job.model";
import type { AsyncQueue } from "./queue.service";
import type { SubscriptionTable } from "./subscription.service";
import type { StorageService } from "./storage.service";
import type { Downloader, DownloadResult } from "./download.service";
import { verifyIntegrity } from "./integrity.service";

/** Parallelism minus two, reserved for ingestion and the control surface. */
export function defaultPoolSize(
  parallelism: number = os.availableParallelism(),
): number {
  return Math.max(Math.floor(parallelism) - 2, 1);
}

export interface WorkerPoolDeps {
  queue: AsyncQueue<Job>;
  subscriptions: SubscriptionTable;
  storage: StorageService;
  downloader: Downloader;
  logger?: AppLogger;
  now?: () => Date;
}

export class WorkerPool {
  private readonly queue: AsyncQueue<Job>;
  private readonly subscriptions: SubscriptionTable;
  private readonly storage: StorageService;
  private readonly downloader: Downloader;
  private readonly logger: AppLogger;
  private readonly now: () => Date;
  private readonly size: number;
  private workers: Promise<void>[] = [];

  constructor(deps: WorkerPoolDeps, size: number = defaultPoolSize()) {
    this.queue = deps.queue;
    this.subscriptions = deps.subscriptions;
    this.storage = deps.storage;
    this.downloader = deps.downloader;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
    this.size = Math.max(Math.floor(size), 1);
  }

  get workerCount(): number {
    return this.size;
  }

  get running(): boolean {
    return this.workers.length > 0;
  }

  start(): void {
    if (this.running) return;

    this.workers = Array.from({ length: this.size }, (_, index) =>
      this.runWorker(index + 1),
    );
    this.logger.info(`Started ${this.size} download workers`);
  }

  /**
   * Closes the job queue and resolves once every worker has drained the
   * remaining jobs and exited.
   */
  async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.workers);
    this.workers = [];
  }

  /**
   * Resolves the output path once, then handles every canonical link of the
   * job in order. A failing link never prevents the next one.
   */
  async processJob(job: Job): Promise<LinkOutcome[]> {
    const canonical = job.links.filter(
      (link) => link.relation === CANONICAL_RELATION,
    );
    if (canonical.length === 0) {
      this.logger.debug(`No canonical link in notification ${job.dataId}`, {
        jobId: job.id,
      });
      return [];
    }

    const directory = this.subscriptions.get(job.topic);
    const outputPath = this.storage.resolveOutputPath(
      directory,
      job.dataId,
      this.now(),
    );

    const outcomes: LinkOutcome[] = [];
    for (const link of canonical) {
      outcomes.push(await this.processLink(job, link, outputPath));
    }
    return outcomes;
  }

  private async runWorker(workerId: number): Promise<void> {
    for (;;) {
      let job: Job;
      try {
        job = await this.queue.dequeue();
      } catch (error) {
        if (error instanceof QueueClosedError) {
          this.logger.debug(`Worker ${workerId} stopped`);
          return;
        }
        throw error;
      }

      try {
        await this.processJob(job);
      } catch (error) {
        this.logger.error(`Worker ${workerId} failed on job ${job.id}:`, error);
      }
    }
  }

  private async processLink(
    job: Job,
    link: JobLink,
    outputPath: string,
  ): Promise<LinkOutcome> {
    const href = link.href.toString();
    const filename = path.basename(link.href.pathname);
    this.logger.info(`Attempting to download ${filename}`, { jobId: job.id });

    try {
      if (await this.storage.exists(outputPath)) {
        this.logger.info(`File ${filename} already downloaded. Skipping.`, {
          path: outputPath,
        });
        return { href, path: outputPath, status: "skipped-existing" };
      }
    } catch (error) {
      this.logger.error(`Error checking ${outputPath}:`, error);
      return { href, path: outputPath, status: "persist-failed" };
    }

    let download: DownloadResult;
    try {
      download = await this.downloader.fetch(link.href);
    } catch (error) {
      this.logger.error(`Error downloading ${href}`, {
        jobId: job.id,
        reason: errorMessage(error),
      });
      return { href, path: outputPath, status: "download-failed" };
    }

    const verification = verifyIntegrity(download.data, job.integrity);
    this.reportVerification(job, filename, verification);

    try {
      await this.storage.write(outputPath, download.data);
    } catch (error) {
      this.logger.error(`Error saving to disk: ${outputPath}`, {
        jobId: job.id,
        reason: errorMessage(error),
      });
      return { href, path: outputPath, status: "persist-failed", verification };
    }

    const sizeKb = (download.size / 1024).toFixed(2);
    const seconds = (download.elapsedMs / 1000).toFixed(2);
    this.logger.info(
      `Downloaded ${filename} of size ${sizeKb}KB in ${seconds} seconds`,
      { path: outputPath },
    );

    return { href, path: outputPath, status: "downloaded", verification };
  }

  private reportVerification(
    job: Job,
    filename: string,
    result: VerificationResult,
  ): void {
    if (result.status === "skipped") {
      this.logger.info(`Integrity check skipped for ${filename}`, {
        jobId: job.id,
        reason: result.reason,
        method: result.method,
      });
      return;
    }

    if (result.match) {
      this.logger.info(`Integrity verified for ${filename}`, {
        jobId: job.id,
        algorithm: result.algorithm,
      });
    } else {
      // Kept on disk regardless; a mismatch is only reported.
      this.logger.warn(`Integrity mismatch for ${filename}`, {
        jobId: job.id,
        algorithm: result.algorithm,
        expected: result.expected,
        actual: result.actual,
      });
    }
  }
}
