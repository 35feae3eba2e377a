import Joi from "joi";
import { v4 as uuidv4 } from "uuid";
import defaultLogger, { type AppLogger } from "../utils/logger";
import {
  NotificationParseError,
  QueueClosedError,
  errorMessage,
} from "../utils/errors";
import {
  CANONICAL_RELATION,
  type Job,
  type JobLink,
  type SubscriptionMap,
} from "../models/job.model";
import type {
  NotificationLink,
  NotificationPayload,
  RawNotification,
} from "../models/notification.model";
import type { AsyncQueue } from "./queue.service";
import type { SubscriptionTable } from "./subscription.service";
import type { StorageService } from "./storage.service";

export interface NotificationTransport {
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
}

const notificationSchema = Joi.object<NotificationPayload>({
  id: Joi.string(),
  properties: Joi.object({
    data_id: Joi.string().min(1).required(),
    pubtime: Joi.string(),
    integrity: Joi.object({
      method: Joi.string().required(),
      value: Joi.string().required(),
    }).unknown(true),
  })
    .unknown(true)
    .required(),
  links: Joi.array()
    .items(
      Joi.object({
        rel: Joi.string().required(),
        href: Joi.string().required(),
        type: Joi.string(),
        length: Joi.number(),
      }).unknown(true),
    )
    .required(),
}).unknown(true);

function toJobLink(link: NotificationLink): JobLink | null {
  try {
    return Object.freeze({ relation: link.rel, href: new URL(link.href) });
  } catch {
    return null;
  }
}

/**
 * Parses a raw broker payload into an immutable Job.
 *
 * Only canonical links are kept. A canonical link whose href is not an
 * absolute URL is handed to `onInvalidLink` and left out of the job.
 */
export function parseNotification(
  topic: string,
  payload: string | Buffer,
  receivedAt: Date = new Date(),
  onInvalidLink?: (link: NotificationLink) => void,
): Job {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString());
  } catch (error) {
    throw new NotificationParseError(topic, "Payload is not valid JSON", {
      cause: error,
    });
  }

  const { error, value } = notificationSchema.validate(parsed);
  if (error || !value) {
    throw new NotificationParseError(
      topic,
      error ? error.message : "Empty notification",
      { cause: error },
    );
  }

  const { properties, links } = value;

  const jobLinks: JobLink[] = [];
  for (const link of links) {
    if (link.rel !== CANONICAL_RELATION) continue;
    const jobLink = toJobLink(link);
    if (jobLink) {
      jobLinks.push(jobLink);
    } else {
      onInvalidLink?.(link);
    }
  }

  return Object.freeze({
    id: uuidv4(),
    topic,
    dataId: properties.data_id,
    links: Object.freeze(jobLinks),
    integrity: properties.integrity
      ? Object.freeze({
          method: properties.integrity.method,
          expectedValueBase64: properties.integrity.value,
        })
      : undefined,
    receivedAt,
  });
}

export interface IngestionServiceDeps {
  queue: AsyncQueue<Job>;
  subscriptions: SubscriptionTable;
  transport: NotificationTransport;
  storage: StorageService;
  logger?: AppLogger;
}

export interface SubscriptionChange {
  changed: boolean;
  subscriptions: SubscriptionMap;
}

/**
 * Turns broker notifications into jobs and owns the control operations that
 * change what the broker delivers.
 */
export class IngestionService {
  private readonly queue: AsyncQueue<Job>;
  private readonly subscriptions: SubscriptionTable;
  private readonly transport: NotificationTransport;
  private readonly storage: StorageService;
  private readonly logger: AppLogger;
  private readonly pendingSubscribes = new Map<string, Promise<void>>();

  constructor(deps: IngestionServiceDeps) {
    this.queue = deps.queue;
    this.subscriptions = deps.subscriptions;
    this.transport = deps.transport;
    this.storage = deps.storage;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Never throws: a malformed payload is logged and dropped so later
   * messages keep flowing.
   */
  onMessage(topic: string, payload: string | Buffer): Job | null {
    this.logger.info("Message received", { topic });

    let job: Job;
    try {
      job = parseNotification(topic, payload, new Date(), (link) =>
        this.logger.warn("Dropping canonical link with invalid href", {
          topic,
          href: link.href,
        }),
      );
    } catch (error) {
      this.logger.error("Malformed notification", {
        topic,
        reason: errorMessage(error),
      });
      return null;
    }

    try {
      this.queue.enqueue(job);
    } catch (error) {
      this.logger.error("Could not enqueue job", {
        topic,
        dataId: job.dataId,
        reason: errorMessage(error),
      });
      return null;
    }

    return job;
  }

  /** Drains the notification inbox until it is closed. */
  async consume(inbox: AsyncQueue<RawNotification>): Promise<void> {
    for (;;) {
      let message: RawNotification;
      try {
        message = await inbox.dequeue();
      } catch (error) {
        if (error instanceof QueueClosedError) return;
        throw error;
      }
      this.onMessage(message.topic, message.payload);
    }
  }

  listSubscriptions(): SubscriptionMap {
    return this.subscriptions.snapshot();
  }

  /**
   * Adds `topic` and subscribes at the broker, only when the topic is new.
   * A failed broker subscribe rolls the insertion back and rethrows.
   *
   * A second add of a topic whose subscribe is still in flight waits for it,
   * so it never reports a subscription that is later rolled back.
   */
  async addSubscription(
    topic: string,
    directory?: string,
  ): Promise<SubscriptionChange> {
    if (this.subscriptions.has(topic)) {
      return this.alreadySubscribed(topic);
    }

    if (directory !== undefined) {
      await this.storage.assertWritableDirectory(directory);
    }

    const { inserted } = this.subscriptions.add(topic, directory);
    if (!inserted) {
      return this.alreadySubscribed(topic);
    }

    const subscribing = this.transport.subscribe(topic);
    this.pendingSubscribes.set(topic, subscribing);
    try {
      await subscribing;
    } catch (error) {
      this.subscriptions.remove(topic);
      this.logger.warn(`Rolled back subscription ${topic}`, {
        reason: errorMessage(error),
      });
      throw error;
    } finally {
      this.pendingSubscribes.delete(topic);
    }

    this.logger.info(`Added subscription ${topic}`, {
      directory: this.subscriptions.get(topic),
    });
    return { changed: true, subscriptions: this.listSubscriptions() };
  }

  /**
   * Unsubscribes at the broker whether or not the topic is known locally,
   * then drops it from the table.
   */
  async deleteSubscription(topic: string): Promise<SubscriptionChange> {
    const { removed } = this.subscriptions.remove(topic);
    if (!removed) {
      this.logger.info(`Topic ${topic} not found`, {
        subscribed: Object.keys(this.listSubscriptions()),
      });
    }

    await this.transport.unsubscribe(topic);

    if (removed) {
      this.logger.info(`Removed subscription ${topic}`);
    }
    return { changed: removed, subscriptions: this.listSubscriptions() };
  }

  private async alreadySubscribed(topic: string): Promise<SubscriptionChange> {
    const pending = this.pendingSubscribes.get(topic);
    if (pending) {
      await pending;
    }
    this.logger.info(`Topic ${topic} already subscribed`);
    return { changed: false, subscriptions: this.listSubscriptions() };
  }
}
