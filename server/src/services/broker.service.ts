import { createClient } from "redis";
import defaultLogger, { type AppLogger } from "../utils/logger";
import type { RawNotification } from "../models/notification.model";
import type { AsyncQueue } from "./queue.service";
import type { NotificationTransport } from "./ingestion.service";

type SubscriberClient = ReturnType<typeof createClient>;

export function isPatternTopic(topic: string): boolean {
  return /[*?[]/.test(topic);
}

/**
 * Redis pub/sub transport. Delivered messages are not handled inline; they
 * are pushed onto the notification inbox for the ingestion consumer.
 */
export class BrokerService implements NotificationTransport {
  private readonly subscriber: SubscriberClient;
  private readonly inbox: AsyncQueue<RawNotification>;
  private readonly logger: AppLogger;
  private isConnected: boolean = false;

  constructor(options: {
    url: string;
    inbox: AsyncQueue<RawNotification>;
    logger?: AppLogger;
  }) {
    this.inbox = options.inbox;
    this.logger = options.logger ?? defaultLogger;
    this.subscriber = createClient({ url: options.url });

    this.subscriber.on("error", (err) =>
      this.logger.error("Redis Subscriber Error:", err),
    );
  }

  get connected(): boolean {
    return this.isConnected;
  }

  async connect(): Promise<void> {
    try {
      this.logger.info("Connecting...");
      await this.subscriber.connect();
      this.isConnected = true;
      this.logger.info("BrokerService connected to Redis");
    } catch (error) {
      this.logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.subscriber.quit();
      this.isConnected = false;
      this.logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      this.logger.error("Error disconnecting from Redis:", error);
    }
  }

  async subscribe(topic: string): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    const listener = (message: string, channel: string) =>
      this.deliver(channel, message);

    try {
      if (isPatternTopic(topic)) {
        await this.subscriber.pSubscribe(topic, listener);
      } else {
        await this.subscriber.subscribe(topic, listener);
      }
      this.logger.info(`Subscribed to ${topic}`);
    } catch (error) {
      this.logger.error(`Error subscribing to ${topic}:`, error);
      throw error;
    }
  }

  async unsubscribe(topic: string): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      if (isPatternTopic(topic)) {
        await this.subscriber.pUnsubscribe(topic);
      } else {
        await this.subscriber.unsubscribe(topic);
      }
      this.logger.info(`Unsubscribed from ${topic}`);
    } catch (error) {
      this.logger.error(`Error unsubscribing from ${topic}:`, error);
      throw error;
    }
  }

  private deliver(channel: string, message: string): void {
    try {
      this.inbox.enqueue({ topic: channel, payload: message });
    } catch (error) {
      this.logger.error(`Dropped message from ${channel}:`, error);
    }
  }
}
