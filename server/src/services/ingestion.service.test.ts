import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  IngestionService,
  type NotificationTransport,
  parseNotification,
} from "./ingestion.service";
import { AsyncQueue } from "./queue.service";
import { SubscriptionTable } from "./subscription.service";
import { StorageService } from "./storage.service";
import type { Job } from "../models/job.model";
import type { RawNotification } from "../models/notification.model";
import { InvalidDirectoryError, NotificationParseError } from "../utils/errors";

class FakeTransport implements NotificationTransport {
  readonly subscribed: string[] = [];
  readonly unsubscribed: string[] = [];
  failNext = false;

  async subscribe(topic: string): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("broker unavailable");
    }
    this.subscribed.push(topic);
  }

  async unsubscribe(topic: string): Promise<void> {
    this.unsubscribed.push(topic);
  }
}

function createTestLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const notification = {
  id: "3f1c",
  properties: {
    data_id: "urn:x:1",
    pubtime: "2024-03-05T11:58:00Z",
    integrity: { method: "sha256", value: "q1MKE+RZFJgrefm34/uplM/R8/si9xzqGvvwK0YMbR0=" },
  },
  links: [
    { rel: "canonical", href: "http://h/f.bin", type: "application/bufr" },
    { rel: "via", href: "http://h/about" },
  ],
};

describe("parseNotification", () => {
  it("builds a frozen job from the canonical links of the payload", () => {
    const receivedAt = new Date(2024, 2, 5);
    const job = parseNotification("a", JSON.stringify(notification), receivedAt);

    expect(job.topic).toBe("a");
    expect(job.dataId).toBe("urn:x:1");
    expect(job.links.map((l) => [l.relation, l.href.toString()])).toEqual([
      ["canonical", "http://h/f.bin"],
    ]);
    expect(job.integrity).toEqual({
      method: "sha256",
      expectedValueBase64: "q1MKE+RZFJgrefm34/uplM/R8/si9xzqGvvwK0YMbR0=",
    });
    expect(job.receivedAt).toBe(receivedAt);
    expect(job.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.links)).toBe(true);
  });

  it("accepts buffers and a missing integrity block", () => {
    const { integrity, ...properties } = notification.properties;
    const job = parseNotification(
      "a",
      Buffer.from(JSON.stringify({ ...notification, properties })),
    );

    expect(integrity.method).toBe("sha256");
    expect(job.integrity).toBeUndefined();
  });

  it("ignores relative hrefs on links that are not canonical", () => {
    const job = parseNotification(
      "a",
      JSON.stringify({
        ...notification,
        links: [
          { rel: "canonical", href: "http://h/f.bin" },
          { rel: "related", href: "../metadata/record.json" },
        ],
      }),
    );

    expect(job.links.map((l) => l.href.toString())).toEqual([
      "http://h/f.bin",
    ]);
  });

  it("reports a canonical link without an absolute URL and keeps the rest", () => {
    const onInvalidLink = vi.fn();

    const job = parseNotification(
      "a",
      JSON.stringify({
        ...notification,
        links: [
          { rel: "canonical", href: "/relative/f.bin" },
          { rel: "canonical", href: "http://mirror/f.bin" },
        ],
      }),
      new Date(),
      onInvalidLink,
    );

    expect(job.links.map((l) => l.href.toString())).toEqual([
      "http://mirror/f.bin",
    ]);
    expect(onInvalidLink).toHaveBeenCalledTimes(1);
    expect(onInvalidLink).toHaveBeenCalledWith({
      rel: "canonical",
      href: "/relative/f.bin",
    });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseNotification("a", "{not json")).toThrow(
      NotificationParseError,
    );
  });

  it("rejects payloads without a data id or links", () => {
    expect(() =>
      parseNotification("a", JSON.stringify({ properties: {}, links: [] })),
    ).toThrow(/data_id/);
    expect(() =>
      parseNotification(
        "a",
        JSON.stringify({ properties: { data_id: "x" } }),
      ),
    ).toThrow(/links/);
  });
});

describe("IngestionService", () => {
  let root: string;
  let queue: AsyncQueue<Job>;
  let subscriptions: SubscriptionTable;
  let transport: FakeTransport;
  let logger: ReturnType<typeof createTestLogger>;
  let ingestion: IngestionService;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "ingestion-test-"));
    queue = new AsyncQueue<Job>();
    subscriptions = new SubscriptionTable(root);
    transport = new FakeTransport();
    logger = createTestLogger();
    ingestion = new IngestionService({
      queue,
      subscriptions,
      transport,
      storage: new StorageService(),
      logger,
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("onMessage", () => {
    it("enqueues one job per valid message", async () => {
      const job = ingestion.onMessage("a", JSON.stringify(notification));

      expect(job).not.toBeNull();
      expect(queue.size).toBe(1);
      expect(await queue.dequeue()).toBe(job);
    });

    it("logs and drops a malformed message, then keeps accepting", () => {
      expect(ingestion.onMessage("a", "garbage")).toBeNull();
      expect(logger.error).toHaveBeenCalledWith("Malformed notification", {
        topic: "a",
        reason: "Payload is not valid JSON",
      });

      ingestion.onMessage("a", JSON.stringify(notification));
      expect(queue.size).toBe(1);
    });

    it("enqueues a message whose related link is relative", async () => {
      const job = ingestion.onMessage(
        "a",
        JSON.stringify({
          properties: { data_id: "urn:x:1" },
          links: [
            { rel: "canonical", href: "http://h/f.bin" },
            { rel: "related", href: "../metadata/record.json" },
          ],
        }),
      );

      expect(job).not.toBeNull();
      expect(queue.size).toBe(1);
      const queued = await queue.dequeue();
      expect(queued.links.map((l) => l.href.toString())).toEqual([
        "http://h/f.bin",
      ]);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("warns about a bad canonical link without rejecting the message", () => {
      const job = ingestion.onMessage(
        "a",
        JSON.stringify({
          properties: { data_id: "urn:x:1" },
          links: [{ rel: "canonical", href: "not a url" }],
        }),
      );

      expect(job?.links).toEqual([]);
      expect(queue.size).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Dropping canonical link with invalid href",
        { topic: "a", href: "not a url" },
      );
    });

    it("enqueues duplicates as separate jobs", () => {
      ingestion.onMessage("a", JSON.stringify(notification));
      ingestion.onMessage("a", JSON.stringify(notification));

      expect(queue.size).toBe(2);
    });

    it("does not throw once the job queue is closed", () => {
      queue.close();

      expect(ingestion.onMessage("a", JSON.stringify(notification))).toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        "Could not enqueue job",
        expect.objectContaining({ topic: "a", dataId: "urn:x:1" }),
      );
    });
  });

  describe("consume", () => {
    it("drains the inbox in order until it is closed", async () => {
      const inbox = new AsyncQueue<RawNotification>();
      const done = ingestion.consume(inbox);

      inbox.enqueue({ topic: "t1", payload: JSON.stringify(notification) });
      inbox.enqueue({ topic: "t2", payload: "broken" });
      inbox.enqueue({ topic: "t3", payload: JSON.stringify(notification) });
      inbox.close();
      await done;

      expect(queue.size).toBe(2);
      expect((await queue.dequeue()).topic).toBe("t1");
      expect((await queue.dequeue()).topic).toBe("t3");
    });
  });

  describe("addSubscription", () => {
    it("subscribes only on first insertion", async () => {
      const first = await ingestion.addSubscription("a");
      const second = await ingestion.addSubscription("a");

      expect(first).toEqual({ changed: true, subscriptions: { a: root } });
      expect(second).toEqual({ changed: false, subscriptions: { a: root } });
      expect(transport.subscribed).toEqual(["a"]);
      expect(logger.info).toHaveBeenCalledWith("Topic a already subscribed");
    });

    it("stores a validated per-topic directory", async () => {
      const custom = path.join(root, "custom");
      await fs.mkdir(custom);

      const result = await ingestion.addSubscription("b", custom);

      expect(result.subscriptions).toEqual({ b: custom });
    });

    it("rejects a directory that does not exist", async () => {
      await expect(
        ingestion.addSubscription("b", path.join(root, "missing")),
      ).rejects.toBeInstanceOf(InvalidDirectoryError);

      expect(subscriptions.has("b")).toBe(false);
      expect(transport.subscribed).toEqual([]);
    });

    it("rolls back when the broker subscribe fails", async () => {
      transport.failNext = true;

      await expect(ingestion.addSubscription("a")).rejects.toThrow(
        "broker unavailable",
      );
      expect(subscriptions.has("a")).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith("Rolled back subscription a", {
        reason: "broker unavailable",
      });
    });

    it("makes a concurrent add wait for the subscribe in flight", async () => {
      let release: () => void = () => {};
      transport.subscribe = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      );

      const first = ingestion.addSubscription("a");
      const second = ingestion.addSubscription("a");
      let secondSettled = false;
      void second.then(() => {
        secondSettled = true;
      });
      await new Promise((resolve) => setImmediate(resolve));

      expect(secondSettled).toBe(false);
      release();

      expect(await first).toEqual({ changed: true, subscriptions: { a: root } });
      expect(await second).toEqual({ changed: false, subscriptions: { a: root } });
      expect(transport.subscribe).toHaveBeenCalledTimes(1);
    });

    it("fails a concurrent add when the subscribe in flight is rolled back", async () => {
      let fail: (error: Error) => void = () => {};
      transport.subscribe = vi.fn(
        () =>
          new Promise<void>((_resolve, reject) => {
            fail = reject;
          }),
      );

      const first = ingestion.addSubscription("a");
      const second = ingestion.addSubscription("a");
      const firstResult = expect(first).rejects.toThrow("broker unavailable");
      const secondResult = expect(second).rejects.toThrow("broker unavailable");
      await new Promise((resolve) => setImmediate(resolve));
      fail(new Error("broker unavailable"));

      await firstResult;
      await secondResult;
      expect(subscriptions.has("a")).toBe(false);
      expect(logger.info).not.toHaveBeenCalledWith("Topic a already subscribed");
    });
  });

  describe("deleteSubscription", () => {
    it("removes a known topic and unsubscribes", async () => {
      await ingestion.addSubscription("a");

      const result = await ingestion.deleteSubscription("a");

      expect(result).toEqual({ changed: true, subscriptions: {} });
      expect(transport.unsubscribed).toEqual(["a"]);
    });

    it("still unsubscribes an unknown topic and reports it as not found", async () => {
      await ingestion.addSubscription("b");

      const result = await ingestion.deleteSubscription("a");

      expect(result).toEqual({ changed: false, subscriptions: { b: root } });
      expect(transport.unsubscribed).toEqual(["a"]);
      expect(logger.info).toHaveBeenCalledWith("Topic a not found", {
        subscribed: ["b"],
      });
    });
  });

  it("lists a snapshot of the table", async () => {
    await ingestion.addSubscription("a");
    await ingestion.addSubscription("b");

    expect(ingestion.listSubscriptions()).toEqual({ a: root, b: root });
  });
});
