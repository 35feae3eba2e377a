import type { SubscriptionMap } from "../models/job.model";

/**
 * Topic -> download directory mapping shared by the control surface and
 * the workers. Entries are only ever inserted or erased whole, never
 * edited in place, so a reader sees an entry either fully present or
 * fully absent.
 */
export class SubscriptionTable {
  private readonly entries = new Map<string, string>();

  constructor(
    readonly defaultDirectory: string,
    initial: Iterable<readonly [string, string]> = [],
  ) {
    for (const [topic, directory] of initial) {
      this.entries.set(topic, directory);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(topic: string): boolean {
    return this.entries.has(topic);
  }

  /** Directory for `topic`, or `fallback` when the topic is not subscribed. */
  get(topic: string, fallback: string = this.defaultDirectory): string {
    return this.entries.get(topic) ?? fallback;
  }

  /** Inserts `topic` unless it is already present; never overwrites. */
  add(
    topic: string,
    directory: string = this.defaultDirectory,
  ): { inserted: boolean } {
    if (this.entries.has(topic)) {
      return { inserted: false };
    }
    this.entries.set(topic, directory);
    return { inserted: true };
  }

  remove(topic: string): { removed: boolean } {
    return { removed: this.entries.delete(topic) };
  }

  snapshot(): SubscriptionMap {
    return Object.fromEntries(this.entries);
  }
}
