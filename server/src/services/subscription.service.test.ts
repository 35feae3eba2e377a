import { describe, it, expect } from "vitest";
import { SubscriptionTable } from "./subscription.service";

describe("SubscriptionTable", () => {
  it("seeds initial entries", () => {
    const table = new SubscriptionTable("/data", [
      ["a", "/data"],
      ["b", "/other"],
    ]);

    expect(table.snapshot()).toEqual({ a: "/data", b: "/other" });
    expect(table.size).toBe(2);
  });

  it("returns the fallback directory for unknown topics", () => {
    const table = new SubscriptionTable("/data");

    expect(table.get("missing")).toBe("/data");
    expect(table.get("missing", "/elsewhere")).toBe("/elsewhere");
  });

  it("adds a topic once and never overwrites it", () => {
    const table = new SubscriptionTable("/data");

    expect(table.add("a", "/first")).toEqual({ inserted: true });
    expect(table.add("a", "/second")).toEqual({ inserted: false });
    expect(table.get("a")).toBe("/first");
    expect(table.size).toBe(1);
  });

  it("uses the default directory when none is given", () => {
    const table = new SubscriptionTable("/data");
    table.add("a");

    expect(table.snapshot()).toEqual({ a: "/data" });
  });

  it("reports whether a removal found the topic", () => {
    const table = new SubscriptionTable("/data", [["a", "/x"]]);

    expect(table.remove("a")).toEqual({ removed: true });
    expect(table.remove("a")).toEqual({ removed: false });
    expect(table.get("a")).toBe("/data");
  });

  it("hands out snapshots that are detached from the table", () => {
    const table = new SubscriptionTable("/data", [["a", "/x"]]);
    const snapshot = table.snapshot();
    snapshot.b = "/y";
    table.remove("a");

    expect(snapshot).toEqual({ a: "/x", b: "/y" });
    expect(table.snapshot()).toEqual({});
  });

  it("never exposes a partial entry to readers interleaved with writes", async () => {
    const table = new SubscriptionTable("/default");
    const seen = new Set<string>();

    const readers = Array.from({ length: 50 }, async () => {
      for (let i = 0; i < 20; i++) {
        seen.add(table.get("a"));
        await Promise.resolve();
      }
    });
    const writer = (async () => {
      for (let i = 0; i < 20; i++) {
        table.add("a", "/topic-a");
        await Promise.resolve();
        table.remove("a");
        await Promise.resolve();
      }
    })();

    await Promise.all([...readers, writer]);

    for (const directory of seen) {
      expect(["/default", "/topic-a"]).toContain(directory);
    }
  });
});
