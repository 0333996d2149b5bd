import { describe, expect, it } from "vitest";
import { InconsistentStateError } from "../src/core/errors";
import { InMemoryEntryStore } from "../src/store";
import type { Entry } from "../src/types";

function entry(entryUrl: string, title = entryUrl): Entry {
  return { entryUrl, title, publishedOn: new Date(Date.UTC(2024, 0, 1)), attachments: [] };
}

describe("InMemoryEntryStore", () => {
  it("keeps one entry per URL, the last one registered", () => {
    const store = new InMemoryEntryStore();
    store.register(entry("https://x/a", "old"));
    store.register(entry("https://x/b"));
    store.register(entry("https://x/a", "new"));

    expect(store.size).toBe(2);
    expect(store.values().map((item) => item.title)).toEqual(["https://x/b", "new"]);
  });

  it("appends attachments in call order", () => {
    const store = new InMemoryEntryStore();
    store.register(entry("https://x/a"));
    store.appendAttachment("https://x/a", { filename: "A", url: "https://x/a.pdf" });
    store.appendAttachment("https://x/a", { filename: "B", url: "https://x/b.pdf" });

    expect(store.get("https://x/a")?.attachments.map((attachment) => attachment.filename)).toEqual(["A", "B"]);
  });

  it("rejects attachments for unknown URLs", () => {
    const store = new InMemoryEntryStore();
    expect(() => store.appendAttachment("https://x/missing", { filename: "A", url: "" })).toThrow(
      InconsistentStateError,
    );
  });

  it("refuses mutation once frozen", () => {
    const store = new InMemoryEntryStore();
    store.register(entry("https://x/a"));
    const snapshot = store.freeze();

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
    expect(() => store.register(entry("https://x/b"))).toThrow("cannot register https://x/b: store is frozen");
    expect(() => store.appendAttachment("https://x/a", { filename: "A", url: "" })).toThrow(InconsistentStateError);
  });
});
