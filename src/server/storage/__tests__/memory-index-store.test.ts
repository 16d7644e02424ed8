import { describe, expect, it } from "vitest";

import { MemoryIndexStore } from "../memory-index-store";
import type { PasteRecord } from "../index-store";
import { StorageError } from "../../core/errors";

const record = (id: string, createdAt: string): PasteRecord => ({
  id,
  title: null,
  language: "plaintext",
  createdAt: new Date(createdAt),
  expiresAt: null,
  burnAfterRead: false,
  size: 1,
});

class FailingIndexStore extends MemoryIndexStore {
  failing = false;

  protected override async persist(): Promise<void> {
    if (this.failing) throw new StorageError("disk full");
  }
}

describe("MemoryIndexStore", () => {
  it("lists newest first, breaking ties by id", () => {
    const store = new MemoryIndexStore([
      record("bbbb2222", "2026-01-01T10:00:00.000Z"),
      record("cccc3333", "2026-01-03T10:00:00.000Z"),
      record("aaaa1111", "2026-01-01T10:00:00.000Z"),
    ]);

    expect(store.list().map(r => r.id)).toEqual(["cccc3333", "aaaa1111", "bbbb2222"]);
  });

  it("lets exactly one of two concurrent deletes win", async () => {
    const store = new MemoryIndexStore([record("aaaa1111", "2026-01-01T10:00:00.000Z")]);

    const results = await Promise.all([store.delete("aaaa1111"), store.delete("aaaa1111")]);

    expect(results).toEqual([true, false]);
    expect(store.has("aaaa1111")).toBe(false);
  });

  it("rolls a mutation back when persisting fails", async () => {
    const existing = record("aaaa1111", "2026-01-01T10:00:00.000Z");
    const store = new FailingIndexStore([existing]);
    store.failing = true;

    await expect(store.upsert(record("bbbb2222", "2026-01-02T10:00:00.000Z"))).rejects.toThrow("disk full");
    await expect(store.delete("aaaa1111")).rejects.toThrow("disk full");

    expect(store.has("bbbb2222")).toBe(false);
    expect(store.get("aaaa1111")).toBe(existing);
    expect(store.size()).toBe(1);
  });
});
