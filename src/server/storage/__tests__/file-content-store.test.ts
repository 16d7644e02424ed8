import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileContentStore } from "../file-content-store";
import { NotFoundError, StorageError, ValidationError } from "../../core/errors";

describe("FileContentStore", () => {
  let dataDir: string;
  let store: FileContentStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "quick-paste-content-"));
    store = new FileContentStore(dataDir);
    await store.init();
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("writes one extension-less file per paste", async () => {
    await store.put("abc12345", "print(1)");

    expect(await readFile(path.join(dataDir, "pastes", "abc12345"), "utf8")).toBe("print(1)");
  });

  it("returns content byte-for-byte", async () => {
    const content = "line one\r\n\ttabbed ünïcødé 世界\n\n";
    await store.put("abc12345", content);

    expect(await store.get("abc12345")).toBe(content);
  });

  it("reports missing content as not found", async () => {
    await expect(store.get("missing1")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes idempotently", async () => {
    await store.put("abc12345", "x");
    await store.delete("abc12345");
    await store.delete("abc12345");
    await store.delete("neverwas");

    await expect(store.get("abc12345")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("never overwrites an existing body", async () => {
    await store.put("abc12345", "first");

    await expect(store.put("abc12345", "second")).rejects.toBeInstanceOf(StorageError);
    expect(await store.get("abc12345")).toBe("first");
  });

  it("keeps ids that are not path-safe away from the filesystem", async () => {
    await expect(store.put("../escape", "x")).rejects.toBeInstanceOf(ValidationError);
    await expect(store.get("../index.json")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.delete("../index.json")).resolves.toBeUndefined();
  });
});
