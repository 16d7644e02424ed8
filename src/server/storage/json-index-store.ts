import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_LANGUAGE, type PasteRecord } from "./index-store";
import { MemoryIndexStore } from "./memory-index-store";
import { errnoCode } from "./file-content-store";
import { StorageError } from "../core/errors";
import { storeLogger as logger, logPerformance } from "../utils/logger";

/* ────────────────────────────────────────────────────────────── */
/*  <dataDir>/index.json                                          */
/*    {                                                           */
/*      "k3x9a0qz": {                                             */
/*        "title": "notes", "language": "python",                 */
/*        "created_at": "2026-01-01T10:00:00.000Z",               */
/*        "expires_at": null, "burn_after_read": false,           */
/*        "size": 8                                               */
/*      }, …                                                      */
/*    }                                                           */
/*  Whole document rewritten after each mutation (tmp + rename).  */
/* ────────────────────────────────────────────────────────────── */

export const INDEX_FILE = "index.json";

/** Timestamps written without an offset are UTC. */
const timestamp = z.string().transform((value, ctx) => {
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(value);
  const date = new Date(hasZone ? value : `${value}Z`);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp '${value}'` });
    return z.NEVER;
  }
  return date;
});

const storedRecord = z.object({
  title: z.string().nullish(),
  language: z.string().nullish(),
  created_at: timestamp,
  expires_at: timestamp.nullish(),
  burn_after_read: z.boolean().default(false),
  size: z.number().int().nonnegative().default(0),
});

const storedIndex = z.record(z.string(), storedRecord);

type StoredRecord = z.input<typeof storedRecord>;

export const toStored = (record: PasteRecord): StoredRecord => ({
  title: record.title,
  language: record.language,
  created_at: record.createdAt.toISOString(),
  expires_at: record.expiresAt ? record.expiresAt.toISOString() : null,
  burn_after_read: record.burnAfterRead,
  size: record.size,
});

export function parseIndex(json: string): PasteRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new StorageError("Index file is not valid JSON", error);
  }

  const parsed = storedIndex.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StorageError(`Index file is malformed at ${issue?.path.join(".") ?? "root"}: ${issue?.message ?? "unknown"}`);
  }

  return Object.entries(parsed.data).map(([id, r]) => ({
    id,
    title: r.title ?? null,
    language: r.language || DEFAULT_LANGUAGE,
    createdAt: r.created_at,
    expiresAt: r.expires_at ?? null,
    burnAfterRead: r.burn_after_read,
    size: r.size,
  }));
}

/**
 * Index persisted as one JSON document. The whole map lives in RAM; disk is
 * only read by `create` and written after mutations.
 */
export class JsonIndexStore extends MemoryIndexStore {
  private readonly file: string;
  private flushCount = 0;

  private constructor(file: string, records: PasteRecord[]) {
    super(records);
    this.file = file;
  }

  /* ---------- factory: load whatever is already on disk -------- */
  static async create(dataDir: string): Promise<JsonIndexStore> {
    const startTime = Date.now();
    const file = path.join(dataDir, INDEX_FILE);

    try {
      await mkdir(dataDir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create ${dataDir}`, error);
    }

    let records: PasteRecord[] = [];
    try {
      records = parseIndex(await readFile(file, "utf8"));
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        logger.info({ file }, "No index yet, starting empty");
      } else if (error instanceof StorageError) {
        throw error;
      } else {
        throw new StorageError(`Failed to read ${file}`, error);
      }
    }

    const store = new JsonIndexStore(file, records);
    logPerformance(logger, "index-load", startTime, { file, records: records.length });
    return store;
  }

  protected override async persist(): Promise<void> {
    const doc: Record<string, StoredRecord> = {};
    for (const record of this.records.values()) doc[record.id] = toStored(record);

    const tmp = `${this.file}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(doc, null, 2), "utf8");
      await rename(tmp, this.file);
    } catch (error) {
      throw new StorageError(`Failed to write ${this.file}`, error);
    }

    this.flushCount++;
    logger.debug({ file: this.file, records: this.records.size, flushes: this.flushCount }, "Index flushed");
  }
}
