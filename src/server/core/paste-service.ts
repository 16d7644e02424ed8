import type { ContentStore } from "../storage/content-store";
import {
  DEFAULT_LANGUAGE,
  isExpired,
  type IndexStore,
  type PasteRecord,
} from "../storage/index-store";
import {
  ExpiredError,
  NotFoundError,
  PayloadTooLargeError,
  ValidationError,
  isNotFound,
} from "./errors";
import { generateId, randomId, type IdSource } from "./id-generator";
import { serviceLogger as logger, logError } from "../utils/logger";

const HOUR_MS = 3_600_000;

/** A lone UTF-16 half cannot be written as UTF-8 and would come back as U+FFFD. */
const LONE_SURROGATE = /\p{Surrogate}/u;

export interface CreatePasteInput {
  content: string;
  language?: string | null;
  title?: string | null;
  /** Omitted → configured default; `null` → never expires; `0` → already expired. */
  expiresInHours?: number | null;
  burnAfterRead?: boolean;
}

export interface CreatedPaste {
  id: string;
  url: string;
  rawUrl: string;
  createdAt: Date;
  expiresAt: Date | null;
  language: string;
}

export interface PasteView {
  record: PasteRecord;
  /** Raw content, or the rendered page when `raw` was false. */
  body: string;
}

export interface PasteSummary {
  id: string;
  url: string;
  title: string | null;
  language: string;
  size: number;
  createdAt: Date;
  expiresAt: Date | null;
  burnAfterRead: boolean;
}

export interface PasteListing {
  pastes: PasteSummary[];
  /** Live pastes in total, before `limit` applies. */
  total: number;
}

/** Presentation Layer seam: record + content → markup. */
export type PageRenderer = (record: PasteRecord, content: string) => string;

export interface PasteServiceOptions {
  baseUrl: string;
  maxSize: number;
  defaultExpiryHours: number | null;
  render: PageRenderer;
  now?: () => Date;
  newId?: IdSource;
}

/**
 * Create / read / delete / list over a ContentStore and an IndexStore.
 *
 * Ordering keeps every indexed id backed by a body: create writes content
 * before the record, removal drops the record before the content.
 */
export class PasteService {
  private readonly content: ContentStore;
  private readonly index: IndexStore;
  private readonly options: PasteServiceOptions;
  private readonly now: () => Date;
  private readonly newId: IdSource;

  constructor(content: ContentStore, index: IndexStore, options: PasteServiceOptions) {
    this.content = content;
    this.index = index;
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomId;
  }

  async create(input: CreatePasteInput): Promise<CreatedPaste> {
    if (input.content.trim().length === 0) {
      throw new ValidationError("Content cannot be empty");
    }
    if (LONE_SURROGATE.test(input.content)) {
      throw new ValidationError("Content contains an unpaired UTF-16 surrogate");
    }
    const size = Buffer.byteLength(input.content, "utf8");
    if (size > this.options.maxSize) {
      throw new PayloadTooLargeError(this.options.maxSize);
    }

    const createdAt = this.now();
    const expiresAt = this.expiryFor(createdAt, input.expiresInHours);
    const id = generateId(candidate => this.index.has(candidate), this.newId);

    const record: PasteRecord = {
      id,
      title: input.title?.trim() || null,
      language: input.language?.trim().toLowerCase() || DEFAULT_LANGUAGE,
      createdAt,
      expiresAt,
      burnAfterRead: input.burnAfterRead ?? false,
      size,
    };

    await this.content.put(id, input.content);
    try {
      await this.index.upsert(record);
    } catch (error) {
      // body without a record is unreachable; drop it and report the index failure
      await this.content.delete(id).catch(cleanupError =>
        logError(logger, cleanupError, { id, context: "create-cleanup" }),
      );
      throw error;
    }

    logger.info({
      id,
      size,
      language: record.language,
      expiresAt,
      burnAfterRead: record.burnAfterRead,
    }, "Paste created");

    return {
      id,
      url: this.urlFor(id),
      rawUrl: `${this.urlFor(id)}/raw`,
      createdAt,
      expiresAt,
      language: record.language,
    };
  }

  async read(id: string, raw: boolean): Promise<PasteView> {
    const record = await this.liveRecord(id);

    let content: string;
    try {
      content = await this.content.get(id);
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn({ id }, "Indexed paste has no content, dropping record");
        await this.index.delete(id);
      }
      throw error;
    }

    const body = raw ? content : this.options.render(record, content);

    if (record.burnAfterRead) {
      // Only the reader that wins the index delete may see the paste.
      const claimed = await this.index.delete(id);
      if (!claimed) throw new NotFoundError();
      await this.content.delete(id);
      logger.info({ id }, "Paste burned after read");
    }

    return { record, body };
  }

  /** Metadata of a live paste; never burns. Backs HEAD requests. */
  async inspect(id: string): Promise<PasteRecord> {
    return this.liveRecord(id);
  }

  /** Resolves `true` when something was removed; absent ids are fine. */
  async delete(id: string): Promise<boolean> {
    const existed = await this.index.delete(id);
    await this.content.delete(id);
    if (existed) logger.info({ id }, "Paste deleted");
    return existed;
  }

  async list(options: { limit?: number } = {}): Promise<PasteListing> {
    const now = this.now();
    const live: PasteRecord[] = [];

    for (const record of this.index.list()) {
      if (isExpired(record, now)) await this.expire(record.id);
      else live.push(record);
    }

    const limited = options.limit === undefined ? live : live.slice(0, options.limit);
    return {
      pastes: limited.map(record => this.summarize(record)),
      total: live.length,
    };
  }

  /** Sweep every expired record; returns how many went. */
  async purgeExpired(): Promise<number> {
    const now = this.now();
    const expired = this.index.list().filter(record => isExpired(record, now));
    for (const record of expired) await this.expire(record.id);
    if (expired.length > 0) logger.info({ purged: expired.length }, "Purged expired pastes");
    return expired.length;
  }

  count(): number {
    return this.index.size();
  }

  urlFor(id: string): string {
    return `${this.options.baseUrl}/${id}`;
  }

  /* ── internals ───────────────────────────────────────────── */

  private async liveRecord(id: string): Promise<PasteRecord> {
    const record = this.index.get(id);
    if (!record) throw new NotFoundError();
    if (isExpired(record, this.now())) {
      const error = new ExpiredError(id);
      await this.expire(error.pasteId);
      logger.debug({ id: error.pasteId, expiresAt: record.expiresAt }, "Read of expired paste");
      throw error;
    }
    return record;
  }

  private async expire(id: string): Promise<void> {
    await this.index.delete(id);
    await this.content.delete(id);
    logger.debug({ id }, "Expired paste removed");
  }

  private expiryFor(createdAt: Date, hours: number | null | undefined): Date | null {
    const effective = hours === undefined ? this.options.defaultExpiryHours : hours;
    if (effective === null) return null;
    if (!Number.isFinite(effective) || effective < 0) {
      throw new ValidationError("expires_in_hours must be a non-negative number");
    }

    const expiresAt = new Date(createdAt.getTime() + effective * HOUR_MS);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new ValidationError("expires_in_hours is too large");
    }
    return expiresAt;
  }

  private summarize(record: PasteRecord): PasteSummary {
    return {
      id: record.id,
      url: this.urlFor(record.id),
      title: record.title,
      language: record.language,
      size: record.size,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
      burnAfterRead: record.burnAfterRead,
    };
  }
}
