/** Metadata for one paste; the body lives in the ContentStore. */
export interface PasteRecord {
  readonly id: string;
  readonly title: string | null;
  /** Highlighting tag, `plaintext` when the creator gave none. */
  readonly language: string;
  readonly createdAt: Date;
  /** `null` ≡ never expires. */
  readonly expiresAt: Date | null;
  readonly burnAfterRead: boolean;
  /** UTF‑8 byte length of the body. */
  readonly size: number;
}

export const DEFAULT_LANGUAGE = "plaintext";

/**
 *  get(id)      – record or undefined
 *  list()       – every record, newest first
 *  upsert(r)    – insert / replace, then persist
 *  delete(id)   – remove, then persist; resolves `true` if it existed
 *
 *  Mutations are serialized: at most one read‑modify‑write is in flight,
 *  so two concurrent `delete(id)` calls resolve `true` exactly once.
 */
export interface IndexStore {
  get(id: string): PasteRecord | undefined;
  has(id: string): boolean;
  list(): PasteRecord[];
  size(): number;

  upsert(record: PasteRecord): Promise<void>;
  delete(id: string): Promise<boolean>;
}

/** Newest first; equal timestamps fall back to id order. */
export const byCreatedAtDesc = (a: PasteRecord, b: PasteRecord): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || a.id.localeCompare(b.id);

export const isExpired = (record: PasteRecord, now: Date): boolean =>
  record.expiresAt !== null && now.getTime() >= record.expiresAt.getTime();
