import { byCreatedAtDesc, type IndexStore, type PasteRecord } from "./index-store";
import { Mutex } from "../core/mutex";

/**
 *  In-memory index. Persistent stores extend it and implement `persist`,
 *  which runs after every mutation while the mutex is still held; if it
 *  throws, the mutation is rolled back so memory never runs ahead of disk.
 */
export class MemoryIndexStore implements IndexStore {
  protected readonly records = new Map<string, PasteRecord>();
  private readonly mutex = new Mutex();

  constructor(initial: Iterable<PasteRecord> = []) {
    for (const record of initial) this.records.set(record.id, record);
  }

  get(id: string): PasteRecord | undefined {
    return this.records.get(id);
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  list(): PasteRecord[] {
    return [...this.records.values()].sort(byCreatedAtDesc);
  }

  size(): number {
    return this.records.size;
  }

  upsert(record: PasteRecord): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const previous = this.records.get(record.id);
      this.records.set(record.id, record);
      try {
        await this.persist();
      } catch (error) {
        if (previous) this.records.set(record.id, previous);
        else this.records.delete(record.id);
        throw error;
      }
    });
  }

  delete(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const previous = this.records.get(id);
      if (!previous) return false;
      this.records.delete(id);
      try {
        await this.persist();
      } catch (error) {
        this.records.set(id, previous);
        throw error;
      }
      return true;
    });
  }

  /** No backing medium. */
  protected async persist(): Promise<void> {}
}
