import type { ContentStore } from "./content-store";
import { NotFoundError } from "../core/errors";

/**
 *  Pure in-memory store for unit tests. Interface stays async so callers
 *  don't care which store they talk to.
 */
export class MemoryContentStore implements ContentStore {
  private readonly bodies = new Map<string, string>();

  async put(id: string, content: string): Promise<void> {
    this.bodies.set(id, content);
  }

  async get(id: string): Promise<string> {
    const body = this.bodies.get(id);
    if (body === undefined) throw new NotFoundError();
    return body;
  }

  async delete(id: string): Promise<void> {
    this.bodies.delete(id);
  }

  has(id: string): boolean {
    return this.bodies.has(id);
  }

  get size() { return this.bodies.size; }
}
