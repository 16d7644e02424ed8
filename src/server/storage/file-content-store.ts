import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ContentStore } from "./content-store";
import { NotFoundError, StorageError, ValidationError } from "../core/errors";
import { isValidId } from "../core/id-generator";
import { storeLogger as logger } from "../utils/logger";

/* ────────────────────────────────────────────────────────────── */
/*  On-disk layout                                                */
/*    <dataDir>/pastes/                                           */
/*      ├─ k3x9a0qz        raw UTF-8 body, no extension           */
/*      └─ …                                                      */
/* ────────────────────────────────────────────────────────────── */

export const PASTES_DIR = "pastes";

export const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

export class FileContentStore implements ContentStore {
  private readonly dir: string;

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, PASTES_DIR);
  }

  /** Create the pastes directory if needed. */
  async init(): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create ${this.dir}`, error);
    }
    logger.debug({ dir: this.dir }, "Content directory ready");
  }

  async put(id: string, content: string): Promise<void> {
    if (!isValidId(id)) throw new ValidationError(`Invalid paste id: ${id}`);
    const file = this.fileFor(id);
    try {
      // `wx`: a new id never overwrites an existing body
      await writeFile(file, content, { encoding: "utf8", flag: "wx" });
    } catch (error) {
      throw new StorageError(`Failed to write paste ${id}`, error);
    }
    logger.trace({ id, file }, "Content written");
  }

  async get(id: string): Promise<string> {
    if (!isValidId(id)) throw new NotFoundError();
    try {
      return await readFile(this.fileFor(id), "utf8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") throw new NotFoundError();
      throw new StorageError(`Failed to read paste ${id}`, error);
    }
  }

  async delete(id: string): Promise<void> {
    if (!isValidId(id)) return;
    try {
      await rm(this.fileFor(id), { force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete paste ${id}`, error);
    }
    logger.trace({ id }, "Content deleted");
  }

  private fileFor(id: string): string {
    return path.join(this.dir, id);
  }
}
