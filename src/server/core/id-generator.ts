import { customAlphabet } from "nanoid";
import { StorageError } from "./errors";

export const ID_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
export const ID_LENGTH = 8;
export const ID_PATTERN = /^[a-z0-9]+$/;

/** Upper bound on regeneration; 36^8 ids make hitting it a broken RNG. */
const MAX_ATTEMPTS = 32;

export type IdSource = () => string;

export const randomId: IdSource = customAlphabet(ID_ALPHABET, ID_LENGTH);

/**
 * Draw ids from `source` until one is not `taken`.
 */
export function generateId(taken: (id: string) => boolean, source: IdSource = randomId): string {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const id = source();
    if (!taken(id)) return id;
  }
  throw new StorageError(`Could not allocate a free paste id after ${MAX_ATTEMPTS} attempts`);
}

export const isValidId = (id: string): boolean => ID_PATTERN.test(id);
