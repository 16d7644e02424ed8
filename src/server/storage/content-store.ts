/**
 *  put(id, text)   – write the body of a NEW paste
 *  get(id)         – body, or NotFoundError when absent
 *  delete(id)      – remove; already absent counts as success
 */
export interface ContentStore {
  put(id: string, content: string): Promise<void>;
  get(id: string): Promise<string>;
  delete(id: string): Promise<void>;
}
