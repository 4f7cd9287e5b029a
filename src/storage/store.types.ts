/**
 * Hierarchical storage contract used by the credential store and the
 * project namespace. Paths are arrays of segments relative to the store
 * root, e.g. ['alice_dev1', 'projects', 'thesis', 'temp', 'draft.md'].
 *
 * Implementations must reject any path that would resolve outside their
 * root before touching the underlying medium.
 */
export type StorePath = readonly string[];

export type EntryKind = 'file' | 'directory';

export interface StoreEntry {
  name: string;
  kind: EntryKind;
}

export interface WriteOptions {
  /** Fail with ConflictError instead of overwriting an existing file */
  exclusive?: boolean;
}

export interface MakeDirectoryOptions {
  /**
   * exclusive: the parent must exist and the directory must not
   * (ConflictError otherwise). Non-exclusive creation is recursive and
   * idempotent.
   */
  exclusive?: boolean;
}

export interface TreeStore {
  /** null when nothing exists at the path */
  kind(path: StorePath): Promise<EntryKind | null>;
  readFile(path: StorePath): Promise<Buffer>;
  /** Creates missing parent directories */
  writeFile(path: StorePath, data: Buffer | string, options?: WriteOptions): Promise<void>;
  makeDirectory(path: StorePath, options?: MakeDirectoryOptions): Promise<void>;
  list(path: StorePath): Promise<StoreEntry[]>;
  remove(path: StorePath, options?: { recursive?: boolean }): Promise<void>;
  /** Relocates a file, replacing anything at the destination */
  move(from: StorePath, to: StorePath): Promise<void>;
}
