/**
 * Abstract storage backend interface.
 *
 * Keys are `/`-separated paths relative to the backend root.
 */

export interface EntryStat {
  kind: "file" | "directory";
  size: number;
}

export interface StorageBackend {
  /** Absolute location of a key, for messages and for collaborators outside the backend. */
  locate(key: string): string;

  /** Write data to the given key, creating parent directories. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Create a directory key and its parents. */
  ensureDir(key: string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** Stream the bytes of the given key in chunks. */
  readStream(key: string): AsyncIterable<Uint8Array>;

  /** List all file keys under the given prefix, sorted. */
  list(prefix: string): Promise<string[]>;

  /** Names of the direct children of a directory key, sorted. */
  listDir(key: string): Promise<string[]>;

  /** Stat the key, or null if it does not exist. */
  stat(key: string): Promise<EntryStat | null>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Copy one file key to another, overwriting the destination. */
  copy(from: string, to: string): Promise<void>;

  /** Concatenate file keys in order into `to`; returns the number of bytes written. */
  concat(sources: string[], to: string): Promise<number>;

  /** Rename a file or directory key. */
  rename(from: string, to: string): Promise<void>;

  /** Delete a directory key and everything beneath it. Missing keys are ignored. */
  deleteTree(key: string): Promise<void>;
}
