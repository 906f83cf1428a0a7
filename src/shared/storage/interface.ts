/**
 * Storage Provider Interface
 *
 * Abstraction over where run artifacts and index snapshots live:
 * - FileStorage: rooted at the configured output directory
 * - MemoryStorage: in-memory, for tests
 *
 * All paths are relative to the storage root and use forward slashes.
 */

export interface StorageEntry {
  name: string;
  path: string;
  isDirectory: boolean;
}

export interface StorageProvider {
  /**
   * Read file contents as a string
   * @throws If the file does not exist
   */
  read(path: string): Promise<string>;

  /**
   * Write content to a file, creating parent directories
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Delete a file or directory tree
   * @throws If the path does not exist
   */
  delete(path: string): Promise<void>;

  /**
   * List entries of a directory. A missing directory lists as empty.
   */
  list(directory: string): Promise<StorageEntry[]>;

  exists(path: string): Promise<boolean>;
}
