/**
 * In-Memory Storage Provider
 *
 * Keeps files in a flat map keyed by normalized path. Directories are implied
 * by the files beneath them.
 */

import * as path from 'path';
import { StorageEntry, StorageProvider } from './interface';

export class MemoryStorage implements StorageProvider {
  private files = new Map<string, string>();

  private normalize(filePath: string): string {
    const normalized = path.posix.normalize(filePath.replace(/\\/g, '/')).replace(/^\/+|\/+$/g, '');
    if (normalized.startsWith('..')) {
      throw new Error(`Invalid path: ${filePath} escapes storage root`);
    }
    return normalized === '.' ? '' : normalized;
  }

  private isDirectory(key: string): boolean {
    const prefix = key === '' ? '' : `${key}/`;
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(this.normalize(filePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory: ${filePath}`);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    const key = this.normalize(filePath);
    if (key === '') {
      throw new Error('Cannot write to root directory');
    }
    this.files.set(key, content);
  }

  async delete(filePath: string): Promise<void> {
    const key = this.normalize(filePath);
    if (this.files.delete(key)) {
      return;
    }
    if (!this.isDirectory(key)) {
      throw new Error(`ENOENT: no such file or directory: ${filePath}`);
    }
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${key}/`)) {
        this.files.delete(file);
      }
    }
  }

  async list(directory: string): Promise<StorageEntry[]> {
    const key = this.normalize(directory);
    const prefix = key === '' ? '' : `${key}/`;
    const entries = new Map<string, StorageEntry>();

    for (const file of this.files.keys()) {
      if (!file.startsWith(prefix)) continue;
      const [name, ...rest] = file.slice(prefix.length).split('/');
      if (!name || entries.has(name)) continue;
      entries.set(name, {
        name,
        path: path.posix.join(key, name),
        isDirectory: rest.length > 0,
      });
    }

    return [...entries.values()];
  }

  async exists(filePath: string): Promise<boolean> {
    const key = this.normalize(filePath);
    return this.files.has(key) || this.isDirectory(key);
  }

  /**
   * Snapshot of every stored file, for assertions in tests
   */
  dump(): Record<string, string> {
    return Object.fromEntries(this.files);
  }
}
