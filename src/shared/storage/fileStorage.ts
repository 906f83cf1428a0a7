/**
 * File System Storage Provider
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageEntry, StorageProvider } from './interface';

/**
 * File-system storage rooted at one directory
 */
export class FileStorage implements StorageProvider {
  private readonly rootPath: string;

  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
  }

  getRootPath(): string {
    return this.rootPath;
  }

  /**
   * Resolve a relative path inside the root, rejecting traversal
   */
  resolvePath(relativePath: string): string {
    const resolved = path.resolve(this.rootPath, relativePath);
    const relative = path.relative(this.rootPath, resolved);

    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Invalid path: ${relativePath} escapes storage root`);
    }

    return resolved;
  }

  async read(filePath: string): Promise<string> {
    return fs.readFile(this.resolvePath(filePath), 'utf-8');
  }

  async write(filePath: string, content: string): Promise<void> {
    const absolutePath = this.resolvePath(filePath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, content, 'utf-8');
  }

  async delete(filePath: string): Promise<void> {
    const absolutePath = this.resolvePath(filePath);
    const stats = await fs.stat(absolutePath);

    if (stats.isDirectory()) {
      await fs.rm(absolutePath, { recursive: true });
    } else {
      await fs.unlink(absolutePath);
    }
  }

  async list(directory: string): Promise<StorageEntry[]> {
    const absolutePath = this.resolvePath(directory);
    if (!(await this.exists(directory))) {
      return [];
    }

    const entries = await fs.readdir(absolutePath, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      path: path.posix.join(directory, entry.name),
      isDirectory: entry.isDirectory(),
    }));
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolvePath(filePath));
      return true;
    } catch {
      return false;
    }
  }
}
