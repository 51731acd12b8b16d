/**
 * @fileoverview Default IFileSystem implementation using Node.js fs module.
 *
 * @module core/defaultFileSystem
 */

import * as fs from 'fs';
import type { IFileSystem } from '../interfaces/IFileSystem';

/**
 * Default file system implementation backed by Node.js fs module.
 */
export class DefaultFileSystem implements IFileSystem {
  // ─── Sync Operations ───────────────────────────────────────────────────

  readJSON(filePath: string, fallback: unknown): unknown {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      return JSON.parse(content);
    } catch {
      return fallback;
    }
  }

  // ─── Async Operations ─────────────────────────────────────────────────

  async existsAsync(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readFileAsync(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, 'utf-8');
  }

  async writeFileAsync(filePath: string, content: string): Promise<void> {
    await fs.promises.writeFile(filePath, content, 'utf-8');
  }

  async appendFileAsync(filePath: string, content: string): Promise<void> {
    await fs.promises.appendFile(filePath, content, 'utf-8');
  }

  async renameAsync(oldPath: string, newPath: string): Promise<void> {
    await fs.promises.rename(oldPath, newPath);
  }

  async rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void> {
    await fs.promises.rm(filePath, options);
  }

  async mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.promises.mkdir(dirPath, options);
  }

  async readdirAsync(dirPath: string): Promise<string[]> {
    return fs.promises.readdir(dirPath);
  }
}
