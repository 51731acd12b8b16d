/**
 * @fileoverview Interface for file system operations.
 *
 * Abstracts the Node.js `fs` module so the file-backed job store and the
 * JSON config provider can be exercised against a temp directory or a stub.
 *
 * @module interfaces/IFileSystem
 */

/**
 * File system operations used by the engine.
 *
 * @example
 * ```typescript
 * class FileSystemJobStore {
 *   constructor(private readonly fs: IFileSystem) {}
 *
 *   async read(file: string): Promise<string> {
 *     return this.fs.readFileAsync(file);
 *   }
 * }
 * ```
 */
export interface IFileSystem {
  // ─── Sync Operations ───────────────────────────────────────────────────

  /**
   * Read and parse a JSON file, returning `fallback` when the file is
   * missing or does not parse.
   */
  readJSON(filePath: string, fallback: unknown): unknown;

  // ─── Async Operations ─────────────────────────────────────────────────

  existsAsync(filePath: string): Promise<boolean>;

  readFileAsync(filePath: string): Promise<string>;

  writeFileAsync(filePath: string, content: string): Promise<void>;

  /** Append to a file, creating it if needed. */
  appendFileAsync(filePath: string, content: string): Promise<void>;

  renameAsync(oldPath: string, newPath: string): Promise<void>;

  rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;

  mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void>;

  readdirAsync(dirPath: string): Promise<string[]>;
}
