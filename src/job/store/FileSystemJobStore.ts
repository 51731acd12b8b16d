/**
 * @fileoverview FileSystem Job Store Implementation
 *
 * Implements IJobStore and IDiagnosticStore on a directory tree:
 *
 * ```
 * <storagePath>/
 *   <jobId>/
 *     job.json            latest snapshot, replaced atomically
 *     diagnostics.jsonl   one entry per line, append-only
 * ```
 *
 * All file I/O goes through the injected IFileSystem interface for testability.
 *
 * @module job/store/FileSystemJobStore
 */

import * as path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import type { IDiagnosticStore } from '../../interfaces/IDiagnosticStore';
import type { IFileSystem } from '../../interfaces/IFileSystem';
import type { IJobStore } from '../../interfaces/IJobStore';
import type { DiagnosticEntry } from '../../types/diagnostic';
import type { JobFilter, JobSnapshot } from '../../types/job';
import { Logger } from '../../core/logger';
import { JOB_ID_PATTERN } from '../../validation/schemas';
import { parseDiagnosticEntry, parseJobSnapshot } from '../../validation/validator';
import { DuplicateJobError, JobNotFoundError, JobValidationError, errorMessage } from '../errors';
import { byCreation, matchesFilter } from './filter';

const log = Logger.for('job-store');

const JOB_FILE = 'job.json';
const TEMP_JOB_FILE = '.job.json.tmp';
const DIAGNOSTICS_FILE = 'diagnostics.jsonl';
const ID_REGEX = new RegExp(JOB_ID_PATTERN);

/** Raw file contents of one job directory before a transaction touched it. */
interface JournalEntry {
  job: string | null;
  diagnostics: string | null;
}

type Journal = Map<string, JournalEntry>;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSystemJobStore implements IJobStore, IDiagnosticStore {
  private readonly scope = new AsyncLocalStorage<Journal>();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly storagePath: string,
    private readonly fs: IFileSystem,
  ) {}

  async create(snapshot: JobSnapshot): Promise<void> {
    if (await this.fs.existsAsync(this.jobFile(snapshot.id))) {
      throw new DuplicateJobError(snapshot.id);
    }
    await this.journal(snapshot.id);
    await this.writeSnapshot(snapshot);
  }

  async update(snapshot: JobSnapshot): Promise<void> {
    if (!(await this.fs.existsAsync(this.jobFile(snapshot.id)))) {
      throw new JobNotFoundError(snapshot.id);
    }
    await this.journal(snapshot.id);
    await this.writeSnapshot(snapshot);
  }

  async get(id: string): Promise<JobSnapshot | undefined> {
    const content = await this.readOptional(this.jobFile(id));
    if (content === null) {
      return undefined;
    }
    return parseJobSnapshot(JSON.parse(content));
  }

  async list(filter?: JobFilter): Promise<JobSnapshot[]> {
    if (!(await this.fs.existsAsync(this.storagePath))) {
      return [];
    }
    const snapshots: JobSnapshot[] = [];
    for (const entry of await this.fs.readdirAsync(this.storagePath)) {
      if (!ID_REGEX.test(entry)) {
        continue;
      }
      try {
        const snapshot = await this.get(entry);
        if (snapshot && matchesFilter(snapshot, filter)) {
          snapshots.push(snapshot);
        }
      } catch (error) {
        log.warn(`Skipping unreadable job ${entry}`, { error: errorMessage(error) });
      }
    }
    return snapshots.sort(byCreation);
  }

  async delete(id: string): Promise<boolean> {
    const dir = this.jobDir(id);
    if (!(await this.fs.existsAsync(dir))) {
      return false;
    }
    await this.journal(id);
    await this.fs.rmAsync(dir, { recursive: true, force: true });
    log.debug(`Deleted job ${id}`);
    return true;
  }

  /**
   * Run `fn` with every job directory it writes journaled; on failure the
   * journaled files are put back. Transactions run one at a time; a
   * nested call joins the enclosing transaction.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.scope.getStore()) {
      return fn();
    }

    const previous = this.queue;
    let release = (): void => {};
    this.queue = new Promise<void>(resolve => {
      release = resolve;
    });
    await previous;

    const journal: Journal = new Map();
    try {
      return await this.scope.run(journal, fn);
    } catch (error) {
      await this.rollback(journal);
      throw error;
    } finally {
      release();
    }
  }

  async append(entry: DiagnosticEntry): Promise<void> {
    await this.journal(entry.jobId);
    await this.fs.mkdirAsync(this.jobDir(entry.jobId), { recursive: true });
    await this.fs.appendFileAsync(this.diagnosticsFile(entry.jobId), `${JSON.stringify(entry)}\n`);
  }

  async listForJob(jobId: string): Promise<DiagnosticEntry[]> {
    const content = await this.readOptional(this.diagnosticsFile(jobId));
    if (content === null) {
      return [];
    }
    return content
      .split('\n')
      .filter(line => line.trim().length > 0)
      .map(line => parseDiagnosticEntry(JSON.parse(line)));
  }

  private async writeSnapshot(snapshot: JobSnapshot): Promise<void> {
    const dir = this.jobDir(snapshot.id);
    const tempFile = path.join(dir, TEMP_JOB_FILE);
    try {
      await this.fs.mkdirAsync(dir, { recursive: true });
      await this.fs.writeFileAsync(tempFile, JSON.stringify(snapshot, null, 2));
      await this.fs.renameAsync(tempFile, this.jobFile(snapshot.id));
    } catch (error) {
      log.error(`Failed to write job ${snapshot.id}`, { error: errorMessage(error) });
      await this.fs.rmAsync(tempFile, { force: true });
      throw error;
    }
  }

  /** Remember a job directory's files the first time a transaction touches it. */
  private async journal(id: string): Promise<void> {
    const journal = this.scope.getStore();
    if (!journal || journal.has(id)) {
      return;
    }
    journal.set(id, {
      job: await this.readOptional(this.jobFile(id)),
      diagnostics: await this.readOptional(this.diagnosticsFile(id)),
    });
  }

  private async rollback(journal: Journal): Promise<void> {
    for (const [id, entry] of journal) {
      const dir = this.jobDir(id);
      if (entry.job === null && entry.diagnostics === null) {
        await this.fs.rmAsync(dir, { recursive: true, force: true });
        continue;
      }
      await this.fs.mkdirAsync(dir, { recursive: true });
      await this.restoreFile(this.jobFile(id), entry.job);
      await this.restoreFile(this.diagnosticsFile(id), entry.diagnostics);
    }
    log.warn(`Rolled back ${journal.size} job(s) after a failed transaction`);
  }

  private async restoreFile(filePath: string, content: string | null): Promise<void> {
    if (content === null) {
      await this.fs.rmAsync(filePath, { force: true });
    } else {
      await this.fs.writeFileAsync(filePath, content);
    }
  }

  private async readOptional(filePath: string): Promise<string | null> {
    try {
      return await this.fs.readFileAsync(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private jobDir(id: string): string {
    if (!ID_REGEX.test(id)) {
      throw new JobValidationError(`Invalid job id: '${id}'`);
    }
    return path.join(this.storagePath, id);
  }

  private jobFile(id: string): string {
    return path.join(this.jobDir(id), JOB_FILE);
  }

  private diagnosticsFile(id: string): string {
    return path.join(this.jobDir(id), DIAGNOSTICS_FILE);
  }
}
