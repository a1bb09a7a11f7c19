/**
 * Persistent resume files for interrupted transfers
 */

import { randomBytes } from 'node:crypto';
import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { join, posix, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_MAX_RESUME_AGE_MS, defaultResumeDirectory } from '../config/index.js';
import { ResumeDataInvalidError, wrapLocalIoError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { sha256Hex } from '../signing/index.js';
import { TransferState, type TransferDirection, type TransferStateData } from './state.js';

export const RESUME_FILE_SUFFIX = '.resume.json';

const chunkRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
  length: z.number().int().positive(),
  status: z.enum(['Pending', 'InFlight', 'Completed', 'Failed']),
  retryCount: z.number().int().nonnegative(),
  eTag: z.string().min(1).optional(),
  checksum: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  bytesTransferred: z.number().int().nonnegative(),
  lastError: z.string().optional(),
  completedAt: z.string().optional(),
});

const transferStateSchema = z.object({
  version: z.number().int(),
  bucket: z.string().min(1),
  key: z.string().min(1),
  localPath: z.string().min(1),
  totalSize: z.number().int().nonnegative(),
  chunkSize: z.number().int().positive(),
  direction: z.enum(['upload', 'download']),
  uploadId: z.string().min(1).optional(),
  chunks: z.array(chunkRecordSchema),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  fingerprint: z.object({
    size: z.number().int().nonnegative(),
    lastModified: z.number(),
    eTag: z.string().optional(),
  }),
});

export interface TransferIdentity {
  bucket: string;
  key: string;
  localPath: string;
  direction: TransferDirection;
}

export interface ResumeStoreOptions {
  /** Defaults to ~/.s3-resumable-client/resume */
  directory?: string;
  /** States last updated longer ago than this are ignored on load */
  maxAgeMs?: number;
  logger?: Logger;
}

/**
 * Outcome of reading a resume file. `problem` is set when a file existed
 * but could not be used.
 */
export interface ResumeInspection {
  state?: TransferState;
  problem?: ResumeDataInvalidError;
}

function safeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 64);
  return cleaned || '_';
}

/**
 * Parses and validates resume file contents
 *
 * @throws {ResumeDataInvalidError} On malformed JSON, a schema violation or
 * inconsistent chunks
 */
export function parseResumeData(text: string): TransferState {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ResumeDataInvalidError({
      message: `Resume data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      code: 'INVALID_JSON',
      cause: error,
    });
  }

  const result = transferStateSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ResumeDataInvalidError({
      message: `Resume data failed validation at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
      code: 'SCHEMA_VIOLATION',
    });
  }

  const data: TransferStateData = result.data;
  return TransferState.fromData(data);
}

/**
 * File-backed store of transfer states, one JSON file per transfer.
 *
 * Writes go to a temp file that is renamed into place, so a reader sees
 * either the previous state or the new one.
 */
export class ResumeStore {
  readonly directory: string;
  readonly maxAgeMs: number;
  private readonly logger: Logger;

  constructor(options: ResumeStoreOptions = {}) {
    this.directory = resolve(options.directory ?? defaultResumeDirectory());
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_RESUME_AGE_MS;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Resume file path for a transfer. The hash covers the absolute local path
   * so the same key downloaded to two places gets two files.
   */
  pathFor(identity: TransferIdentity): string {
    const absolutePath = resolve(identity.localPath);
    const hash = sha256Hex(
      `${identity.bucket}|${identity.key}|${absolutePath}|${identity.direction}`
    ).slice(0, 16);
    const name = [
      safeSegment(identity.bucket),
      safeSegment(posix.basename(identity.key)),
      identity.direction,
      hash,
    ].join('_');
    return join(this.directory, `${name}${RESUME_FILE_SUFFIX}`);
  }

  /**
   * @throws {LocalIoError} If the directory or file cannot be written
   */
  async save(state: TransferState): Promise<void> {
    const target = this.pathFor(state);
    const temp = `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(state.toJSON(), null, 2), 'utf8');
      await rename(temp, target);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) => {
        this.logger.trace('Temp resume file not removed', {
          path: temp,
          errorMessage: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw wrapLocalIoError(error, target, 'write resume file');
    }

    this.logger.trace('Saved resume state', { path: target, completed: state.completedCount });
  }

  /**
   * Loads the state for a transfer, or undefined when there is none usable
   */
  async load(identity: TransferIdentity, now: Date = new Date()): Promise<TransferState | undefined> {
    const inspection = await this.inspect(identity, now);
    return inspection.state;
  }

  /**
   * Like load, but reports why an existing file was rejected
   */
  async inspect(identity: TransferIdentity, now: Date = new Date()): Promise<ResumeInspection> {
    const path = this.pathFor(identity);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      return { problem: this.reject(path, 'UNREADABLE', `cannot be read: ${describe(error)}`, error) };
    }

    let state: TransferState;
    try {
      state = parseResumeData(text);
    } catch (error) {
      if (error instanceof ResumeDataInvalidError) {
        this.logger.warn('Ignoring invalid resume data', { path, errorCode: error.code, errorMessage: error.message });
        return { problem: error };
      }
      throw error;
    }

    if (
      state.bucket !== identity.bucket ||
      state.key !== identity.key ||
      state.direction !== identity.direction ||
      resolve(state.localPath) !== resolve(identity.localPath)
    ) {
      return { problem: this.reject(path, 'IDENTITY_MISMATCH', 'belongs to a different transfer') };
    }

    const age = now.getTime() - Date.parse(state.updatedAt);
    if (age > this.maxAgeMs) {
      return {
        problem: this.reject(path, 'EXPIRED', `is ${Math.round(age / 1000)}s old, limit ${Math.round(this.maxAgeMs / 1000)}s`),
      };
    }

    return { state };
  }

  /**
   * Removes the resume file. Missing files are ignored.
   *
   * @returns true when a file was removed
   */
  async delete(identity: TransferIdentity): Promise<boolean> {
    const path = this.pathFor(identity);
    try {
      await unlink(path);
      this.logger.trace('Deleted resume state', { path });
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw wrapLocalIoError(error, path, 'delete resume file');
    }
  }

  /**
   * Every valid state in the directory, expired ones included
   */
  async list(): Promise<TransferStateData[]> {
    const entries = await this.readEntries();
    return entries.flatMap((entry) => (entry.state ? [entry.state.toJSON()] : []));
  }

  /**
   * Deletes resume files last updated more than `maxAgeMs` ago, along with
   * files that no longer parse
   *
   * @returns Number of files removed
   */
  async purgeOlderThan(maxAgeMs: number = this.maxAgeMs, now: Date = new Date()): Promise<number> {
    const entries = await this.readEntries();
    let removed = 0;

    for (const entry of entries) {
      const stale = !entry.state || now.getTime() - Date.parse(entry.state.updatedAt) > maxAgeMs;
      if (!stale) {
        continue;
      }
      try {
        await unlink(entry.path);
        removed++;
      } catch (error) {
        if (!isMissingFile(error)) {
          throw wrapLocalIoError(error, entry.path, 'delete resume file');
        }
      }
    }

    if (removed > 0) {
      this.logger.info('Purged resume states', { directory: this.directory, removed });
    }
    return removed;
  }

  private async readEntries(): Promise<Array<{ path: string; state?: TransferState }>> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw wrapLocalIoError(error, this.directory, 'list resume directory');
    }

    const entries: Array<{ path: string; state?: TransferState }> = [];
    for (const name of names.filter((n) => n.endsWith(RESUME_FILE_SUFFIX)).sort()) {
      const path = join(this.directory, name);
      try {
        entries.push({ path, state: parseResumeData(await readFile(path, 'utf8')) });
      } catch (error) {
        if (!(error instanceof ResumeDataInvalidError) && !isMissingFile(error)) {
          throw wrapLocalIoError(error, path, 'read resume file');
        }
        entries.push({ path });
      }
    }
    return entries;
  }

  private reject(path: string, code: string, reason: string, cause?: unknown): ResumeDataInvalidError {
    const problem = new ResumeDataInvalidError({
      message: `Resume file ${path} ${reason}`,
      code,
      details: { path },
      cause,
    });
    this.logger.warn('Ignoring resume data', { path, errorCode: code, errorMessage: problem.message });
    return problem;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
