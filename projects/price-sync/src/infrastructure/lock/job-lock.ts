// src/infrastructure/lock/job-lock.ts
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { Logger } from '../logging';
import { JobLockedError, serializeError } from '../../utils/error';
import { isPlainObject } from '../../utils/object';

const LockHolderSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.number()
});

export type LockHolder = z.infer<typeof LockHolderSchema>;

export interface JobLockOptions {
  lockFile: string;
  staleAfterMs: number;
  logger: Logger;
  clock?: () => number;
}

// fs errors can come from another realm, so match on shape rather than instanceof
function isAlreadyExists(error: unknown): boolean {
  return isPlainObject(error) && error.code === 'EEXIST';
}

/**
 * Exclusive lock file guarding against two overlapping runs writing the same spreadsheet.
 * A lock older than `staleAfterMs` belongs to a run the platform killed and is taken over.
 */
export class JobLock {
  private held = false;
  private readonly clock: () => number;

  constructor(private readonly options: JobLockOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    const { lockFile, staleAfterMs, logger } = this.options;
    await fs.ensureDir(path.dirname(lockFile));

    try {
      await this.create();
      return;
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }

    const holder = await this.readHolder();
    if (holder && this.clock() - holder.acquiredAt < staleAfterMs) {
      throw new JobLockedError(lockFile, new Date(holder.acquiredAt).toISOString());
    }

    logger.warn('Taking over stale job lock', { lockFile, holder });
    await fs.remove(lockFile);
    await this.create();
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await fs.remove(this.options.lockFile);
    this.held = false;
  }

  private async create(): Promise<void> {
    const holder: LockHolder = { pid: process.pid, acquiredAt: this.clock() };
    await fs.writeFile(this.options.lockFile, JSON.stringify(holder), { flag: 'wx' });
    this.held = true;
  }

  private async readHolder(): Promise<LockHolder | null> {
    try {
      const raw: unknown = await fs.readJson(this.options.lockFile);
      const parsed = LockHolderSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.options.logger.warn('Unreadable job lock file, treating it as stale', {
        lockFile: this.options.lockFile,
        error: serializeError(error)
      });
      return null;
    }
  }
}
