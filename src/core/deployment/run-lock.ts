/**
 * Run lock
 *
 * One run per environment at a time. The lock file holds the owner's pid;
 * a lock whose owner is gone is reclaimed. Reclaiming renames the lock
 * aside first, so of several runs reclaiming the same stale lock only one
 * takes it, and a lock another run took in the meantime is put back.
 */

import { link, mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { RunLockError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

export type LivenessCheck = (pid: number) => boolean;

/**
 * Whether a process with this pid exists
 */
export const processIsAlive: LivenessCheck = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrorCode(error, 'EPERM');
  }
};

export class RunLock {
  private logger = getComponentLogger('run-lock');
  private held = false;
  readonly path: string;

  constructor(
    private readonly directory: string,
    private readonly environment: string,
    private readonly pid: number = process.pid,
    private readonly isAlive: LivenessCheck = processIsAlive
  ) {
    this.path = join(directory, `${environment}.lock`);
  }

  async acquire(): Promise<void> {
    await mkdir(this.directory, { recursive: true });

    for (let attempt = 0; attempt < 3; attempt++) {
      try {
        const handle = await open(this.path, 'wx');
        try {
          await handle.writeFile(String(this.pid), 'utf8');
        } finally {
          await handle.close();
        }
        this.held = true;
        this.logger.debug('Acquired run lock', { path: this.path, pid: this.pid });
        return;
      } catch (error) {
        if (!isErrorCode(error, 'EEXIST')) {
          throw error;
        }
      }

      const owner = await this.readOwner(this.path);
      if (owner !== undefined && owner !== this.pid && this.isAlive(owner)) {
        throw new RunLockError(
          `Another run (pid ${owner}) holds the lock for '${this.environment}'; wait for it or remove ${this.path} if it is stale`,
          this.environment,
          this.path,
          owner
        );
      }

      this.logger.warn('Reclaiming stale run lock', { path: this.path, ownerPid: owner });
      await this.reclaim(owner);
    }

    throw new RunLockError(
      `Could not acquire the lock for '${this.environment}'`,
      this.environment,
      this.path
    );
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await rm(this.path, { force: true });
    this.held = false;
    this.logger.debug('Released run lock', { path: this.path });
  }

  /**
   * Moves the stale lock aside. When the moved file turns out to name
   * another owner, a run took the lock after it was read; it goes back.
   */
  private async reclaim(staleOwner: number | undefined): Promise<void> {
    const claimed = `${this.path}.${this.pid}.reclaim`;
    try {
      await rename(this.path, claimed);
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return;
      }
      throw error;
    }

    try {
      const owner = await this.readOwner(claimed);
      if (owner !== staleOwner) {
        this.logger.debug('Lock changed hands while reclaiming; restoring it', { path: this.path, ownerPid: owner });
        await link(claimed, this.path).catch((error: unknown) => {
          if (!isErrorCode(error, 'EEXIST')) {
            throw error;
          }
        });
      }
    } finally {
      await rm(claimed, { force: true });
    }
  }

  private async readOwner(path: string): Promise<number | undefined> {
    try {
      const pid = Number.parseInt((await readFile(path, 'utf8')).trim(), 10);
      return Number.isNaN(pid) ? undefined : pid;
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return undefined;
      }
      throw error;
    }
  }
}

function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
