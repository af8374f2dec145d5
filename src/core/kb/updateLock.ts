import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { ensureDirectoryExists } from '../../utils/fileUtils.js';
import { LockError, errorMessage } from './errors.js';

const LOCK_STALE_MS = 30_000;
const LOCK_UPDATE_MS = 5_000;

/** Handed to the work running under the lock. */
export interface LockLease {
  /** Throws a {@link LockError} once the lock can no longer be trusted. */
  assertHeld(): void;
}

interface HeldLock {
  lease: LockLease;
  release(): Promise<void>;
}

/**
 * Single-writer lock over the cache and index artifacts. Callers in this
 * process queue in FIFO order; other processes are excluded by a lock
 * directory beside the cache file.
 */
export class UpdateLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly lockPath: string;

  constructor(private readonly targetPath: string) {
    this.lockPath = `${targetPath}.lock`;
  }

  async runExclusive<T>(work: (lease: LockLease) => Promise<T>): Promise<T> {
    const previous = this.tail;
    let releaseLocal: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      releaseLocal = resolve;
    });

    await previous;
    try {
      const held = await this.acquireFileLock();
      try {
        return await work(held.lease);
      } finally {
        await held.release();
      }
    } finally {
      releaseLocal();
    }
  }

  private async acquireFileLock(): Promise<HeldLock> {
    await ensureDirectoryExists(path.dirname(this.targetPath));
    let compromised: Error | null = null;
    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.targetPath, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: LOCK_STALE_MS,
        update: LOCK_UPDATE_MS,
        retries: { retries: 20, minTimeout: 100, maxTimeout: 2_000 },
        // proper-lockfile throws from a timer unless this is provided.
        onCompromised: (err) => {
          compromised = err;
          console.error(`Update lock compromised (${this.lockPath}):`, err);
        },
      });
    } catch (error) {
      throw new LockError(
        `Could not acquire update lock ${this.lockPath}: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }

    const lease: LockLease = {
      assertHeld: () => {
        if (compromised) {
          throw new LockError(
            `Update lock ${this.lockPath} was compromised; refusing to write: ${compromised.message}`,
            undefined,
            { cause: compromised }
          );
        }
      },
    };

    return {
      lease,
      release: async () => {
        if (compromised) return;
        try {
          await release();
        } catch (error) {
          console.warn(`Failed to release update lock ${this.lockPath}:`, error);
        }
      },
    };
  }
}
