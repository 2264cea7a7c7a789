/**
 * Lease kept in a JSON file shared by every process on the host.
 *
 * Compare-and-swap runs while holding `<path>.lock`, a sidecar created with
 * the exclusive `wx` flag. A sidecar older than `staleLockMs` belongs to a
 * process that died mid-swap and is removed.
 */

import { mkdir, open, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { InstanceLease, LeaseStore } from '../types/index.js';
import { sleep } from '../infra/timeout.js';
import { leasesEqual, parseLease } from './lease-store.js';

export interface FileLeaseStoreOptions {
  staleLockMs?: number;
  lockRetryMs?: number;
  lockAttempts?: number;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class FileLeaseStore implements LeaseStore {
  private readonly lockPath: string;
  private readonly staleLockMs: number;
  private readonly lockRetryMs: number;
  private readonly lockAttempts: number;

  constructor(
    private readonly path: string,
    options: FileLeaseStoreOptions = {},
  ) {
    this.lockPath = `${path}.lock`;
    this.staleLockMs = options.staleLockMs ?? 5000;
    this.lockRetryMs = options.lockRetryMs ?? 20;
    this.lockAttempts = options.lockAttempts ?? 25;
  }

  async read(): Promise<InstanceLease | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return undefined;
      throw error;
    }
    if (raw.trim().length === 0) return undefined;
    try {
      return parseLease(JSON.parse(raw));
    } catch {
      console.warn(`[lease] ignoring unreadable lease file ${this.path}`);
      return undefined;
    }
  }

  async compareAndSwap(expected: InstanceLease | undefined, next: InstanceLease | undefined): Promise<boolean> {
    const acquired = await this.acquireMutex();
    if (!acquired) return false;
    try {
      const current = await this.read();
      if (!leasesEqual(current, expected)) return false;
      if (next) {
        const tempPath = `${this.path}.${process.pid}.tmp`;
        await writeFile(tempPath, JSON.stringify(next, null, 2));
        await rename(tempPath, this.path);
      } else {
        await unlink(this.path).catch((error: unknown) => {
          if (!isErrnoCode(error, 'ENOENT')) throw error;
        });
      }
      return true;
    } finally {
      await unlink(this.lockPath).catch(() => undefined);
    }
  }

  private async acquireMutex(): Promise<boolean> {
    await mkdir(dirname(this.path), { recursive: true });
    for (let attempt = 0; attempt < this.lockAttempts; attempt += 1) {
      try {
        const handle = await open(this.lockPath, 'wx');
        await handle.writeFile(String(process.pid));
        await handle.close();
        return true;
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) throw error;
      }
      await this.breakStaleMutex();
      await sleep(this.lockRetryMs);
    }
    return false;
  }

  private async breakStaleMutex(): Promise<void> {
    try {
      const info = await stat(this.lockPath);
      if (Date.now() - info.mtimeMs > this.staleLockMs) {
        await unlink(this.lockPath);
        console.warn(`[lease] removed stale lock file ${this.lockPath}`);
      }
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) throw error;
    }
  }
}
