/**
 * Run lease
 *
 * Keeps a manual invocation and a scheduled tick from working on the same
 * stores at once. The lease is a lock file created exclusively; a lease older
 * than its TTL is treated as left behind by a crashed run and replaced.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const LEASE_FILE_NAME = 'run.lock';

export interface LeaseInfo {
  pid: number;
  host: string;
  startedAt: string;
}

export type LeaseAttempt =
  | { acquired: true; lease: RunLease }
  | { acquired: false; holder: LeaseInfo | null };

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export function parseLeaseInfo(text: string): LeaseInfo | null {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null) return null;
  if (!('pid' in data) || !('host' in data) || !('startedAt' in data)) return null;
  const { pid, host, startedAt } = data;
  if (typeof pid !== 'number' || typeof host !== 'string' || typeof startedAt !== 'string') return null;
  return { pid, host, startedAt };
}

export function isStale(info: LeaseInfo | null, now: Date, ttlMinutes: number): boolean {
  if (!info) return true;
  const started = Date.parse(info.startedAt);
  if (Number.isNaN(started)) return true;
  return now.getTime() - started > ttlMinutes * 60 * 1000;
}

async function readLease(file: string): Promise<LeaseInfo | null> {
  try {
    return parseLeaseInfo(await fs.promises.readFile(file, 'utf8'));
  } catch (err) {
    if (hasCode(err, 'ENOENT')) return null;
    throw err;
  }
}

export class RunLease {
  private constructor(
    readonly file: string,
    readonly info: LeaseInfo
  ) {}

  static async acquire(dir: string, ttlMinutes: number, now: Date = new Date()): Promise<LeaseAttempt> {
    await fs.promises.mkdir(dir, { recursive: true });
    const file = path.join(dir, LEASE_FILE_NAME);
    const info: LeaseInfo = { pid: process.pid, host: os.hostname(), startedAt: now.toISOString() };

    // Second pass only after removing a stale lease
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await fs.promises.writeFile(file, JSON.stringify(info, null, 2), { encoding: 'utf8', flag: 'wx' });
        return { acquired: true, lease: new RunLease(file, info) };
      } catch (err) {
        if (!hasCode(err, 'EEXIST')) throw err;
      }

      const holder = await readLease(file);
      if (!isStale(holder, now, ttlMinutes)) {
        return { acquired: false, holder };
      }
      await fs.promises.rm(file, { force: true });
    }

    return { acquired: false, holder: await readLease(file) };
  }

  /**
   * Remove the lock file if it is still ours.
   */
  async release(): Promise<void> {
    const current = await readLease(this.file);
    if (
      current &&
      current.pid === this.info.pid &&
      current.host === this.info.host &&
      current.startedAt === this.info.startedAt
    ) {
      await fs.promises.rm(this.file, { force: true });
    }
  }
}
