import fs from 'fs';
import path from 'path';

export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const text = fs.readFileSync(filePath, 'utf-8').trim();
  if (!text) return null;
  return JSON.parse(text);
}

/** Write to a sibling temp file, then rename over the target. */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

export type LockOptions = {
  timeoutMs?: number;
  /** A lock file older than this is treated as left behind by a dead process */
  staleMs?: number;
  pollMs?: number;
};

export type ReleaseLock = () => void;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function tryCreateLock(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx');
    fs.writeSync(fd, JSON.stringify({ pid: process.pid, at: new Date().toISOString() }));
    fs.closeSync(fd);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return false;
    throw err;
  }
}

function removeIfStale(lockPath: string, staleMs: number): void {
  try {
    const age = Date.now() - fs.statSync(lockPath).mtimeMs;
    if (age > staleMs) fs.unlinkSync(lockPath);
  } catch (err) {
    // Released between our open attempt and the stat
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
}

/**
 * Exclusive lock file for read-modify-write of persisted state shared by
 * concurrent runs of the same content type.
 */
export async function acquireLock(lockPath: string, opts: LockOptions = {}): Promise<ReleaseLock> {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const staleMs = opts.staleMs ?? 10 * 60_000;
  const pollMs = opts.pollMs ?? 200;
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  const deadline = Date.now() + timeoutMs;
  while (!tryCreateLock(lockPath)) {
    removeIfStale(lockPath, staleMs);
    if (Date.now() >= deadline) {
      throw new Error(`Timed out waiting for lock ${lockPath}`);
    }
    await sleep(pollMs);
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    fs.rmSync(lockPath, { force: true });
  };
}

export async function withLock<T>(lockPath: string, fn: () => Promise<T> | T, opts?: LockOptions): Promise<T> {
  const release = await acquireLock(lockPath, opts);
  try {
    return await fn();
  } finally {
    release();
  }
}
