/**
 * Guard against overlapping scheduled runs.
 *
 * The lock file is created exclusively; it holds the owner's pid and start
 * time. A lock older than `staleMs` is treated as left behind by a crashed
 * run and taken over: it is first renamed aside, and the takeover only
 * proceeds if the renamed file is still the lock that was judged stale.
 */

import { randomBytes } from "crypto";
import { link, mkdir, open, readFile, rename, rm, stat } from "fs/promises";
import path from "path";

export type LockInfo = {
  pid: number;
  runName: string;
  startedAt: string;
};

export type LockResult =
  | { acquired: true; release: () => Promise<void> }
  | { acquired: false; holder: LockInfo | null };

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && Reflect.get(error, "code") === code;
}

async function readLockText(file: string): Promise<string | null> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return null;
    throw error;
  }
}

function parseLock(text: string | null): LockInfo | null {
  if (text === null) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== "object" || parsed === null) return null;
    const pid: unknown = Reflect.get(parsed, "pid");
    const runName: unknown = Reflect.get(parsed, "runName");
    const startedAt: unknown = Reflect.get(parsed, "startedAt");
    if (typeof pid !== "number" || typeof runName !== "string" || typeof startedAt !== "string") return null;
    return { pid, runName, startedAt };
  } catch (error) {
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

async function readLock(file: string): Promise<LockInfo | null> {
  return parseLock(await readLockText(file));
}

async function modifiedAt(file: string): Promise<number> {
  try {
    return (await stat(file)).mtimeMs;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return NaN;
    throw error;
  }
}

async function tryCreate(file: string, info: LockInfo): Promise<boolean> {
  try {
    const handle = await open(file, "wx");
    try {
      await handle.writeFile(JSON.stringify(info));
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrnoCode(error, "EEXIST")) return false;
    throw error;
  }
}

export async function acquireRunLock(
  file: string,
  options: { runName: string; staleMs: number; now?: () => Date }
): Promise<LockResult> {
  const now = options.now ?? (() => new Date());
  const info: LockInfo = { pid: process.pid, runName: options.runName, startedAt: now().toISOString() };
  await mkdir(path.dirname(file), { recursive: true });

  const release = async () => {
    // Only remove the lock if it is still ours.
    const current = await readLock(file);
    if (current && current.pid === info.pid && current.runName === info.runName) {
      await rm(file, { force: true });
    }
  };

  if (await tryCreate(file, info)) return { acquired: true, release };

  const heldText = await readLockText(file);
  const holder = parseLock(heldText);
  // A lock without readable contents (mid-write, or truncated) is aged by its mtime.
  const heldSince = holder ? Date.parse(holder.startedAt) : await modifiedAt(file);
  const stale = !holder || Number.isNaN(heldSince) || now().getTime() - heldSince > options.staleMs;
  if (!stale) return { acquired: false, holder };

  const taken = heldText === null ? await tryCreate(file, info) : await replaceStaleLock(file, heldText, info);
  if (taken) return { acquired: true, release };
  return { acquired: false, holder: await readLock(file) };
}

/**
 * Swap a stale lock for `info`. Returns false when the file on disk is no
 * longer `staleText`, i.e. another run replaced it first; that lock is put
 * back untouched.
 */
export async function replaceStaleLock(file: string, staleText: string, info: LockInfo): Promise<boolean> {
  const aside = `${file}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
  try {
    await rename(file, aside);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) return false;
    throw error;
  }

  const movedText = await readFile(aside, "utf8");
  if (movedText !== staleText) {
    try {
      await link(aside, file);
    } catch (error) {
      if (!isErrnoCode(error, "EEXIST")) throw error;
    }
    await rm(aside, { force: true });
    return false;
  }

  await rm(aside, { force: true });
  return tryCreate(file, info);
}
