// src/otbm/atomicFile.ts
import { randomBytes } from "node:crypto";
import { closeSync, fsyncSync, openSync, renameSync, rmSync } from "node:fs";
import path from "node:path";

export type AtomicWriteResult<T> = Readonly<{
  path: string;
  value: T;
  // False when the platform refused to sync the directory entry.
  dirSynced: boolean;
}>;

export function tempPathFor(target: string): string {
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${randomBytes(6).toString("hex")}.tmp`);
}

function syncDirectory(dir: string): boolean {
  let fd: number;
  try {
    fd = openSync(dir, "r");
  } catch {
    return false;
  }
  try {
    fsyncSync(fd);
    return true;
  } catch {
    return false;
  } finally {
    closeSync(fd);
  }
}

/**
 * Runs `fill` against a fresh temp file beside `target`, then renames it into
 * place. The target is untouched unless every step succeeds.
 */
export function writeFileAtomic<T>(target: string, fill: (fd: number) => T): AtomicWriteResult<T> {
  const tmp = tempPathFor(target);
  const fd = openSync(tmp, "wx");
  let open = true;
  try {
    const value = fill(fd);
    fsyncSync(fd);
    closeSync(fd);
    open = false;
    renameSync(tmp, target);
    return { path: target, value, dirSynced: syncDirectory(path.dirname(target)) };
  } catch (e: unknown) {
    if (open) closeSync(fd);
    rmSync(tmp, { force: true });
    throw e;
  }
}
