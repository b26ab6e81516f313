import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { describeError, WriteFailure } from "../errors.js";
import { childLogger } from "../logger.js";

const log = childLogger("atomic-write");

export interface StagedFile {
  target: string;
  content: string;
}

interface Staged {
  tmp: string;
  target: string;
  backup?: string; // previous file at target, moved aside while renaming
}

/**
 * Write every file to a temporary sibling, then rename all of them into
 * place. Either every target ends up with its new content or every target
 * is left as it was: a failure (or an abort) before or during the renames
 * removes the temporaries and restores targets already renamed.
 */
export async function writeFilesAtomic(files: readonly StagedFile[], signal?: AbortSignal): Promise<string[]> {
  const staged: Staged[] = [];
  const renamed: Staged[] = [];
  let current = files[0]?.target ?? "";

  try {
    for (const file of files) {
      current = path.resolve(file.target);
      await mkdir(path.dirname(current), { recursive: true });
      const tmp = tempName(current, "tmp");
      staged.push({ tmp, target: current });
      await writeFile(tmp, file.content, { encoding: "utf8", signal });
    }
    signal?.throwIfAborted();
    for (const s of staged) {
      current = s.target;
      if (await isFile(s.target)) {
        s.backup = tempName(s.target, "bak");
        await rename(s.target, s.backup);
      }
      await rename(s.tmp, s.target);
      renamed.push(s);
    }
  } catch (err) {
    await rollback(staged, renamed);
    throw err instanceof WriteFailure ? err : new WriteFailure(current, err);
  }

  await Promise.all(staged.map((s) => (s.backup ? rm(s.backup, { force: true }) : undefined)));
  return staged.map((s) => s.target);
}

export async function writeFileAtomic(target: string, content: string, signal?: AbortSignal): Promise<string> {
  const [written] = await writeFilesAtomic([{ target, content }], signal);
  return written ?? path.resolve(target);
}

/* ---------------- helpers ---------------- */

function tempName(target: string, suffix: string): string {
  return `${target}.${process.pid}.${randomUUID()}.${suffix}`;
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

async function rollback(staged: readonly Staged[], renamed: readonly Staged[]): Promise<void> {
  for (const s of renamed) await rm(s.target, { force: true });
  for (const s of staged) {
    await rm(s.tmp, { force: true });
    if (!s.backup) continue;
    try {
      await rename(s.backup, s.target);
    } catch (err) {
      log.error("could not restore previous file", { target: s.target, backup: s.backup, error: describeError(err) });
    }
  }
}
