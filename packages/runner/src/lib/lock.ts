import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "./logger.js";

export interface LockData {
  pid: number;
  ts: number;
  name: string;
}

/** Lock file for a batch name; unsafe characters become `_`. */
export function lockPath(name: string): string {
  return path.join(os.tmpdir(), `hyperauto-${name.replace(/[^\w.-]/g, "_")}.lock`);
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function tryCreate(file: string, name: string): boolean {
  const data: LockData = { pid: process.pid, ts: Date.now(), name };
  try {
    fs.writeFileSync(file, JSON.stringify(data), { flag: "wx" });
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
    throw err;
  }
}

export function readLock(name: string): LockData | null {
  const file = lockPath(name);
  if (!fs.existsSync(file)) return null;
  try {
    const data: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    if (
      typeof data === "object" &&
      data !== null &&
      "pid" in data &&
      typeof data.pid === "number" &&
      "ts" in data &&
      typeof data.ts === "number"
    ) {
      return { pid: data.pid, ts: data.ts, name };
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Takes the batch lock or throws when a live process holds it. Stale locks
 * (dead PID) and unreadable lock files are replaced.
 */
export function acquireLock(name: string): void {
  const file = lockPath(name);
  if (tryCreate(file, name)) return;

  const existing = readLock(name);
  if (existing && isPidAlive(existing.pid)) {
    throw new Error(
      `Lock held by PID ${existing.pid} for ${name} (since ${new Date(existing.ts).toISOString()})`,
    );
  }

  logger.createChild("lock").warn({ name, pid: existing?.pid ?? null }, "removing stale lock");
  fs.rmSync(file, { force: true });
  if (!tryCreate(file, name)) {
    throw new Error(`Lock race: another process acquired the lock for ${name}`);
  }
}

/** Removes the lock when this process owns it (or it is unreadable). */
export function releaseLock(name: string): void {
  const file = lockPath(name);
  if (!fs.existsSync(file)) return;
  const data = readLock(name);
  if (data === null || data.pid === process.pid) fs.rmSync(file, { force: true });
}
