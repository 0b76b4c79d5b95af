/**
 * Directory scanner: the only part of the engine that touches the filesystem.
 *
 * Lists `<prefix>*<suffix>` files in the shared directory, decodes each one,
 * and deletes files whose owner died or whose timestamp is past the session
 * timeout. Nothing here throws; problems are counted in `errorCount` and the
 * next scan tries again.
 */

import { readdir, readFile, unlink } from "node:fs/promises";
import { join } from "node:path";
import { decodeStatusRecord } from "./status-file.js";
import { isExpired } from "./session-store.js";
import type { Session } from "./types.js";
import { logDebug, logError } from "./log.js";

export interface ScanOptions {
  directory: string;
  filePrefix: string;
  fileSuffix: string;
  now: Date;
  sessionTimeoutSeconds: number;
}

export interface ScanDeps {
  isProcessAlive: (pid: number) => boolean;
}

export interface ScanResult {
  sessions: Map<string, Session>;
  errorCount: number;
}

export type ScanFunction = (options: ScanOptions, deps: ScanDeps) => Promise<ScanResult>;

export function isStatusFileName(name: string, prefix: string, suffix: string): boolean {
  return name.length >= prefix.length + suffix.length && name.startsWith(prefix) && name.endsWith(suffix);
}

export const scanDirectory: ScanFunction = async (options, deps) => {
  const { directory, filePrefix, fileSuffix, now, sessionTimeoutSeconds } = options;
  const sessions = new Map<string, Session>();
  let errorCount = 0;

  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    logError("Scanner", `Cannot list ${directory}`, error);
    return { sessions, errorCount: 1 };
  }

  for (const name of names.sort()) {
    if (!isStatusFileName(name, filePrefix, fileSuffix)) continue;
    const filepath = join(directory, name);

    let content: string;
    try {
      content = await readFile(filepath, "utf-8");
    } catch (error) {
      // Removed between readdir and readFile - the session is simply gone
      if ((error as NodeJS.ErrnoException).code === "ENOENT") continue;
      logError("Scanner", `Cannot read ${name}`, error);
      errorCount += 1;
      continue;
    }

    // Mid-write; the writer will fill it in before the next scan
    if (content.trim() === "") continue;

    const decoded = decodeStatusRecord(content, now);
    if (!decoded.ok) {
      logDebug("Scanner", `Skipping ${name}: ${decoded.error.message}`);
      errorCount += 1;
      continue;
    }
    const { record } = decoded;

    if (record.ownerPid !== undefined && !deps.isProcessAlive(record.ownerPid)) {
      logDebug("Scanner", `Owner ${record.ownerPid} of ${name} is gone, removing`);
      if (!(await removeFile(filepath))) errorCount += 1;
      continue;
    }

    if (isExpired(record.timestamp, now, sessionTimeoutSeconds)) {
      logDebug("Scanner", `${name} is older than ${sessionTimeoutSeconds}s, removing`);
      if (!(await removeFile(filepath))) errorCount += 1;
      continue;
    }

    const session: Session = {
      id: name,
      status: record.state,
      project: record.project,
      lastSeen: record.timestamp,
    };
    if (record.message !== undefined) session.message = record.message;
    sessions.set(name, session);
  }

  return { sessions, errorCount };
};

/**
 * Delete a dead or stale status file. A file that is already gone counts as
 * removed. Returns false only when the delete itself failed.
 */
async function removeFile(filepath: string): Promise<boolean> {
  try {
    await unlink(filepath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return true;
    logError("Scanner", `Cannot remove ${filepath}`, error);
    return false;
  }
}
