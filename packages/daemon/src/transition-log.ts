/**
 * Per-session transition log.
 *
 * Appends one human-readable line per status change to
 * <logsDir>/<sessionId>.log
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { SessionStatus } from "./types.js";
import { logDebug } from "./log.js";

export interface TransitionMeta {
  source: "cycle" | "eviction";
  project?: string;
  message?: string;
  sound?: string;
}

export function formatLine(
  from: SessionStatus | null,
  to: SessionStatus | null,
  meta: TransitionMeta,
  at: Date = new Date(),
): string {
  const stateCol = from === null
    ? `[init] ${to ?? "gone"}`
    : `${from} -> ${to ?? "gone"}`;

  const parts: string[] = [`source:${meta.source}`];
  if (meta.project) parts.push(`project:${meta.project}`);
  if (meta.sound) parts.push(`sound:${meta.sound}`);
  if (meta.message) parts.push(`message:${meta.message}`);

  return `${at.toISOString()}  ${stateCol.padEnd(30)}  ${parts.join("  ")}\n`;
}

export class TransitionLog {
  private dirEnsured = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(readonly logsDir: string) {}

  pathFor(sessionId: string): string {
    return join(this.logsDir, `${sessionId}.log`);
  }

  /**
   * Queue a line for the session's log. Writes happen in call order;
   * a failed write is logged and does not stop later ones.
   */
  append(
    sessionId: string,
    from: SessionStatus | null,
    to: SessionStatus | null,
    meta: TransitionMeta,
  ): void {
    const line = formatLine(from, to, meta);
    this.pending = this.pending
      .then(() => this.write(sessionId, line))
      .catch((error: unknown) => {
        logDebug("TransitionLog", `Write failed for ${sessionId}: ${String(error)}`);
      });
  }

  /** Resolves once every queued line has been written or dropped. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async write(sessionId: string, line: string): Promise<void> {
    if (!this.dirEnsured) {
      await mkdir(this.logsDir, { recursive: true });
      this.dirEnsured = true;
    }
    await appendFile(this.pathFor(sessionId), line);
  }
}
