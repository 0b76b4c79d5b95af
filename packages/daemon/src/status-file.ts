/**
 * Codec for the per-session status files written by the hook script.
 *
 * {"state":"working","message":"Processing...","timestamp":"2025-01-01T00:00:00Z",
 *  "project":"my-app","owner_pid":4242}
 *
 * Only `state` is required. Unknown fields are dropped, `null` counts as absent.
 */

import { z } from "zod";
import { SESSION_STATUSES, type StatusRecord } from "./types.js";

export const DEFAULT_PROJECT = "Unknown";

const CANONICAL_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export const StatusRecordSchema = z.object({
  state: z.enum(SESSION_STATUSES),
  message: z.string().nullish(),
  timestamp: z.string().nullish(),
  project: z.string().nullish(),
  owner_pid: z.number().int().nullish(),
});

export type RawStatusRecord = z.infer<typeof StatusRecordSchema>;

export type ParseFailureReason = "empty" | "malformed" | "invalid";

export class StatusFileParseError extends Error {
  readonly reason: ParseFailureReason;

  constructor(reason: ParseFailureReason, message: string) {
    super(message);
    this.name = "StatusFileParseError";
    this.reason = reason;
  }
}

export type DecodeResult =
  | { ok: true; record: StatusRecord }
  | { ok: false; error: StatusFileParseError };

/**
 * Parse a timestamp in the single accepted form, `YYYY-MM-DDTHH:MM:SSZ`.
 * Anything else (offsets, fractional seconds, impossible dates) gives null.
 */
export function parseTimestamp(value: string): Date | null {
  if (!CANONICAL_TIMESTAMP_RE.test(value)) return null;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return null;
  // Date rolls 2025-02-30 over into March; reject instead
  if (formatTimestamp(date) !== value) return null;
  return date;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function decodeStatusRecord(
  bytes: Uint8Array | string,
  now: Date = new Date(),
): DecodeResult {
  const text = typeof bytes === "string" ? bytes : Buffer.from(bytes).toString("utf-8");
  if (text.trim() === "") {
    return { ok: false, error: new StatusFileParseError("empty", "Status file is empty") };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new StatusFileParseError("malformed", `Invalid JSON: ${detail}`) };
  }

  const result = StatusRecordSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: new StatusFileParseError("invalid", result.error.message) };
  }

  const raw = result.data;
  const record: StatusRecord = {
    state: raw.state,
    timestamp: (raw.timestamp != null ? parseTimestamp(raw.timestamp) : null) ?? now,
    project: raw.project ?? DEFAULT_PROJECT,
  };
  if (raw.message != null) record.message = raw.message;
  // 0 and negative pids name no single process; treat the record as ownerless
  if (raw.owner_pid != null && raw.owner_pid > 0) record.ownerPid = raw.owner_pid;

  return { ok: true, record };
}

/**
 * Serialize a record the way the hook writes it. The engine never writes
 * status files itself; this exists for seeding and for tests.
 */
export function encodeStatusRecord(record: StatusRecord): string {
  const raw: RawStatusRecord = {
    state: record.state,
    timestamp: formatTimestamp(record.timestamp),
    project: record.project,
  };
  if (record.message !== undefined) raw.message = record.message;
  if (record.ownerPid !== undefined) raw.owner_pid = record.ownerPid;
  return JSON.stringify(raw);
}
