import { describe, it, expect } from "vitest";
import {
  decodeStatusRecord,
  encodeStatusRecord,
  parseTimestamp,
  formatTimestamp,
  StatusFileParseError,
} from "./status-file.js";
import type { StatusRecord } from "./types.js";

const NOW = new Date("2025-06-01T12:00:00Z");

function decodeOk(input: string) {
  const result = decodeStatusRecord(input, NOW);
  if (!result.ok) throw new Error(`expected decode to succeed: ${result.error.message}`);
  return result.record;
}

function decodeErr(input: string) {
  const result = decodeStatusRecord(input, NOW);
  if (result.ok) throw new Error("expected decode to fail");
  return result.error;
}

describe("decodeStatusRecord", () => {
  it("decodes a full record", () => {
    const record = decodeOk(
      '{"state":"working","message":"Processing...","timestamp":"2025-01-01T00:00:00Z","project":"my-app","owner_pid":4242}',
    );
    expect(record).toEqual({
      state: "working",
      message: "Processing...",
      timestamp: new Date("2025-01-01T00:00:00Z"),
      project: "my-app",
      ownerPid: 4242,
    });
  });

  it("applies defaults for missing optional fields", () => {
    const record = decodeOk('{"state":"idle"}');
    expect(record).toEqual({ state: "idle", timestamp: NOW, project: "Unknown" });
    expect(record.message).toBeUndefined();
    expect(record.ownerPid).toBeUndefined();
  });

  it("treats null optional fields as absent", () => {
    const record = decodeOk('{"state":"needs_input","message":null,"project":null,"timestamp":null,"owner_pid":null}');
    expect(record).toEqual({ state: "needs_input", timestamp: NOW, project: "Unknown" });
  });

  it("ignores unknown fields", () => {
    const record = decodeOk('{"state":"idle","project":"p","color":"blue","extra":{"a":1}}');
    expect(record).toEqual({ state: "idle", timestamp: NOW, project: "p" });
  });

  it("falls back to now for a non-canonical timestamp", () => {
    expect(decodeOk('{"state":"idle","timestamp":"2025-01-01 00:00:00"}').timestamp).toEqual(NOW);
    expect(decodeOk('{"state":"idle","timestamp":"2025-01-01T00:00:00.123Z"}').timestamp).toEqual(NOW);
    expect(decodeOk('{"state":"idle","timestamp":"2025-01-01T00:00:00+00:00"}').timestamp).toEqual(NOW);
  });

  it("accepts bytes as well as strings", () => {
    const record = decodeStatusRecord(Buffer.from('{"state":"working","project":"bytes"}'), NOW);
    expect(record.ok).toBe(true);
  });

  it("rejects empty input", () => {
    expect(decodeErr("").reason).toBe("empty");
    expect(decodeErr("  \n").reason).toBe("empty");
  });

  it("rejects malformed JSON", () => {
    const error = decodeErr('{"state":"working"');
    expect(error).toBeInstanceOf(StatusFileParseError);
    expect(error.reason).toBe("malformed");
  });

  it("rejects an unknown state", () => {
    expect(decodeErr('{"state":"sleeping"}').reason).toBe("invalid");
  });

  it("rejects a missing state", () => {
    expect(decodeErr('{"message":"hi"}').reason).toBe("invalid");
  });

  it("rejects a non-object document", () => {
    expect(decodeErr('"working"').reason).toBe("invalid");
    expect(decodeErr("[1,2]").reason).toBe("invalid");
  });

  it("rejects a non-integer owner_pid", () => {
    expect(decodeErr('{"state":"idle","owner_pid":12.5}').reason).toBe("invalid");
    expect(decodeErr('{"state":"idle","owner_pid":"123"}').reason).toBe("invalid");
  });

  it("treats a zero or negative owner_pid as no owner", () => {
    expect(decodeOk('{"state":"idle","owner_pid":0}').ownerPid).toBeUndefined();
    expect(decodeOk('{"state":"idle","owner_pid":-1}').ownerPid).toBeUndefined();
  });
});

describe("parseTimestamp", () => {
  it("parses the canonical form", () => {
    expect(parseTimestamp("2025-01-01T00:00:00Z")?.getTime()).toBe(Date.UTC(2025, 0, 1));
  });

  it("rejects impossible dates", () => {
    expect(parseTimestamp("2025-02-30T00:00:00Z")).toBeNull();
    expect(parseTimestamp("2025-13-01T00:00:00Z")).toBeNull();
  });

  it("formats in second precision", () => {
    expect(formatTimestamp(new Date("2025-03-04T05:06:07.890Z"))).toBe("2025-03-04T05:06:07Z");
  });
});

describe("encodeStatusRecord", () => {
  it("writes the hook's wire format", () => {
    const json = encodeStatusRecord({
      state: "needs_input",
      message: "Waiting for input",
      timestamp: new Date("2025-01-01T00:00:00Z"),
      project: "api",
      ownerPid: 99,
    });
    expect(JSON.parse(json)).toEqual({
      state: "needs_input",
      message: "Waiting for input",
      timestamp: "2025-01-01T00:00:00Z",
      project: "api",
      owner_pid: 99,
    });
  });

  it("round-trips records with whole-second timestamps", () => {
    const records: StatusRecord[] = [
      { state: "working", timestamp: new Date("2025-01-01T00:00:00Z"), project: "a" },
      { state: "idle", message: "Ready", timestamp: new Date("2024-12-31T23:59:59Z"), project: "Unknown" },
      { state: "needs_input", message: "", timestamp: new Date("2025-07-04T10:20:30Z"), project: "b", ownerPid: 1 },
    ];
    for (const record of records) {
      const decoded = decodeStatusRecord(encodeStatusRecord(record), NOW);
      expect(decoded).toEqual({ ok: true, record });
    }
  });
});
