import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, writeFile, rm, readdir } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { scanDirectory, isStatusFileName, type ScanOptions } from "./scanner.js";
import { encodeStatusRecord, formatTimestamp } from "./status-file.js";
import { setLogLevel } from "./log.js";

const NOW = new Date("2025-06-01T12:00:00Z");

let dir: string;

function options(overrides: Partial<ScanOptions> = {}): ScanOptions {
  return {
    directory: dir,
    filePrefix: "vibestatus-",
    fileSuffix: ".json",
    now: NOW,
    sessionTimeoutSeconds: 300,
    ...overrides,
  };
}

const alive = { isProcessAlive: () => true };

async function writeStatus(name: string, body: Record<string, unknown> | string): Promise<void> {
  const content = typeof body === "string" ? body : JSON.stringify(body);
  await writeFile(path.join(dir, name), content);
}

async function filesInDir(): Promise<string[]> {
  return (await readdir(dir)).sort();
}

function secondsAgo(seconds: number): string {
  return formatTimestamp(new Date(NOW.getTime() - seconds * 1000));
}

describe("scanDirectory", () => {
  beforeEach(async () => {
    setLogLevel("error");
    dir = await mkdtemp(path.join(os.tmpdir(), "status-scan-"));
  });

  afterEach(async () => {
    setLogLevel("info");
    await rm(dir, { recursive: true, force: true });
  });

  it("picks up a fresh working session keyed by file name", async () => {
    await writeStatus("vibestatus-abc.json", { state: "working", timestamp: formatTimestamp(NOW) });

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect(errorCount).toBe(0);
    expect([...sessions.values()]).toEqual([
      { id: "vibestatus-abc.json", status: "working", project: "Unknown", lastSeen: NOW },
    ]);
  });

  it("carries project and message through", async () => {
    await writeStatus("vibestatus-1.json", encodeStatusRecord({
      state: "needs_input",
      message: "Waiting for input",
      project: "api",
      timestamp: NOW,
    }));

    const { sessions } = await scanDirectory(options(), alive);

    expect(sessions.get("vibestatus-1.json")).toEqual({
      id: "vibestatus-1.json",
      status: "needs_input",
      project: "api",
      message: "Waiting for input",
      lastSeen: NOW,
    });
  });

  it("only considers files with the prefix and suffix", async () => {
    await writeStatus("vibestatus-a.json", { state: "idle" });
    await writeStatus("other-b.json", { state: "idle" });
    await writeStatus("vibestatus-c.txt", { state: "idle" });
    await writeStatus("vibestatus-.json.bak", { state: "idle" });

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect([...sessions.keys()]).toEqual(["vibestatus-a.json"]);
    expect(errorCount).toBe(0);
  });

  it("deletes stale files and leaves them out", async () => {
    await writeStatus("vibestatus-old.json", { state: "working", timestamp: secondsAgo(400) });
    await writeStatus("vibestatus-new.json", { state: "idle", timestamp: secondsAgo(10) });

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect([...sessions.keys()]).toEqual(["vibestatus-new.json"]);
    expect(errorCount).toBe(0);
    expect(await filesInDir()).toEqual(["vibestatus-new.json"]);
  });

  it("treats a file exactly at the timeout as stale", async () => {
    await writeStatus("vibestatus-edge.json", { state: "idle", timestamp: secondsAgo(300) });

    const { sessions } = await scanDirectory(options(), alive);

    expect(sessions.size).toBe(0);
    expect(await filesInDir()).toEqual([]);
  });

  it("deletes files whose owner process is dead, however fresh", async () => {
    await writeStatus("vibestatus-dead.json", { state: "working", timestamp: formatTimestamp(NOW), owner_pid: 4242 });
    await writeStatus("vibestatus-live.json", { state: "working", timestamp: formatTimestamp(NOW), owner_pid: 1717 });
    const isProcessAlive = vi.fn((pid: number) => pid !== 4242);

    const { sessions } = await scanDirectory(options(), { isProcessAlive });

    expect([...sessions.keys()]).toEqual(["vibestatus-live.json"]);
    expect(isProcessAlive).toHaveBeenCalledWith(4242);
    expect(await filesInDir()).toEqual(["vibestatus-live.json"]);
  });

  it("assumes a session without owner_pid is alive", async () => {
    await writeStatus("vibestatus-x.json", { state: "idle", timestamp: formatTimestamp(NOW) });
    const isProcessAlive = vi.fn(() => false);

    const { sessions } = await scanDirectory(options(), { isProcessAlive });

    expect(sessions.size).toBe(1);
    expect(isProcessAlive).not.toHaveBeenCalled();
  });

  it("keeps a fresh session whose owner_pid is 0 without a liveness check", async () => {
    await writeStatus("vibestatus-zero.json", { state: "working", timestamp: secondsAgo(1), owner_pid: 0 });
    const isProcessAlive = vi.fn(() => false);

    const { sessions, errorCount } = await scanDirectory(options(), { isProcessAlive });

    expect(errorCount).toBe(0);
    expect([...sessions.keys()]).toEqual(["vibestatus-zero.json"]);
    expect(isProcessAlive).not.toHaveBeenCalled();
  });

  it("deletes a stale file whose owner_pid is 0", async () => {
    await writeStatus("vibestatus-zero.json", { state: "idle", timestamp: secondsAgo(600), owner_pid: 0 });

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect(errorCount).toBe(0);
    expect(sessions.size).toBe(0);
    expect(await filesInDir()).toEqual([]);
  });

  it("uses now for a missing timestamp, so the file never goes stale", async () => {
    await writeStatus("vibestatus-x.json", { state: "idle" });

    const { sessions } = await scanDirectory(options(), alive);

    expect(sessions.get("vibestatus-x.json")?.lastSeen).toEqual(NOW);
  });

  it("skips empty files without counting an error and leaves them in place", async () => {
    await writeStatus("vibestatus-empty.json", "");

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect(sessions.size).toBe(0);
    expect(errorCount).toBe(0);
    expect(await filesInDir()).toEqual(["vibestatus-empty.json"]);
  });

  it("counts malformed files as errors and leaves them in place", async () => {
    await writeStatus("vibestatus-bad.json", '{"state":"working"');
    await writeStatus("vibestatus-enum.json", { state: "sleeping" });
    await writeStatus("vibestatus-ok.json", { state: "idle" });

    const { sessions, errorCount } = await scanDirectory(options(), alive);

    expect([...sessions.keys()]).toEqual(["vibestatus-ok.json"]);
    expect(errorCount).toBe(2);
    expect(await filesInDir()).toEqual(["vibestatus-bad.json", "vibestatus-enum.json", "vibestatus-ok.json"]);
  });

  it("reports one error and no sessions when the directory cannot be listed", async () => {
    const { sessions, errorCount } = await scanDirectory(options({ directory: path.join(dir, "missing") }), alive);

    expect(sessions.size).toBe(0);
    expect(errorCount).toBe(1);
  });

  it("returns the same sessions for back-to-back scans", async () => {
    await writeStatus("vibestatus-a.json", { state: "working", project: "a", timestamp: secondsAgo(5) });
    await writeStatus("vibestatus-b.json", { state: "needs_input", project: "b", timestamp: secondsAgo(60) });

    const first = await scanDirectory(options(), alive);
    const second = await scanDirectory(options({ now: new Date(NOW.getTime() + 100_000) }), alive);

    expect(second.sessions).toEqual(first.sessions);
    expect(second.errorCount).toBe(0);
  });
});

describe("isStatusFileName", () => {
  it("needs both prefix and suffix", () => {
    expect(isStatusFileName("vibestatus-a.json", "vibestatus-", ".json")).toBe(true);
    expect(isStatusFileName("vibestatus-a.txt", "vibestatus-", ".json")).toBe(false);
    expect(isStatusFileName("a.json", "vibestatus-", ".json")).toBe(false);
  });

  it("does not let prefix and suffix overlap", () => {
    expect(isStatusFileName("ab", "ab", "b")).toBe(false);
  });
});
