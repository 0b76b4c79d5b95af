/**
 * Local HTTP server for a presentation layer.
 *
 * GET /status          → published state (aggregate + sorted sessions)
 * GET /diagnostics     → engine counters
 * GET /logs/:sessionId → pipes <logsDir>/<sessionId>.log
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createReadStream } from "node:fs";
import { access, constants } from "node:fs/promises";
import { join } from "node:path";
import type { StatusEngine } from "./engine.js";
import { sessionLabel } from "./status.js";
import type { PublishedState } from "./types.js";
import { log, logError } from "./log.js";

export const DEFAULT_PORT = 4460;

// Session ids are file names: allow dots, but never a path segment
const SESSION_ID_RE = /^[A-Za-z0-9._-]+$/;

export interface StatusServerOptions {
  engine: StatusEngine;
  logsDir: string;
  port?: number;
  host?: string;
}

export interface StatusServer {
  readonly port: number;
  readonly url: string;
  close(): Promise<void>;
}

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_RE.test(sessionId) && !sessionId.includes("..");
}

/**
 * JSON shape of GET /status. Dates become ISO strings.
 *
 * `lastSeen` is the value at the last published change. A timestamp that
 * moved on its own does not republish, so it can lag by up to the session
 * timeout; `label` is the short row text for the multi-session list.
 */
export function serializeState(state: PublishedState): {
  aggregate: PublishedState["aggregate"];
  activeSessionCount: number;
  sessions: Array<{
    id: string;
    status: string;
    label: string;
    project: string;
    message: string | null;
    lastSeen: string;
  }>;
} {
  return {
    aggregate: state.aggregate,
    activeSessionCount: state.activeSessionCount,
    sessions: state.sessions.map((session) => ({
      id: session.id,
      status: session.status,
      label: sessionLabel(session.status),
      project: session.project,
      message: session.message ?? null,
      lastSeen: session.lastSeen.toISOString(),
    })),
  };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  options: StatusServerOptions,
): Promise<void> {
  res.setHeader("Access-Control-Allow-Origin", "*");

  if (req.method === "OPTIONS") {
    res.writeHead(204, {
      "Access-Control-Allow-Methods": "GET",
      "Access-Control-Allow-Headers": "Content-Type",
    });
    res.end();
    return;
  }

  if (req.method !== "GET") {
    sendText(res, 405, "Method Not Allowed");
    return;
  }

  const pathname = new URL(req.url ?? "/", "http://127.0.0.1").pathname;

  if (pathname === "/status") {
    sendJson(res, 200, serializeState(options.engine.getState()));
    return;
  }

  if (pathname === "/diagnostics") {
    const diagnostics = options.engine.getDiagnostics();
    sendJson(res, 200, {
      ...diagnostics,
      lastCycleAt: diagnostics.lastCycleAt?.toISOString() ?? null,
    });
    return;
  }

  const match = pathname.match(/^\/logs\/([^/]+)$/);
  if (!match) {
    sendText(res, 404, "Not Found");
    return;
  }

  let sessionId: string;
  try {
    sessionId = decodeURIComponent(match[1]);
  } catch {
    sendText(res, 400, "Invalid session ID");
    return;
  }
  if (!isValidSessionId(sessionId)) {
    sendText(res, 400, "Invalid session ID");
    return;
  }

  const filepath = join(options.logsDir, `${sessionId}.log`);
  try {
    await access(filepath, constants.R_OK);
  } catch {
    sendText(res, 404, "Log not found");
    return;
  }

  res.writeHead(200, {
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Disposition": `attachment; filename="${sessionId}.log"`,
  });
  createReadStream(filepath).pipe(res);
}

export function startStatusServer(options: StatusServerOptions): Promise<StatusServer> {
  const host = options.host ?? "127.0.0.1";

  const server = createServer((req, res) => {
    handleRequest(req, res, options).catch((error: unknown) => {
      logError("Server", `Request ${req.method} ${req.url} failed`, error);
      if (!res.headersSent) sendText(res, 500, "Internal error");
      else res.end();
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? DEFAULT_PORT, host, () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port ?? DEFAULT_PORT;
      const url = `http://${host}:${port}`;
      log("Server", `Serving status on ${url}`);
      resolve({
        port,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
