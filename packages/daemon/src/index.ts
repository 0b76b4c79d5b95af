#!/usr/bin/env node
/**
 * VibeStatus daemon: polls the shared status directory, serves the aggregate
 * state over HTTP and logs every requested notification sound.
 */

import { ConfigError, loadConfig } from "./config.js";
import { StatusEngine } from "./engine.js";
import { log, logError, setLogLevel } from "./log.js";
import { startStatusServer } from "./status-server.js";
import { TransitionLog } from "./transition-log.js";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const engine = new StatusEngine({
    config,
    transitionLog: new TransitionLog(config.logsDir),
    onSound: (soundId) => log("Sound", `Requested "${soundId}"`),
  });
  engine.start();

  const server = await startStatusServer({ engine, logsDir: config.logsDir, port: config.port });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log("Daemon", `Received ${signal}, shutting down`);
    await Promise.all([engine.stop(), server.close()]);
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logError("Daemon", "Shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logError("Daemon", error.message);
  } else {
    logError("Daemon", "Failed to start", error);
  }
  process.exit(1);
});
