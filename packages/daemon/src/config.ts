import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS } from "./log.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function expandHome(p: string): string {
  if (p.startsWith("~/") || p === "~") {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

// The hook script writes to /tmp, not to the per-user macOS temp dir
const DEFAULT_DIRECTORY = process.platform === "win32" ? os.tmpdir() : "/tmp";

const positiveInt = z.coerce.number().int().positive();

export const EngineConfigSchema = z.object({
  directory: z.string().min(1).default(DEFAULT_DIRECTORY),
  filePrefix: z.string().default("vibestatus-"),
  fileSuffix: z.string().default(".json"),
  pollIntervalMs: positiveInt.default(500),
  processCheckIntervalMs: positiveInt.default(2000),
  debounceMs: z.coerce.number().int().nonnegative().default(100),
  sessionTimeoutSeconds: positiveInt.default(300),
  idleSound: z.string().min(1).default("Glass"),
  needsInputSound: z.string().min(1).default("Purr"),
  processPattern: z.string().min(1).default("claude"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DaemonConfigSchema = EngineConfigSchema.extend({
  port: z.coerce.number().int().min(0).max(65535).default(4460),
  logsDir: z.string().min(1).default(path.join(os.homedir(), ".vibestatus", "session-logs")),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

const ENV_KEYS: Record<keyof z.input<typeof DaemonConfigSchema>, string> = {
  directory: "VIBESTATUS_DIR",
  filePrefix: "VIBESTATUS_FILE_PREFIX",
  fileSuffix: "VIBESTATUS_FILE_SUFFIX",
  pollIntervalMs: "VIBESTATUS_POLL_INTERVAL_MS",
  processCheckIntervalMs: "VIBESTATUS_PROCESS_CHECK_INTERVAL_MS",
  debounceMs: "VIBESTATUS_DEBOUNCE_MS",
  sessionTimeoutSeconds: "VIBESTATUS_SESSION_TIMEOUT_SECONDS",
  idleSound: "VIBESTATUS_IDLE_SOUND",
  needsInputSound: "VIBESTATUS_NEEDS_INPUT_SOUND",
  processPattern: "VIBESTATUS_PROCESS_PATTERN",
  port: "VIBESTATUS_PORT",
  logsDir: "VIBESTATUS_LOGS_DIR",
  logLevel: "VIBESTATUS_LOG_LEVEL",
};

/**
 * Engine defaults, with any overrides applied.
 */
export function engineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides);
}

/**
 * Read the daemon configuration from environment variables. Unset or blank
 * variables fall back to defaults; invalid values throw ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim();
    if (value) raw[field] = field === "directory" || field === "logsDir" ? expandHome(value) : value;
  }
  if (raw.logLevel) raw.logLevel = raw.logLevel.toLowerCase();

  const result = DaemonConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const [field] = issue.path;
        const name = isConfigField(field) ? ENV_KEYS[field] : issue.path.join(".");
        return `${name}: ${issue.message}`;
      })
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

function isConfigField(value: unknown): value is keyof typeof ENV_KEYS {
  return typeof value === "string" && value in ENV_KEYS;
}
