import { EventEmitter } from "node:events";
import { aggregateStatus } from "./aggregate.js";
import type { EngineConfig } from "./config.js";
import type { DirectoryWatch, DirectoryWatchFactory } from "./directory-watch.js";
import { watchDirectory } from "./directory-watch.js";
import { describeError, log, logDebug, logError, logWarn } from "./log.js";
import { createProcessProbe, type ProcessProbe } from "./process-probe.js";
import { scanDirectory, isStatusFileName, type ScanFunction } from "./scanner.js";
import { SessionStore } from "./session-store.js";
import { buildPublishedState, formatStatus, publishedStateChanged } from "./status.js";
import type { TransitionLog } from "./transition-log.js";
import { detectTransitions, diffStatuses, selectSound } from "./transitions.js";
import type { PublishedState, SessionStatus } from "./types.js";

export type { EngineConfig } from "./config.js";
export type { PublishedState, Session, SessionStatus, AggregateStatus } from "./types.js";

export type CycleTrigger = "start" | "timer" | "watch" | "process" | "refresh";

export interface StatusEngineOptions {
  config: EngineConfig;
  probe?: ProcessProbe;
  /** Native change notifications. null runs on the poll timer alone. */
  watchDirectory?: DirectoryWatchFactory | null;
  scan?: ScanFunction;
  now?: () => Date;
  onSound?: (soundId: string) => void;
  transitionLog?: TransitionLog | null;
}

export interface EngineDiagnostics {
  running: boolean;
  cycles: number;
  failedCycles: number;
  lastErrorCount: number;
  familyRunning: boolean | null;
  lastCycleAt: Date | null;
}

const EMPTY_STATE: PublishedState = Object.freeze({
  aggregate: "not_running",
  sessions: Object.freeze([]),
  activeSessionCount: 0,
});

/**
 * Polls the shared status directory and publishes one aggregate state.
 *
 * Events:
 *   "state" (PublishedState)  only when the published state changed
 *   "sound" (string)          a notification sound should be played
 *
 * At most one cycle runs at a time. A request made during a cycle sets a
 * single pending flag, so one more cycle follows it; further requests
 * coalesce into that one. Watch notifications are debounced first.
 */
export class StatusEngine extends EventEmitter {
  private readonly config: EngineConfig;
  private readonly probe: ProcessProbe;
  private readonly watchFactory: DirectoryWatchFactory | null;
  private readonly scan: ScanFunction;
  private readonly now: () => Date;
  private readonly onSound: ((soundId: string) => void) | null;
  private readonly transitionLog: TransitionLog | null;

  private readonly store = new SessionStore();
  private previousStatuses: ReadonlyMap<string, SessionStatus> = new Map();
  private published: PublishedState = EMPTY_STATE;

  private running = false;
  // Bumped on stop; a cycle started under an older generation never publishes
  private generation = 0;
  private inFlight: Promise<void> | null = null;
  private pending = false;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private pollInterval: ReturnType<typeof setInterval> | null = null;
  private processInterval: ReturnType<typeof setInterval> | null = null;
  private processCheck: Promise<void> | null = null;
  private directoryWatch: DirectoryWatch | null = null;

  private familyRunning: boolean | null = null;
  private cycles = 0;
  private failedCycles = 0;
  private lastErrorCount = 0;
  private lastCycleAt: Date | null = null;

  constructor(options: StatusEngineOptions) {
    super();
    this.config = options.config;
    this.probe = options.probe ?? createProcessProbe(options.config.processPattern);
    this.watchFactory = options.watchDirectory === undefined ? watchDirectory : options.watchDirectory;
    this.scan = options.scan ?? scanDirectory;
    this.now = options.now ?? (() => new Date());
    this.onSound = options.onSound ?? null;
    this.transitionLog = options.transitionLog ?? null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Current published snapshot. Never mutated after it is handed out. */
  getState(): PublishedState {
    return this.published;
  }

  getDiagnostics(): EngineDiagnostics {
    return {
      running: this.running,
      cycles: this.cycles,
      failedCycles: this.failedCycles,
      lastErrorCount: this.lastErrorCount,
      familyRunning: this.familyRunning,
      lastCycleAt: this.lastCycleAt,
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    const { directory, pollIntervalMs, processCheckIntervalMs } = this.config;

    if (this.watchFactory) {
      try {
        this.directoryWatch = this.watchFactory(directory, (filename) => {
          if (isStatusFileName(filename, this.config.filePrefix, this.config.fileSuffix)) {
            this.requestCycle("watch");
          }
        });
      } catch (error) {
        logWarn("Engine", `Directory watch unavailable for ${directory}, polling only: ${describeError(error)}`);
      }
    }

    this.pollInterval = setInterval(() => this.requestCycle("timer"), pollIntervalMs);
    this.processInterval = setInterval(() => this.checkProcessFamily(), processCheckIntervalMs);

    log("Engine", `Watching ${directory} (poll ${pollIntervalMs}ms, timeout ${this.config.sessionTimeoutSeconds}s)`);
    this.requestCycle("start");
    this.checkProcessFamily();
  }

  /**
   * Stop all timers and the directory watch, then wait for any in-flight
   * cycle to settle. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      await this.whenIdle();
      return;
    }
    this.running = false;
    this.generation += 1;
    this.pending = false;

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
    if (this.processInterval) {
      clearInterval(this.processInterval);
      this.processInterval = null;
    }

    const watch = this.directoryWatch;
    this.directoryWatch = null;
    if (watch) {
      try {
        await watch.close();
      } catch (error) {
        logError("Engine", "Failed to close directory watch", error);
      }
    }

    await this.whenIdle();
    log("Engine", "Stopped");
  }

  /**
   * Run a cycle now (or right after the in-flight one) and resolve once the
   * published state reflects it.
   */
  async refresh(): Promise<PublishedState> {
    this.requestCycle("refresh");
    await this.whenIdle();
    return this.published;
  }

  /**
   * Ask for a cycle. Watch notifications wait out the debounce window and
   * coalesce with any already waiting; everything else goes straight to the
   * scheduler.
   */
  requestCycle(trigger: CycleTrigger): void {
    if (!this.running) return;

    if (trigger === "watch") {
      if (this.debounceTimer) return;
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = null;
        this.schedule();
      }, this.config.debounceMs);
      return;
    }

    this.schedule();
  }

  private schedule(): void {
    if (!this.running) return;
    if (this.inFlight) {
      this.pending = true;
      return;
    }
    this.inFlight = this.drain().finally(() => {
      this.inFlight = null;
    });
  }

  private async drain(): Promise<void> {
    do {
      this.pending = false;
      await this.runCycle();
    } while (this.pending && this.running);
  }

  /** Resolves once no cycle or process check is in flight. */
  async whenIdle(): Promise<void> {
    while (this.inFlight || this.processCheck) {
      await Promise.all([this.inFlight, this.processCheck]);
    }
    await this.transitionLog?.flush();
  }

  private async runCycle(): Promise<void> {
    const generation = this.generation;
    const now = this.now();

    try {
      const { sessions, errorCount } = await this.scan(
        {
          directory: this.config.directory,
          filePrefix: this.config.filePrefix,
          fileSuffix: this.config.fileSuffix,
          now,
          sessionTimeoutSeconds: this.config.sessionTimeoutSeconds,
        },
        { isProcessAlive: (pid) => this.probe.isAlive(pid) },
      );
      if (generation !== this.generation || !this.running) return;

      this.store.replace(sessions);
      const current = this.store.statuses();
      const transitions = detectTransitions(this.previousStatuses, current);
      const sound = selectSound(transitions, this.config);
      this.logTransitions(this.previousStatuses, current, "cycle", sound);
      this.previousStatuses = current;

      this.cycles += 1;
      this.lastErrorCount = errorCount;
      this.lastCycleAt = now;
      if (errorCount > 0) {
        logDebug("Engine", `Cycle finished with ${errorCount} error(s)`);
      }

      this.publish(buildPublishedState(aggregateStatus(sessions.values()), sessions.values()));

      if (sound) this.requestSound(sound);
    } catch (error) {
      this.failedCycles += 1;
      logError("Engine", "Cycle failed, skipping", error);
    }
  }

  private publish(next: PublishedState): void {
    if (!publishedStateChanged(this.published, next)) return;
    const previous = this.published.aggregate;
    this.published = Object.freeze({
      ...next,
      sessions: Object.freeze([...next.sessions]),
    });
    if (previous !== next.aggregate) {
      log("Engine", `${formatStatus(next.aggregate)} (${next.activeSessionCount} session(s))`);
    }
    this.emit("state", this.published);
  }

  private requestSound(soundId: string): void {
    this.emit("sound", soundId);
    if (!this.onSound) return;
    try {
      this.onSound(soundId);
    } catch (error) {
      logError("Engine", `Sound request "${soundId}" failed`, error);
    }
  }

  private logTransitions(
    previous: ReadonlyMap<string, SessionStatus>,
    current: ReadonlyMap<string, SessionStatus>,
    source: "cycle" | "eviction",
    sound: string | null,
  ): void {
    if (!this.transitionLog) return;
    for (const change of diffStatuses(previous, current)) {
      const session = this.store.get(change.sessionId);
      this.transitionLog.append(change.sessionId, change.from, change.to, {
        source,
        project: session?.project,
        message: session?.message,
        sound: change.from === "working" && change.to !== null ? sound ?? undefined : undefined,
      });
    }
  }

  /**
   * Probe whether the worker family is running at all. Newly running while
   * nothing is shown → scan right away. Confirmed not running with no cycle
   * in flight → drop expired sessions and show not_running without waiting
   * for the next scan.
   */
  private checkProcessFamily(): void {
    if (!this.running || this.processCheck) return;
    const generation = this.generation;

    this.processCheck = this.probe
      .isFamilyRunning()
      .then((isRunning) => {
        if (generation !== this.generation || !this.running) return;
        const wasRunning = this.familyRunning;
        this.familyRunning = isRunning;

        if (isRunning) {
          if (wasRunning === false && this.published.aggregate === "not_running") {
            logDebug("Engine", "Worker process detected, scanning now");
            this.requestCycle("process");
          }
          return;
        }

        // The store belongs to the running cycle; it publishes a fresher view
        if (this.inFlight) return;

        const evicted = this.store.evictExpired(this.now(), this.config.sessionTimeoutSeconds);
        if (evicted.length > 0) {
          const current = this.store.statuses();
          this.logTransitions(this.previousStatuses, current, "eviction", null);
          this.previousStatuses = current;
        }
        if (this.store.size === 0) {
          this.publish(EMPTY_STATE);
        } else if (evicted.length > 0) {
          const sessions = this.store.snapshot();
          this.publish(buildPublishedState(aggregateStatus(sessions.values()), sessions.values()));
        }
      })
      .catch((error: unknown) => {
        logDebug("Engine", `Process family check failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.processCheck = null;
      });
  }
}
