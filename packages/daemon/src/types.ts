export const SESSION_STATUSES = ["working", "idle", "needs_input"] as const;

/** Canonical per-session state, as written by the hook into each status file. */
export type SessionStatus = (typeof SESSION_STATUSES)[number];

/** The single overall status; "not_running" only when there are no sessions. */
export type AggregateStatus = SessionStatus | "not_running";

/** One decoded status file, with defaults already applied. */
export interface StatusRecord {
  state: SessionStatus;
  message?: string;
  timestamp: Date;
  project: string;
  ownerPid?: number;
}

export interface Session {
  id: string;          // status file name, e.g. vibestatus-abc.json
  status: SessionStatus;
  project: string;
  message?: string;
  lastSeen: Date;
}

export interface PublishedState {
  aggregate: AggregateStatus;
  sessions: readonly Session[];
  activeSessionCount: number;
}

export interface SoundTriggers {
  playIdleSound: boolean;
  playNeedsInputSound: boolean;
}

export interface SoundIds {
  idleSound: string;
  needsInputSound: string;
}
