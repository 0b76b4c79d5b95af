import type { AggregateStatus, Session } from "./types.js";

/**
 * Reduce every session to one overall status.
 *
 * Priority: needs_input > working > idle. No sessions → not_running.
 */
export function aggregateStatus(sessions: Iterable<Pick<Session, "status">>): AggregateStatus {
  let sawWorking = false;
  let sawIdle = false;

  for (const session of sessions) {
    // Nothing outranks needs_input
    if (session.status === "needs_input") return "needs_input";
    if (session.status === "working") sawWorking = true;
    else sawIdle = true;
  }

  if (sawWorking) return "working";
  if (sawIdle) return "idle";
  return "not_running";
}
