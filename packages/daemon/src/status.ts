import type {
  AggregateStatus,
  PublishedState,
  Session,
  SessionStatus,
} from "./types.js";

/**
 * Build the published view of a session map: sorted for display, counted.
 */
export function buildPublishedState(
  aggregate: AggregateStatus,
  sessions: Iterable<Session>,
): PublishedState {
  const sorted = sortSessions(sessions);
  return {
    aggregate,
    sessions: sorted,
    activeSessionCount: sorted.length,
  };
}

/**
 * Order by project, then id. Plain code-unit comparison, no locale rules,
 * so the order is the same on every machine.
 */
export function sortSessions(sessions: Iterable<Session>): Session[] {
  return [...sessions].sort((a, b) => compareOrdinal(a.project, b.project) || compareOrdinal(a.id, b.id));
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare two published states to detect changes worth a redraw.
 * `lastSeen` is left out: a hook that omits the timestamp gets "now" on
 * every decode, which would otherwise republish on every cycle.
 */
export function publishedStateChanged(
  prev: PublishedState | null | undefined,
  next: PublishedState,
): boolean {
  if (!prev) return true;
  if (prev.aggregate !== next.aggregate) return true;
  if (prev.sessions.length !== next.sessions.length) return true;

  return prev.sessions.some((session, i) => {
    const other = next.sessions[i];
    return (
      session.id !== other.id ||
      session.status !== other.status ||
      session.project !== other.project ||
      session.message !== other.message
    );
  });
}

/**
 * Text shown next to the indicator.
 */
export function statusText(aggregate: AggregateStatus): string {
  const labels: Record<AggregateStatus, string> = {
    working: "Working...",
    idle: "Ready",
    needs_input: "Input needed",
    not_running: "Not running",
  };
  return labels[aggregate];
}

/**
 * Short label for one row of the multi-session list.
 */
export function sessionLabel(status: SessionStatus | "not_running"): string {
  const labels: Record<AggregateStatus, string> = {
    working: "working",
    idle: "ready",
    needs_input: "input",
    not_running: "offline",
  };
  return labels[status];
}

/**
 * Format status for display.
 */
export function formatStatus(aggregate: AggregateStatus): string {
  const icons: Record<AggregateStatus, string> = {
    working: "🟠",
    idle: "🟢",
    needs_input: "🔵",
    not_running: "⚪",
  };
  return `${icons[aggregate]} ${statusText(aggregate)}`;
}
