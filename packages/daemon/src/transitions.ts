/**
 * Per-session transition detection.
 *
 * A sound only fires when a session leaves "working":
 *
 *   working → idle         idle sound
 *   working → needs_input  needs-input sound
 *
 * New sessions, vanished sessions and idle ↔ needs_input never fire.
 */

import type { SessionStatus, SoundIds, SoundTriggers } from "./types.js";

export function detectTransitions(
  previous: ReadonlyMap<string, SessionStatus>,
  current: ReadonlyMap<string, SessionStatus>,
): SoundTriggers {
  const triggers: SoundTriggers = { playIdleSound: false, playNeedsInputSound: false };

  for (const [id, status] of current) {
    if (previous.get(id) !== "working") continue;
    if (status === "needs_input") triggers.playNeedsInputSound = true;
    else if (status === "idle") triggers.playIdleSound = true;
  }

  return triggers;
}

/**
 * Pick the one sound to request for a cycle. needs_input wins over idle.
 */
export function selectSound(triggers: SoundTriggers, sounds: SoundIds): string | null {
  if (triggers.playNeedsInputSound) return sounds.needsInputSound;
  if (triggers.playIdleSound) return sounds.idleSound;
  return null;
}

export interface StatusChange {
  sessionId: string;
  from: SessionStatus | null;
  to: SessionStatus | null;
}

/**
 * Every per-session status difference between two cycles, including sessions
 * appearing (from = null) and disappearing (to = null). Feeds the transition log.
 */
export function diffStatuses(
  previous: ReadonlyMap<string, SessionStatus>,
  current: ReadonlyMap<string, SessionStatus>,
): StatusChange[] {
  const changes: StatusChange[] = [];
  for (const [sessionId, to] of current) {
    const from = previous.get(sessionId) ?? null;
    if (from !== to) changes.push({ sessionId, from, to });
  }
  for (const [sessionId, from] of previous) {
    if (!current.has(sessionId)) changes.push({ sessionId, from, to: null });
  }
  return changes;
}
