// State merge engine: every field is last-write-wins except `runs`, which only grows

import type { StatePatch } from '../types/pipeline.js';

export function lastWriteWins<T>(current: T, incoming: T | undefined): T {
  return incoming === undefined ? current : incoming;
}

export function appendOnly<T>(current: readonly T[], incoming: readonly T[] | undefined): T[] {
  if (!incoming || incoming.length === 0) return [...current];
  return [...current, ...incoming];
}

function withoutUndefined<S>(patch: StatePatch<S>): StatePatch<S> {
  const clean: StatePatch<S> = { ...patch };
  for (const key in clean) {
    if (clean[key] === undefined) delete clean[key];
  }
  return clean;
}

/**
 * Apply one stage patch. Fields absent from the patch (or set to undefined)
 * keep their current value; `runs` is concatenated.
 */
export function mergeState<R, S extends { runs: R[] }>(current: S, patch: StatePatch<S>): S {
  const { runs, ...rest } = withoutUndefined(patch);
  return { ...current, ...rest, runs: appendOnly<R>(current.runs, runs) };
}

/**
 * Timestamp for the next run record of a conversation. Never earlier than
 * the previous record, whatever the wall clock says.
 */
export function nextRunTimestamp(previousAt: string | undefined, now: Date): string {
  const candidate = now.toISOString();
  if (previousAt === undefined) return candidate;
  return Date.parse(previousAt) > now.getTime() ? previousAt : candidate;
}
