/**
 * Last-write-wins at whole-record granularity. An incoming record replaces the stored
 * one only when strictly newer; ties keep what is stored.
 */

import { addMilliseconds, compareDesc, isAfter, parseISO } from 'date-fns';

export function isNewer(incoming: string, existing: string): boolean {
  return isAfter(parseISO(incoming), parseISO(existing));
}

export function laterOf(current: string | null, candidate: string): string {
  if (current === null) return candidate;
  return isNewer(candidate, current) ? candidate : current;
}

/**
 * `candidate` when strictly later than `previous`, otherwise one millisecond past it.
 */
export function strictlyAfter(previous: string, candidate: string): string {
  return isNewer(candidate, previous) ? candidate : addMilliseconds(parseISO(previous), 1).toISOString();
}

interface Versioned {
  global_id: string;
  updated_at: string;
}

/**
 * Most recently updated first; equal timestamps fall back to the lowest global id so
 * every store picks the same survivor.
 */
export function compareBySurvival(a: Versioned, b: Versioned): number {
  const byRecency = compareDesc(parseISO(a.updated_at), parseISO(b.updated_at));
  if (byRecency !== 0) return byRecency;
  if (a.global_id === b.global_id) return 0;
  return a.global_id < b.global_id ? -1 : 1;
}
