import type { JsonValue } from '../json.js';

/**
 * Collapse an evaluator match list into the value that gets printed:
 * no matches become `null`, a single match is unwrapped, and anything
 * longer stays an array in match order.
 */
export function normalizeResults(matches: readonly JsonValue[]): JsonValue {
  if (matches.length === 0) return null;
  if (matches.length === 1) return matches[0];
  return [...matches];
}
