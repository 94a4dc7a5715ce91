/**
 * Generic diff comparison helpers.
 *
 * Reusable primitives for comparing expected vs reported field values.
 */

import type { FieldDiff } from "./types.js";

export function diffExact(
  path: string,
  expected: unknown,
  actual: unknown,
): FieldDiff | null {
  if (expected === actual) return null;
  return { path, expected, actual, comparison: "exact" };
}

/**
 * Expected value must appear among the reported values.
 */
export function diffPresent<T>(
  path: string,
  expected: T,
  actual: ReadonlySet<T>,
): FieldDiff | null {
  if (actual.has(expected)) return null;
  return { path, expected, actual: [...actual], comparison: "present" };
}

/**
 * Value must not appear among the reported values.
 */
export function diffAbsent<T>(
  path: string,
  unexpected: T,
  actual: ReadonlySet<T>,
): FieldDiff | null {
  if (!actual.has(unexpected)) return null;
  return {
    path,
    expected: { absent: unexpected },
    actual: [...actual],
    comparison: "absent",
  };
}

export function diffSameSet<T>(
  path: string,
  expected: ReadonlySet<T>,
  actual: ReadonlySet<T>,
): FieldDiff | null {
  const sameSize = expected.size === actual.size;
  if (sameSize && [...expected].every((value) => actual.has(value))) {
    return null;
  }
  return {
    path,
    expected: [...expected],
    actual: [...actual],
    comparison: "same-set",
  };
}

export function collectDiffs(
  ...diffs: Array<FieldDiff | null | FieldDiff[]>
): FieldDiff[] {
  return diffs.flatMap((diff) => (diff === null ? [] : diff));
}
