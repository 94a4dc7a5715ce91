/**
 * Generic verification types.
 *
 * Shared by any tracked-vs-reported comparison.
 */

export interface FieldDiff {
  path: string;
  expected: unknown;
  actual: unknown;
  comparison: "exact" | "present" | "absent" | "same-set";
}

export interface VerifyResult {
  pass: boolean;
  diffs: FieldDiff[];
}
