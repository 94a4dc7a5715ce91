export { BaseVerifier } from "./base-verifier.js";
export type { FieldDiff, VerifyResult } from "./types.js";
export {
  diffExact,
  diffPresent,
  diffAbsent,
  diffSameSet,
  collectDiffs,
} from "./diff-helpers.js";
