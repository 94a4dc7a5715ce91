/**
 * BaseVerifier: abstract base class for tracked-vs-reported verification.
 *
 * Subclasses describe how to derive the expected tree from the tracked
 * model, how to observe the actual tree from the outside world, and how to
 * compare the two. The expected side may be looser than the observed one
 * (e.g. "this key is among the registered keys").
 */

import type { FieldDiff, VerifyResult } from "./types.js";

export abstract class BaseVerifier<TExpected, TObserved, TContext> {
  /** Derive the expected snapshot from the tracked model. */
  abstract extractTree(context: TContext): TExpected;

  /** Read the snapshot the outside world currently reports. */
  abstract observeTree(context: TContext): Promise<TObserved>;

  /** Compare expected against observed. Return field diffs. */
  abstract compareTree(expected: TExpected, actual: TObserved): FieldDiff[];

  verifyTree(expected: TExpected, actual: TObserved): VerifyResult {
    const diffs = this.compareTree(expected, actual);
    return { pass: diffs.length === 0, diffs };
  }

  async check(context: TContext): Promise<VerifyResult> {
    const expected = this.extractTree(context);
    const actual = await this.observeTree(context);
    return this.verifyTree(expected, actual);
  }
}
