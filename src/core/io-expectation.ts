import type { Operation } from "./operations.js";
import {
  applyOperation,
  isRegistered,
  type ReservationState,
} from "./state.js";

export type IoExpectation = "pass" | "fail";

/**
 * Writes through the map succeed while we are registered, or while nobody
 * holds a reservation. An unregistered initiator facing a Registrants Only
 * reservation must see every write rejected.
 */
export function expectedIo(state: ReservationState): IoExpectation {
  if (isRegistered(state)) return "pass";
  return state.holder === "none" ? "pass" : "fail";
}

/**
 * Expectation once `op` has succeeded. A local preempt may first let the
 * peer grab the reservation; the local initiator stays registered either
 * way, so the answer does not depend on it.
 */
export function expectationAfter(
  state: ReservationState,
  op: Operation,
): IoExpectation {
  return expectedIo(applyOperation(state, op));
}
