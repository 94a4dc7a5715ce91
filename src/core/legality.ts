import { Operations, type Operation } from "./operations.js";
import { isRegistered, type ReservationState } from "./state.js";

/**
 * Operations that are legal to issue from `state`.
 *
 * An unregistered initiator can only register. A registered one can do
 * anything except take a reservation somebody else holds: Reserve is only
 * offered while the reservation is free or already ours.
 */
export function legalOperations(state: ReservationState): Operation[] {
  if (!isRegistered(state)) {
    return [
      Operations.register("new-key"),
      Operations.registerIgnore("new-key"),
    ];
  }

  const operations: Operation[] = [
    Operations.register("new-key"),
    Operations.register("unregister"),
    Operations.registerIgnore("new-key"),
    Operations.registerIgnore("unregister"),
    Operations.release(),
    Operations.clear(),
    Operations.preempt("local"),
    Operations.preempt("peer"),
  ];

  if (state.holder === "none" || state.holder === "local") {
    operations.push(Operations.reserve());
  }

  return operations;
}

/** Source of uniform randoms in [0, 1). */
export type RandomSource = () => number;

export function pickOperation(
  state: ReservationState,
  random: RandomSource = Math.random,
): Operation {
  const operations = legalOperations(state);
  const index = Math.min(
    Math.floor(random() * operations.length),
    operations.length - 1,
  );
  const operation = operations[index];
  if (!operation) {
    throw new Error("No legal operation available");
  }
  return operation;
}
