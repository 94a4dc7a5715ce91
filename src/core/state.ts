/**
 * Reservation model: what the exerciser believes the logical unit holds.
 *
 * The state is an immutable value. Every transition returns a new object;
 * nothing outside the driver loop ever holds a reference it can mutate.
 */

import { formatKey, UNREGISTERED, type Key } from "./keys.js";
import type { Operation } from "./operations.js";

export type Holder = "none" | "local" | "peer";

export interface ReservationState {
  /** Key registered through the multipath map, `0x0` when unregistered. */
  readonly localKey: Key;
  /** Fixed key the second path registers with. */
  readonly peerKey: Key;
  /** Next never-used key for the local initiator. */
  readonly nextKey: Key;
  readonly holder: Holder;
  /** Key removed by the last preempt, checked absent on the next verification. */
  readonly pendingPreemption: Key | null;
}

export interface InitialStateOptions {
  peerKey?: Key;
  /** Defaults to the key right after the peer's. */
  firstKey?: Key;
}

export const DEFAULT_PEER_KEY: Key = 0x1n;

export function initialState(
  options: InitialStateOptions = {},
): ReservationState {
  const { peerKey = DEFAULT_PEER_KEY } = options;
  const firstKey = options.firstKey ?? peerKey + 1n;
  if (peerKey === UNREGISTERED) {
    throw new Error("Peer key must be non-zero");
  }
  if (firstKey <= peerKey) {
    throw new Error(
      `First local key ${formatKey(firstKey)} must be above the peer key ${formatKey(peerKey)}`,
    );
  }
  return {
    localKey: UNREGISTERED,
    peerKey,
    nextKey: firstKey,
    holder: "none",
    pendingPreemption: null,
  };
}

export function isRegistered(state: ReservationState): boolean {
  return state.localKey !== UNREGISTERED;
}

export function holderKey(state: ReservationState): Key | null {
  switch (state.holder) {
    case "none":
      return null;
    case "local":
      return state.localKey;
    case "peer":
      return state.peerKey;
  }
}

export function describeState(state: ReservationState): string {
  const parts = [
    `local_key=${formatKey(state.localKey)}`,
    `reservation_holder=${state.holder}`,
    `next_key=${formatKey(state.nextKey)}`,
  ];
  if (state.pendingPreemption !== null) {
    parts.push(`preempted=${formatKey(state.pendingPreemption)}`);
  }
  return parts.join(", ");
}

function registerNewKey(state: ReservationState): ReservationState {
  return {
    ...state,
    localKey: state.nextKey,
    nextKey: state.nextKey + 1n,
  };
}

function unregister(state: ReservationState): ReservationState {
  return {
    ...state,
    localKey: UNREGISTERED,
    holder: state.holder === "local" ? "none" : state.holder,
  };
}

/**
 * State after `op` has been reported successful by the storage stack.
 */
export function applyOperation(
  state: ReservationState,
  op: Operation,
): ReservationState {
  switch (op.kind) {
    case "register":
    case "register-ignore":
      return op.change === "new-key" ? registerNewKey(state) : unregister(state);
    case "reserve":
      return { ...state, holder: "local" };
    case "release":
      return {
        ...state,
        holder: state.holder === "local" ? "none" : state.holder,
      };
    case "clear":
      return { ...state, localKey: UNREGISTERED, holder: "none" };
    case "preempt":
      if (op.by === "local") {
        return {
          ...state,
          pendingPreemption: state.peerKey,
          holder: state.holder === "peer" ? "local" : state.holder,
        };
      }
      return {
        ...state,
        pendingPreemption: state.localKey,
        localKey: UNREGISTERED,
        holder: state.holder === "local" ? "peer" : state.holder,
      };
  }
}

/**
 * The second path took the reservation while none existed. Only happens as
 * the set-up step of a local preempt.
 */
export function applyPeerReserve(state: ReservationState): ReservationState {
  if (state.holder !== "none") {
    throw new Error(
      `Peer cannot reserve while the reservation is held by ${state.holder}`,
    );
  }
  return { ...state, holder: "peer" };
}

export function clearPendingPreemption(
  state: ReservationState,
): ReservationState {
  return state.pendingPreemption === null
    ? state
    : { ...state, pendingPreemption: null };
}

export function resetState(state: ReservationState): ReservationState {
  return initialState({ peerKey: state.peerKey });
}
