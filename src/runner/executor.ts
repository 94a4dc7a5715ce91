/**
 * Command Executor: turns an abstract operation into concrete PR OUT
 * commands against the multipath map (local) and the second path (peer).
 */

import { StateMismatchError } from "../core/errors.js";
import { formatKey, UNREGISTERED, type Key } from "../core/keys.js";
import type { RandomSource } from "../core/legality.js";
import type {
  Operation,
  OperationKind,
  OperationOf,
  RegistrationChange,
} from "../core/operations.js";
import {
  applyOperation,
  applyPeerReserve,
  isRegistered,
  resetState,
  type ReservationState,
} from "../core/state.js";
import type { Logger } from "../lib.js";
import type { PrTool } from "../tools/pr-tool.js";

type OperationMap = { [K in OperationKind]: OperationOf<K> };

type HandlerTable = {
  [K in OperationKind]: (
    state: ReservationState,
    op: OperationMap[K],
  ) => Promise<ReservationState>;
};

export interface CommandExecutorOptions {
  local: PrTool;
  peer: PrTool;
  logger: Logger;
  /** Decides whether the peer grabs a free reservation before a preempt. */
  random?: RandomSource;
}

export interface ClearAllOptions {
  /** Fail unless READ KEYS comes back empty afterwards. */
  verify: boolean;
}

export class CommandExecutor {
  private readonly local: PrTool;
  private readonly peer: PrTool;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly handlers: HandlerTable;

  constructor(options: CommandExecutorOptions) {
    this.local = options.local;
    this.peer = options.peer;
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.handlers = {
      register: (state, op) => this.register(state, op.change, false),
      "register-ignore": (state, op) => this.register(state, op.change, true),
      reserve: (state) => this.reserve(state),
      release: (state) => this.release(state),
      clear: (state) => this.clear(state),
      preempt: (state, op) =>
        op.by === "local" ? this.preempt(state) : this.preemptByPeer(state),
    };
  }

  /**
   * Issue `op` and return the state the storage stack must now report.
   * Any tool failure propagates; the caller's state is left untouched.
   */
  execute(state: ReservationState, op: Operation): Promise<ReservationState> {
    return this.dispatch(op.kind, state, op);
  }

  private dispatch<K extends OperationKind>(
    kind: K,
    state: ReservationState,
    op: OperationMap[K],
  ): Promise<ReservationState> {
    return this.handlers[kind](state, op);
  }

  private async register(
    state: ReservationState,
    change: RegistrationChange,
    ignoreReservation: boolean,
  ): Promise<ReservationState> {
    const verb = ignoreReservation ? "REGISTER_AND_IGNORE" : "REGISTER";
    const newKey = change === "new-key" ? state.nextKey : UNREGISTERED;
    this.logger.info(
      change === "new-key"
        ? `Executing ${verb} with new key (key=${formatKey(state.localKey)} -> ${formatKey(newKey)})`
        : `Executing ${verb} to unregister (key=${formatKey(state.localKey)} -> 0x0)`,
    );

    await this.local.register({
      reservationKey:
        ignoreReservation || !isRegistered(state) ? undefined : state.localKey,
      serviceActionKey: newKey,
      ignoreReservation,
    });

    const op: Operation = ignoreReservation
      ? { kind: "register-ignore", change }
      : { kind: "register", change };
    return applyOperation(state, op);
  }

  private async reserve(state: ReservationState): Promise<ReservationState> {
    this.logger.info(`Executing RESERVE (key=${formatKey(state.localKey)})`);
    await this.local.reserve(state.localKey);
    return applyOperation(state, { kind: "reserve" });
  }

  private async release(state: ReservationState): Promise<ReservationState> {
    this.logger.info(`Executing RELEASE (key=${formatKey(state.localKey)})`);
    await this.local.release(state.localKey);
    return applyOperation(state, { kind: "release" });
  }

  private async clear(state: ReservationState): Promise<ReservationState> {
    this.logger.info(`Executing CLEAR (key=${formatKey(state.localKey)})`);
    await this.local.clear(state.localKey);
    return applyOperation(state, { kind: "clear" });
  }

  /** Make sure the peer is registered, whatever it was before. */
  private async registerPeer(state: ReservationState): Promise<void> {
    await this.peer.register({
      serviceActionKey: state.peerKey,
      ignoreReservation: true,
    });
  }

  private async preempt(state: ReservationState): Promise<ReservationState> {
    this.logger.info(
      `Executing PREEMPT (key=${formatKey(state.localKey)} preempting ${formatKey(state.peerKey)})`,
    );
    await this.registerPeer(state);

    let current = state;
    if (state.holder === "none" && this.random() < 0.5) {
      this.logger.info(
        `Peer taking the reservation with key ${formatKey(state.peerKey)}`,
      );
      await this.peer.reserve(state.peerKey);
      current = applyPeerReserve(state);
    }

    await this.local.preempt(state.localKey, state.peerKey);
    return applyOperation(current, { kind: "preempt", by: "local" });
  }

  private async preemptByPeer(
    state: ReservationState,
  ): Promise<ReservationState> {
    this.logger.info(
      `Executing PREEMPT_BY_PEER (key=${formatKey(state.peerKey)} preempting ${formatKey(state.localKey)})`,
    );
    await this.registerPeer(state);
    await this.peer.preempt(state.peerKey, state.localKey);
    return applyOperation(state, { kind: "preempt", by: "peer" });
  }

  private async unregisterQuietly(tool: PrTool): Promise<void> {
    try {
      await tool.register({
        serviceActionKey: UNREGISTERED,
        ignoreReservation: true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warning(
        `Could not unregister through ${tool.devicePath}: ${message}`,
      );
    }
  }

  /**
   * Unregister both initiators, which also drops any reservation they hold.
   * Failures of the individual unregisters are logged and tolerated; with
   * `verify` the outcome is checked instead.
   */
  async clearAll(
    state: ReservationState,
    options: ClearAllOptions,
  ): Promise<ReservationState> {
    this.logger.info("Clearing all registrations and reservations...");
    await this.unregisterQuietly(this.local);
    await this.unregisterQuietly(this.peer);

    if (options.verify) {
      const report = await this.local.readKeys();
      if (report.keys.length > 0) {
        const remaining: Key[] = [...new Set(report.keys)];
        throw new StateMismatchError(
          [
            {
              path: "registrations",
              expected: [],
              actual: remaining,
              comparison: "same-set",
            },
          ],
          "all registrations cleared",
        );
      }
      this.logger.success("Verified all registrations cleared");
    } else {
      this.logger.success("All registrations cleared");
    }
    return resetState(state);
  }
}
