/**
 * Cross-checks the tracked reservation model against what the storage
 * stack reports. Any difference ends the run: it is either a protocol
 * violation by the target or a bug in the model, and neither is patched up.
 */

import { StateMismatchError } from "../core/errors.js";
import { formatKey, type Key } from "../core/keys.js";
import {
  clearPendingPreemption,
  describeState,
  holderKey,
  isRegistered,
  type ReservationState,
} from "../core/state.js";
import {
  BaseVerifier,
  collectDiffs,
  diffAbsent,
  diffExact,
  diffPresent,
  diffSameSet,
  type FieldDiff,
} from "../core/verifier/index.js";
import type { Logger } from "../lib.js";
import type { PrStatus } from "../status/pr-status.js";
import type { DaemonPrView, MultipathDaemon } from "../tools/multipathd.js";
import type { PrTool } from "../tools/pr-tool.js";

export interface ExpectedReservationTree {
  /** Local key that must be registered, null when unregistered. */
  requiredKey: Key | null;
  /** Key the reservation must be held with, null for no reservation. */
  reservationKey: Key | null;
  /** Key that was just preempted and must be gone. */
  forbiddenKey: Key | null;
  daemon: DaemonPrView;
}

export interface ObservedReservationTree {
  status: PrStatus;
  /** Null when the daemon channel is disabled or skipped for this pass. */
  daemon: DaemonPrView | null;
  /** The second path's own report, null when not cross-checked. */
  peer: PrStatus | null;
}

export interface ReservationVerifierOptions {
  local: PrTool;
  peer: PrTool | null;
  daemon: { service: MultipathDaemon; map: string } | null;
  logger: Logger;
}

/**
 * A preempt issued through the second path is invisible to multipathd until
 * it next talks to the target, so the daemon is not consulted on the pass
 * straight after the local key was preempted.
 */
function localKeyJustPreempted(state: ReservationState): boolean {
  return (
    state.pendingPreemption !== null &&
    state.pendingPreemption !== state.peerKey
  );
}

export class ReservationVerifier extends BaseVerifier<
  ExpectedReservationTree,
  ObservedReservationTree,
  ReservationState
> {
  constructor(private readonly options: ReservationVerifierOptions) {
    super();
  }

  extractTree(state: ReservationState): ExpectedReservationTree {
    const registered = isRegistered(state);
    return {
      requiredKey: registered ? state.localKey : null,
      reservationKey: holderKey(state),
      forbiddenKey: state.pendingPreemption,
      daemon: {
        prKey: registered ? state.localKey : null,
        prStatus: registered ? "set" : "unset",
        prHold: state.holder === "local" ? "set" : "unset",
      },
    };
  }

  async observeTree(state: ReservationState): Promise<ObservedReservationTree> {
    const { local, peer, daemon } = this.options;
    const status = await local.readStatus();
    const daemonView =
      daemon && !localKeyJustPreempted(state)
        ? await daemon.service.readPrView(daemon.map)
        : null;
    const peerStatus = peer ? await peer.readStatus() : null;
    return { status, daemon: daemonView, peer: peerStatus };
  }

  compareTree(
    expected: ExpectedReservationTree,
    actual: ObservedReservationTree,
  ): FieldDiff[] {
    const keys = actual.status.registeredKeys;
    const reservationKey = actual.status.reservation?.key ?? null;

    const diffs = collectDiffs(
      expected.requiredKey === null
        ? null
        : diffPresent("registrations.local", expected.requiredKey, keys),
      diffExact("reservation.key", expected.reservationKey, reservationKey),
      expected.forbiddenKey === null
        ? null
        : diffAbsent("registrations.preempted", expected.forbiddenKey, keys),
    );

    if (actual.daemon) {
      diffs.push(
        ...collectDiffs(
          diffExact("multipathd.prkey", expected.daemon.prKey, actual.daemon.prKey),
          diffExact(
            "multipathd.prstatus",
            expected.daemon.prStatus,
            actual.daemon.prStatus,
          ),
          diffExact(
            "multipathd.prhold",
            expected.daemon.prHold,
            actual.daemon.prHold,
          ),
        ),
      );
    }

    if (actual.peer) {
      diffs.push(
        ...collectDiffs(
          diffSameSet("peer.registrations", keys, actual.peer.registeredKeys),
          diffExact(
            "peer.reservation.key",
            reservationKey,
            actual.peer.reservation?.key ?? null,
          ),
        ),
      );
    }

    return diffs;
  }

  /**
   * Verify and return the state with a confirmed preemption cleared.
   */
  async verify(state: ReservationState): Promise<ReservationState> {
    const { logger } = this.options;
    const actual = await this.observeTree(state);
    const result = this.verifyTree(this.extractTree(state), actual);

    if (!result.pass) {
      throw new StateMismatchError(result.diffs, describeState(state));
    }

    if (state.pendingPreemption !== null) {
      logger.info(
        `Verified preempted key ${formatKey(state.pendingPreemption)} was removed`,
      );
    }
    if (actual.daemon) {
      const { prKey, prStatus, prHold } = actual.daemon;
      logger.info(
        `multipathd state verified: prkey=${prKey === null ? "none" : formatKey(prKey)}, prstatus=${prStatus}, prhold=${prHold}`,
      );
    }
    logger.info(`State verified: ${describeState(state)}`);
    return clearPendingPreemption(state);
  }
}
