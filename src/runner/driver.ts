import process from "node:process";
import { createActor, waitFor } from "xstate";
import { capturedOutput } from "../core/errors.js";
import { expectedIo } from "../core/io-expectation.js";
import type { Key } from "../core/keys.js";
import { pickOperation, type RandomSource } from "../core/legality.js";
import { describeOperation } from "../core/operations.js";
import { initialState, type ReservationState } from "../core/state.js";
import type { Logger } from "../lib.js";
import type { FaultInjector } from "../supervisor/fault-injector.js";
import type { IoOracleController } from "../supervisor/io-oracle.js";
import type { MultipathDaemon } from "../tools/multipathd.js";
import type { PrTool } from "../tools/pr-tool.js";
import {
  DRIVER_STATES,
  driverMachine,
  toError,
  type DriverContext,
  type DriverOutput,
  type DriverServices,
} from "./driver-machine.js";
import type { CommandExecutor } from "./executor.js";
import type { ReservationVerifier } from "./verifier.js";

export interface ExerciserComponents {
  executor: CommandExecutor;
  verifier: ReservationVerifier;
  oracle: IoOracleController;
  /** Null when path failures are not being injected. */
  injector: FaultInjector | null;
  /** Multipath map access, used for the exit-state dump. */
  local: PrTool;
  multipath: { service: MultipathDaemon; map: string };
  logger: Logger;
  random?: RandomSource;
  peerKey?: Key;
}

async function attempt(
  logger: Logger,
  step: string,
  fn: () => Promise<void>,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    logger.error(`${step} failed: ${toError(error).message}`);
  }
}

async function dumpExitState(components: ExerciserComponents): Promise<void> {
  const { local, multipath, logger } = components;
  logger.info("Exit state.");
  logger.info("Registered keys:");
  await attempt(logger, "Reading keys", async () => {
    logger.log(await local.dumpKeys());
  });
  logger.info("Reservation:");
  await attempt(logger, "Reading reservation", async () => {
    logger.log(await local.dumpReservation());
  });
  logger.info("multipath state:");
  await attempt(logger, "Reading multipath topology", async () => {
    logger.log(await multipath.service.showTopology(multipath.map));
  });
}

/**
 * Bind the driver machine's steps to the real components.
 */
export function createDriverServices(
  components: ExerciserComponents,
): DriverServices {
  const { executor, verifier, oracle, injector, logger } = components;
  const random = components.random ?? Math.random;
  const fresh = () => initialState({ peerKey: components.peerKey });

  return {
    async startUp() {
      const state = await executor.clearAll(fresh(), { verify: true });
      await oracle.start(expectedIo(state));
      injector?.start();
      return state;
    },

    pick(state) {
      return pickOperation(state, random);
    },

    execute(state, op) {
      return oracle.runAround(state, op, () => executor.execute(state, op));
    },

    verify(state) {
      return verifier.verify(state);
    },

    async checkProcesses() {
      oracle.checkAlive();
      injector?.checkAlive();
    },

    async shutDown(state: ReservationState | null) {
      await dumpExitState(components);
      logger.info("Cleaning up...");
      await oracle.shutdown();
      if (injector?.isRunning()) {
        await attempt(logger, "Stopping path-failure injector", () =>
          injector.stop(),
        );
      }
      await attempt(logger, "Clearing registrations", async () => {
        await executor.clearAll(state ?? fresh(), { verify: false });
      });
      logger.info("Cleanup complete");
    },
  };
}

/**
 * Progress line for entering `stateName`, mirroring the banner a human
 * operator watches for.
 */
function describeStep(
  stateName: string,
  context: DriverContext,
): string | null {
  switch (stateName) {
    case DRIVER_STATES.executing:
      return context.operation
        ? `=== Test iteration ${context.iteration} ===\nSelected command: ${describeOperation(context.operation)}`
        : null;
    case DRIVER_STATES.dwelling:
      return `Waiting ${context.ioDwellMs / 1000} seconds for I/O test validation...`;
    case DRIVER_STATES.pausing:
      return `Iteration ${context.iteration} completed successfully`;
    case DRIVER_STATES.terminated:
      if (context.failure) return null;
      return context.interrupted
        ? "Interrupted, shutting down"
        : `Stopping after ${context.iteration} iterations`;
    default:
      return null;
  }
}

export interface RunExerciserOptions {
  ioDwellMs: number;
  iterationPauseMs: number;
  maxIterations: number;
  logger: Logger;
  /** Signals that request a clean stop. */
  signals?: NodeJS.Signals[];
}

export async function runExerciser(
  services: DriverServices,
  options: RunExerciserOptions,
): Promise<DriverOutput> {
  const { logger, signals = ["SIGINT", "SIGTERM"] } = options;
  const actor = createActor(driverMachine, {
    input: {
      services,
      ioDwellMs: options.ioDwellMs,
      iterationPauseMs: options.iterationPauseMs,
      maxIterations: options.maxIterations,
    },
  });

  let previous: string | null = null;
  actor.subscribe((snapshot) => {
    const stateName = String(snapshot.value);
    if (stateName === previous) return;
    previous = stateName;
    const { failure } = snapshot.context;
    if (stateName === DRIVER_STATES.terminated && failure) {
      logger.error(failure.message);
      const output = capturedOutput(failure);
      if (output) logger.log(logger.chalk.red(output));
      return;
    }
    const step = describeStep(stateName, snapshot.context);
    if (step) {
      for (const line of step.split("\n")) logger.info(line);
    }
  });

  const interrupt = () => actor.send({ type: "INTERRUPT" });
  for (const signal of signals) process.on(signal, interrupt);

  try {
    actor.start();
    const snapshot = await waitFor(actor, (s) => s.status === "done");
    if (!snapshot.output) {
      throw new Error("Driver halted without an outcome");
    }
    return snapshot.output;
  } finally {
    for (const signal of signals) process.off(signal, interrupt);
  }
}
