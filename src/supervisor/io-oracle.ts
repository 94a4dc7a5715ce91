/**
 * I/O Oracle Controller.
 *
 * Keeps one background writer running against the map, launched with the
 * outcome every write must have. The writer is stopped before any
 * operation that would change that outcome and relaunched once the new
 * state is known, so no write is ever judged against a stale expectation.
 */

import { sleep } from "zx";
import {
  BackgroundProcessFaultError,
  StateMismatchError,
} from "../core/errors.js";
import {
  expectationAfter,
  expectedIo,
  type IoExpectation,
} from "../core/io-expectation.js";
import { describeOperation, type Operation } from "../core/operations.js";
import { describeState, type ReservationState } from "../core/state.js";
import type { Logger } from "../lib.js";
import { SupervisedProcess, type ProcessLauncher } from "./supervised-process.js";

const ORACLE_NAME = "I/O test";

export interface OracleCommand {
  command: string;
  args: string[];
}

export interface IoOracleOptions {
  launcher: ProcessLauncher;
  commandFor: (expectation: IoExpectation) => OracleCommand;
  stopTimeoutMs: number;
  graceMs: number;
  logger: Logger;
}

interface RunningOracle {
  process: SupervisedProcess;
  expectation: IoExpectation;
}

export class IoOracleController {
  private running: RunningOracle | null = null;

  constructor(private readonly options: IoOracleOptions) {}

  get expectation(): IoExpectation | null {
    return this.running?.expectation ?? null;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  async start(expectation: IoExpectation): Promise<void> {
    if (this.running) {
      throw new Error(
        `${ORACLE_NAME} is already running (PID: ${this.running.process.pid})`,
      );
    }
    const { launcher, commandFor, graceMs, logger } = this.options;
    logger.info(`Starting background I/O test (expected: ${expectation})`);

    const { command, args } = commandFor(expectation);
    const oracle = new SupervisedProcess(ORACLE_NAME, launcher, command, args);
    oracle.start();
    this.running = { process: oracle, expectation };

    await sleep(graceMs);
    if (!oracle.isAlive()) {
      this.running = null;
      throw new BackgroundProcessFaultError(
        ORACLE_NAME,
        "failed to start",
        oracle.exitStatus(),
      );
    }
    logger.info(`I/O test started successfully (PID: ${oracle.pid})`);
  }

  async stop(): Promise<void> {
    const running = this.running;
    if (!running) {
      throw new Error(`${ORACLE_NAME} is not currently running`);
    }
    const { logger, stopTimeoutMs } = this.options;
    logger.info(`Stopping background I/O test (PID: ${running.process.pid})`);
    this.running = null;
    await running.process.stop(stopTimeoutMs);
    logger.info("I/O test stopped successfully");
  }

  /**
   * Run `mutate` under the stop-before-mutate / restart-after-mutate rule.
   * When the expectation does not change the writer keeps running across
   * the operation.
   */
  async runAround(
    state: ReservationState,
    op: Operation,
    mutate: () => Promise<ReservationState>,
  ): Promise<ReservationState> {
    const { logger } = this.options;
    const current = this.expectation;
    const restart = current !== expectationAfter(state, op);

    if (restart && this.running) {
      logger.info(
        `I/O expectation will change after ${describeOperation(op)}, stopping I/O test`,
      );
      await this.stop();
    }

    const next = await mutate();
    const expectation = expectedIo(next);

    if (restart) {
      logger.info(`Restarting I/O test with new expectation: ${expectation}`);
      await this.start(expectation);
    } else if (expectation !== current) {
      throw new StateMismatchError(
        [
          {
            path: "io.expectation",
            expected: expectation,
            actual: current,
            comparison: "exact",
          },
        ],
        describeState(next),
      );
    }
    return next;
  }

  checkAlive(): void {
    const running = this.running;
    if (!running) {
      throw new BackgroundProcessFaultError(
        ORACLE_NAME,
        "should be running but is not",
        null,
      );
    }
    if (!running.process.isAlive()) {
      this.running = null;
      throw new BackgroundProcessFaultError(
        ORACLE_NAME,
        "process unexpectedly stopped",
        running.process.exitStatus(),
      );
    }
    this.options.logger.info("I/O test is running normally");
  }

  /** Stop whatever is running. Used on the way out; never throws. */
  async shutdown(): Promise<Error | null> {
    if (!this.running) return null;
    try {
      await this.stop();
      return null;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.options.logger.error(failure.message);
      return failure;
    }
  }
}
