import { BackgroundProcessFaultError } from "../core/errors.js";
import type { Logger } from "../lib.js";
import { SupervisedProcess, type ProcessLauncher } from "./supervised-process.js";

const INJECTOR_NAME = "Path-failure injector";

export interface FaultInjectorOptions {
  launcher: ProcessLauncher;
  /** Executable that cycles the map's paths; receives the map name. */
  command: string;
  map: string;
  stopTimeoutMs: number;
  logger: Logger;
}

/**
 * Supervises the external path-failure injector. The injector restores
 * every path when it receives SIGTERM.
 */
export class FaultInjector {
  private readonly process: SupervisedProcess;

  constructor(private readonly options: FaultInjectorOptions) {
    this.process = new SupervisedProcess(
      INJECTOR_NAME,
      options.launcher,
      options.command,
      [options.map],
    );
  }

  start(): void {
    this.options.logger.info("Starting background multipath test...");
    this.process.start();
    this.options.logger.info(
      `Background test started with PID ${this.process.pid}`,
    );
  }

  isRunning(): boolean {
    return this.process.isAlive();
  }

  checkAlive(): void {
    if (!this.process.isAlive()) {
      throw new BackgroundProcessFaultError(
        INJECTOR_NAME,
        "process unexpectedly stopped",
        this.process.exitStatus(),
      );
    }
  }

  async stop(): Promise<void> {
    this.options.logger.info(
      `Stopping background test (PID ${this.process.pid})...`,
    );
    await this.process.stop(this.options.stopTimeoutMs);
  }
}
