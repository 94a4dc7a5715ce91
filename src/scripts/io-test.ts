import process from "node:process";
import { fs, sleep } from "zx";
import { parseIoTestArguments } from "../args.js";
import type { IoExpectation } from "../core/io-expectation.js";
import { Script } from "../lib.js";
import type { CommandRunner } from "../tools/exec.js";

/** sg_dd exits with 24 when the target answers RESERVATION CONFLICT. */
export const RESERVATION_CONFLICT_EXIT_CODE = 24;

export interface IoTestLoopOptions {
  runner: CommandRunner;
  device: string;
  expectation: IoExpectation;
  intervalMs: number;
  /** Re-checks the device's paths after an unexplained write failure. */
  probeCommand: string;
  signal: AbortSignal;
  write: (text: string) => void;
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Abort on the first of `signals`. The writer treats every stop request as
 * a clean exit, whichever signal carried it.
 */
export function abortOnSignals(
  signals: readonly NodeJS.Signals[],
  source: SignalSource = process,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const stop = () => controller.abort();
  for (const signal of signals) source.on(signal, stop);
  return {
    signal: controller.signal,
    dispose: () => {
      for (const signal of signals) source.off(signal, stop);
    },
  };
}

/**
 * Writes to the device on a fixed interval and fails on the first write
 * whose outcome contradicts the expectation it was started with.
 */
export class IoTestLoop {
  constructor(private readonly options: IoTestLoopOptions) {}

  async run(): Promise<number> {
    const { device, expectation, intervalMs, signal, write } = this.options;
    write(`Starting I/O test on ${device} (expected: ${expectation})\n`);

    while (!signal.aborted) {
      const failure = await this.attempt();
      if (failure !== null) {
        write(`\nFAILURE: ${failure}\n`);
        return 1;
      }
      if (signal.aborted) break;
      await sleep(intervalMs);
    }

    write("\nReceived TERM signal, exiting successfully\n");
    return 0;
  }

  /** One write. Returns the reason the run must fail, if any. */
  async attempt(): Promise<string | null> {
    const { runner, device, expectation, probeCommand, write } = this.options;
    const result = await runner.run("sg_dd", [
      "if=/dev/zero",
      `of=${device}`,
      "bs=512",
      "bpt=8",
      "count=8",
      "oflag=direct,sgio",
    ]);

    if (result.exitCode === 0) {
      if (expectation === "fail") {
        return "I/O succeeded but was expected to fail";
      }
      write(".");
      return null;
    }

    if (expectation === "pass") {
      if (result.exitCode === RESERVATION_CONFLICT_EXIT_CODE) {
        return "I/O failed with conflict but was expected to pass";
      }
      write(`\nI/O failed with ${result.exitCode}. checking paths\n`);
      const probe = await runner.run(probeCommand, [device]);
      if (probe.exitCode !== 0) {
        return "probing paths failed";
      }
    }
    write("x");
    return null;
  }
}

export default class IoTestScript extends Script {
  static override name = "io-test";
  static override description =
    "Write to a device repeatedly, checking every write against an expected outcome";

  override async fn() {
    const { device, expectation } = parseIoTestArguments(this.runner.argv);
    const { config, system } = this.runner;

    if (!(await fs.pathExists(device))) {
      this.logger.error(`Device '${device}' does not exist`);
      this.runner.exitCode = 1;
      return;
    }

    const stop = abortOnSignals(system.signals);
    try {
      const loop = new IoTestLoop({
        runner: system.commands,
        device,
        expectation,
        intervalMs: config.ioIntervalMs,
        probeCommand: config.probeCommand,
        signal: stop.signal,
        write: (text) => process.stdout.write(text),
      });
      this.runner.exitCode = await loop.run();
    } finally {
      stop.dispose();
    }
  }
}
