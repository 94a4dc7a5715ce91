import { $, sleep } from "zx";
import { ToolInvocationError, UnitAttentionError } from "../core/errors.js";
import type { Logger } from "../lib.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Something that can run a command to completion. The exerciser never
 * talks to storage any other way, which is also what lets the tests swap in
 * an in-process storage stack.
 */
export interface CommandRunner {
  readonly label: string;
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

export class ZxCommandRunner implements CommandRunner {
  readonly label = "local";

  constructor(private readonly verbose = false) {}

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    // Detached so a terminal interrupt cannot kill a PR command mid-flight.
    const output = await $({
      nothrow: true,
      quiet: !this.verbose,
      detached: true,
    })`${command} ${args}`;
    return {
      // A null exit code means the tool died on a signal.
      exitCode: output.exitCode ?? 128,
      stdout: output.stdout,
      stderr: output.stderr,
    };
  }
}

/**
 * Runs commands on another host over ssh. The remote side re-splits the
 * argument vector, so arguments must not contain whitespace.
 */
export class RemoteCommandRunner implements CommandRunner {
  constructor(
    readonly host: string,
    private readonly transport: CommandRunner,
  ) {}

  get label(): string {
    return this.host;
  }

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    const unsafe = args.find((arg) => /\s/.test(arg));
    if (unsafe !== undefined) {
      throw new Error(`Cannot pass "${unsafe}" to ${this.host} over ssh`);
    }
    return this.transport.run("ssh", [this.host, command, ...args]);
  }
}

/** sg_persist and mpathpersist both exit with 6 on a Unit Attention. */
export const UNIT_ATTENTION_EXIT_CODE = 6;

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export interface InvokeOptions {
  /** Only SCSI commands take one; without it exit code 6 is fatal too. */
  retry?: RetryPolicy;
  logger?: Logger;
}

export function formatCommandLine(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
): string {
  const line = [command, ...args].join(" ");
  return runner.label === "local" ? line : `[${runner.label}] ${line}`;
}

/**
 * Run a tool and insist on success. Under a retry policy Unit Attention is
 * retried up to its attempt count; every other non-zero exit is fatal.
 */
export async function invokeTool(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options: InvokeOptions = {},
): Promise<CommandResult> {
  const { retry, logger } = options;
  const commandLine = formatCommandLine(runner, command, args);

  for (let attempt = 1; ; attempt++) {
    const result = await runner.run(command, args);
    if (result.exitCode === 0) return result;

    if (retry === undefined || result.exitCode !== UNIT_ATTENTION_EXIT_CODE) {
      throw new ToolInvocationError({ command: commandLine, ...result });
    }
    if (attempt >= retry.attempts) {
      throw new UnitAttentionError(commandLine, attempt);
    }
    logger?.info(
      `Unit Attention occurred (attempt ${attempt}/${retry.attempts}), retrying...`,
    );
    await sleep(retry.delayMs);
  }
}
