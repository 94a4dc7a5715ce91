import path from "node:path";
import process from "node:process";
import { chalk } from "zx";
import { z } from "zod";
import type { System } from "./system.js";

const durationMs = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((value) => value === "true");

/**
 * Tunables read from the environment. Names mirror the knobs of the
 * harness; every one has a default so a bare run needs none of them.
 */
export const EnvSchema = z.object({
  PR_IO_DWELL_MS: durationMs(5000),
  PR_ITERATION_PAUSE_MS: durationMs(1000),
  PR_UA_ATTEMPTS: z.coerce.number().int().positive().default(3),
  PR_UA_RETRY_DELAY_MS: durationMs(100),
  PR_STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PR_ORACLE_GRACE_MS: durationMs(100),
  PR_IO_INTERVAL_MS: durationMs(100),
  PR_MAX_ITERATIONS: z.coerce.number().int().nonnegative().default(0),
  PR_FAULT_INJECTOR: z.string().default("./multipath-test.sh"),
  PR_PROBE_COMMAND: z.string().default("./probe"),
  PR_PEER_CROSS_CHECK: flag("true"),
});

const ConfigSchema = z.object({
  root: z.string(),
  silent: z.boolean(),
  ioDwellMs: z.number(),
  iterationPauseMs: z.number(),
  unitAttentionAttempts: z.number(),
  unitAttentionDelayMs: z.number(),
  stopTimeoutMs: z.number(),
  oracleGraceMs: z.number(),
  ioIntervalMs: z.number(),
  maxIterations: z.number(),
  faultInjector: z.string().nullable(),
  probeCommand: z.string(),
  peerCrossCheck: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface CreateConfigOptions {
  processEnv?: Record<string, string | undefined>;
  silent?: boolean;
  root?: string;
}

export function createConfig(options: CreateConfigOptions = {}): Config {
  const {
    processEnv = process.env,
    silent = false,
    root = process.cwd(),
  } = options;
  const env = EnvSchema.parse(processEnv);

  return ConfigSchema.parse({
    root: path.resolve(root),
    silent,
    ioDwellMs: env.PR_IO_DWELL_MS,
    iterationPauseMs: env.PR_ITERATION_PAUSE_MS,
    unitAttentionAttempts: env.PR_UA_ATTEMPTS,
    unitAttentionDelayMs: env.PR_UA_RETRY_DELAY_MS,
    stopTimeoutMs: env.PR_STOP_TIMEOUT_MS,
    oracleGraceMs: env.PR_ORACLE_GRACE_MS,
    ioIntervalMs: env.PR_IO_INTERVAL_MS,
    maxIterations: env.PR_MAX_ITERATIONS,
    faultInjector: env.PR_FAULT_INJECTOR.trim() || null,
    probeCommand: env.PR_PROBE_COMMAND,
    peerCrossCheck: env.PR_PEER_CROSS_CHECK,
  });
}

/**
 * Logger for script output.
 */
export class Logger {
  config: Pick<Config, "silent">;

  constructor(config: Pick<Config, "silent">) {
    this.config = config;
  }

  get chalk(): typeof chalk {
    return chalk;
  }

  log(...args: unknown[]): void {
    if (this.config.silent) return;
    console.log(...args);
  }

  info(message: string): void {
    this.log(`${chalk.blue("[INFO]")} ${message}`);
  }

  success(message: string): void {
    this.log(`${chalk.green("[SUCCESS]")} ${message}`);
  }

  warning(message: string): void {
    this.log(`${chalk.yellow("[WARNING]")} ${message}`);
  }

  error(message: string): void {
    this.log(`${chalk.red("[ERROR]")} ${message}`);
  }
}

export interface ScriptDependency {
  class: typeof Script;
  enabled: boolean | ((runner: Runner) => boolean | Promise<boolean>);
}

export class Script {
  static name = "";
  static description = "";
  static dependencies: ScriptDependency[] = [];

  runner: Runner;

  constructor(runner: Runner) {
    this.runner = runner;
  }

  async fn(): Promise<void> {
    throw new Error("Not implemented");
  }

  get logger(): Logger {
    return this.runner.logger;
  }
}

export class Runner {
  config: Config;
  system: System;
  logger: Logger;
  argv: string[];
  exitCode = 0;

  constructor(
    config: Config,
    system: System,
    argv: string[] = [],
    logger: Logger = new Logger(config),
  ) {
    this.config = config;
    this.system = system;
    this.logger = logger;
    this.argv = argv;
  }

  async isDependencyEnabled(dependency: ScriptDependency): Promise<boolean> {
    return typeof dependency.enabled === "function"
      ? await dependency.enabled(this)
      : dependency.enabled;
  }

  async resolveDependencies(
    ScriptClass: typeof Script,
    dependenciesMap: Map<typeof Script, boolean[]> = new Map(),
  ): Promise<Map<typeof Script, boolean[]>> {
    for await (const dependency of ScriptClass.dependencies) {
      const enabled = await this.isDependencyEnabled(dependency);

      const enabledArr = dependenciesMap.get(dependency.class) || [];
      enabledArr.push(enabled);
      dependenciesMap.set(dependency.class, enabledArr);

      if (enabled) {
        await this.resolveDependencies(dependency.class, dependenciesMap);
      }
    }
    return dependenciesMap;
  }

  async run(ScriptClass: typeof Script): Promise<number> {
    const scripts = await this.resolveDependencies(ScriptClass);
    scripts.set(ScriptClass, [true]);
    const line = (length: number) =>
      `${Array(Math.round(length * 1.618))
        .fill("=")
        .join("")}`;
    for await (const [ScriptToRun, enabledArr] of scripts.entries()) {
      const enabled = enabledArr.some(Boolean);
      const skipped = enabled ? "" : chalk.bold("(skipped)");
      const color = enabled ? chalk.magenta : chalk.gray;
      const message = `${chalk.bold(ScriptToRun.name)}: ${ScriptToRun.description} ${skipped}`;
      const length = message.length + 2;
      this.logger.log(color([line(length), message, line(length)].join("\n")));
      if (!enabled) continue;
      const scriptInstance = new ScriptToRun(this);
      await scriptInstance.fn();
      if (this.exitCode !== 0) break;
    }
    return this.exitCode;
  }
}
