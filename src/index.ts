import process from "node:process";
import { chalk, minimist } from "zx";
import { USAGE, UsageError } from "./args.js";
import { capturedOutput, isExerciserError } from "./core/errors.js";
import { createConfig, Logger, Runner, type Script } from "./lib.js";
import IoTestScript from "./scripts/io-test.js";
import PreflightScript from "./scripts/preflight.js";
import RunScript from "./scripts/run.js";
import { createSystem, type System } from "./system.js";

export const scripts: Record<string, typeof Script> = {
  run: RunScript,
  preflight: PreflightScript,
  "io-test": IoTestScript,
};

function printHelp(logger: Logger, message: string, exitCode = 1): number {
  const color = exitCode === 0 ? chalk.green : chalk.red;
  logger.log(color(message));
  logger.log(chalk.yellow(USAGE));
  return exitCode;
}

export interface MainOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  system?: System;
}

/**
 * CLI entry. Resolves to the process exit code.
 */
export default async function main(options: MainOptions = {}): Promise<number> {
  const { argv: fullArgv = process.argv, env = process.env } = options;
  const argv = fullArgv.slice(2);
  const args = minimist(argv);
  const config = createConfig({ processEnv: env });
  const logger = new Logger(config);

  if (args.help) {
    return printHelp(logger, "Randomized persistent reservation exerciser", 0);
  }

  const ScriptClass = scripts[String(args._[0] ?? "")];
  if (!ScriptClass) {
    return printHelp(logger, `Unknown command: ${args._[0] ?? "(none)"}`);
  }

  const system = options.system ?? createSystem();
  const runner = new Runner(config, system, argv, logger);

  try {
    return await runner.run(ScriptClass);
  } catch (error) {
    if (error instanceof UsageError) {
      return printHelp(logger, error.message);
    }
    if (isExerciserError(error)) {
      logger.error(`${error.message} (${error.kind})`);
      const output = capturedOutput(error);
      if (output) logger.log(chalk.red(output));
      return 1;
    }
    throw error;
  }
}

export { createConfig, Logger, Runner } from "./lib.js";
export type { Config } from "./lib.js";
export * from "./core/keys.js";
export * from "./core/operations.js";
export * from "./core/state.js";
export * from "./core/legality.js";
export * from "./core/io-expectation.js";
export * from "./core/errors.js";
