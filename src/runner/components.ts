import type { RunArguments } from "../args.js";
import type { Config, Logger } from "../lib.js";
import { FaultInjector } from "../supervisor/fault-injector.js";
import { IoOracleController } from "../supervisor/io-oracle.js";
import type { System } from "../system.js";
import { RemoteCommandRunner, type CommandRunner } from "../tools/exec.js";
import { MultipathDaemon } from "../tools/multipathd.js";
import { PersistTool } from "../tools/pr-tool.js";
import type { ExerciserComponents } from "./driver.js";
import { CommandExecutor } from "./executor.js";
import { ReservationVerifier } from "./verifier.js";

/** Runner for commands aimed at the second path. */
export function peerRunner(system: System, host: string | null): CommandRunner {
  return host === null
    ? system.commands
    : new RemoteCommandRunner(host, system.commands);
}

/**
 * Wire up one exerciser run from configuration and command-line choices.
 */
export function createComponents(
  config: Config,
  system: System,
  args: RunArguments,
  logger: Logger,
): ExerciserComponents {
  const { map, host, device } = args.targets;
  const retry = {
    attempts: config.unitAttentionAttempts,
    delayMs: config.unitAttentionDelayMs,
  };

  const local = PersistTool.forMap(map, system.commands, retry, logger);
  const peer = PersistTool.forDevice(
    device,
    peerRunner(system, host),
    retry,
    logger,
  );
  const multipath = { service: new MultipathDaemon(system.commands), map };

  const oracle = new IoOracleController({
    launcher: system.launcher,
    commandFor: (expectation) => ({
      command: system.selfCommand.command,
      args: [
        ...system.selfCommand.args,
        "io-test",
        local.devicePath,
        expectation,
      ],
    }),
    stopTimeoutMs: config.stopTimeoutMs,
    graceMs: config.oracleGraceMs,
    logger,
  });

  const injector =
    args.faultInjector && config.faultInjector !== null
      ? new FaultInjector({
          launcher: system.launcher,
          command: config.faultInjector,
          map,
          stopTimeoutMs: config.stopTimeoutMs,
          logger,
        })
      : null;

  return {
    executor: new CommandExecutor({
      local,
      peer,
      logger,
      random: system.random,
    }),
    verifier: new ReservationVerifier({
      local,
      peer: args.peerCheck && config.peerCrossCheck ? peer : null,
      daemon: args.daemonCheck ? multipath : null,
      logger,
    }),
    oracle,
    injector,
    local,
    multipath,
    logger,
    random: system.random,
  };
}
