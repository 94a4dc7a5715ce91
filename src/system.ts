import process from "node:process";
import type { RandomSource } from "./core/legality.js";
import { ZxCommandRunner, type CommandRunner } from "./tools/exec.js";
import {
  ZxProcessLauncher,
  type ProcessLauncher,
} from "./supervisor/supervised-process.js";

/**
 * Everything the scripts touch outside the process: commands, background
 * helpers, privileges, randomness and signals.
 */
export interface System {
  commands: CommandRunner;
  launcher: ProcessLauncher;
  isPrivileged(): boolean;
  random: RandomSource;
  signals: NodeJS.Signals[];
  /** How to re-invoke this CLI, e.g. for the background I/O test. */
  selfCommand: { command: string; args: string[] };
}

export function createSystem(verbose = false): System {
  const entry = process.argv[1];
  if (!entry) {
    throw new Error("Cannot determine the CLI entry point");
  }
  return {
    commands: new ZxCommandRunner(verbose),
    launcher: new ZxProcessLauncher(),
    isPrivileged: () => process.getuid?.() === 0,
    random: Math.random,
    signals: ["SIGINT", "SIGTERM"],
    selfCommand: {
      command: process.execPath,
      args: [...process.execArgv, entry],
    },
  };
}
