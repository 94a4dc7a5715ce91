/**
 * PR OUT / PR IN access through the sg3_utils style command line shared by
 * `mpathpersist` (multipath map) and `sg_persist` (single SCSI device).
 */

import { formatKey, type Key } from "../core/keys.js";
import { PR_TYPE_WRITE_EXCLUSIVE_REGISTRANTS_ONLY } from "../core/operations.js";
import type { Logger } from "../lib.js";
import {
  parseRegistrations,
  parseReservation,
  toPrStatus,
  type PrStatus,
  type RegistrationReport,
  type ReservationReport,
} from "../status/pr-status.js";
import { invokeTool, type CommandRunner, type RetryPolicy } from "./exec.js";

export interface RegisterRequest {
  /** Current key; left out when unregistered or when ignoring it. */
  reservationKey?: Key;
  /** Key to register, `0x0` to unregister. */
  serviceActionKey: Key;
  ignoreReservation: boolean;
}

export interface PrTool {
  readonly program: PersistProgram;
  readonly devicePath: string;
  register(request: RegisterRequest): Promise<void>;
  reserve(key: Key): Promise<void>;
  release(key: Key): Promise<void>;
  clear(key: Key): Promise<void>;
  preempt(key: Key, victimKey: Key): Promise<void>;
  readKeys(): Promise<RegistrationReport>;
  readReservation(): Promise<ReservationReport>;
  readStatus(): Promise<PrStatus>;
  /** Raw READ KEYS / READ RESERVATION text, for exit-state dumps. */
  dumpKeys(): Promise<string>;
  dumpReservation(): Promise<string>;
}

export type PersistProgram = "mpathpersist" | "sg_persist";

export interface PersistToolOptions {
  program: PersistProgram;
  devicePath: string;
  runner: CommandRunner;
  retry: RetryPolicy;
  logger?: Logger;
}

const PR_TYPE = `--prout-type=${PR_TYPE_WRITE_EXCLUSIVE_REGISTRANTS_ONLY}`;

export class PersistTool implements PrTool {
  readonly program: PersistProgram;
  readonly devicePath: string;
  private readonly runner: CommandRunner;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger | undefined;

  constructor(options: PersistToolOptions) {
    this.program = options.program;
    this.devicePath = options.devicePath;
    this.runner = options.runner;
    this.retry = options.retry;
    this.logger = options.logger;
  }

  static forMap(
    map: string,
    runner: CommandRunner,
    retry: RetryPolicy,
    logger?: Logger,
  ): PersistTool {
    return new PersistTool({
      program: "mpathpersist",
      devicePath: `/dev/mapper/${map}`,
      runner,
      retry,
      logger,
    });
  }

  static forDevice(
    device: string,
    runner: CommandRunner,
    retry: RetryPolicy,
    logger?: Logger,
  ): PersistTool {
    return new PersistTool({
      program: "sg_persist",
      devicePath: `/dev/${device}`,
      runner,
      retry,
      logger,
    });
  }

  private async invoke(args: string[]): Promise<string> {
    const result = await invokeTool(
      this.runner,
      this.program,
      [...args, this.devicePath],
      { retry: this.retry, logger: this.logger },
    );
    return result.stdout;
  }

  async register(request: RegisterRequest): Promise<void> {
    const args = ["--out"];
    if (request.ignoreReservation) {
      args.push("--register-ignore");
    } else {
      args.push("--register");
      if (request.reservationKey !== undefined) {
        args.push(`--param-rk=${formatKey(request.reservationKey)}`);
      }
    }
    args.push(`--param-sark=${formatKey(request.serviceActionKey)}`);
    await this.invoke(args);
  }

  async reserve(key: Key): Promise<void> {
    await this.invoke([
      "--out",
      "--reserve",
      `--param-rk=${formatKey(key)}`,
      PR_TYPE,
    ]);
  }

  async release(key: Key): Promise<void> {
    await this.invoke([
      "--out",
      "--release",
      `--param-rk=${formatKey(key)}`,
      PR_TYPE,
    ]);
  }

  async clear(key: Key): Promise<void> {
    await this.invoke(["--out", "--clear", `--param-rk=${formatKey(key)}`]);
  }

  async preempt(key: Key, victimKey: Key): Promise<void> {
    await this.invoke([
      "--out",
      "--preempt",
      `--param-rk=${formatKey(key)}`,
      `--param-sark=${formatKey(victimKey)}`,
      PR_TYPE,
    ]);
  }

  dumpKeys(): Promise<string> {
    return this.invoke(["-ik"]);
  }

  dumpReservation(): Promise<string> {
    return this.invoke(["-ir"]);
  }

  async readKeys(): Promise<RegistrationReport> {
    return parseRegistrations(await this.dumpKeys());
  }

  async readReservation(): Promise<ReservationReport> {
    return parseReservation(await this.dumpReservation());
  }

  async readStatus(): Promise<PrStatus> {
    const registrations = await this.readKeys();
    const reservation = await this.readReservation();
    return toPrStatus(registrations, reservation);
  }
}
