/**
 * In-process stand-in for the storage stack: answers the command lines the
 * exerciser issues (mpathpersist, sg_persist, multipathd, multipath,
 * udevadm, sg_dd, which, ssh) from a simulated logical unit with SCSI-3
 * persistent reservation semantics.
 */

import type { Key } from "../../src/core/keys.js";
import type { CommandResult, CommandRunner } from "../../src/tools/exec.js";

export type Initiator = "local" | "peer";

export interface FakeReservation {
  holder: Initiator;
  key: Key;
  type: number;
}

const RESERVATION_CONFLICT = 24;
const UNIT_ATTENTION = 6;
const SYNTAX_ERROR = 1;
const ILLEGAL_REQUEST = 5;

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });
const fail = (exitCode: number, stderr = ""): CommandResult => ({
  exitCode,
  stdout: "",
  stderr,
});

const hex = (key: Key): string => `0x${key.toString(16)}`;

/**
 * The logical unit. The local initiator reaches it through `pathCount`
 * paths, so its key is listed once per path in READ KEYS.
 */
export class FakeLogicalUnit {
  registrations = new Map<Initiator, Key>();
  reservation: FakeReservation | null = null;
  generation = 0;

  constructor(
    readonly wwid = "36001405deadbeef0000000000000001",
    readonly pathCount = 2,
  ) {}

  keyOf(initiator: Initiator): Key | null {
    return this.registrations.get(initiator) ?? null;
  }

  register(
    initiator: Initiator,
    reservationKey: Key | null,
    serviceActionKey: Key,
  ): number {
    const current = this.keyOf(initiator);
    if (reservationKey !== null) {
      const expected = current ?? 0n;
      if (reservationKey !== expected) return RESERVATION_CONFLICT;
    }
    if (current === null) {
      if (serviceActionKey !== 0n) {
        this.registrations.set(initiator, serviceActionKey);
        this.generation++;
      }
      return 0;
    }
    if (serviceActionKey === 0n) {
      this.registrations.delete(initiator);
      if (this.reservation?.holder === initiator) this.reservation = null;
    } else {
      this.registrations.set(initiator, serviceActionKey);
      if (this.reservation?.holder === initiator) {
        this.reservation = { ...this.reservation, key: serviceActionKey };
      }
    }
    this.generation++;
    return 0;
  }

  private holdsKey(initiator: Initiator, key: Key): boolean {
    return this.keyOf(initiator) === key;
  }

  reserve(initiator: Initiator, key: Key, type: number): number {
    if (!this.holdsKey(initiator, key)) return RESERVATION_CONFLICT;
    if (this.reservation === null) {
      this.reservation = { holder: initiator, key, type };
      return 0;
    }
    return this.reservation.holder === initiator &&
      this.reservation.type === type
      ? 0
      : RESERVATION_CONFLICT;
  }

  release(initiator: Initiator, key: Key, type: number): number {
    if (!this.holdsKey(initiator, key)) return RESERVATION_CONFLICT;
    if (this.reservation === null || this.reservation.holder !== initiator) {
      return 0;
    }
    if (this.reservation.type !== type) return ILLEGAL_REQUEST;
    this.reservation = null;
    return 0;
  }

  clear(initiator: Initiator, key: Key): number {
    if (!this.holdsKey(initiator, key)) return RESERVATION_CONFLICT;
    this.registrations.clear();
    this.reservation = null;
    this.generation++;
    return 0;
  }

  preempt(initiator: Initiator, key: Key, victimKey: Key, type: number): number {
    if (!this.holdsKey(initiator, key)) return RESERVATION_CONFLICT;
    const victims = [...this.registrations].filter(
      ([other, otherKey]) => other !== initiator && otherKey === victimKey,
    );
    const takesReservation = this.reservation?.key === victimKey;
    if (victims.length === 0 && !takesReservation) return RESERVATION_CONFLICT;

    for (const [victim] of victims) this.registrations.delete(victim);
    if (takesReservation) {
      this.reservation = { holder: initiator, key, type };
    }
    this.generation++;
    return 0;
  }

  /** Outcome of a write from `initiator` under Write Exclusive, Registrants Only. */
  write(initiator: Initiator): number {
    if (this.reservation === null) return 0;
    return this.registrations.has(initiator) ? 0 : RESERVATION_CONFLICT;
  }

  listedKeys(): Key[] {
    const keys: Key[] = [];
    const peer = this.keyOf("peer");
    if (peer !== null) keys.push(peer);
    const local = this.keyOf("local");
    if (local !== null) {
      for (let path = 0; path < this.pathCount; path++) keys.push(local);
    }
    return keys;
  }
}

export interface FakeStorageStackOptions {
  map?: string;
  device?: string;
  host?: string | null;
  lu?: FakeLogicalUnit;
  /** Commands `which` reports as installed. */
  installed?: string[];
}

const DEFAULT_TOOLS = [
  "mpathpersist",
  "multipath",
  "multipathd",
  "sg_persist",
  "udevadm",
  "ssh",
  "./multipath-test.sh",
];

function flagValue(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

function parseHexKey(value: string | undefined): Key | null {
  if (value === undefined) return null;
  return /^0x[0-9a-f]+$/i.test(value) ? BigInt(value) : null;
}

/**
 * A `CommandRunner` backed by a `FakeLogicalUnit`. Every command line is
 * recorded in `calls` as it would be typed.
 */
export class FakeStorageStack implements CommandRunner {
  readonly label = "local";
  readonly lu: FakeLogicalUnit;
  readonly map: string;
  readonly device: string;
  readonly host: string | null;
  readonly calls: string[] = [];
  readonly installed: Set<string>;
  /** Remaining Unit Attentions to report, per program. */
  readonly unitAttentions = new Map<string, number>();
  /** Overrides the multipathd view, for daemon disagreement tests. */
  daemonOverride: Partial<Record<"prkey" | "prstatus" | "prhold", string>> = {};
  /** Canned results per program, bypassing the simulation. */
  readonly failures = new Map<string, CommandResult>();

  constructor(options: FakeStorageStackOptions = {}) {
    this.map = options.map ?? "mpatha";
    this.device = options.device ?? "sdb";
    this.host = options.host ?? null;
    this.lu = options.lu ?? new FakeLogicalUnit();
    this.installed = new Set(options.installed ?? DEFAULT_TOOLS);
  }

  get mapPath(): string {
    return `/dev/mapper/${this.map}`;
  }

  get devicePath(): string {
    return `/dev/${this.device}`;
  }

  injectUnitAttention(program: string, count = 1): void {
    this.unitAttentions.set(program, count);
  }

  callsTo(program: string): string[] {
    return this.calls.filter((call) => call.split(" ")[0] === program);
  }

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.calls.push([command, ...args].join(" "));
    return this.dispatch(command, args, null);
  }

  private dispatch(
    command: string,
    args: readonly string[],
    remoteHost: string | null,
  ): CommandResult {
    const failure = this.failures.get(command);
    if (failure) return failure;

    const pending = this.unitAttentions.get(command) ?? 0;
    if (pending > 0) {
      this.unitAttentions.set(command, pending - 1);
      return fail(UNIT_ATTENTION, "Unit attention");
    }

    switch (command) {
      case "ssh":
        return this.ssh(args);
      case "mpathpersist":
        return remoteHost === null
          ? this.persist("local", this.mapPath, args)
          : fail(SYNTAX_ERROR, "no multipath on remote host");
      case "sg_persist":
        if (remoteHost !== this.host) {
          return fail(SYNTAX_ERROR, `${this.devicePath}: not reachable here`);
        }
        return this.persist("peer", this.devicePath, args);
      case "multipathd":
        return this.multipathd(args);
      case "multipath":
        return ok(
          `${this.map} (${this.lu.wwid}) dm-0 LIO-ORG,disk\nsize=1.0G features='0' hwhandler='1 alua' wp=rw\n`,
        );
      case "udevadm":
        return this.udevadm(args, remoteHost);
      case "sg_dd":
        return this.sgDd(args);
      case "which":
        return args[0] !== undefined && this.installed.has(args[0])
          ? ok(`/usr/sbin/${args[0]}\n`)
          : fail(1);
      default:
        return fail(127, `${command}: command not found`);
    }
  }

  private ssh(args: readonly string[]): CommandResult {
    const [host, command, ...rest] = args;
    if (host === undefined || command === undefined || host !== this.host) {
      return fail(255, `ssh: Could not resolve hostname ${host ?? ""}`);
    }
    return this.dispatch(command, rest, host);
  }

  private persist(
    initiator: Initiator,
    expectedPath: string,
    args: readonly string[],
  ): CommandResult {
    const path = args[args.length - 1];
    if (path !== expectedPath) {
      return fail(SYNTAX_ERROR, `${path ?? "(none)"}: unexpected device`);
    }
    if (args.includes("-ik")) return ok(this.readKeys(initiator));
    if (args.includes("-ir")) return ok(this.readReservation(initiator));
    if (!args.includes("--out")) return fail(SYNTAX_ERROR, "unsupported");

    const rk = parseHexKey(flagValue(args, "param-rk"));
    const sark = parseHexKey(flagValue(args, "param-sark"));
    const type = Number(flagValue(args, "prout-type") ?? "0");
    const lu = this.lu;

    let code: number;
    if (args.includes("--register")) {
      code = lu.register(initiator, rk ?? 0n, sark ?? 0n);
    } else if (args.includes("--register-ignore")) {
      code = lu.register(initiator, null, sark ?? 0n);
    } else if (args.includes("--reserve")) {
      code = rk === null ? SYNTAX_ERROR : lu.reserve(initiator, rk, type);
    } else if (args.includes("--release")) {
      code = rk === null ? SYNTAX_ERROR : lu.release(initiator, rk, type);
    } else if (args.includes("--clear")) {
      code = rk === null ? SYNTAX_ERROR : lu.clear(initiator, rk);
    } else if (args.includes("--preempt")) {
      code =
        rk === null || sark === null
          ? SYNTAX_ERROR
          : lu.preempt(initiator, rk, sark, type);
    } else {
      code = SYNTAX_ERROR;
    }
    return code === 0 ? ok() : fail(code, "persistent reserve out failed");
  }

  private readKeys(initiator: Initiator): string {
    const keys = this.lu.listedKeys();
    const generation = `PR generation=${hex(BigInt(this.lu.generation))}`;
    if (initiator === "local") {
      if (keys.length === 0) {
        return `  ${generation}, \tthere are NO registered reservation keys\n`;
      }
      return `  ${generation}, \t${keys.length} registered reservation key${keys.length === 1 ? "" : "s"} follow:\n${keys
        .map((key) => `    ${hex(key)}\n`)
        .join("")}`;
    }
    const header = "  LIO-ORG   disk              4.0\n";
    if (keys.length === 0) {
      return `${header}  ${generation}, there are NO registered reservation keys\n`;
    }
    return `${header}  ${generation}, ${keys.length} registered reservation key${keys.length === 1 ? "" : "s"} follow:\n${keys
      .map((key) => `    ${hex(key)}\n`)
      .join("")}`;
  }

  private readReservation(initiator: Initiator): string {
    const generation = `PR generation=${hex(BigInt(this.lu.generation))}`;
    const header = initiator === "peer" ? "  LIO-ORG   disk              4.0\n" : "";
    const reservation = this.lu.reservation;
    if (reservation === null) {
      return `${header}  ${generation}, there is NO reservation held\n`;
    }
    const keyLine =
      initiator === "local"
        ? `   Key = ${hex(reservation.key)}`
        : `    Key=${hex(reservation.key)}`;
    return `${header}  ${generation}, Reservation follows:\n${keyLine}\n    scope: LU_SCOPE,  type: Write Exclusive, registrants only\n`;
  }

  private multipathd(args: readonly string[]): CommandResult {
    const [verb, kind, map] = args;
    if (verb === "show" && kind === "maps") {
      return ok(`${this.map} ${this.lu.wwid}\nmpathb 36001405otherdevice000000000002\n`);
    }
    if (kind !== "map" || map !== this.map) {
      return fail(SYNTAX_ERROR, "invalid map");
    }
    const localKey = this.lu.keyOf("local");
    switch (verb) {
      case "getprkey":
        return ok(
          `${this.daemonOverride.prkey ?? (localKey === null ? "none" : hex(localKey))}\n`,
        );
      case "getprstatus":
        return ok(
          `${this.daemonOverride.prstatus ?? (localKey === null ? "unset" : "set")}\n`,
        );
      case "getprhold":
        return ok(
          `${this.daemonOverride.prhold ?? (this.lu.reservation?.holder === "local" ? "set" : "unset")}\n`,
        );
      default:
        return fail(SYNTAX_ERROR, "unknown command");
    }
  }

  private udevadm(
    args: readonly string[],
    remoteHost: string | null,
  ): CommandResult {
    const nameIndex = args.indexOf("-n");
    const name = nameIndex >= 0 ? args[nameIndex + 1] : undefined;
    if (name !== this.devicePath || remoteHost !== this.host) {
      return ok("\n");
    }
    return ok(`${this.lu.wwid}\n`);
  }

  private sgDd(args: readonly string[]): CommandResult {
    const target = args.find((arg) => arg.startsWith("of="))?.slice(3);
    if (target === this.mapPath) return fail(this.lu.write("local"));
    if (target === this.devicePath) return fail(this.lu.write("peer"));
    return fail(SYNTAX_ERROR, "no such device");
  }
}
