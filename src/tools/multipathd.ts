import type { Key } from "../core/keys.js";
import {
  parseMapWwids,
  parsePrFlag,
  parsePrKey,
  type PrFlag,
} from "../status/daemon-status.js";
import { invokeTool, type CommandRunner } from "./exec.js";

/** What multipathd itself believes about a map's persistent reservation. */
export interface DaemonPrView {
  prKey: Key | null;
  prStatus: PrFlag;
  prHold: PrFlag;
}

/**
 * Queries against the multipath daemon and the multipath CLI. These never
 * issue SCSI commands, so Unit Attention retries do not apply.
 */
export class MultipathDaemon {
  constructor(private readonly runner: CommandRunner) {}

  private async query(command: string, args: string[]): Promise<string> {
    const result = await invokeTool(this.runner, command, args);
    return result.stdout;
  }

  async getPrKey(map: string): Promise<Key | null> {
    return parsePrKey(await this.query("multipathd", ["getprkey", "map", map]));
  }

  async getPrStatus(map: string): Promise<PrFlag> {
    return parsePrFlag(
      await this.query("multipathd", ["getprstatus", "map", map]),
    );
  }

  async getPrHold(map: string): Promise<PrFlag> {
    return parsePrFlag(
      await this.query("multipathd", ["getprhold", "map", map]),
    );
  }

  async readPrView(map: string): Promise<DaemonPrView> {
    return {
      prKey: await this.getPrKey(map),
      prStatus: await this.getPrStatus(map),
      prHold: await this.getPrHold(map),
    };
  }

  async mapWwid(map: string): Promise<string | null> {
    const output = await this.query("multipathd", [
      "show",
      "maps",
      "raw",
      "format",
      "%n %w",
    ]);
    return parseMapWwids(output).get(map) ?? null;
  }

  showTopology(map: string): Promise<string> {
    return this.query("multipath", ["-l", map]);
  }
}

/**
 * Serial udev reports for a SCSI device; for multipath members this is
 * the same value multipathd uses as the map WWID.
 */
export async function pathWwid(
  runner: CommandRunner,
  device: string,
): Promise<string | null> {
  const result = await invokeTool(runner, "udevadm", [
    "info",
    "-n",
    `/dev/${device}`,
    "--query=property",
    "--property=ID_SERIAL",
    "--value",
  ]);
  return result.stdout.trim() || null;
}
