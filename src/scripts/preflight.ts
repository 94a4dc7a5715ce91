import { parseRunArguments } from "../args.js";
import {
  IdentifierMismatchError,
  ToolInvocationError,
} from "../core/errors.js";
import { Script } from "../lib.js";
import { peerRunner } from "../runner/components.js";
import type { CommandRunner } from "../tools/exec.js";
import { MultipathDaemon, pathWwid } from "../tools/multipathd.js";

const LOCAL_TOOLS = ["mpathpersist", "multipath", "multipathd", "udevadm"];
const PEER_TOOLS = ["sg_persist", "udevadm"];

export default class PreflightScript extends Script {
  static override name = "preflight";
  static override description =
    "Check privileges, required tools and that both paths reach the same storage";

  private async requireTools(
    runner: CommandRunner,
    tools: readonly string[],
  ): Promise<void> {
    for (const tool of tools) {
      const result = await runner.run("which", [tool]);
      if (result.exitCode !== 0) {
        throw new ToolInvocationError({
          command: `which ${tool}`,
          ...result,
        });
      }
    }
  }

  override async fn() {
    const { targets, faultInjector } = parseRunArguments(this.runner.argv);
    const { config, system } = this.runner;
    const peer = peerRunner(system, targets.host);

    if (!system.isPrivileged()) {
      this.logger.error("This command must be run as root");
      this.runner.exitCode = 1;
      return;
    }

    const localTools =
      targets.host === null ? [...LOCAL_TOOLS, "sg_persist"] : [...LOCAL_TOOLS, "ssh"];
    if (faultInjector && config.faultInjector !== null) {
      localTools.push(config.faultInjector);
    }
    await this.requireTools(system.commands, localTools);
    if (targets.host !== null) {
      await this.requireTools(peer, PEER_TOOLS);
    }
    this.logger.success("Required tools found");

    this.logger.info(
      `Verifying that ${targets.map} and ${targets.device} point to the same storage...`,
    );
    const mapWwid = await new MultipathDaemon(system.commands).mapWwid(
      targets.map,
    );
    const deviceWwid = await pathWwid(peer, targets.device);
    if (mapWwid === null || deviceWwid === null) {
      const missing = mapWwid === null ? targets.map : targets.device;
      this.logger.error(`Could not get WWID for ${missing}`);
      this.runner.exitCode = 1;
      return;
    }
    if (mapWwid !== deviceWwid) {
      throw new IdentifierMismatchError(
        { device: targets.map, wwid: mapWwid },
        { device: targets.device, wwid: deviceWwid },
      );
    }
    this.logger.success(`Device WWIDs match: ${mapWwid}`);
  }
}
