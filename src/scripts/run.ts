import { parseRunArguments } from "../args.js";
import { Script } from "../lib.js";
import { createComponents } from "../runner/components.js";
import { createDriverServices, runExerciser } from "../runner/driver.js";
import PreflightScript from "./preflight.js";

export default class RunScript extends Script {
  static override dependencies = [
    {
      class: PreflightScript,
      enabled: true,
    },
  ];
  static override name = "run";
  static override description =
    "Exercise persistent reservations until interrupted or a check fails";

  override async fn() {
    const args = parseRunArguments(this.runner.argv);
    const { config, system, logger } = this.runner;
    const { map, host, device } = args.targets;

    logger.info(
      `Starting exerciser for ${map} (multipath) and ${host === null ? device : `${host}:${device}`} (SCSI)`,
    );
    const components = createComponents(config, system, args, logger);
    const outcome = await runExerciser(createDriverServices(components), {
      ioDwellMs: config.ioDwellMs,
      iterationPauseMs: config.iterationPauseMs,
      maxIterations: args.maxIterations ?? config.maxIterations,
      logger,
      signals: system.signals,
    });

    if (outcome.failure) {
      logger.error(
        `Stopped after ${outcome.iterations} iterations: ${outcome.failure.name}`,
      );
    } else {
      logger.success(`Completed ${outcome.iterations} iterations`);
    }
    this.runner.exitCode = outcome.exitCode;
  }
}
