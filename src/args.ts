import { minimist } from "zx";
import { z } from "zod";
import type { IoExpectation } from "./core/io-expectation.js";

export const USAGE = [
  "Usage: pr-exerciser <command> [options]",
  "",
  "  run <map> [<host>] <device>        exercise persistent reservations",
  "  preflight <map> [<host>] <device>  only run the start-up checks",
  "  io-test <device> <pass|fail>       background I/O writer",
  "",
  "  <map>     multipath map name (e.g. mpatha)",
  "  <host>    host the second path lives on, reached over ssh",
  "  <device>  SCSI device reaching the same storage (e.g. sdb)",
  "",
  "Options:",
  "  --max-iterations <n>  stop cleanly after n iterations",
  "  --no-fault-injector   do not cycle paths in the background",
  "  --no-daemon-check     skip the multipathd cross-check",
  "  --no-peer-check       skip the second path's own status report",
  "  --help                show this message",
].join("\n");

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const Name = z
  .string()
  .regex(/^[\w.:-]+$/, "Names may only contain letters, digits, '.', ':', '_' and '-'");

const HostName = z
  .string()
  .regex(/^[\w.:@-]+$/, "Host may only contain letters, digits, '.', ':', '@', '_' and '-'");

export interface Targets {
  map: string;
  host: string | null;
  device: string;
}

export const TargetsSchema = z.union([
  z
    .tuple([Name, Name])
    .transform(([map, device]): Targets => ({ map, host: null, device })),
  z
    .tuple([Name, HostName, Name])
    .transform(([map, host, device]): Targets => ({ map, host, device })),
]);

const Positionals = z.array(
  z.union([z.string(), z.number()]).transform(String),
);

const RunFlagsSchema = z.object({
  _: Positionals,
  "max-iterations": z.coerce.number().int().nonnegative().optional(),
  "fault-injector": z.boolean(),
  "daemon-check": z.boolean(),
  "peer-check": z.boolean(),
});

export interface RunArguments {
  targets: Targets;
  /** Overrides the configured limit when given. */
  maxIterations: number | null;
  faultInjector: boolean;
  daemonCheck: boolean;
  peerCheck: boolean;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Arguments of `run` and `preflight`. `argv` starts with the command name.
 */
export function parseRunArguments(argv: readonly string[]): RunArguments {
  const flags = RunFlagsSchema.safeParse(
    minimist([...argv], {
      boolean: ["fault-injector", "daemon-check", "peer-check"],
      string: ["max-iterations"],
      default: {
        "fault-injector": true,
        "daemon-check": true,
        "peer-check": true,
      },
    }),
  );
  if (!flags.success) {
    throw new UsageError(describeIssues(flags.error));
  }

  const positionals = flags.data._.slice(1);
  const targets = TargetsSchema.safeParse(positionals);
  if (!targets.success) {
    throw new UsageError(
      positionals.length === 2 || positionals.length === 3
        ? describeIssues(targets.error)
        : `Expected <map> [<host>] <device>, got ${positionals.length} arguments`,
    );
  }

  return {
    targets: targets.data,
    maxIterations: flags.data["max-iterations"] ?? null,
    faultInjector: flags.data["fault-injector"],
    daemonCheck: flags.data["daemon-check"],
    peerCheck: flags.data["peer-check"],
  };
}

export interface IoTestArguments {
  device: string;
  expectation: IoExpectation;
}

const IoTestSchema = z
  .tuple([
    z.string().min(1),
    z.enum(["pass", "fail"], {
      errorMap: () => ({ message: "Expected result must be 'pass' or 'fail'" }),
    }),
  ])
  .transform(([device, expectation]): IoTestArguments => ({
    device,
    expectation,
  }));

export function parseIoTestArguments(
  argv: readonly string[],
): IoTestArguments {
  const positionals = Positionals.parse(minimist([...argv])._).slice(1);
  const result = IoTestSchema.safeParse(positionals);
  if (!result.success) {
    throw new UsageError(
      positionals.length === 2
        ? describeIssues(result.error)
        : "Expected <device> <pass|fail>",
    );
  }
  return result.data;
}
