import { $ } from "zx";
import {
  BackgroundProcessFaultError,
  type ExitStatus,
} from "../core/errors.js";

export interface ProcessHandle {
  readonly pid: number | undefined;
  /** Settles once, when the process has gone; never rejects. */
  readonly exited: Promise<ExitStatus>;
  kill(signal: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  launch(command: string, args: readonly string[]): ProcessHandle;
}

/**
 * Spawns long-lived helpers through zx. Output is streamed to the terminal
 * so the oracle's per-write progress stays visible. Helpers get their own
 * process group: a Ctrl+C at the terminal reaches only the exerciser, which
 * then stops them itself.
 */
export class ZxProcessLauncher implements ProcessLauncher {
  launch(command: string, args: readonly string[]): ProcessHandle {
    const child = $({
      nothrow: true,
      verbose: true,
      detached: true,
    })`${command} ${args}`;
    const exited = child.then(
      (output): ExitStatus => ({
        exitCode: output.exitCode,
        signal: output.signal,
      }),
      (error: unknown): ExitStatus => ({
        exitCode: null,
        signal: null,
        error: error instanceof Error ? error.message : String(error),
      }),
    );
    return {
      get pid() {
        return child.child?.pid;
      },
      exited,
      kill(signal) {
        child.child?.kill(signal);
      },
    };
  }
}

const TIMED_OUT = Symbol("timed-out");

async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * A background helper that is only ever observed from outside: started,
 * polled for liveness, and stopped with SIGTERM and a bounded wait.
 */
export class SupervisedProcess {
  private handle: ProcessHandle | null = null;
  private status: ExitStatus | null = null;

  constructor(
    readonly name: string,
    private readonly launcher: ProcessLauncher,
    private readonly command: string,
    private readonly args: readonly string[],
  ) {}

  get pid(): number | undefined {
    return this.handle?.pid;
  }

  start(): void {
    if (this.isAlive()) {
      throw new Error(`${this.name} is already running (PID: ${this.pid})`);
    }
    const handle = this.launcher.launch(this.command, this.args);
    this.handle = handle;
    this.status = null;
    void handle.exited.then((status) => {
      if (this.handle === handle) this.status = status;
    });
  }

  isAlive(): boolean {
    return this.handle !== null && this.status === null;
  }

  exitStatus(): ExitStatus | null {
    return this.status;
  }

  /**
   * SIGTERM, then wait up to `timeoutMs`. A timeout escalates to SIGKILL.
   * Anything but a zero exit is a fault.
   */
  async stop(timeoutMs: number): Promise<ExitStatus> {
    const handle = this.handle;
    if (handle === null) {
      throw new Error(`${this.name} is not running`);
    }
    if (this.status !== null) {
      throw new BackgroundProcessFaultError(
        this.name,
        "exited before it was stopped",
        this.status,
      );
    }

    handle.kill("SIGTERM");
    const status = await withTimeout(handle.exited, timeoutMs);
    if (status === TIMED_OUT) {
      handle.kill("SIGKILL");
      this.handle = null;
      throw new BackgroundProcessFaultError(
        this.name,
        `did not exit within ${timeoutMs}ms of SIGTERM`,
        null,
      );
    }

    this.status = status;
    this.handle = null;
    if (status.exitCode !== 0) {
      throw new BackgroundProcessFaultError(
        this.name,
        "did not exit cleanly",
        status,
      );
    }
    return status;
  }
}
