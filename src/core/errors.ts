/**
 * Failure taxonomy for an exerciser run.
 *
 * Only a Unit Attention is ever retried, and only inside the tool layer.
 * Anything that reaches the driver loop ends the run through cleanup.
 */

import type { FieldDiff } from "./verifier/types.js";

export type ErrorKind =
  | "retryable-transient"
  | "state-mismatch"
  | "identifier-mismatch"
  | "background-process-fault"
  | "tool-invocation";

export abstract class ExerciserError extends Error {
  abstract readonly kind: ErrorKind;
}

export interface CommandFailure {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export class ToolInvocationError extends ExerciserError {
  override readonly kind = "tool-invocation";

  constructor(readonly failure: CommandFailure) {
    super(
      `Command failed with exit code ${failure.exitCode}: ${failure.command}`,
    );
    this.name = "ToolInvocationError";
  }
}

export class UnitAttentionError extends ExerciserError {
  override readonly kind = "retryable-transient";

  constructor(
    readonly command: string,
    readonly attempts: number,
  ) {
    super(
      `${command} still reported Unit Attention after ${attempts} attempts`,
    );
    this.name = "UnitAttentionError";
  }
}

/** Tool output that matches none of the known report layouts. */
export class StatusParseError extends ExerciserError {
  override readonly kind = "tool-invocation";

  constructor(
    message: string,
    readonly output: string,
  ) {
    super(message);
    this.name = "StatusParseError";
  }
}

export class StateMismatchError extends ExerciserError {
  override readonly kind = "state-mismatch";

  constructor(
    readonly diffs: FieldDiff[],
    readonly expectedState: string,
  ) {
    super(
      `State verification failed (${expectedState}):\n${diffs
        .map((diff) => `  ${formatDiff(diff)}`)
        .join("\n")}`,
    );
    this.name = "StateMismatchError";
  }
}

export class IdentifierMismatchError extends ExerciserError {
  override readonly kind = "identifier-mismatch";

  constructor(
    readonly first: { device: string; wwid: string },
    readonly second: { device: string; wwid: string },
  ) {
    super(
      `Device WWIDs do not match: ${first.device}=${first.wwid} vs ${second.device}=${second.wwid}`,
    );
    this.name = "IdentifierMismatchError";
  }
}

export interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned or observed at all. */
  error?: string;
}

export class BackgroundProcessFaultError extends ExerciserError {
  override readonly kind = "background-process-fault";

  constructor(
    readonly processName: string,
    message: string,
    readonly status: ExitStatus | null,
  ) {
    super(describeFault(processName, message, status));
    this.name = "BackgroundProcessFaultError";
  }
}

function describeFault(
  processName: string,
  message: string,
  status: ExitStatus | null,
): string {
  const suffix = status ? ` (${formatExitStatus(status)})` : "";
  return `${processName}: ${message}${suffix}`;
}

export function formatExitStatus(status: ExitStatus): string {
  if (status.error) return status.error;
  if (status.signal) return `signal ${status.signal}`;
  return `exit code ${status.exitCode ?? "unknown"}`;
}

function formatValue(value: unknown): string {
  if (typeof value === "bigint") return `0x${value.toString(16)}`;
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (value === null || value === undefined) return String(value);
  if (typeof value === "object") {
    return JSON.stringify(value, (_key, current: unknown) =>
      typeof current === "bigint" ? `0x${current.toString(16)}` : current,
    );
  }
  return String(value);
}

export function formatDiff(diff: FieldDiff): string {
  return `${diff.path} [${diff.comparison}]: expected ${formatValue(diff.expected)}, got ${formatValue(diff.actual)}`;
}

/**
 * What the failing tool printed, for errors that carry it. Null when there
 * is nothing worth showing.
 */
export function capturedOutput(error: unknown): string | null {
  let parts: string[] = [];
  if (error instanceof ToolInvocationError) {
    parts = [error.failure.stdout, error.failure.stderr];
  } else if (error instanceof StatusParseError) {
    parts = [error.output];
  }
  const text = parts
    .map((part) => part.trimEnd())
    .filter(Boolean)
    .join("\n");
  return text || null;
}

export function isExerciserError(error: unknown): error is ExerciserError {
  return error instanceof ExerciserError;
}
