/**
 * Persistent reservation operations the exerciser can issue.
 *
 * Every reservation-bearing call uses PR type 5, Write Exclusive,
 * Registrants Only.
 */

export const PR_TYPE_WRITE_EXCLUSIVE_REGISTRANTS_ONLY = 5;

export type RegistrationChange = "new-key" | "unregister";

export type Operation =
  | { kind: "register"; change: RegistrationChange }
  | { kind: "register-ignore"; change: RegistrationChange }
  | { kind: "reserve" }
  | { kind: "release" }
  | { kind: "clear" }
  | { kind: "preempt"; by: "local" | "peer" };

export type OperationKind = Operation["kind"];

export type OperationOf<K extends OperationKind> = Extract<
  Operation,
  { kind: K }
>;

export const Operations = {
  register: (change: RegistrationChange): Operation => ({
    kind: "register",
    change,
  }),
  registerIgnore: (change: RegistrationChange): Operation => ({
    kind: "register-ignore",
    change,
  }),
  reserve: (): Operation => ({ kind: "reserve" }),
  release: (): Operation => ({ kind: "release" }),
  clear: (): Operation => ({ kind: "clear" }),
  preempt: (by: "local" | "peer"): Operation => ({ kind: "preempt", by }),
} as const;

export function describeOperation(op: Operation): string {
  switch (op.kind) {
    case "register":
      return op.change === "new-key" ? "REGISTER_NEW" : "REGISTER_UNREGISTER";
    case "register-ignore":
      return op.change === "new-key"
        ? "REGISTER_AND_IGNORE_NEW"
        : "REGISTER_AND_IGNORE_UNREGISTER";
    case "reserve":
      return "RESERVE";
    case "release":
      return "RELEASE";
    case "clear":
      return "CLEAR";
    case "preempt":
      return op.by === "local" ? "PREEMPT" : "PREEMPT_BY_PEER";
  }
}
