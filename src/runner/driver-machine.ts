/**
 * Driver loop as a state machine.
 *
 * One iteration is select → execute → verify → dwell → check the
 * background processes → pause. Every side effect is an invoked
 * fromPromise actor, so an interrupt can only take effect between steps
 * (or cut a dwell/pause short), never half way through a PR OUT command.
 * Any failure, and any interrupt, ends in `terminated`, which always runs
 * cleanup before the machine halts.
 */

import { assign, fromPromise, setup } from "xstate";
import type { Operation } from "../core/operations.js";
import type { ReservationState } from "../core/state.js";

export interface DriverServices {
  /** Clear the target, start the background processes, return the initial state. */
  startUp(): Promise<ReservationState>;
  pick(state: ReservationState): Operation;
  execute(state: ReservationState, op: Operation): Promise<ReservationState>;
  verify(state: ReservationState): Promise<ReservationState>;
  /** Throw if the oracle or the path-failure injector died. */
  checkProcesses(): Promise<void>;
  /** Best-effort teardown; must not throw for an individual step failing. */
  shutDown(state: ReservationState | null, failure: Error | null): Promise<void>;
}

export interface DriverMachineInput {
  services: DriverServices;
  ioDwellMs: number;
  iterationPauseMs: number;
  /** 0 runs until interrupted or failed. */
  maxIterations: number;
}

export interface DriverContext extends DriverMachineInput {
  state: ReservationState | null;
  operation: Operation | null;
  iteration: number;
  failure: Error | null;
  interrupted: boolean;
}

export type DriverEvent = { type: "INTERRUPT" };

export interface DriverOutput {
  exitCode: number;
  iterations: number;
  interrupted: boolean;
  failure: Error | null;
}

export const DRIVER_STATES = {
  startingUp: "startingUp",
  selecting: "selecting",
  executing: "executing",
  verifying: "verifying",
  dwelling: "dwelling",
  checkingProcesses: "checkingProcesses",
  pausing: "pausing",
  terminated: "terminated",
  halted: "halted",
} as const;

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function requireState(state: ReservationState | null): ReservationState {
  if (state === null) {
    throw new Error("Reservation state is not initialised");
  }
  return state;
}

function requireOperation(operation: Operation | null): Operation {
  if (operation === null) {
    throw new Error("No operation selected");
  }
  return operation;
}

export const driverMachine = setup({
  types: {
    context: {} as DriverContext,
    events: {} as DriverEvent,
    input: {} as DriverMachineInput,
    output: {} as DriverOutput,
  },
  actors: {
    startUp: fromPromise<ReservationState, { services: DriverServices }>(
      ({ input }) => input.services.startUp(),
    ),
    execute: fromPromise<
      ReservationState,
      {
        services: DriverServices;
        state: ReservationState | null;
        operation: Operation | null;
      }
    >(({ input }) =>
      input.services.execute(
        requireState(input.state),
        requireOperation(input.operation),
      ),
    ),
    verify: fromPromise<
      ReservationState,
      { services: DriverServices; state: ReservationState | null }
    >(({ input }) => input.services.verify(requireState(input.state))),
    checkProcesses: fromPromise<void, { services: DriverServices }>(
      ({ input }) => input.services.checkProcesses(),
    ),
    shutDown: fromPromise<
      void,
      {
        services: DriverServices;
        state: ReservationState | null;
        failure: Error | null;
      }
    >(({ input }) => input.services.shutDown(input.state, input.failure)),
  },
  guards: {
    interrupted: ({ context }) => context.interrupted,
    iterationBudgetSpent: ({ context }) =>
      context.maxIterations > 0 && context.iteration >= context.maxIterations,
  },
  delays: {
    ioDwell: ({ context }) => context.ioDwellMs,
    iterationPause: ({ context }) => context.iterationPauseMs,
  },
}).createMachine({
  id: "driver",
  initial: DRIVER_STATES.startingUp,
  context: ({ input }) => ({
    ...input,
    state: null,
    operation: null,
    iteration: 0,
    failure: null,
    interrupted: false,
  }),
  on: {
    INTERRUPT: { actions: assign({ interrupted: true }) },
  },
  states: {
    [DRIVER_STATES.startingUp]: {
      invoke: {
        src: "startUp",
        input: ({ context }) => ({ services: context.services }),
        onDone: {
          target: DRIVER_STATES.selecting,
          actions: assign({ state: ({ event }) => event.output }),
        },
        onError: {
          target: DRIVER_STATES.terminated,
          actions: assign({ failure: ({ event }) => toError(event.error) }),
        },
      },
    },

    [DRIVER_STATES.selecting]: {
      always: [
        { guard: "interrupted", target: DRIVER_STATES.terminated },
        { guard: "iterationBudgetSpent", target: DRIVER_STATES.terminated },
        {
          target: DRIVER_STATES.executing,
          actions: assign({
            iteration: ({ context }) => context.iteration + 1,
            operation: ({ context }) =>
              context.services.pick(requireState(context.state)),
          }),
        },
      ],
    },

    [DRIVER_STATES.executing]: {
      invoke: {
        src: "execute",
        input: ({ context }) => ({
          services: context.services,
          state: context.state,
          operation: context.operation,
        }),
        onDone: {
          target: DRIVER_STATES.verifying,
          actions: assign({ state: ({ event }) => event.output }),
        },
        onError: {
          target: DRIVER_STATES.terminated,
          actions: assign({ failure: ({ event }) => toError(event.error) }),
        },
      },
    },

    [DRIVER_STATES.verifying]: {
      invoke: {
        src: "verify",
        input: ({ context }) => ({
          services: context.services,
          state: context.state,
        }),
        onDone: {
          target: DRIVER_STATES.dwelling,
          actions: assign({ state: ({ event }) => event.output }),
        },
        onError: {
          target: DRIVER_STATES.terminated,
          actions: assign({ failure: ({ event }) => toError(event.error) }),
        },
      },
    },

    [DRIVER_STATES.dwelling]: {
      always: { guard: "interrupted", target: DRIVER_STATES.terminated },
      on: {
        INTERRUPT: {
          target: DRIVER_STATES.terminated,
          actions: assign({ interrupted: true }),
        },
      },
      after: {
        ioDwell: DRIVER_STATES.checkingProcesses,
      },
    },

    [DRIVER_STATES.checkingProcesses]: {
      invoke: {
        src: "checkProcesses",
        input: ({ context }) => ({ services: context.services }),
        onDone: DRIVER_STATES.pausing,
        onError: {
          target: DRIVER_STATES.terminated,
          actions: assign({ failure: ({ event }) => toError(event.error) }),
        },
      },
    },

    [DRIVER_STATES.pausing]: {
      always: { guard: "interrupted", target: DRIVER_STATES.terminated },
      on: {
        INTERRUPT: {
          target: DRIVER_STATES.terminated,
          actions: assign({ interrupted: true }),
        },
      },
      after: {
        iterationPause: DRIVER_STATES.selecting,
      },
    },

    [DRIVER_STATES.terminated]: {
      invoke: {
        src: "shutDown",
        input: ({ context }) => ({
          services: context.services,
          state: context.state,
          failure: context.failure,
        }),
        onDone: DRIVER_STATES.halted,
        // Teardown problems never change the outcome of the run.
        onError: DRIVER_STATES.halted,
      },
    },

    [DRIVER_STATES.halted]: {
      type: "final",
    },
  },
  output: ({ context }) => ({
    exitCode: context.failure ? 1 : 0,
    iterations: context.iteration,
    interrupted: context.interrupted,
    failure: context.failure,
  }),
});
