/**
 * xstate v5 machine for the cycle scheduler's phase.
 *
 * The scheduler's loop drives the work; this machine records which phase the loop is
 * in and keeps the cycle counters, so /status reads one consistent snapshot.
 */

import { setup, assign } from "xstate";

export type SchedulerPhase = "paused" | "advancing" | "monitoring" | "sleeping";

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------
interface SchedulerContext {
  cyclesCompleted: number;
  lastRunAt: string | null;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
type SchedulerEvent =
  | { type: "START" }
  | { type: "PAUSE" }
  | { type: "TARGETS_DONE" }
  | { type: "CYCLE_COMPLETED"; at: string }
  | { type: "WAKE" };

export interface SchedulerInput {
  cyclesCompleted?: number;
  lastRunAt?: string | null;
}

const pauseFromActive = { PAUSE: { target: "paused" as const } };

export const schedulerMachine = setup({
  types: {
    context: {} as SchedulerContext,
    events: {} as SchedulerEvent,
    input: {} as SchedulerInput,
  },
  actions: {
    recordCycle: assign({
      cyclesCompleted: ({ context }) => context.cyclesCompleted + 1,
      lastRunAt: ({ context, event }) => {
        if (event.type === "CYCLE_COMPLETED") return event.at;
        return context.lastRunAt;
      },
    }),
  },
}).createMachine({
  id: "scheduler",
  context: ({ input }) => ({
    cyclesCompleted: input?.cyclesCompleted ?? 0,
    lastRunAt: input?.lastRunAt ?? null,
  }),
  initial: "paused",
  states: {
    paused: {
      on: { START: { target: "advancing" } },
    },

    advancing: {
      on: {
        ...pauseFromActive,
        TARGETS_DONE: { target: "monitoring" },
      },
    },

    monitoring: {
      on: {
        ...pauseFromActive,
        CYCLE_COMPLETED: { target: "sleeping", actions: "recordCycle" },
      },
    },

    sleeping: {
      on: {
        ...pauseFromActive,
        WAKE: { target: "advancing" },
      },
    },
  },
});
