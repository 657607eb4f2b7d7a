import { describe, it, expect } from "vitest";
import { createActor } from "xstate";
import { schedulerMachine, type SchedulerInput } from "./scheduler-machine.js";

function startActor(input: SchedulerInput = {}) {
  const actor = createActor(schedulerMachine, { input });
  actor.start();
  return actor;
}

describe("scheduler-machine: initial context", () => {
  it("starts paused with no completed cycles", () => {
    const snap = startActor().getSnapshot();
    expect(snap.value).toBe("paused");
    expect(snap.context).toEqual({ cyclesCompleted: 0, lastRunAt: null });
  });
});

describe("scheduler-machine: cycle", () => {
  it("walks advancing -> monitoring -> sleeping -> advancing", () => {
    const actor = startActor();
    actor.send({ type: "START" });
    expect(actor.getSnapshot().value).toBe("advancing");

    actor.send({ type: "TARGETS_DONE" });
    expect(actor.getSnapshot().value).toBe("monitoring");

    actor.send({ type: "CYCLE_COMPLETED", at: "2026-04-01T12:00:00.000Z" });
    expect(actor.getSnapshot().value).toBe("sleeping");
    expect(actor.getSnapshot().context).toEqual({ cyclesCompleted: 1, lastRunAt: "2026-04-01T12:00:00.000Z" });

    actor.send({ type: "WAKE" });
    expect(actor.getSnapshot().value).toBe("advancing");
  });

  it("counts on from a restored cycle count", () => {
    const actor = startActor({ cyclesCompleted: 4 });
    actor.send({ type: "START" });
    actor.send({ type: "TARGETS_DONE" });
    actor.send({ type: "CYCLE_COMPLETED", at: "2026-04-01T13:00:00.000Z" });
    expect(actor.getSnapshot().context.cyclesCompleted).toBe(5);
  });
});

describe("scheduler-machine: pause", () => {
  it.each([
    ["advancing", [{ type: "START" }]],
    ["monitoring", [{ type: "START" }, { type: "TARGETS_DONE" }]],
    ["sleeping", [{ type: "START" }, { type: "TARGETS_DONE" }, { type: "CYCLE_COMPLETED", at: "2026-04-01T12:00:00.000Z" }]],
  ] as const)("pauses from %s", (phase, events) => {
    const actor = startActor();
    for (const event of events) actor.send(event);
    expect(actor.getSnapshot().value).toBe(phase);

    actor.send({ type: "PAUSE" });
    expect(actor.getSnapshot().value).toBe("paused");
  });

  it("ignores loop events while paused", () => {
    const actor = startActor();
    actor.send({ type: "TARGETS_DONE" });
    actor.send({ type: "CYCLE_COMPLETED", at: "2026-04-01T12:00:00.000Z" });
    actor.send({ type: "WAKE" });
    expect(actor.getSnapshot().value).toBe("paused");
    expect(actor.getSnapshot().context.cyclesCompleted).toBe(0);
  });
});
