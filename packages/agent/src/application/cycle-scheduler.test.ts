import { describe, it, expect, vi } from "vitest";
import type { Target } from "../domain/targets.js";
import { TEST_NOW } from "../test-helpers.js";
import { SchedulerSettingsSchema } from "../types/config.js";
import type { AgentEvent, EventSink } from "../types/events.js";
import { CycleScheduler, type CycleSchedulerDeps, type Sleeper } from "./cycle-scheduler.js";
import type { MonitoringSummary, PricingRunSummary, PricingWork } from "./pricing-runner.js";
import { RuntimeTracker } from "./runtime-tracker.js";

const T1: Target = { skuId: 1, storeId: 1 };
const T2: Target = { skuId: 2, storeId: 1 };
const T3: Target = { skuId: 3, storeId: 1 };

const EMPTY_SWEEP: MonitoringSummary = { checked: 0, retracted: 0, failed: 0, skipped: 0 };

function runSummary(target: Target): PricingRunSummary {
  return {
    ...target,
    shouldAct: false,
    promotionId: null,
    executionStatus: null,
    error: null,
    visited: ["collect_data", "analyze_market"],
    finishedAt: TEST_NOW.toISOString(),
  };
}

function createWork() {
  return {
    analyzeTarget: vi.fn<PricingWork["analyzeTarget"]>(async (target) => runSummary(target)),
    monitorActivePromotions: vi.fn<PricingWork["monitorActivePromotions"]>(async () => EMPTY_SWEEP),
  };
}

function createEvents() {
  const events: AgentEvent[] = [];
  const sink: EventSink = {
    append: vi.fn(async (event: AgentEvent) => {
      events.push(event);
    }),
  };
  return { sink, events };
}

function createScheduler(overrides: Partial<CycleSchedulerDeps> = {}) {
  const work = createWork();
  const { sink, events } = createEvents();
  const tracker = new RuntimeTracker(() => TEST_NOW);
  const sleep = vi.fn<Sleeper>(async () => {});
  const scheduler = new CycleScheduler({
    targets: [T1, T2, T3],
    work,
    tracker,
    events: sink,
    settings: SchedulerSettingsSchema.parse({ interTargetDelayMs: 0 }),
    cycleIntervalMs: 60_000,
    autoStart: true,
    now: () => TEST_NOW,
    sleep,
    ...overrides,
  });
  return { scheduler, work, events, tracker, sleep };
}

const processedTargets = (work: ReturnType<typeof createWork>) => work.analyzeTarget.mock.calls.map(([t]) => t.skuId);

describe("CycleScheduler control", () => {
  it("refuses to start without targets", async () => {
    const { scheduler } = createScheduler({ targets: [], autoStart: false });
    await expect(scheduler.start()).resolves.toEqual({ success: false, message: "No agent targets configured." });
    expect(scheduler.isRunning()).toBe(false);
  });

  it("reports start, repeated start and idempotent stop", async () => {
    const { scheduler, events } = createScheduler({ autoStart: false });

    await expect(scheduler.start()).resolves.toEqual({ success: true, message: "Agent loop started." });
    await expect(scheduler.start()).resolves.toEqual({ success: true, message: "Agent loop already running." });
    await expect(scheduler.stop()).resolves.toEqual({ success: true, message: "Agent loop paused." });
    await expect(scheduler.stop()).resolves.toEqual({ success: true, message: "Agent loop paused." });

    expect(events.map((e) => e.type)).toEqual(["agent_started", "agent_paused"]);
  });

  it("starts paused unless autoStart is set", async () => {
    const { scheduler, work } = createScheduler({ autoStart: false });
    await expect(scheduler.runCycleStep()).resolves.toBe("paused");
    expect(work.analyzeTarget).not.toHaveBeenCalled();
    expect(scheduler.phase()).toBe("paused");
  });

  it("idles while running without targets", async () => {
    const { scheduler, work } = createScheduler({ targets: [] });
    await expect(scheduler.runCycleStep()).resolves.toBe("idle");
    await expect(scheduler.runCycleStep()).resolves.toBe("idle");
    expect(work.analyzeTarget).not.toHaveBeenCalled();
    expect(scheduler.getStatus().idleReason).toBe("No agent targets configured.");
  });

  it("clears the idle reason once paused", async () => {
    const { scheduler } = createScheduler({ targets: [] });
    await scheduler.stop();
    expect(scheduler.getStatus().idleReason).toBeNull();
  });

  it("has no idle reason while targets exist", () => {
    const { scheduler } = createScheduler();
    expect(scheduler.getStatus().idleReason).toBeNull();
  });
});

describe("CycleScheduler cycle", () => {
  it("prices every target in order, sweeps promotions, then records the cycle", async () => {
    const { scheduler, work, events } = createScheduler();

    await expect(scheduler.runCycleStep()).resolves.toBe("completed");

    expect(processedTargets(work)).toEqual([1, 2, 3]);
    expect(work.monitorActivePromotions).toHaveBeenCalledTimes(1);
    expect(events.map((e) => e.type)).toEqual([
      "cycle_started",
      "target_processed",
      "target_processed",
      "target_processed",
      "monitoring_completed",
      "cycle_completed",
    ]);
    expect(scheduler.getStatus()).toMatchObject({
      phase: "sleeping",
      cyclesCompleted: 1,
      lastRun: "2026-04-01T12:00:00.000Z",
      nextTargetIndex: 0,
      cycleStartedAt: null,
      lastProcessedTarget: T3,
      inProgressTarget: null,
    });
  });

  it("resumes from the cursor after a pause without skipping or repeating a target", async () => {
    const { scheduler, work } = createScheduler();
    work.analyzeTarget.mockImplementation(async (target) => {
      if (target.skuId === 2) await scheduler.stop();
      return runSummary(target);
    });

    await expect(scheduler.runCycleStep()).resolves.toBe("interrupted");
    const paused = scheduler.getStatus();
    expect(paused).toMatchObject({ phase: "paused", running: false, nextTargetIndex: 2, lastProcessedTarget: T2 });
    expect(paused.cycleStartedAt).toBe("2026-04-01T12:00:00.000Z");
    expect(work.monitorActivePromotions).not.toHaveBeenCalled();

    await expect(scheduler.runCycleStep()).resolves.toBe("paused");
    expect(scheduler.getStatus().nextTargetIndex).toBe(2);

    await scheduler.start();
    await expect(scheduler.runCycleStep()).resolves.toBe("completed");
    expect(processedTargets(work)).toEqual([1, 2, 3]);
    expect(scheduler.getStatus().cyclesCompleted).toBe(1);
  });

  it("runs the sweep when paused right after the last target", async () => {
    const { scheduler, work } = createScheduler();
    work.analyzeTarget.mockImplementation(async (target) => {
      if (target.skuId === 3) await scheduler.stop();
      return runSummary(target);
    });

    await expect(scheduler.runCycleStep()).resolves.toBe("interrupted");
    expect(scheduler.getStatus().nextTargetIndex).toBe(3);

    await scheduler.start();
    await expect(scheduler.runCycleStep()).resolves.toBe("completed");
    expect(work.analyzeTarget).toHaveBeenCalledTimes(3);
    expect(work.monitorActivePromotions).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().nextTargetIndex).toBe(0);
  });

  it("records a failed target and moves on to the next one", async () => {
    const { scheduler, work } = createScheduler();
    work.analyzeTarget.mockImplementation(async (target) => {
      if (target.skuId === 2) throw new Error("inventory service down");
      return runSummary(target);
    });

    await expect(scheduler.runCycleStep()).resolves.toBe("completed");

    expect(processedTargets(work)).toEqual([1, 2, 3]);
    expect(scheduler.errorHistory()).toEqual([
      { error: "inventory service down", timestamp: "2026-04-01T12:00:00.000Z", skuId: 2, storeId: 1 },
    ]);
  });

  it("completes the cycle when the monitoring sweep fails", async () => {
    const { scheduler, work } = createScheduler();
    work.monitorActivePromotions.mockRejectedValue(new Error("Tool call failed: timeout"));

    await expect(scheduler.runCycleStep()).resolves.toBe("completed");

    expect(scheduler.errorHistory().map((e) => e.error)).toEqual(["monitorActivePromotions: Tool call failed: timeout"]);
    expect(scheduler.getStatus().cyclesCompleted).toBe(1);
  });

  it("keeps only the most recent errors", async () => {
    const { scheduler, work } = createScheduler({ targets: [T1] });
    let failures = 0;
    work.analyzeTarget.mockImplementation(async () => {
      failures++;
      throw new Error(`fail ${failures}`);
    });

    for (let i = 0; i < 105; i++) await scheduler.runCycleStep();

    const history = scheduler.errorHistory();
    expect(history).toHaveLength(100);
    expect(history[0]?.error).toBe("fail 6");
    expect(history[99]?.error).toBe("fail 105");

    const tail = scheduler.getStatus().errors;
    expect(tail).toHaveLength(10);
    expect(tail[0]?.error).toBe("fail 96");
  });

  it("waits between targets but not after the last one", async () => {
    const { scheduler, sleep } = createScheduler({
      settings: SchedulerSettingsSchema.parse({ interTargetDelayMs: 250 }),
    });

    await scheduler.runCycleStep();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([250, 250]);
  });
});

describe("CycleScheduler status", () => {
  it("shows the in-progress target as current while a run is active", async () => {
    const { scheduler, work } = createScheduler();
    const seen: ReturnType<CycleScheduler["getStatus"]>[] = [];
    work.analyzeTarget.mockImplementation(async (target) => {
      seen.push(scheduler.getStatus());
      return runSummary(target);
    });

    await scheduler.runCycleStep();

    expect(seen[0]).toMatchObject({
      phase: "advancing",
      inProgressTarget: T1,
      currentTarget: T1,
      nextTarget: T1,
      nextTargetAfterCurrent: T2,
    });
    expect(seen[2]).toMatchObject({ currentTarget: T3, nextTargetAfterCurrent: null });
  });

  it("falls back to the runtime tracker for the current target", () => {
    const { scheduler, tracker } = createScheduler({ autoStart: false });
    tracker.enter("monitor", { skuId: 7, storeId: 2, promotionId: 40 });

    expect(scheduler.getStatus()).toMatchObject({
      currentTarget: { skuId: 7, storeId: 2 },
      nextTarget: T1,
      nextTargetAfterCurrent: T1,
      currentAgent: "monitor",
      currentPromotionId: 40,
      currentAgentUpdatedAt: "2026-04-01T12:00:00.000Z",
    });
  });

  it("has no current target when idle", () => {
    const { scheduler } = createScheduler({ autoStart: false });
    expect(scheduler.getStatus()).toMatchObject({ currentTarget: null, nextTarget: T1, workerRunning: false });
  });
});

describe("CycleScheduler loop", () => {
  it("polls while paused and stops on shutdown", async () => {
    const { scheduler, sleep } = createScheduler({ autoStart: false });
    sleep.mockImplementation(async () => {
      if (sleep.mock.calls.length >= 3) scheduler.requestShutdown();
    });

    scheduler.launch();
    expect(scheduler.getStatus().workerRunning).toBe(true);
    await scheduler.awaitStopped();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000, 1000]);
    expect(scheduler.getStatus().workerRunning).toBe(false);
  });

  it("sleeps between cycles in pause-check slices", async () => {
    const { scheduler, sleep } = createScheduler({ targets: [T1], cycleIntervalMs: 2500 });
    sleep.mockImplementation(async () => {
      if (sleep.mock.calls.length >= 3) scheduler.requestShutdown();
    });

    scheduler.launch();
    await scheduler.awaitStopped();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000, 500]);
    expect(scheduler.getStatus().cyclesCompleted).toBe(1);
  });

  it("cuts the inter-cycle sleep short when paused", async () => {
    const { scheduler, sleep } = createScheduler({ targets: [T1] });
    sleep.mockImplementation(async () => {
      const call = sleep.mock.calls.length;
      if (call === 1) await scheduler.stop();
      if (call >= 2) scheduler.requestShutdown();
    });

    scheduler.launch();
    await scheduler.awaitStopped();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000]);
    expect(scheduler.phase()).toBe("paused");
  });

  it("records a loop error and backs off before retrying", async () => {
    const { scheduler, sleep, events } = createScheduler({ autoStart: false });
    vi.spyOn(scheduler, "runCycleStep").mockRejectedValueOnce(new Error("tick failed"));
    sleep.mockImplementation(async () => {
      if (sleep.mock.calls.length >= 2) scheduler.requestShutdown();
    });

    scheduler.launch();
    await scheduler.awaitStopped();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 1000]);
    expect(scheduler.errorHistory().map((e) => e.error)).toEqual(["tick failed"]);
    expect(events.map((e) => e.type)).toEqual(["scheduler_error"]);
  });

  it("keeps running when the event log fails", async () => {
    const { scheduler } = createScheduler({
      events: { append: vi.fn(async () => Promise.reject(new Error("disk full"))) },
    });

    await expect(scheduler.runCycleStep()).resolves.toBe("completed");
    expect(scheduler.getStatus().cyclesCompleted).toBe(1);
  });
});
