import { setTimeout as sleep } from "node:timers/promises";
import { createActor } from "xstate";
import { backoffDelay } from "@pricing/kit";
import { computeStatusTargets, type StatusTargets } from "../domain/status-targets.js";
import { formatTarget, type Target } from "../domain/targets.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { SchedulerSettings } from "../types/config.js";
import type { EventSink, EventType } from "../types/events.js";
import type { PricingWork } from "./pricing-runner.js";
import type { RuntimeSnapshot, RuntimeTracker } from "./runtime-tracker.js";
import { schedulerMachine, type SchedulerPhase } from "./scheduler-machine.js";

const log = logger.createChild("scheduler");

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves early (without throwing) when the signal aborts. */
export const abortableSleep: Sleeper = async (ms, signal) => {
  if (signal.aborted) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
};

export interface SchedulerError {
  error: string;
  timestamp: string;
  skuId?: number;
  storeId?: number;
}

export interface ControlResult {
  success: boolean;
  message: string;
}

/** paused: not running. idle: running without targets. interrupted: paused mid-cycle. */
export type CycleStepOutcome = "paused" | "idle" | "interrupted" | "completed";

export interface SchedulerStatus extends StatusTargets {
  running: boolean;
  workerRunning: boolean;
  phase: SchedulerPhase;
  lastRun: string | null;
  cyclesCompleted: number;
  nextTargetIndex: number;
  targetsInCycle: number;
  lastProcessedTarget: Target | null;
  inProgressTarget: Target | null;
  cycleStartedAt: string | null;
  /** Set while the loop is running but has nothing to process. */
  idleReason: string | null;
  currentAgent: string | null;
  currentSkuId: number | null;
  currentStoreId: number | null;
  currentPromotionId: number | null;
  currentAgentUpdatedAt: string | null;
  errors: SchedulerError[];
}

export interface CycleSchedulerDeps {
  targets: readonly Target[];
  work: PricingWork;
  tracker: RuntimeTracker;
  events: EventSink;
  settings: SchedulerSettings;
  /** Sleep between completed cycles. */
  cycleIntervalMs: number;
  autoStart: boolean;
  now?: () => Date;
  sleep?: Sleeper;
}

interface Cursor {
  nextIndex: number;
  inProgress: Target | null;
  lastProcessed: Target | null;
  cycleStartedAt: string | null;
}

/**
 * The single background loop: prices each target from a resumable cursor, sweeps the
 * active promotions once per full pass, then sleeps. Stopping pauses between targets and
 * keeps the cursor, so a restart continues with the target that would have run next.
 */
const NO_TARGETS_MESSAGE = "No agent targets configured.";

export class CycleScheduler {
  private readonly deps: CycleSchedulerDeps;
  private readonly now: () => Date;
  private readonly sleeper: Sleeper;
  private readonly targets: readonly Target[];
  private readonly actor = createActor(schedulerMachine, { input: {} });
  private readonly cursor: Cursor = { nextIndex: 0, inProgress: null, lastProcessed: null, cycleStartedAt: null };
  private errors: SchedulerError[] = [];
  private running: boolean;
  private shutdown = new AbortController();
  private loopPromise: Promise<void> | null = null;
  private idleReported = false;

  constructor(deps: CycleSchedulerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.sleeper = deps.sleep ?? abortableSleep;
    this.targets = [...deps.targets];
    this.running = deps.autoStart;
    this.actor.start();
  }

  // ---------------------------------------------------------------------------
  // Control
  // ---------------------------------------------------------------------------

  async start(): Promise<ControlResult> {
    if (this.targets.length === 0) {
      return { success: false, message: NO_TARGETS_MESSAGE };
    }
    if (this.running) {
      return { success: true, message: "Agent loop already running." };
    }
    this.running = true;
    log.info({ action: "start", nextTargetIndex: this.cursor.nextIndex }, "Agent loop started");
    await this.emit("agent_started", { nextTargetIndex: this.cursor.nextIndex });
    return { success: true, message: "Agent loop started." };
  }

  async stop(): Promise<ControlResult> {
    if (this.running) {
      this.running = false;
      log.info({ action: "stop", nextTargetIndex: this.cursor.nextIndex }, "Agent loop paused");
      await this.emit("agent_paused", { nextTargetIndex: this.cursor.nextIndex });
    }
    return { success: true, message: "Agent loop paused." };
  }

  isRunning(): boolean {
    return this.running;
  }

  // ---------------------------------------------------------------------------
  // Supervision
  // ---------------------------------------------------------------------------

  /** Starts the background loop; a second call while it is alive does nothing. */
  launch(): void {
    if (this.loopPromise) return;
    if (this.shutdown.signal.aborted) this.shutdown = new AbortController();
    this.loopPromise = this.loop()
      .catch((err) => {
        log.fatal({ action: "loop", err: errorMessage(err) }, "Scheduler loop died");
      })
      .finally(() => {
        this.loopPromise = null;
      });
  }

  requestShutdown(): void {
    this.running = false;
    this.shutdown.abort();
  }

  async awaitStopped(): Promise<void> {
    await this.loopPromise;
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  private async loop(): Promise<void> {
    const { settings } = this.deps;
    let consecutiveErrors = 0;
    log.info({ action: "loop", targets: this.targets.length, running: this.running }, "Scheduler loop started");

    while (!this.shutdown.signal.aborted) {
      try {
        const outcome = await this.runCycleStep();
        consecutiveErrors = 0;
        if (outcome === "paused") await this.wait(settings.pauseCheckMs);
        else if (outcome === "idle") await this.wait(settings.idlePollMs);
        else if (outcome === "completed") await this.sleepWhileRunning(this.deps.cycleIntervalMs);
      } catch (err) {
        consecutiveErrors++;
        this.recordError(err);
        log.error({ action: "loop", err: errorMessage(err), consecutiveErrors }, "Scheduler loop error");
        await this.emit("scheduler_error", { error: errorMessage(err), consecutiveErrors });
        await this.wait(backoffDelay(consecutiveErrors, settings.errorBackoffMs, settings.maxErrorBackoffMs));
      }
    }

    this.actor.send({ type: "PAUSE" });
    log.info({ action: "loop", nextTargetIndex: this.cursor.nextIndex }, "Scheduler loop stopped");
  }

  /**
   * One pass of the loop body without the closing sleep: the remaining targets from the
   * cursor, then the monitoring sweep and cycle bookkeeping once the cursor reaches the end.
   */
  async runCycleStep(): Promise<CycleStepOutcome> {
    if (!this.isActive()) {
      this.actor.send({ type: "PAUSE" });
      this.idleReported = false;
      return "paused";
    }
    if (this.targets.length === 0) {
      if (!this.idleReported) {
        log.warn({ action: "idle", pollMs: this.deps.settings.idlePollMs }, NO_TARGETS_MESSAGE);
        this.idleReported = true;
      }
      return "idle";
    }

    this.enterAdvancing();
    const total = this.targets.length;
    if (this.cursor.cycleStartedAt === null) {
      this.cursor.cycleStartedAt = this.now().toISOString();
      log.info({ action: "cycleStarted", targets: total }, "Agent cycle starting");
      await this.emit("cycle_started", { targets: total });
    }

    while (this.cursor.nextIndex < total) {
      if (!this.isActive()) return this.interrupt();

      const index = this.cursor.nextIndex;
      const target = this.targets[index];
      if (!target) break;
      await this.processTarget(target);
      this.cursor.lastProcessed = target;
      this.cursor.nextIndex = index + 1;
      this.cursor.inProgress = null;

      if (this.cursor.nextIndex < total && this.deps.settings.interTargetDelayMs > 0) {
        await this.wait(this.deps.settings.interTargetDelayMs);
      }
    }

    if (!this.isActive()) return this.interrupt();

    this.actor.send({ type: "TARGETS_DONE" });
    await this.sweepPromotions();
    await this.completeCycle();
    return "completed";
  }

  private async processTarget(target: Target): Promise<void> {
    this.cursor.inProgress = target;
    try {
      const summary = await this.deps.work.analyzeTarget(target);
      await this.emit("target_processed", { ...summary });
    } catch (err) {
      this.recordError(err, target);
      log.error({ action: "processTarget", target: formatTarget(target), err: errorMessage(err) }, "Pricing run failed");
    }
  }

  private async sweepPromotions(): Promise<void> {
    try {
      const summary = await this.deps.work.monitorActivePromotions();
      await this.emit("monitoring_completed", { ...summary });
    } catch (err) {
      this.recordError(new Error(`monitorActivePromotions: ${errorMessage(err)}`));
      log.error({ action: "monitoring", err: errorMessage(err) }, "Monitoring sweep failed");
    }
  }

  private async completeCycle(): Promise<void> {
    const finished = this.now();
    const startedAt = this.cursor.cycleStartedAt;
    const durationMs = startedAt === null ? 0 : finished.getTime() - Date.parse(startedAt);

    this.actor.send({ type: "CYCLE_COMPLETED", at: finished.toISOString() });
    this.cursor.nextIndex = 0;
    this.cursor.cycleStartedAt = null;
    this.cursor.inProgress = null;

    const { cyclesCompleted } = this.actor.getSnapshot().context;
    log.info({ action: "cycleCompleted", cyclesCompleted, durationMs }, "Agent cycle completed");
    await this.emit("cycle_completed", { cyclesCompleted, durationMs });
  }

  private interrupt(): CycleStepOutcome {
    this.actor.send({ type: "PAUSE" });
    log.info({ action: "interrupt", nextTargetIndex: this.cursor.nextIndex }, "Agent paused; cursor kept");
    return "interrupted";
  }

  private enterAdvancing(): void {
    const phase = this.phase();
    if (phase === "paused") this.actor.send({ type: "START" });
    else if (phase === "sleeping") this.actor.send({ type: "WAKE" });
  }

  private isActive(): boolean {
    return this.running && !this.shutdown.signal.aborted;
  }

  private wait(ms: number): Promise<void> {
    return this.sleeper(ms, this.shutdown.signal);
  }

  /** Sleeps in pauseCheckMs slices so a stop request lands within one slice. */
  private async sleepWhileRunning(totalMs: number): Promise<void> {
    const slice = this.deps.settings.pauseCheckMs;
    let elapsed = 0;
    while (elapsed < totalMs && this.isActive()) {
      const step = Math.min(slice, totalMs - elapsed);
      await this.wait(step);
      elapsed += step;
    }
  }

  private recordError(err: unknown, target?: Target): void {
    this.errors.push({
      error: errorMessage(err),
      timestamp: this.now().toISOString(),
      ...(target ? { skuId: target.skuId, storeId: target.storeId } : {}),
    });
    const limit = this.deps.settings.errorHistoryLimit;
    if (this.errors.length > limit) {
      this.errors = this.errors.slice(-limit);
    }
  }

  private async emit(type: EventType, data: Record<string, unknown>): Promise<void> {
    try {
      await this.deps.events.append({ type, timestamp: this.now().toISOString(), data });
    } catch (err) {
      log.warn({ action: "emit", type, err: errorMessage(err) }, "Event log append failed");
    }
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  phase(): SchedulerPhase {
    return this.actor.getSnapshot().value;
  }

  errorHistory(): readonly SchedulerError[] {
    return this.errors;
  }

  getStatus(): SchedulerStatus {
    const runtime: RuntimeSnapshot = this.deps.tracker.snapshot();
    const { cyclesCompleted, lastRunAt } = this.actor.getSnapshot().context;
    const { nextIndex, inProgress, lastProcessed, cycleStartedAt } = this.cursor;
    const tail = this.deps.settings.statusErrorTail;

    return {
      running: this.running,
      workerRunning: this.loopPromise !== null,
      phase: this.phase(),
      lastRun: lastRunAt,
      cyclesCompleted,
      nextTargetIndex: nextIndex,
      targetsInCycle: this.targets.length,
      lastProcessedTarget: lastProcessed ? { ...lastProcessed } : null,
      inProgressTarget: inProgress ? { ...inProgress } : null,
      cycleStartedAt,
      idleReason: this.running && this.targets.length === 0 ? NO_TARGETS_MESSAGE : null,
      ...computeStatusTargets(this.targets, nextIndex, inProgress, runtime),
      currentAgent: runtime.currentStage,
      currentSkuId: runtime.skuId,
      currentStoreId: runtime.storeId,
      currentPromotionId: runtime.promotionId,
      currentAgentUpdatedAt: runtime.updatedAt,
      errors: tail > 0 ? this.errors.slice(-tail) : [],
    };
  }
}
