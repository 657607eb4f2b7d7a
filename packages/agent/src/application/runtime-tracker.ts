export interface RuntimeSnapshot {
  currentStage: string | null;
  skuId: number | null;
  storeId: number | null;
  promotionId: number | null;
  updatedAt: string | null;
}

export interface RuntimeIds {
  skuId?: number | null;
  storeId?: number | null;
  promotionId?: number | null;
}

const IDLE: RuntimeSnapshot = Object.freeze({
  currentStage: null,
  skuId: null,
  storeId: null,
  promotionId: null,
  updatedAt: null,
});

/**
 * "What is executing now" register. Writers replace the whole snapshot in one
 * assignment, so readers never see a stage name paired with another target's ids.
 */
export class RuntimeTracker {
  private current: RuntimeSnapshot = IDLE;
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  enter(stage: string, ids: RuntimeIds = {}): void {
    this.current = Object.freeze({
      currentStage: stage,
      skuId: ids.skuId ?? null,
      storeId: ids.storeId ?? null,
      promotionId: ids.promotionId ?? null,
      updatedAt: this.now().toISOString(),
    });
  }

  clear(): void {
    this.current = IDLE;
  }

  snapshot(): RuntimeSnapshot {
    return this.current;
  }
}
