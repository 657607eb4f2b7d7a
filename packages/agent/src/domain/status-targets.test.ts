import { describe, it, expect } from "vitest";
import { computeStatusTargets } from "./status-targets.js";
import type { Target } from "./targets.js";

const targets: Target[] = [
  { skuId: 1, storeId: 1 },
  { skuId: 2, storeId: 1 },
  { skuId: 3, storeId: 1 },
];
const noRuntime = { skuId: null, storeId: null };

describe("computeStatusTargets", () => {
  it("idle at the start of a cycle: no current, next is the cursor target", () => {
    expect(computeStatusTargets(targets, 0, null, noRuntime)).toEqual({
      nextTarget: { skuId: 1, storeId: 1 },
      currentTarget: null,
      nextTargetAfterCurrent: { skuId: 1, storeId: 1 },
    });
  });

  it("in-progress target is current and the following one is next", () => {
    const result = computeStatusTargets(targets, 0, { skuId: 1, storeId: 1 }, noRuntime);
    expect(result.currentTarget).toEqual({ skuId: 1, storeId: 1 });
    expect(result.nextTargetAfterCurrent).toEqual({ skuId: 2, storeId: 1 });
  });

  it("last target in progress has nothing after it", () => {
    const result = computeStatusTargets(targets, 2, { skuId: 3, storeId: 1 }, noRuntime);
    expect(result.currentTarget).toEqual({ skuId: 3, storeId: 1 });
    expect(result.nextTargetAfterCurrent).toBeNull();
  });

  it("empty target list resolves everything to null", () => {
    expect(computeStatusTargets([], 0, null, noRuntime)).toEqual({
      nextTarget: null,
      currentTarget: null,
      nextTargetAfterCurrent: null,
    });
  });

  it("falls back to the runtime tracker when nothing is in progress", () => {
    const result = computeStatusTargets(targets, 1, null, { skuId: 9, storeId: 4 });
    expect(result.currentTarget).toEqual({ skuId: 9, storeId: 4 });
    expect(result.nextTargetAfterCurrent).toEqual({ skuId: 2, storeId: 1 });
  });

  it("prefers the in-progress target over the runtime tracker", () => {
    const result = computeStatusTargets(targets, 1, { skuId: 2, storeId: 1 }, { skuId: 9, storeId: 4 });
    expect(result.currentTarget).toEqual({ skuId: 2, storeId: 1 });
  });

  it("ignores a half-set runtime target", () => {
    const result = computeStatusTargets(targets, 0, null, { skuId: 9, storeId: null });
    expect(result.currentTarget).toBeNull();
  });

  it("cursor past the end has no next target", () => {
    expect(computeStatusTargets(targets, 3, null, noRuntime).nextTarget).toBeNull();
  });
});
