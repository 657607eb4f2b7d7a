import type { Target } from "./targets.js";

export interface StatusTargets {
  /** Cursor target: the one the loop will pick up next. */
  nextTarget: Target | null;
  /** In-progress target first, runtime tracker second. */
  currentTarget: Target | null;
  nextTargetAfterCurrent: Target | null;
}

function cursorTarget(targets: readonly Target[], index: number): Target | null {
  const target = index >= 0 && index < targets.length ? targets[index] : undefined;
  return target ? { ...target } : null;
}

/**
 * Resolve the current/next targets shown by /status.
 * With a target in progress the cursor still points at it, so "next after current" is index + 1.
 */
export function computeStatusTargets(
  targets: readonly Target[],
  nextIndex: number,
  inProgress: Target | null,
  runtime: { skuId: number | null; storeId: number | null },
): StatusTargets {
  const nextTarget = cursorTarget(targets, nextIndex);

  let currentTarget: Target | null = null;
  if (inProgress) {
    currentTarget = { ...inProgress };
  } else if (runtime.skuId !== null && runtime.storeId !== null) {
    currentTarget = { skuId: runtime.skuId, storeId: runtime.storeId };
  }

  const nextTargetAfterCurrent = inProgress ? cursorTarget(targets, nextIndex + 1) : nextTarget;

  return { nextTarget, currentTarget, nextTargetAfterCurrent };
}
