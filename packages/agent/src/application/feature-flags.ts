import type { FeatureFlags } from "../types/config.js";

/**
 * Live feature flags. Each graph run takes a snapshot at its start, so an update
 * lands on the next run and never changes routing halfway through one.
 */
export class FeatureFlagStore {
  private flags: FeatureFlags;

  constructor(initial: FeatureFlags) {
    this.flags = { ...initial };
  }

  snapshot(): FeatureFlags {
    return { ...this.flags };
  }

  update(patch: Partial<FeatureFlags>): FeatureFlags {
    const current = this.flags;
    this.flags = {
      enableDecisionLearning: patch.enableDecisionLearning ?? current.enableDecisionLearning,
      enableOptimizationLoop: patch.enableOptimizationLoop ?? current.enableOptimizationLoop,
      enableMultiCritic: patch.enableMultiCritic ?? current.enableMultiCritic,
      enableApprovalLearning: patch.enableApprovalLearning ?? current.enableApprovalLearning,
    };
    return this.snapshot();
  }
}
