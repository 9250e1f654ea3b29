import type {
  FreshnessResult,
  FreshnessStatus,
  IntegrityResult,
  IntegrityStatus,
  OverallStatus,
  RetentionResult,
  RetentionStatus
} from '../types.js';

/**
 * Point allocation behind the health score. The 3/2/3 split and the 0.8/0.5
 * cut-offs are kept for compatibility with existing dashboards; they are a
 * tunable heuristic.
 */
export type ScoringPolicy = {
  freshness: Record<FreshnessStatus, number>;
  dailyRetention: Record<RetentionStatus, number>;
  integrity: Record<IntegrityStatus, number>;
  thresholds: {
    healthyAbove: number;
    warningAbove: number;
  };
};

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  freshness: { healthy: 3, stale: 1, missing: 0 },
  dailyRetention: { healthy: 2, warning: 1, critical: 0 },
  integrity: { healthy: 3, degraded: 1, missing: 0, error: 0 },
  thresholds: {
    healthyAbove: 0.8,
    warningAbove: 0.5
  }
};

export type ScoreInputs = {
  freshness: FreshnessResult;
  dailyRetention: RetentionResult;
  integrity: IntegrityResult;
};

export type HealthScore = {
  points: number;
  maxPoints: number;
  healthScore: number;
  overallStatus: OverallStatus;
};

function maxOf(values: Record<string, number>): number {
  return Math.max(0, ...Object.values(values));
}

export function maxPoints(policy: ScoringPolicy = DEFAULT_SCORING_POLICY): number {
  return maxOf(policy.freshness) + maxOf(policy.dailyRetention) + maxOf(policy.integrity);
}

export function classifyScore(
  healthScore: number,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): OverallStatus {
  if (healthScore > policy.thresholds.healthyAbove) {
    return 'healthy';
  }
  if (healthScore > policy.thresholds.warningAbove) {
    return 'warning';
  }
  return 'critical';
}

export function scoreHealth(
  inputs: ScoreInputs,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): HealthScore {
  const points =
    policy.freshness[inputs.freshness.status] +
    policy.dailyRetention[inputs.dailyRetention.status] +
    policy.integrity[inputs.integrity.status];
  const total = maxPoints(policy);
  const healthScore = total > 0 ? Math.min(1, Math.max(0, points / total)) : 0;

  return {
    points,
    maxPoints: total,
    healthScore,
    overallStatus: classifyScore(healthScore, policy)
  };
}
