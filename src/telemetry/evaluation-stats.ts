/**
 * Evaluation Statistics
 *
 * Counters filled in by the evaluator when a stats sink is passed in its
 * options. One sink may be shared across calls to aggregate a whole run.
 *
 * @module telemetry/evaluation-stats
 */

export interface EvaluationStats {
  /** Messages produced by an update rule */
  computed: number;
  /** Valid inbound messages used without recomputation */
  reused: number;
  /** Depth-budget fallbacks stored */
  fallbacks: number;
  /** Rule invocations by rule name */
  rules: Record<string, number>;
}

export function createEvaluationStats(): EvaluationStats {
  return { computed: 0, reused: 0, fallbacks: 0, rules: {} };
}

export function recordRule(stats: EvaluationStats, rule: string): void {
  stats.computed++;
  stats.rules[rule] = (stats.rules[rule] ?? 0) + 1;
}
