import type { SafetyConfig } from "../config/config.js";
import type { AssetSnapshot, RuleName, RuleOutcome, SafetyVerdict } from "../core/types.js";

type Comparator = "min" | "max";

interface Rule {
  name: RuleName;
  comparator: Comparator;
  threshold: number;
  weight: number;
  read: (snapshot: AssetSnapshot) => number | null;
}

const clampScore = (value: number): number => Math.min(100, Math.max(0, value));

/**
 * Normalized margin of one observation against its threshold, 0-100.
 * Sitting exactly on the threshold scores 50; twice the margin scores 100.
 */
export const ruleScore = (comparator: Comparator, observed: number, threshold: number): number => {
  if (threshold === 0) {
    if (comparator === "min") {
      return observed >= 0 ? 100 : 0;
    }
    return observed <= 0 ? 100 : 0;
  }
  const ratio = observed / threshold;
  return clampScore(comparator === "min" ? 50 * ratio : 50 * (2 - ratio));
};

const isKnown = (value: number | null): value is number => value !== null && Number.isFinite(value);

/**
 * Scores a discovered asset against the configured safety rules. Every
 * enabled rule is evaluated so the audit trail is complete on rejection;
 * a missing observation fails its rule.
 */
export class AssetFilter {
  private readonly rules: Rule[];
  private readonly threshold: number;

  constructor(safety: SafetyConfig) {
    this.threshold = safety.safety_threshold;
    const weights = safety.rule_weights;
    const candidates: Array<Omit<Rule, "threshold" | "weight"> & { threshold: number | null }> = [
      {
        name: "min_liquidity",
        comparator: "min",
        threshold: safety.min_liquidity_usd,
        read: (snapshot) => snapshot.liquidityUsd
      },
      {
        name: "min_holders",
        comparator: "min",
        threshold: safety.min_holders,
        read: (snapshot) => snapshot.holders
      },
      {
        name: "max_top_holder_percent",
        comparator: "max",
        threshold: safety.max_top_holder_percent,
        read: (snapshot) => snapshot.topHolderPercent
      },
      {
        name: "min_pool_age",
        comparator: "min",
        threshold: safety.min_pool_age_seconds,
        read: (snapshot) => snapshot.poolAgeSeconds
      },
      {
        name: "max_pool_age",
        comparator: "max",
        threshold: safety.max_pool_age_seconds,
        read: (snapshot) => snapshot.poolAgeSeconds
      },
      {
        name: "min_safety_provider_score",
        comparator: "min",
        threshold: safety.min_safety_provider_score,
        read: (snapshot) => snapshot.safetyProviderScore
      }
    ];

    this.rules = [];
    for (const candidate of candidates) {
      if (candidate.threshold === null) {
        continue;
      }
      this.rules.push({ ...candidate, threshold: candidate.threshold, weight: weights[candidate.name] ?? 1 });
    }
  }

  evaluate(snapshot: AssetSnapshot): SafetyVerdict {
    const outcomes: RuleOutcome[] = this.rules.map((rule) => {
      const observed = rule.read(snapshot);
      if (!isKnown(observed)) {
        return { rule: rule.name, passed: false, observed: null, threshold: rule.threshold, score: 0 };
      }
      const passed = rule.comparator === "min" ? observed >= rule.threshold : observed <= rule.threshold;
      return {
        rule: rule.name,
        passed,
        observed,
        threshold: rule.threshold,
        score: ruleScore(rule.comparator, observed, rule.threshold)
      };
    });

    const score = this.composite(outcomes);
    const accepted = outcomes.every((outcome) => outcome.passed) && score >= this.threshold;
    return { accepted, score, rules: outcomes };
  }

  private composite(outcomes: RuleOutcome[]): number {
    let weighted = 0;
    let totalWeight = 0;
    outcomes.forEach((outcome, index) => {
      const weight = this.rules[index].weight;
      weighted += outcome.score * weight;
      totalWeight += weight;
    });
    if (totalWeight === 0) {
      return 100;
    }
    return Math.round((weighted / totalWeight) * 100) / 100;
  }
}

export const failedRules = (verdict: SafetyVerdict): RuleName[] =>
  verdict.rules.filter((outcome) => !outcome.passed).map((outcome) => outcome.rule);
