/**
 * Attack Surface Engine: Mitigation Planner
 *
 * Greedy selection: the ten highest-scoring assets are considered in rank
 * order and each one is admitted if its cost fits the budget still left.
 * A cheaper, lower-ranked asset is never preferred over an earlier one, so
 * the result is not a knapsack optimum.
 */
import { aggregateAttackSurface } from './aggregator.js';
import { DEFAULT_CATEGORY_CATALOG, resolveCategoryProfile } from './category-profiles.js';
import { ConfigurationError } from '../utils/errors.js';
import { round } from '../utils/round.js';
import type { CategoryCatalog } from './category-profiles.js';
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type { Asset, Mitigation, MitigationPlan, MitigationPriority } from '../models/attack-surface.js';

export const MAX_MITIGATION_CANDIDATES = 10;
export const DEFAULT_BUDGET = 100000;
/** EUR of avoided loss per point of risk reduction */
export const EUR_PER_RISK_POINT = 100000;

export interface MitigationPlanOptions {
  budget?: number;
  organizationalFactor?: number;
  catalog?: CategoryCatalog;
  /** Scores already computed for this graph and factor; aggregated here when omitted. */
  componentScores?: Record<string, number>;
}

export function estimateMitigationCost(
  asset: Pick<Asset, 'category' | 'cvssScore'>,
  catalog: CategoryCatalog = DEFAULT_CATEGORY_CATALOG,
): number {
  const { baseCost } = resolveCategoryProfile(asset.category, catalog);
  return Math.trunc(baseCost * (1 + asset.cvssScore / 10));
}

export function mitigationPriority(score: number): MitigationPriority {
  if (score > 0.8) return 'CRITICAL';
  if (score > 0.5) return 'HIGH';
  return 'MEDIUM';
}

export function rankCandidates(componentScores: Record<string, number>): Array<[string, number]> {
  return Object.entries(componentScores)
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_MITIGATION_CANDIDATES);
}

export function planMitigations(
  graph: InfrastructureGraph,
  options: MitigationPlanOptions = {},
): MitigationPlan {
  const budget = options.budget ?? DEFAULT_BUDGET;
  if (!Number.isFinite(budget) || budget < 0) {
    throw new ConfigurationError(`Budget must be a non-negative amount, got ${budget}`);
  }
  const catalog = options.catalog ?? DEFAULT_CATEGORY_CATALOG;
  const componentScores =
    options.componentScores ??
    aggregateAttackSurface(graph, options.organizationalFactor).componentScores;

  const candidates = rankCandidates(componentScores);
  const mitigations: Mitigation[] = [];
  let totalCost = 0;
  let totalRiskReduction = 0;

  for (const [assetId, score] of candidates) {
    const asset = graph.getAsset(assetId);
    const cost = estimateMitigationCost(asset, catalog);
    if (cost > budget - totalCost) continue;

    const profile = resolveCategoryProfile(asset.category, catalog);
    const riskReduction = score * profile.effectiveness;
    const roi = (riskReduction * EUR_PER_RISK_POINT) / cost;

    mitigations.push({
      assetId,
      category: asset.category,
      currentScore: round(score, 3),
      cost,
      riskReduction: round(riskReduction, 3),
      roi: round(roi, 2),
      recommendation: profile.recommendation,
      priority: mitigationPriority(score),
    });
    totalCost += cost;
    totalRiskReduction += riskReduction;
  }

  return {
    mitigations,
    candidatesEvaluated: candidates.length,
    totalCost,
    remainingBudget: budget - totalCost,
    totalRiskReduction: round(totalRiskReduction, 3),
    overallRoi: totalCost > 0 ? round((totalRiskReduction * EUR_PER_RISK_POINT) / totalCost, 2) : 0,
    budgetUtilization: budget > 0 ? round((totalCost / budget) * 100, 1) : 0,
  };
}
