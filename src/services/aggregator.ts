/**
 * Attack Surface Engine: Aggregator
 */
import { scoreAsset } from './node-scorer.js';
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type { AttackSurfaceAggregate, RiskLevel } from '../models/attack-surface.js';

/** Lower bounds of each level; intervals are closed-open. */
const RISK_LEVEL_THRESHOLDS: ReadonlyArray<[number, RiskLevel]> = [
  [600, 'CRITICAL'],
  [300, 'HIGH'],
  [100, 'MEDIUM'],
];

export function aggregateAttackSurface(
  graph: InfrastructureGraph,
  organizationalFactor: number = 1.0,
): AttackSurfaceAggregate {
  // Own data properties for every id, `__proto__` included.
  const componentScores: Record<string, number> = Object.fromEntries(
    Array.from(graph.assetIds(), (assetId): [string, number] => [assetId, scoreAsset(graph, assetId, organizationalFactor)]),
  );

  // Summed in the map's own key order so the total matches a sum over its values.
  const totalScore = Object.values(componentScores).reduce((sum, score) => sum + score, 0);

  return { totalScore, componentScores };
}

export function classifyRiskLevel(totalScore: number): RiskLevel {
  for (const [lowerBound, level] of RISK_LEVEL_THRESHOLDS) {
    if (totalScore >= lowerBound) return level;
  }
  return 'LOW';
}

/** Share of the total, as a percentage; 0 when the total is 0. */
export function percentOfTotal(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}
