/**
 * Attack Surface Engine: Node Scorer
 *
 * score = V * exposure * amplification * organizationalFactor, where V is the
 * CVSS score normalized to [0, 1] and amplification multiplies (1 + alpha * P)
 * over every neighboring edge. Amplification is deliberately unbounded.
 */
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type { AssetScoreBreakdown } from '../models/attack-surface.js';

/** Calibrated lateral-movement amplification constant. */
export const AMPLIFICATION_ALPHA = 0.73;

export function normalizeSeverity(cvssScore: number): number {
  return Math.min(cvssScore / 10, 1);
}

export function amplificationFactor(graph: InfrastructureGraph, assetId: string): number {
  let factor = 1.0;
  for (const neighborId of graph.neighbors(assetId)) {
    factor *= 1 + AMPLIFICATION_ALPHA * graph.propagationProbability(assetId, neighborId);
  }
  return factor;
}

export function explainAssetScore(
  graph: InfrastructureGraph,
  assetId: string,
  organizationalFactor: number = 1.0,
): AssetScoreBreakdown {
  const asset = graph.getAsset(assetId);
  const normalizedSeverity = normalizeSeverity(asset.cvssScore);
  const amplification = amplificationFactor(graph, assetId);

  return {
    assetId,
    category: asset.category,
    normalizedSeverity,
    exposure: asset.exposure,
    amplificationFactor: amplification,
    organizationalFactor,
    score: normalizedSeverity * asset.exposure * amplification * organizationalFactor,
  };
}

export function scoreAsset(
  graph: InfrastructureGraph,
  assetId: string,
  organizationalFactor: number = 1.0,
): number {
  return explainAssetScore(graph, assetId, organizationalFactor).score;
}
