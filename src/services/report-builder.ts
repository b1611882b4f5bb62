/**
 * Attack Surface Engine: Report Builder
 *
 * Runs aggregation, path analysis and mitigation planning once each over the
 * same graph and merges their output with per-category statistics.
 */
import { z } from 'zod';
import { aggregateAttackSurface, classifyRiskLevel, percentOfTotal } from './aggregator.js';
import { DEFAULT_PATH_CUTOFF, DEFAULT_PATH_THRESHOLD, findCriticalPaths } from './path-analyzer.js';
import { DEFAULT_BUDGET, planMitigations } from './mitigation-planner.js';
import { ConfigurationError } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import { clock } from '../utils/clock.js';
import { round } from '../utils/round.js';
import type { CategoryCatalog } from './category-profiles.js';
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type {
  AnalysisParameters,
  AttackSurfaceReport,
  CategoryStatistics,
} from '../models/attack-surface.js';

export const TOP_CRITICAL_PATHS = 5;
export const TOP_VULNERABLE_COMPONENTS = 10;

export const DEFAULT_ANALYSIS_PARAMETERS: AnalysisParameters = {
  organizationalFactor: 1.0,
  pathThreshold: DEFAULT_PATH_THRESHOLD,
  pathCutoff: DEFAULT_PATH_CUTOFF,
  budget: DEFAULT_BUDGET,
};

const analysisParametersSchema = z
  .object({
    organizationalFactor: z.number().positive().finite(),
    pathThreshold: z.number().positive().finite(),
    pathCutoff: z.number().int().min(1),
    budget: z.number().min(0).finite(),
  })
  .partial()
  .strict();

/** Fills missing parameters from `defaults` and rejects out-of-range ones. */
export function resolveAnalysisParameters(
  input: unknown = {},
  defaults: AnalysisParameters = DEFAULT_ANALYSIS_PARAMETERS,
): AnalysisParameters {
  const result = analysisParametersSchema.safeParse(input ?? {});
  if (!result.success) {
    throw ConfigurationError.fromZodIssues('Invalid analysis parameters', result.error.issues);
  }
  return {
    organizationalFactor: result.data.organizationalFactor ?? defaults.organizationalFactor,
    pathThreshold: result.data.pathThreshold ?? defaults.pathThreshold,
    pathCutoff: result.data.pathCutoff ?? defaults.pathCutoff,
    budget: result.data.budget ?? defaults.budget,
  };
}

export function summarizeByCategory(
  graph: InfrastructureGraph,
  componentScores: Record<string, number>,
  totalScore: number,
): Record<string, CategoryStatistics> {
  const scoresByCategory = new Map<string, number[]>();
  for (const [assetId, score] of Object.entries(componentScores)) {
    const { category } = graph.getAsset(assetId);
    const scores = scoresByCategory.get(category) ?? [];
    scores.push(score);
    scoresByCategory.set(category, scores);
  }

  return Object.fromEntries(
    Array.from(scoresByCategory, ([category, scores]): [string, CategoryStatistics] => {
      const sum = scores.reduce((acc, s) => acc + s, 0);
      return [
        category,
        {
          count: scores.length,
          meanScore: round(sum / scores.length, 3),
          maxScore: round(Math.max(...scores), 3),
          contributionPercent: round(percentOfTotal(sum, totalScore), 1),
        },
      ];
    }),
  );
}

export function buildAttackSurfaceReport(
  graph: InfrastructureGraph,
  overrides: Partial<AnalysisParameters> = {},
  catalog?: CategoryCatalog,
): AttackSurfaceReport {
  const parameters = resolveAnalysisParameters(overrides);
  const { totalScore, componentScores } = aggregateAttackSurface(graph, parameters.organizationalFactor);
  const criticalPaths = findCriticalPaths(graph, {
    threshold: parameters.pathThreshold,
    cutoff: parameters.pathCutoff,
  });
  const mitigationPlan = planMitigations(graph, {
    budget: parameters.budget,
    componentScores,
    catalog,
  });

  const topVulnerableComponents = Object.entries(componentScores)
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_VULNERABLE_COMPONENTS)
    .map(([assetId, score]) => ({ assetId, score }));

  return {
    id: generateId('report'),
    generatedAt: clock.isoNow(),
    parameters,
    totalScore,
    riskLevel: classifyRiskLevel(totalScore),
    componentsAnalyzed: Object.keys(componentScores).length,
    componentScores,
    criticalPathsFound: criticalPaths.length,
    criticalPaths,
    topCriticalPaths: criticalPaths.slice(0, TOP_CRITICAL_PATHS),
    componentDistribution: summarizeByCategory(graph, componentScores, totalScore),
    topVulnerableComponents,
    mitigationPlan,
  };
}
