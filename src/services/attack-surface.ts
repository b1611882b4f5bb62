/**
 * Attack Surface Analysis: Service
 *
 * Keeps registered infrastructures and generated reports in memory and runs
 * the engine over them. Each analysis reads one immutable graph snapshot.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { generateId } from '../utils/id.js';
import { clock } from '../utils/clock.js';
import { ConfigurationError, NotFoundError } from '../utils/errors.js';
import { AdjacencyGraph, parseInfrastructureYaml } from './infrastructure-graph.js';
import { explainAssetScore } from './node-scorer.js';
import { createCategoryCatalog } from './category-profiles.js';
import {
  DEFAULT_ANALYSIS_PARAMETERS,
  buildAttackSurfaceReport,
  resolveAnalysisParameters,
} from './report-builder.js';
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type {
  AnalysisParameters,
  AssetScoreBreakdown,
  AttackSurfaceReport,
  RegisteredInfrastructure,
  ReportHistoryEntry,
  ScenarioComparison,
} from '../models/attack-surface.js';

export interface ServiceSettings {
  analysisDefaults: AnalysisParameters;
  maxPathCutoff: number;
}

export interface AnalysisRequest {
  parameters?: unknown;
  categoryProfiles?: unknown;
}

const scenarioRequestsSchema = z
  .array(
    z.object({
      label: z.string().min(1).optional(),
      parameters: z.unknown().optional(),
    }),
  )
  .min(1, 'At least one scenario is required');

const SAMPLE_INFRASTRUCTURE_URL = new URL('../../data/sample-infrastructure.yaml', import.meta.url);

const DEFAULT_SETTINGS: ServiceSettings = {
  analysisDefaults: DEFAULT_ANALYSIS_PARAMETERS,
  maxPathCutoff: 8,
};

// In-memory stores
const infrastructures: Map<string, { record: RegisteredInfrastructure; graph: InfrastructureGraph }> = new Map();
const reports: Map<string, AttackSurfaceReport> = new Map();
const reportHistory: Map<string, ReportHistoryEntry[]> = new Map();
let settings: ServiceSettings = DEFAULT_SETTINGS;

export function configure(next: ServiceSettings): void {
  settings = next;
}

function lookup(infrastructureId: string): { record: RegisteredInfrastructure; graph: InfrastructureGraph } {
  const entry = infrastructures.get(infrastructureId);
  if (!entry) {
    throw new NotFoundError('Infrastructure', infrastructureId);
  }
  return entry;
}

function resolveParameters(input: unknown): AnalysisParameters {
  const parameters = resolveAnalysisParameters(input, settings.analysisDefaults);
  if (parameters.pathCutoff > settings.maxPathCutoff) {
    throw new ConfigurationError(
      `Path cutoff ${parameters.pathCutoff} exceeds the maximum of ${settings.maxPathCutoff}`,
    );
  }
  return parameters;
}

export function registerInfrastructure(input: unknown): RegisteredInfrastructure {
  const graph = AdjacencyGraph.from(input);
  const definition = graph.toDefinition();

  const record: RegisteredInfrastructure = {
    id: generateId('infra'),
    name: definition.name ?? 'Unnamed infrastructure',
    registeredAt: clock.isoNow(),
    assetCount: graph.assetCount,
    edgeCount: graph.edgeCount,
    definition,
  };
  infrastructures.set(record.id, { record, graph });

  console.info(
    `[attack-surface] registered "${record.name}" (${record.id}): ${record.assetCount} assets, ${record.edgeCount} edges`,
  );
  return record;
}

export function registerInfrastructureFromYaml(yamlContent: string): RegisteredInfrastructure {
  return registerInfrastructure(parseInfrastructureYaml(yamlContent));
}

export function registerSampleInfrastructure(): RegisteredInfrastructure {
  return registerInfrastructureFromYaml(readFileSync(SAMPLE_INFRASTRUCTURE_URL, 'utf8'));
}

export function listInfrastructures(): RegisteredInfrastructure[] {
  return Array.from(infrastructures.values(), (entry) => entry.record);
}

export function getInfrastructure(infrastructureId: string): RegisteredInfrastructure {
  return lookup(infrastructureId).record;
}

export function explainAsset(
  infrastructureId: string,
  assetId: string,
  organizationalFactor: number = settings.analysisDefaults.organizationalFactor,
): AssetScoreBreakdown {
  if (!Number.isFinite(organizationalFactor) || organizationalFactor <= 0) {
    throw new ConfigurationError(`Organizational factor must be positive, got ${organizationalFactor}`);
  }
  return explainAssetScore(lookup(infrastructureId).graph, assetId, organizationalFactor);
}

export function analyzeInfrastructure(
  infrastructureId: string,
  request: AnalysisRequest = {},
): AttackSurfaceReport {
  const { graph } = lookup(infrastructureId);
  const parameters = resolveParameters(request.parameters);
  const catalog = request.categoryProfiles === undefined
    ? undefined
    : createCategoryCatalog(request.categoryProfiles);

  const report: AttackSurfaceReport = {
    ...buildAttackSurfaceReport(graph, parameters, catalog),
    infrastructureId,
  };
  reports.set(report.id, report);

  const history = reportHistory.get(infrastructureId) ?? [];
  history.push({
    reportId: report.id,
    infrastructureId,
    generatedAt: report.generatedAt,
    totalScore: report.totalScore,
    riskLevel: report.riskLevel,
    criticalPathsFound: report.criticalPathsFound,
    mitigationCost: report.mitigationPlan.totalCost,
  });
  reportHistory.set(infrastructureId, history);

  console.info(
    `[attack-surface] report ${report.id} for ${infrastructureId}: score ${report.totalScore.toFixed(3)} (${report.riskLevel}), ` +
    `${report.criticalPathsFound} critical paths, ${report.mitigationPlan.mitigations.length} mitigations`,
  );
  return report;
}

/** Runs several parameter sets over the same graph; results are not stored. */
export function compareScenarios(infrastructureId: string, input: unknown): ScenarioComparison {
  const { graph } = lookup(infrastructureId);
  const parsed = scenarioRequestsSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZodIssues('Invalid scenarios', parsed.error.issues);
  }
  const scenarios = parsed.data;

  const results = scenarios.map((scenario, index) => {
    const parameters = resolveParameters(scenario.parameters);
    const report = buildAttackSurfaceReport(graph, parameters);
    return {
      label: scenario.label ?? `scenario-${index + 1}`,
      parameters,
      totalScore: report.totalScore,
      riskLevel: report.riskLevel,
      criticalPathsFound: report.criticalPathsFound,
      mitigationCount: report.mitigationPlan.mitigations.length,
      totalCost: report.mitigationPlan.totalCost,
      totalRiskReduction: report.mitigationPlan.totalRiskReduction,
      overallRoi: report.mitigationPlan.overallRoi,
    };
  });

  let lowest = results[0];
  let highest = results[0];
  for (const result of results) {
    if (result.totalScore < lowest.totalScore) lowest = result;
    if (result.totalScore > highest.totalScore) highest = result;
  }

  return {
    infrastructureId,
    scenarios: results,
    lowestRisk: lowest.label,
    highestRisk: highest.label,
  };
}

export function getReportHistory(infrastructureId: string): ReportHistoryEntry[] {
  lookup(infrastructureId);
  return [...(reportHistory.get(infrastructureId) ?? [])];
}

export function getReport(reportId: string): AttackSurfaceReport {
  const report = reports.get(reportId);
  if (!report) {
    throw new NotFoundError('Report', reportId);
  }
  return report;
}

/** Reset all state; used in tests */
export function _resetState(): void {
  infrastructures.clear();
  reports.clear();
  reportHistory.clear();
  settings = DEFAULT_SETTINGS;
}
