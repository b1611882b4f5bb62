/**
 * Attack Surface Engine: Types
 */

export type KnownAssetCategory = 'pos' | 'server' | 'network' | 'iot' | 'database';

/** Categories are an open set; anything outside the known ones uses the default profile. */
export type AssetCategory = KnownAssetCategory | (string & {});

export interface Asset {
  id: string;
  category: AssetCategory;
  cvssScore: number; // 0-10
  exposure: number; // 0-1, likelihood of being reachable from outside
  privileges: Record<string, number>;
  services: string[];
}

export interface PropagationEdge {
  source: string;
  target: string;
  propagationProbability?: number;
}

export interface InfrastructureDefinition {
  name?: string;
  assets: Asset[];
  edges: PropagationEdge[];
}

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface AttackSurfaceAggregate {
  totalScore: number;
  componentScores: Record<string, number>;
}

export interface AssetScoreBreakdown {
  assetId: string;
  category: AssetCategory;
  normalizedSeverity: number;
  exposure: number;
  amplificationFactor: number;
  organizationalFactor: number;
  score: number;
}

export interface CriticalPath {
  path: string[];
  probability: number;
  riskScore: number;
}

export interface CategoryProfile {
  baseCost: number;
  effectiveness: number;
  recommendation: string;
}

export type MitigationPriority = 'CRITICAL' | 'HIGH' | 'MEDIUM';

export interface Mitigation {
  assetId: string;
  category: AssetCategory;
  currentScore: number;
  cost: number;
  riskReduction: number;
  roi: number;
  recommendation: string;
  priority: MitigationPriority;
}

export interface MitigationPlan {
  mitigations: Mitigation[];
  candidatesEvaluated: number;
  totalCost: number;
  remainingBudget: number;
  totalRiskReduction: number;
  overallRoi: number;
  budgetUtilization: number; // percent
}

export interface CategoryStatistics {
  count: number;
  meanScore: number;
  maxScore: number;
  contributionPercent: number;
}

export interface AnalysisParameters {
  organizationalFactor: number;
  pathThreshold: number;
  pathCutoff: number;
  budget: number;
}

export interface AttackSurfaceReport {
  id: string;
  infrastructureId?: string;
  generatedAt: string;
  parameters: AnalysisParameters;
  totalScore: number;
  riskLevel: RiskLevel;
  componentsAnalyzed: number;
  componentScores: Record<string, number>;
  criticalPathsFound: number;
  criticalPaths: CriticalPath[];
  topCriticalPaths: CriticalPath[];
  componentDistribution: Record<string, CategoryStatistics>;
  topVulnerableComponents: Array<{ assetId: string; score: number }>;
  mitigationPlan: MitigationPlan;
}

export interface RegisteredInfrastructure {
  id: string;
  name: string;
  registeredAt: string;
  assetCount: number;
  edgeCount: number;
  definition: InfrastructureDefinition;
}

export interface ReportHistoryEntry {
  reportId: string;
  infrastructureId: string;
  generatedAt: string;
  totalScore: number;
  riskLevel: RiskLevel;
  criticalPathsFound: number;
  mitigationCost: number;
}

export interface ScenarioComparison {
  infrastructureId: string;
  scenarios: Array<{
    label: string;
    parameters: AnalysisParameters;
    totalScore: number;
    riskLevel: RiskLevel;
    criticalPathsFound: number;
    mitigationCount: number;
    totalCost: number;
    totalRiskReduction: number;
    overallRoi: number;
  }>;
  lowestRisk: string;
  highestRisk: string;
}
