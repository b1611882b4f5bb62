/**
 * Beast Tests: Mitigation Planner
 *
 * Category cost and effectiveness lookups, greedy admission under a budget,
 * candidate cap, ROI, priority tiers and plan totals.
 */
import { describe, it, expect } from 'vitest';
import {
  MAX_MITIGATION_CANDIDATES,
  estimateMitigationCost,
  mitigationPriority,
  planMitigations,
} from '../../src/services/mitigation-planner.js';
import {
  DEFAULT_CATEGORY_PROFILE,
  createCategoryCatalog,
  resolveCategoryProfile,
} from '../../src/services/category-profiles.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { asset, graphOf } from './helpers.js';

// Isolated assets: every score is normalized severity x exposure.
function rankedGraph() {
  return graphOf([
    asset('vault', 'database', 10, 1), // score 1.0, cost 16000
    asset('sensor', 'iot', 10, 0.9), // score 0.9, cost 400
    asset('web', 'server', 10, 0.6), // score 0.6, cost 10000
    asset('till', 'pos', 10, 0.5), // score 0.5, cost 1000
  ]);
}

describe('Mitigation Planner', () => {
  // ─── Category Lookups ────────────────────────────────────────

  it('Beast M.1 - should scale the base cost by severity and truncate', () => {
    expect(estimateMitigationCost({ category: 'database', cvssScore: 10 })).toBe(16000);
    expect(estimateMitigationCost({ category: 'pos', cvssScore: 0 })).toBe(500);
    expect(estimateMitigationCost({ category: 'server', cvssScore: 5 })).toBe(7500);
    expect(estimateMitigationCost({ category: 'network', cvssScore: 5 })).toBe(4500);
    expect(estimateMitigationCost({ category: 'iot', cvssScore: 5 })).toBe(300);
    expect(estimateMitigationCost({ category: 'database', cvssScore: 8.2 })).toBe(14559);
  });

  it('Beast M.2 - unknown categories should fall back to the default profile', () => {
    expect(estimateMitigationCost({ category: 'printer', cvssScore: 5 })).toBe(1500);
    expect(resolveCategoryProfile('printer')).toEqual(DEFAULT_CATEGORY_PROFILE);
    expect(resolveCategoryProfile('constructor')).toEqual(DEFAULT_CATEGORY_PROFILE);
    expect(DEFAULT_CATEGORY_PROFILE.effectiveness).toBe(0.7);
  });

  it('Beast M.3 - effectiveness should follow the category table', () => {
    expect(resolveCategoryProfile('pos').effectiveness).toBe(0.7);
    expect(resolveCategoryProfile('server').effectiveness).toBe(0.8);
    expect(resolveCategoryProfile('network').effectiveness).toBe(0.85);
    expect(resolveCategoryProfile('iot').effectiveness).toBe(0.6);
    expect(resolveCategoryProfile('database').effectiveness).toBe(0.9);
  });

  it('Beast M.4 - priority tiers should use strict thresholds', () => {
    expect(mitigationPriority(0.81)).toBe('CRITICAL');
    expect(mitigationPriority(0.8)).toBe('HIGH');
    expect(mitigationPriority(0.51)).toBe('HIGH');
    expect(mitigationPriority(0.5)).toBe('MEDIUM');
    expect(mitigationPriority(0)).toBe('MEDIUM');
  });

  // ─── Greedy Admission ────────────────────────────────────────

  it('Beast M.5 - a budget of 0 should select nothing and report zero ROI', () => {
    const plan = planMitigations(rankedGraph(), { budget: 0 });

    expect(plan.mitigations).toEqual([]);
    expect(plan.totalCost).toBe(0);
    expect(plan.overallRoi).toBe(0);
    expect(plan.budgetUtilization).toBe(0);
    expect(plan.totalRiskReduction).toBe(0);
    expect(plan.candidatesEvaluated).toBe(4);
  });

  it('Beast M.6 - candidates should be admitted in rank order while they fit', () => {
    const plan = planMitigations(rankedGraph(), { budget: 16500 });

    // vault (16000) fits, sensor (400) fits the remaining 500, the rest do not
    expect(plan.mitigations.map((m) => m.assetId)).toEqual(['vault', 'sensor']);
    expect(plan.totalCost).toBe(16400);
    expect(plan.remainingBudget).toBe(100);
    expect(plan.budgetUtilization).toBe(99.4);
  });

  it('Beast M.7 - a cheaper lower-ranked candidate should not displace an earlier one', () => {
    const plan = planMitigations(rankedGraph(), { budget: 1200 });

    // vault is skipped, sensor admitted, till (1000) no longer fits the remaining 800
    expect(plan.mitigations.map((m) => m.assetId)).toEqual(['sensor']);
    expect(plan.totalCost).toBe(400);
  });

  it('Beast M.8 - should compute risk reduction, ROI, priority and recommendation per mitigation', () => {
    const plan = planMitigations(rankedGraph(), { budget: 100000 });
    const [vault, sensor, web, till] = plan.mitigations;

    expect(plan.mitigations).toHaveLength(4);
    expect(vault).toMatchObject({
      assetId: 'vault',
      category: 'database',
      currentScore: 1,
      cost: 16000,
      riskReduction: 0.9,
      priority: 'CRITICAL',
      recommendation: 'Encryption at rest and in transit, access control, audit logging',
    });
    expect(vault.roi).toBeCloseTo(5.625, 1);
    expect(sensor).toMatchObject({ cost: 400, riskReduction: 0.54, roi: 135, priority: 'CRITICAL' });
    expect(web).toMatchObject({ cost: 10000, riskReduction: 0.48, roi: 4.8, priority: 'HIGH' });
    expect(till).toMatchObject({ cost: 1000, riskReduction: 0.35, roi: 35, priority: 'MEDIUM' });
  });

  it('Beast M.9 - plan totals should aggregate admitted mitigations', () => {
    const plan = planMitigations(rankedGraph(), { budget: 100000 });

    expect(plan.totalCost).toBe(27400);
    expect(plan.remainingBudget).toBe(72600);
    expect(plan.totalRiskReduction).toBe(2.27);
    expect(plan.overallRoi).toBe(8.28);
    expect(plan.budgetUtilization).toBe(27.4);
  });

  it('Beast M.10 - total cost should never exceed the budget', () => {
    const graph = rankedGraph();

    for (const budget of [0, 100, 399, 400, 1000, 5000, 11400, 16000, 27399, 27400, 1e6]) {
      const plan = planMitigations(graph, { budget });
      expect(plan.totalCost).toBeLessThanOrEqual(budget);
      expect(plan.totalCost).toBe(plan.mitigations.reduce((sum, m) => sum + m.cost, 0));
    }
  });

  it('Beast M.11 - no more than 10 candidates should ever be evaluated', () => {
    const sensors = Array.from({ length: 15 }, (_, i) => asset(`sensor_${i}`, 'iot', 5, 0.3 + i * 0.04));
    const plan = planMitigations(graphOf(sensors), { budget: 1e9 });

    expect(MAX_MITIGATION_CANDIDATES).toBe(10);
    expect(plan.candidatesEvaluated).toBe(10);
    expect(plan.mitigations).toHaveLength(10);
    // the five least exposed sensors rank last and are never considered
    expect(plan.mitigations.map((m) => m.assetId)).not.toContain('sensor_0');
    expect(plan.mitigations[0].assetId).toBe('sensor_14');
  });

  it('Beast M.12 - the organizational factor should flow into scores and tiers', () => {
    const graph = graphOf([asset('till', 'pos', 10, 0.5)]);

    expect(planMitigations(graph, { budget: 5000 }).mitigations[0].priority).toBe('MEDIUM');
    expect(planMitigations(graph, { budget: 5000, organizationalFactor: 2 }).mitigations[0]).toMatchObject({
      currentScore: 1,
      priority: 'CRITICAL',
    });
  });

  // ─── Custom Catalogs & Errors ────────────────────────────────

  it('Beast M.13 - a custom catalog should override costs and effectiveness', () => {
    const catalog = createCategoryCatalog({
      iot: { baseCost: 50, effectiveness: 0.5, recommendation: 'Replace the device' },
      printer: { baseCost: 100, effectiveness: 0.4, recommendation: 'Isolate the print VLAN' },
    });
    const graph = graphOf([asset('sensor', 'iot', 10, 1), asset('hp', 'printer', 0, 1), asset('vault', 'database', 10, 0.1)]);
    const plan = planMitigations(graph, { budget: 100000, catalog });

    expect(plan.mitigations.map((m) => [m.assetId, m.cost, m.recommendation])).toEqual([
      ['sensor', 100, 'Replace the device'],
      ['vault', 16000, 'Encryption at rest and in transit, access control, audit logging'],
      ['hp', 100, 'Isolate the print VLAN'],
    ]);
    expect(plan.mitigations[0].riskReduction).toBe(0.5);
  });

  it('Beast M.14 - invalid catalog entries should be rejected', () => {
    expect(() => createCategoryCatalog({ iot: { baseCost: 0, effectiveness: 0.5, recommendation: 'x' } })).toThrow(
      ConfigurationError,
    );
    expect(() => createCategoryCatalog({ iot: { baseCost: 10, effectiveness: 1.5, recommendation: 'x' } })).toThrow(
      ConfigurationError,
    );
  });

  it('Beast M.15 - a negative budget should be a configuration error', () => {
    expect(() => planMitigations(rankedGraph(), { budget: -1 })).toThrow(ConfigurationError);
  });

  it('Beast M.16 - an empty graph should produce an empty plan', () => {
    const plan = planMitigations(graphOf([]));

    expect(plan).toEqual({
      mitigations: [],
      candidatesEvaluated: 0,
      totalCost: 0,
      remainingBudget: 100000,
      totalRiskReduction: 0,
      overallRoi: 0,
      budgetUtilization: 0,
    });
  });
});
