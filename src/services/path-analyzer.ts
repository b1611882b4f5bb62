/**
 * Attack Surface Engine: Path Analyzer
 *
 * Enumerates bounded simple paths from highly exposed assets to high-value
 * assets and keeps the ones whose compromise probability clears a threshold.
 *
 * The path space grows exponentially with branching factor up to `cutoff`.
 * Callers running this on dense graphs are expected to keep the cutoff small.
 */
import { normalizeSeverity } from './node-scorer.js';
import type { InfrastructureGraph } from './infrastructure-graph.js';
import type { AssetCategory, CriticalPath } from '../models/attack-surface.js';

export const DEFAULT_PATH_THRESHOLD = 0.7;
export const DEFAULT_PATH_CUTOFF = 5;
export const EXPOSED_SOURCE_THRESHOLD = 0.5;
export const HIGH_VALUE_CATEGORIES: ReadonlySet<AssetCategory> = new Set<AssetCategory>(['server', 'database']);

export interface PathAnalysisOptions {
  threshold?: number;
  cutoff?: number;
}

/**
 * Every simple path from source to target with at most `cutoff` edges.
 * Iterative DFS: one neighbor iterator per asset on the current path.
 */
export function enumerateSimplePaths(
  graph: InfrastructureGraph,
  source: string,
  target: string,
  cutoff: number = DEFAULT_PATH_CUTOFF,
): string[][] {
  if (cutoff < 1 || source === target) return [];

  const paths: string[][] = [];
  const path: string[] = [source];
  const onPath = new Set<string>(path);
  const frames: Array<Iterator<string>> = [graph.neighbors(source)[Symbol.iterator]()];

  while (frames.length > 0) {
    const next = frames[frames.length - 1].next();

    if (next.done) {
      frames.pop();
      const finished = path.pop();
      if (finished !== undefined) onPath.delete(finished);
      continue;
    }

    const neighborId = next.value;
    if (onPath.has(neighborId)) continue;

    if (neighborId === target) {
      paths.push([...path, target]);
      continue;
    }

    // path.length edges would be used once neighborId is appended
    if (path.length < cutoff) {
      path.push(neighborId);
      onPath.add(neighborId);
      frames.push(graph.neighbors(neighborId)[Symbol.iterator]());
    }
  }

  return paths;
}

export function pathProbability(graph: InfrastructureGraph, path: readonly string[]): number {
  let probability = 1.0;
  for (let i = 0; i < path.length - 1; i++) {
    probability *= graph.propagationProbability(path[i], path[i + 1]);
  }
  return probability;
}

/** Mean of normalized severity times exposure over the assets on the path. */
export function pathRisk(graph: InfrastructureGraph, path: readonly string[]): number {
  if (path.length === 0) return 0;
  let total = 0;
  for (const assetId of path) {
    const asset = graph.getAsset(assetId);
    total += normalizeSeverity(asset.cvssScore) * asset.exposure;
  }
  return total / path.length;
}

export function exposedAssets(graph: InfrastructureGraph): string[] {
  return Array.from(graph.assetIds()).filter(
    (id) => graph.getAsset(id).exposure > EXPOSED_SOURCE_THRESHOLD,
  );
}

export function highValueAssets(graph: InfrastructureGraph): string[] {
  return Array.from(graph.assetIds()).filter((id) =>
    HIGH_VALUE_CATEGORIES.has(graph.getAsset(id).category),
  );
}

export function findCriticalPaths(
  graph: InfrastructureGraph,
  options: PathAnalysisOptions = {},
): CriticalPath[] {
  const threshold = options.threshold ?? DEFAULT_PATH_THRESHOLD;
  const cutoff = options.cutoff ?? DEFAULT_PATH_CUTOFF;
  const sources = exposedAssets(graph);
  const sinks = highValueAssets(graph);
  const criticalPaths: CriticalPath[] = [];

  for (const source of sources) {
    for (const sink of sinks) {
      if (source === sink) continue;
      // An unreachable pair simply yields no paths.
      for (const path of enumerateSimplePaths(graph, source, sink, cutoff)) {
        const probability = pathProbability(graph, path);
        if (probability > threshold) {
          criticalPaths.push({ path, probability, riskScore: pathRisk(graph, path) });
        }
      }
    }
  }

  return criticalPaths.sort((a, b) => b.riskScore - a.riskScore);
}
