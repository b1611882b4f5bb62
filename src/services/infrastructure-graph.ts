/**
 * Attack Surface Engine: Infrastructure Graph Model
 *
 * Assets are nodes, propagation edges are undirected and weighted by the
 * likelihood that compromising one endpoint helps an attacker reach the other.
 * Scoring and path analysis only see the InfrastructureGraph interface.
 */
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, NotFoundError } from '../utils/errors.js';
import type { Asset, InfrastructureDefinition, PropagationEdge } from '../models/attack-surface.js';

export const DEFAULT_PROPAGATION_PROBABILITY = 0.1;

export interface InfrastructureGraph {
  readonly assetCount: number;
  readonly edgeCount: number;
  assetIds(): Iterable<string>;
  hasAsset(assetId: string): boolean;
  getAsset(assetId: string): Readonly<Asset>;
  neighbors(assetId: string): Iterable<string>;
  /** Probability on the edge between two assets, or the default when the edge carries none. */
  propagationProbability(from: string, to: string): number;
}

const assetSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  cvssScore: z.number().min(0).max(10),
  exposure: z.number().min(0).max(1),
  privileges: z.record(z.string(), z.number().min(0).max(1)).default({}),
  services: z.array(z.string()).default([]),
});

const edgeSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  propagationProbability: z.number().gt(0).max(1).optional(),
});

export const infrastructureDefinitionSchema = z
  .object({
    name: z.string().optional(),
    assets: z.array(assetSchema),
    edges: z.array(edgeSchema).default([]),
  })
  .superRefine((definition, ctx) => {
    const seen = new Set<string>();
    definition.assets.forEach((asset, index) => {
      if (seen.has(asset.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['assets', index, 'id'],
          message: `Duplicate asset id "${asset.id}"`,
        });
      }
      seen.add(asset.id);
    });

    definition.edges.forEach((edge, index) => {
      for (const endpoint of ['source', 'target'] as const) {
        if (!seen.has(edge[endpoint])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['edges', index, endpoint],
            message: `Unknown asset "${edge[endpoint]}"`,
          });
        }
      }
      if (edge.source === edge.target) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['edges', index],
          message: `Self-loop on "${edge.source}"`,
        });
      }
    });
  });

/** Adjacency-map graph; immutable after construction. */
export class AdjacencyGraph implements InfrastructureGraph {
  private readonly assets = new Map<string, Readonly<Asset>>();
  private readonly adjacency = new Map<string, Map<string, number | undefined>>();
  private readonly edges: PropagationEdge[] = [];
  readonly name: string | undefined;

  /** Validates the definition before any asset is stored. */
  static from(input: unknown): AdjacencyGraph {
    return new AdjacencyGraph(parseInfrastructureDefinition(input));
  }

  private constructor(definition: InfrastructureDefinition) {
    this.name = definition.name;
    for (const asset of definition.assets) {
      this.assets.set(
        asset.id,
        Object.freeze({
          ...asset,
          privileges: Object.freeze({ ...asset.privileges }),
          services: [...asset.services],
        }),
      );
      this.adjacency.set(asset.id, new Map());
    }
    for (const edge of definition.edges) {
      this.link(edge.source, edge.target, edge.propagationProbability);
      this.link(edge.target, edge.source, edge.propagationProbability);
      this.edges.push({ ...edge });
    }
  }

  get assetCount(): number {
    return this.assets.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  assetIds(): Iterable<string> {
    return this.assets.keys();
  }

  hasAsset(assetId: string): boolean {
    return this.assets.has(assetId);
  }

  getAsset(assetId: string): Readonly<Asset> {
    const asset = this.assets.get(assetId);
    if (!asset) {
      throw new NotFoundError('Asset', assetId);
    }
    return asset;
  }

  neighbors(assetId: string): Iterable<string> {
    return this.adjacencyOf(assetId).keys();
  }

  propagationProbability(from: string, to: string): number {
    return this.adjacencyOf(from).get(to) ?? DEFAULT_PROPAGATION_PROBABILITY;
  }

  toDefinition(): InfrastructureDefinition {
    return {
      name: this.name,
      assets: Array.from(this.assets.values(), (asset) => ({
        ...asset,
        privileges: { ...asset.privileges },
        services: [...asset.services],
      })),
      edges: this.edges.map((edge) => ({ ...edge })),
    };
  }

  private adjacencyOf(assetId: string): Map<string, number | undefined> {
    const links = this.adjacency.get(assetId);
    if (!links) {
      throw new NotFoundError('Asset', assetId);
    }
    return links;
  }

  private link(from: string, to: string, probability: number | undefined): void {
    const links = this.adjacency.get(from);
    if (links) {
      links.set(to, probability);
    }
  }
}

/** Validates a raw definition and returns it with defaults filled in. */
export function parseInfrastructureDefinition(input: unknown): InfrastructureDefinition {
  const result = infrastructureDefinitionSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues('Invalid infrastructure definition', result.error.issues);
  }
  return result.data;
}

export function parseInfrastructureYaml(yamlContent: string): InfrastructureDefinition {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    throw new ConfigurationError(`Invalid YAML: ${message}`);
  }
  return parseInfrastructureDefinition(parsed);
}

export function buildInfrastructureGraph(input: unknown): InfrastructureGraph {
  return AdjacencyGraph.from(input);
}
