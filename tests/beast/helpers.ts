/**
 * Beast Test Helpers: graph builders and an in-process HTTP client.
 */
import { createServer } from 'node:http';
import { createApp } from '../../src/app.js';
import { buildInfrastructureGraph } from '../../src/services/infrastructure-graph.js';
import type { Express } from 'express';
import type { Asset, PropagationEdge } from '../../src/models/attack-surface.js';
import type { InfrastructureGraph } from '../../src/services/infrastructure-graph.js';

export interface TestResponse {
  status: number;
  body: Record<string, unknown>;
}

export function asset(id: string, category: string, cvssScore: number, exposure: number): Asset {
  return { id, category, cvssScore, exposure, privileges: {}, services: [] };
}

export function edge(source: string, target: string, propagationProbability?: number): PropagationEdge {
  return propagationProbability === undefined
    ? { source, target }
    : { source, target, propagationProbability };
}

export function graphOf(assets: Asset[], edges: PropagationEdge[] = []): InfrastructureGraph {
  return buildInfrastructureGraph({ assets, edges });
}

let cachedApp: Express | null = null;

export function getTestApp(): Express {
  if (!cachedApp) {
    cachedApp = createApp({
      port: 0,
      analysisDefaults: { organizationalFactor: 1.0, pathThreshold: 0.7, pathCutoff: 5, budget: 100000 },
      maxPathCutoff: 8,
    });
  }
  return cachedApp;
}

export function resetTestApp(): void {
  cachedApp = null;
}

/**
 * Make a request to the test app on an ephemeral port.
 */
export async function request(
  app: Express,
  method: 'GET' | 'POST' | 'PUT' | 'DELETE',
  path: string,
  body?: Record<string, unknown>,
  contentType: string = 'application/json',
): Promise<TestResponse> {
  const server = createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  try {
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    const options: RequestInit = {
      method,
      headers: { 'Content-Type': contentType },
    };
    if (body && (method === 'POST' || method === 'PUT')) {
      options.body = JSON.stringify(body);
    }

    const res = await fetch(`http://127.0.0.1:${port}${path}`, options);
    const json: unknown = await res.json();
    return { status: res.status, body: isRecord(json) ? json : {} };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
