/**
 * Attack Surface Analysis: Routes
 */
import { Router } from 'express';
import type { Response } from 'express';
import { apiSuccess, apiError } from '../models/shared.js';
import { httpStatusFor } from '../utils/errors.js';
import * as service from '../services/attack-surface.js';

function sendError(res: Response, err: unknown): void {
  const status = httpStatusFor(err);
  const message = err instanceof Error ? err.message : 'Unknown error';
  if (status === 500) {
    console.error('[attack-surface] request failed:', err);
  }
  res.status(status).json(apiError(message));
}

export function attackSurfaceRoutes(): Router {
  const router = Router();

  // GET /api/attack-surface/infrastructures: list registered infrastructures
  router.get('/infrastructures', (_req, res) => {
    const records = service.listInfrastructures().map(({ definition: _definition, ...summary }) => summary);
    res.json(apiSuccess(records));
  });

  // POST /api/attack-surface/infrastructures: register a graph (JSON or YAML)
  router.post('/infrastructures', (req, res) => {
    try {
      const { yamlContent, assets } = req.body ?? {};

      if (typeof yamlContent === 'string') {
        res.status(201).json(apiSuccess(service.registerInfrastructureFromYaml(yamlContent)));
        return;
      }

      if (!assets) {
        res.status(400).json(apiError('Missing required field: assets (or yamlContent)'));
        return;
      }

      res.status(201).json(apiSuccess(service.registerInfrastructure(req.body)));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // POST /api/attack-surface/infrastructures/sample: register the reference store
  router.post('/infrastructures/sample', (_req, res) => {
    try {
      res.status(201).json(apiSuccess(service.registerSampleInfrastructure()));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // GET /api/attack-surface/infrastructures/:id
  router.get('/infrastructures/:id', (req, res) => {
    try {
      res.json(apiSuccess(service.getInfrastructure(req.params.id)));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // GET /api/attack-surface/infrastructures/:id/assets/:assetId/score: score breakdown
  router.get('/infrastructures/:id/assets/:assetId/score', (req, res) => {
    try {
      const { id, assetId } = req.params;
      const { orgFactor } = req.query;
      const breakdown = typeof orgFactor === 'string'
        ? service.explainAsset(id, assetId, Number(orgFactor))
        : service.explainAsset(id, assetId);
      res.json(apiSuccess(breakdown));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // POST /api/attack-surface/infrastructures/:id/analyze: full report
  router.post('/infrastructures/:id/analyze', (req, res) => {
    try {
      const { parameters, categoryProfiles } = req.body ?? {};
      const report = service.analyzeInfrastructure(req.params.id, { parameters, categoryProfiles });
      res.status(201).json(apiSuccess(report));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // POST /api/attack-surface/infrastructures/:id/scenarios: compare parameter sets
  router.post('/infrastructures/:id/scenarios', (req, res) => {
    try {
      const { scenarios } = req.body ?? {};
      if (!Array.isArray(scenarios)) {
        res.status(400).json(apiError('Missing required field: scenarios'));
        return;
      }
      res.json(apiSuccess(service.compareScenarios(req.params.id, scenarios)));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // GET /api/attack-surface/infrastructures/:id/reports: report history
  router.get('/infrastructures/:id/reports', (req, res) => {
    try {
      res.json(apiSuccess(service.getReportHistory(req.params.id)));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  // GET /api/attack-surface/reports/:reportId
  router.get('/reports/:reportId', (req, res) => {
    try {
      res.json(apiSuccess(service.getReport(req.params.reportId)));
    } catch (err: unknown) {
      sendError(res, err);
    }
  });

  return router;
}
