import { Router, Request, Response } from 'express';
import { runCycle, validateSample, CycleDependencies } from '../automation/cycle';
import { handleManualOverride } from '../automation/manualOverride';
import { InvalidInputError } from '../automation/errors';
import type { PlantRegistry } from '../plants/registry';

export function createPlantRoutes(registry: PlantRegistry, deps: CycleDependencies): Router {
  const router = Router();

  /**
   * POST /api/plants/:plantId/telemetry
   * Ingest one sensor sample and run a decision cycle
   */
  router.post('/:plantId/telemetry', async (req: Request, res: Response) => {
    const { plantId } = req.params;

    try {
      validateSample(req.body);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return res.status(400).json({ error: error.message, issues: error.issues });
      }
      throw error;
    }

    try {
      const outcome = await registry.run(plantId, state => runCycle(state, req.body, deps));

      switch (outcome.status) {
        case 'rejected':
          return res.status(400).json({ error: outcome.error.message, issues: outcome.error.issues });
        case 'warming_up':
          return res.status(202).json({ status: 'warming_up', soilSamples: outcome.soilSamples });
        case 'published':
          return res.json(outcome.record);
      }
    } catch (error) {
      console.error(`Error processing telemetry for plant ${plantId}:`, error);
      return res.status(500).json({ error: 'Failed to process telemetry' });
    }
  });

  /**
   * GET /api/plants/:plantId/decisions/latest
   * Most recent published decision for a plant
   */
  router.get('/:plantId/decisions/latest', (req: Request, res: Response) => {
    const record = registry.get(req.params.plantId)?.lastRecord;

    if (!record) {
      return res.status(404).json({ error: 'No decision available for this plant' });
    }

    return res.json(record);
  });

  /**
   * GET /api/plants/:plantId/weather
   * Cached weather context for a plant (does not trigger a refresh)
   */
  router.get('/:plantId/weather', (req: Request, res: Response) => {
    const state = registry.get(req.params.plantId);

    if (!state) {
      return res.status(404).json({ error: 'Plant not found' });
    }

    const snapshot = state.weather.current();
    return res.json({
      ...snapshot,
      fetchedAt: snapshot.fetchedAt !== null ? new Date(snapshot.fetchedAt).toISOString() : null,
    });
  });

  /**
   * POST /api/plants/:plantId/manual-control
   * Manual pump override (not implemented, always 501)
   */
  router.post('/:plantId/manual-control', (req: Request, res: Response) => {
    try {
      const ack = handleManualOverride(req.params.plantId, req.body);
      return res.status(501).json({
        error: 'Manual override not implemented',
        action: ack.action,
        implemented: ack.implemented,
      });
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return res.status(400).json({ error: error.message, issues: error.issues });
      }
      console.error('Error handling manual override:', error);
      return res.status(500).json({ error: 'Failed to handle manual override' });
    }
  });

  return router;
}
