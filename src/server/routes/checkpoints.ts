/**
 * Checkpoint routes: list, save and restore
 */

import { z } from 'zod';
import type { Router } from './router.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';
import { state } from '../state.js';
import { CheckpointNotFoundError, SimulationError } from '../../core/errors.js';
import { restoreCheckpoint } from '../controllers/SimulationController.js';

const SaveBodySchema = z
  .object({
    key: z.string().min(1).optional(),
    description: z.string().optional(),
  })
  .nullable();

export function registerCheckpointRoutes(router: Router): void {
  router.add('GET', '/api/checkpoints', (_req, res) => {
    if (!state.checkpoints) {
      sendError(res, 503, 'Checkpoint storage not initialized');
      return;
    }
    sendJson(res, 200, { checkpoints: state.checkpoints.list() });
  });

  router.add('POST', '/api/checkpoints', async (req, res) => {
    const sink = state.checkpoints;
    const simulation = state.simulation;
    if (!sink || !simulation) {
      sendError(res, 503, 'No simulation or checkpoint storage');
      return;
    }

    const body = SaveBodySchema.safeParse(await parseJsonBody(req));
    if (!body.success) {
      sendError(res, 400, 'Body must be {"key"?: string, "description"?: string}');
      return;
    }

    const key = body.data?.key ?? `manual-${String(simulation.getTick()).padStart(8, '0')}`;
    try {
      const checkpoint = simulation.saveCheckpoint(sink, key, body.data?.description ?? '');
      sendJson(res, 201, { key, metadata: checkpoint.metadata });
    } catch (error) {
      sendError(res, 400, error instanceof SimulationError ? error.describe() : String(error));
    }
  });

  router.addParam('POST', '/api/checkpoints/:key/load', (_req, res, params) => {
    try {
      const simulation = restoreCheckpoint(params.key);
      sendJson(res, 200, { key: params.key, tick: simulation.getTick() });
    } catch (error) {
      if (error instanceof CheckpointNotFoundError) {
        sendError(res, 404, error.message);
      } else if (error instanceof SimulationError) {
        sendError(res, 422, error.describe());
      } else {
        throw error;
      }
    }
  });
}
