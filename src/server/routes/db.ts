/**
 * Database analytics routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, requireDb, parsePositiveInt } from '../utils/http.js';
import { state } from '../state.js';
import { getClassTrajectory, getRunOverview } from '../../storage/analytics.js';

export function registerDbRoutes(router: Router): void {
  // Get database stats
  router.add('GET', '/api/db/stats', (_req, res) => {
    if (!requireDb(state.database, res)) return;

    const stats = state.database.getStats();
    const runId = state.database.getCurrentRunId();
    sendJson(res, 200, { currentRunId: runId, stats });
  });

  // Get all runs
  router.add('GET', '/api/db/runs', (_req, res) => {
    if (!requireDb(state.database, res)) return;

    sendJson(res, 200, { runs: state.database.getAllRuns() });
  });

  router.addParam('GET', '/api/db/runs/:runId/snapshots', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parsePositiveInt(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    sendJson(res, 200, { snapshots: state.database.getSnapshots(runId) });
  });

  router.addParam('GET', '/api/db/runs/:runId/events', (req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parsePositiveInt(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    const url = new URL(req.url || '/', 'http://localhost');
    const limit = parsePositiveInt(url.searchParams.get('limit')) ?? 100;
    const type = url.searchParams.get('type') ?? undefined;
    sendJson(res, 200, { events: state.database.getEvents(runId, limit, type) });
  });

  router.addParam('GET', '/api/db/runs/:runId/overview', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parsePositiveInt(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    const overview = getRunOverview(state.database, runId);
    if (!overview) {
      sendError(res, 404, `Run ${runId} not found`);
      return;
    }
    sendJson(res, 200, overview);
  });

  router.addParam('GET', '/api/db/runs/:runId/classes/:entityId', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parsePositiveInt(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    sendJson(res, 200, { trajectory: getClassTrajectory(state.database, runId, params.entityId) });
  });
}
