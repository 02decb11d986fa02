/**
 * Simulation state and control routes
 */

import { z } from 'zod';
import type { Router } from './router.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';
import { state, broadcast } from '../state.js';
import { serializeWorldState } from '../state-serializer.js';
import { EventTypeSchema } from '../../core/schema.js';
import { SimulationError } from '../../core/errors.js';
import {
  initializeSimulation,
  stepSimulation,
  undoTick,
  redoTick,
} from '../controllers/SimulationController.js';

const MAX_TICKS_PER_REQUEST = 1000;

const RunBodySchema = z.object({
  ticks: z.number().int().min(1).max(MAX_TICKS_PER_REQUEST),
});

const ResetBodySchema = z
  .object({
    scenario: z.string().min(1).optional(),
  })
  .nullable();

function describeError(error: unknown): string {
  return error instanceof SimulationError ? error.describe() : String(error);
}

export function registerSimulationRoutes(router: Router): void {
  // Get current state
  router.add('GET', '/api/state', (_req, res) => {
    const snapshot = state.simulation ? serializeWorldState(state.simulation.getState()) : null;
    sendJson(res, 200, { status: state.status, world: snapshot });
  });

  router.add('GET', '/api/summary', (_req, res) => {
    if (!state.simulation) {
      sendError(res, 404, 'No simulation');
      return;
    }
    sendJson(res, 200, state.simulation.getSummary());
  });

  // Event history from the run's bus, newest last; ?type= and ?limit= filter it
  router.add('GET', '/api/events', (req, res) => {
    if (!state.simulation) {
      sendError(res, 404, 'No simulation');
      return;
    }

    const url = new URL(req.url || '/', 'http://localhost');
    const typeParam = url.searchParams.get('type');
    const limit = Math.max(1, Math.min(1000, parseInt(url.searchParams.get('limit') ?? '100', 10) || 100));

    let events = state.simulation.getEventHistory();
    if (typeParam !== null) {
      const type = EventTypeSchema.safeParse(typeParam);
      if (!type.success) {
        sendError(res, 400, `Unknown event type: ${typeParam}`);
        return;
      }
      events = events.filter((e) => e.type === type.data);
    }

    sendJson(res, 200, {
      total: events.length,
      events: events.slice(-limit).map((e) => ({ type: e.type, tick: e.tick, payload: e.payload })),
    });
  });

  router.add('GET', '/api/metrics', (_req, res) => {
    sendJson(res, 200, {
      summary: state.metrics?.getSummary() ?? null,
      endgame: state.endgame?.getResult() ?? null,
      observerFailures: (state.simulation?.getObserverFailures() ?? []).map((f) => ({
        observer: f.observer,
        hook: f.hook,
        tick: f.tick,
        timedOut: f.timedOut,
        message: f.error.message,
      })),
    });
  });

  router.add('POST', '/api/simulation/step', (_req, res) => {
    try {
      const [metrics] = stepSimulation(1);
      sendJson(res, 200, { tick: state.simulation?.getTick() ?? null, metrics: metrics ?? null });
    } catch (error) {
      sendError(res, 500, describeError(error));
    }
  });

  router.add('POST', '/api/simulation/run', async (req, res) => {
    const body = RunBodySchema.safeParse(await parseJsonBody(req));
    if (!body.success) {
      sendError(res, 400, `Body must be {"ticks": 1..${MAX_TICKS_PER_REQUEST}}`);
      return;
    }

    try {
      const metrics = stepSimulation(body.data.ticks);
      sendJson(res, 200, {
        tick: state.simulation?.getTick() ?? null,
        ticksRun: metrics.length,
        finalHash: metrics[metrics.length - 1]?.stateHash ?? null,
      });
    } catch (error) {
      sendError(res, 500, describeError(error));
    }
  });

  router.add('POST', '/api/simulation/undo', (_req, res) => {
    const restored = undoTick();
    if (!restored) {
      sendError(res, 409, 'Nothing to undo');
      return;
    }
    sendJson(res, 200, { tick: restored.tick });
  });

  router.add('POST', '/api/simulation/redo', (_req, res) => {
    const restored = redoTick();
    if (!restored) {
      sendError(res, 409, 'Nothing to redo');
      return;
    }
    sendJson(res, 200, { tick: restored.tick });
  });

  // Reset simulation, optionally switching scenario
  router.add('POST', '/api/simulation/reset', async (req, res) => {
    const body = ResetBodySchema.safeParse(await parseJsonBody(req));
    if (!body.success) {
      sendError(res, 400, 'Body must be {"scenario"?: string}');
      return;
    }

    try {
      const oldRunId = state.database?.getCurrentRunId() ?? null;
      const simulation = initializeSimulation(body.data?.scenario ?? state.scenario);
      const newRunId = state.database?.getCurrentRunId() ?? null;

      broadcast({ type: 'simulation_reset', data: { oldRunId, newRunId, scenario: state.scenario } });
      console.log(`[Server] Simulation reset: run ${oldRunId} → run ${newRunId}`);

      sendJson(res, 200, {
        success: true,
        scenario: state.scenario,
        tick: simulation.getTick(),
        oldRunId,
        newRunId,
      });
    } catch (error) {
      console.error('[Server] Reset failed:', error);
      sendError(res, 400, describeError(error));
    }
  });
}
