/**
 * Route composition
 * Creates and configures the main router with all route modules
 */

import { Router } from './router.js';
import { registerHealthRoutes } from './health.js';
import { registerSimulationRoutes } from './simulation.js';
import { registerCheckpointRoutes } from './checkpoints.js';
import { registerDbRoutes } from './db.js';

/**
 * Create and configure the main router with all routes
 */
export function createRouter(): Router {
  const router = new Router();

  registerHealthRoutes(router);
  registerSimulationRoutes(router);
  registerCheckpointRoutes(router);
  registerDbRoutes(router);

  return router;
}

// Re-export Router for convenience
export { Router } from './router.js';
export type { HttpMethod, RouteHandler, RouteParams } from './router.js';
