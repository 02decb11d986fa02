/**
 * API Server
 * HTTP + WebSocket server for driving and watching a simulation
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { WebSocketServer } from 'ws';
import { config } from './state.js';
import { createRouter } from './routes/index.js';
import { setCorsHeaders, handleCorsPreflightIfNeeded, sendError } from './utils/http.js';
import { handleConnection } from './ws/handlers.js';
import {
  initializeStorage,
  initializeSimulation,
  shutdownSimulation,
} from './controllers/SimulationController.js';

const router = createRouter();

// ============================================================================
// HTTP Server
// ============================================================================

function handleRequest(req: IncomingMessage, res: ServerResponse): void {
  setCorsHeaders(res);

  if (handleCorsPreflightIfNeeded(req, res)) {
    return;
  }

  const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

  if (router.handle(req, res, url.pathname)) {
    return;
  }

  // 404 fallback
  sendError(res, 404, 'Not found');
}

// ============================================================================
// Main
// ============================================================================

const server = createServer(handleRequest);
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', handleConnection);

initializeStorage();
initializeSimulation();

server.listen(config.PORT, () => {
  console.log('='.repeat(50));
  console.log('Dialectic Simulation API Server');
  console.log('='.repeat(50));
  console.log(`HTTP:        http://localhost:${config.PORT}`);
  console.log(`WebSocket:   ws://localhost:${config.PORT}/ws`);
  console.log(`Database:    ${config.DB_ENABLED ? `${config.DB_PATH} (every ${config.DB_SNAPSHOT_INTERVAL} ticks)` : 'Disabled'}`);
  console.log(`Checkpoints: every ${config.CHECKPOINT_INTERVAL} ticks`);
  console.log('='.repeat(50));
});

process.on('SIGINT', () => {
  console.log('\n[Server] Shutting down...');
  shutdownSimulation();
  wss.close();
  server.close();
  process.exit(0);
});
