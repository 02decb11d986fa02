/**
 * WebSocket connection handlers
 */

import { WebSocket } from 'ws';
import { serializeWorldState } from '../state-serializer.js';
import { state, clients, type ClientMessage } from '../state.js';
import {
  startSimulation,
  pauseSimulation,
  resumeSimulation,
  stepSimulation,
  setSpeed,
} from '../controllers/SimulationController.js';

function isClientMessage(value: unknown): value is ClientMessage {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Send initial state to a newly connected client
 */
function sendInitialState(ws: WebSocket): void {
  ws.send(JSON.stringify({
    type: 'status',
    data: { status: state.status === 'stopped' ? 'connected' : state.status },
  }));

  if (state.simulation) {
    ws.send(JSON.stringify({ type: 'tick', data: serializeWorldState(state.simulation.getState()) }));
  }
}

/**
 * Handle incoming WebSocket message
 */
export function handleMessage(data: unknown): void {
  try {
    const message: unknown = JSON.parse(String(data));
    if (!isClientMessage(message)) {
      console.log('[WebSocket] Ignoring message without a type');
      return;
    }

    switch (message.type) {
      case 'start':
        startSimulation();
        break;
      case 'pause':
        pauseSimulation();
        break;
      case 'resume':
        resumeSimulation();
        break;
      case 'step':
        if (state.status !== 'running') {
          stepSimulation(1);
        }
        break;
      case 'speed':
        if (typeof message.scale === 'number') {
          setSpeed(message.scale);
        }
        break;
      default:
        console.log('[WebSocket] Unknown message type:', message.type);
    }
  } catch (error) {
    console.error('[WebSocket] Message error:', error);
  }
}

/**
 * Handle new WebSocket connection
 */
export function handleConnection(ws: WebSocket): void {
  clients.add(ws);
  console.log(`[WebSocket] Client connected (${clients.size} total)`);

  sendInitialState(ws);

  ws.on('message', (data) => handleMessage(data));
  ws.on('close', () => {
    clients.delete(ws);
    console.log(`[WebSocket] Client disconnected (${clients.size} remaining)`);
  });
  ws.on('error', (error) => {
    console.error('[WebSocket] Error:', error);
    clients.delete(ws);
  });
}
