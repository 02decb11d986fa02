/**
 * HTTP utility functions for the API server
 */

import type { IncomingMessage, ServerResponse } from 'http';

/**
 * Send a JSON response with the given status code and payload
 */
export function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(payload));
}

/**
 * Send an error response with the given status code and message
 */
export function sendError(res: ServerResponse, status: number, message: string): void {
  sendJson(res, status, { error: message });
}

/**
 * Read and parse a JSON request body
 * Resolves null if the body is empty or not valid JSON
 */
export function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      if (!body) {
        resolve(null);
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch (error) {
        console.warn('[Server] Ignoring malformed JSON body:', error);
        resolve(null);
      }
    });
    req.on('error', (error) => {
      console.warn('[Server] Request stream error:', error);
      resolve(null);
    });
  });
}

/**
 * Set CORS headers on a response
 */
export function setCorsHeaders(res: ServerResponse): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, PUT, PATCH, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/**
 * Handle CORS preflight request
 * Returns true if this was a preflight request and it was handled
 */
export function handleCorsPreflightIfNeeded(req: IncomingMessage, res: ServerResponse): boolean {
  if (req.method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return true;
  }
  return false;
}

/**
 * Parse a positive integer (run id, tick count) from a string value
 * Returns null if the value is not a valid number
 */
export function parsePositiveInt(value: string | null | undefined): number | null {
  if (!value) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? null : parsed;
}

/**
 * Type guard to check if database is available
 * Sends 503 error if not available
 */
export function requireDb<T>(db: T | null, res: ServerResponse): db is T {
  if (!db) {
    sendError(res, 503, 'Database not enabled');
    return false;
  }
  return true;
}

/**
 * Extract path parameters from a URL pathname using a pattern
 * Pattern uses :param syntax, e.g., '/api/checkpoints/:key/load'
 * Returns null if the pattern doesn't match
 */
export function matchPath(
  pathname: string,
  pattern: string
): Record<string, string> | null {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) {
    return null;
  }

  const params: Record<string, string> = {};

  for (let i = 0; i < patternParts.length; i++) {
    const patternPart = patternParts[i];
    const pathPart = pathParts[i];

    if (patternPart.startsWith(':')) {
      // This is a parameter
      const decoded = safeDecode(pathPart);
      if (decoded === null) return null;
      params[patternPart.slice(1)] = decoded;
    } else if (patternPart !== pathPart) {
      // Static parts must match exactly
      return null;
    }
  }

  return params;
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}
