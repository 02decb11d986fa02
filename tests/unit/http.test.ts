/**
 * HTTP Utility and Router Tests
 */

import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { Router } from '../../src/server/routes/router.js';
import { matchPath, parsePositiveInt, requireDb } from '../../src/server/utils/http.js';

function request(method: string, url: string): { req: IncomingMessage; res: ServerResponse } {
  const req = new IncomingMessage(new Socket());
  req.method = method;
  req.url = url;
  return { req, res: new ServerResponse(req) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('matchPath', () => {
  it('extracts named parameters', () => {
    expect(matchPath('/api/db/runs/3/classes/C001', '/api/db/runs/:runId/classes/:entityId')).toEqual({
      runId: '3',
      entityId: 'C001',
    });
  });

  it('decodes parameters', () => {
    expect(matchPath('/api/checkpoints/run%201/load', '/api/checkpoints/:key/load')).toEqual({ key: 'run 1' });
  });

  it('rejects malformed escapes', () => {
    expect(matchPath('/api/checkpoints/%E0%A4%A/load', '/api/checkpoints/:key/load')).toBeNull();
  });

  it('requires static segments and length to match', () => {
    expect(matchPath('/api/db/runs/3/events', '/api/db/runs/:runId/snapshots')).toBeNull();
    expect(matchPath('/api/db/runs/3', '/api/db/runs/:runId/snapshots')).toBeNull();
  });
});

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('42')).toBe(42);
    expect(parsePositiveInt('1')).toBe(1);
  });

  it('rejects missing, zero, negative and non-numeric values', () => {
    expect(parsePositiveInt('0')).toBeNull();
    expect(parsePositiveInt(undefined)).toBeNull();
    expect(parsePositiveInt('')).toBeNull();
    expect(parsePositiveInt('-1')).toBeNull();
    expect(parsePositiveInt('abc')).toBeNull();
  });
});

describe('requireDb', () => {
  it('answers 503 when the database is missing', () => {
    const { res } = request('GET', '/api/db/runs');

    expect(requireDb(null, res)).toBe(false);
    expect(res.statusCode).toBe(503);
  });

  it('passes through an open database', () => {
    const { res } = request('GET', '/api/db/runs');

    expect(requireDb({ open: true }, res)).toBe(true);
    expect(res.headersSent).toBe(false);
  });
});

describe('Router', () => {
  it('prefers exact routes over parameterized ones', () => {
    const router = new Router();
    const exact = vi.fn();
    const param = vi.fn();
    router.add('GET', '/api/checkpoints', exact);
    router.addParam('GET', '/api/:section', param);
    const { req, res } = request('GET', '/api/checkpoints');

    expect(router.handle(req, res, '/api/checkpoints')).toBe(true);
    expect(exact).toHaveBeenCalledTimes(1);
    expect(param).not.toHaveBeenCalled();
  });

  it('passes path parameters to the handler', () => {
    const router = new Router();
    const handler = vi.fn();
    router.addParam('POST', '/api/checkpoints/:key/load', handler);
    const { req, res } = request('POST', '/api/checkpoints/cp-1/load');

    router.handle(req, res, '/api/checkpoints/cp-1/load');

    expect(handler).toHaveBeenCalledWith(req, res, { key: 'cp-1' });
  });

  it('extracts named regex groups', () => {
    const router = new Router();
    const handler = vi.fn();
    router.addRegex('GET', /^\/api\/ticks\/(?<tick>\d+)$/, handler);
    const { req, res } = request('GET', '/api/ticks/12');

    router.handle(req, res, '/api/ticks/12');

    expect(handler).toHaveBeenCalledWith(req, res, { tick: '12' });
  });

  it('matches on method', () => {
    const router = new Router();
    router.add('POST', '/api/simulation/step', vi.fn());
    const { req, res } = request('GET', '/api/simulation/step');

    expect(router.handle(req, res, '/api/simulation/step')).toBe(false);
  });

  it('ignores unsupported methods', () => {
    const router = new Router();
    router.add('GET', '/health', vi.fn());
    const { req, res } = request('HEAD', '/health');

    expect(router.handle(req, res, '/health')).toBe(false);
  });

  it('answers 500 when a handler throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const router = new Router();
    router.add('GET', '/boom', () => {
      throw new Error('boom');
    });
    const { req, res } = request('GET', '/boom');

    expect(router.handle(req, res, '/boom')).toBe(true);
    expect(res.statusCode).toBe(500);
  });

  it('answers 500 when an async handler rejects', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const router = new Router();
    router.add('GET', '/later', async () => {
      throw new Error('later');
    });
    const { req, res } = request('GET', '/later');

    router.handle(req, res, '/later');
    await new Promise((resolve) => setImmediate(resolve));

    expect(res.statusCode).toBe(500);
  });

  it('reports route counts', () => {
    const router = new Router();
    router.add('GET', '/a', vi.fn());
    router.addParam('GET', '/b/:id', vi.fn());

    expect(router.getStats()).toEqual({ exact: 1, param: 1, regex: 0 });
  });
});
