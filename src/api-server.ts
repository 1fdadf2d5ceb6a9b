import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import { config, type ExecutionMode } from './config.js';
import { createChildLogger } from './logger.js';
import {
  EngineHaltedError,
  ExchangeError,
  InvalidPlanError,
  PlanNotFoundError,
  describeError,
} from './errors.js';
import type { ExecutionSupervisor } from './engine/execution-supervisor.js';
import type { KillSwitch } from './safety/kill-switch.js';
import type { PlanArchive } from './db/plan-archive.js';
import type { ExchangeClient } from './types/index.js';

const log = createChildLogger('api-server');

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface ApiDeps {
  readonly supervisor: ExecutionSupervisor;
  readonly mode: ExecutionMode;
  readonly killSwitch?: KillSwitch | null;
  readonly exchange?: ExchangeClient | null;
  readonly archive?: PlanArchive | null;
}

const corsHeaders: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Content-Type': 'application/json',
};

const MAX_BODY_BYTES = 64 * 1024;

const killBodySchema = z
  .object({
    reason: z.string().trim().min(1).max(200).optional(),
    sweepOpenOrders: z.boolean().optional(),
    symbol: z.string().trim().min(1).optional(),
  })
  .strict();

type BodyResult = { ok: true; value: unknown } | { ok: false; error: string };

function readBody(req: IncomingMessage): Promise<BodyResult> {
  return new Promise((resolve) => {
    let body = '';
    let tooLarge = false;
    req.on('data', (chunk: Buffer | string) => {
      body += chunk.toString();
      if (body.length > MAX_BODY_BYTES) tooLarge = true;
    });
    req.on('end', () => {
      if (tooLarge) {
        resolve({ ok: false, error: 'Body too large' });
        return;
      }
      try {
        resolve({ ok: true, value: body ? JSON.parse(body) : {} });
      } catch {
        resolve({ ok: false, error: 'Body is not valid JSON' });
      }
    });
  });
}

function send(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, corsHeaders);
  res.end(JSON.stringify(payload));
}

function sendError(res: ServerResponse, err: unknown): void {
  if (err instanceof InvalidPlanError) {
    send(res, 400, { error: err.code, message: err.message });
  } else if (err instanceof EngineHaltedError) {
    send(res, 423, { error: err.code, message: err.message });
  } else if (err instanceof PlanNotFoundError) {
    send(res, 404, { error: err.code, message: err.message });
  } else if (err instanceof ExchangeError) {
    send(res, 502, { error: err.code, message: err.message });
  } else {
    log.error({ err }, 'Unhandled API error');
    send(res, 500, { error: 'INTERNAL', message: describeError(err) });
  }
}

function parseLimit(params: URLSearchParams, fallback: number, max: number): number {
  const n = parseInt(params.get('limit') ?? '', 10);
  return Number.isFinite(n) && n > 0 ? Math.min(n, max) : fallback;
}

const PLAN_ID_PATH = /^\/api\/plans\/([^/]+)$/;

/**
 * JSON API over the supervisor, the kill switch and the plan archive
 */
export function createApiHandler(deps: ApiDeps): ApiHandler {
  const { supervisor, mode } = deps;
  const killSwitch = deps.killSwitch ?? null;
  const exchange = deps.exchange ?? null;
  const archive = deps.archive ?? null;

  return async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;

    if (method === 'OPTIONS') {
      res.writeHead(204, corsHeaders);
      res.end();
      return;
    }

    try {
      if (path === '/api/state' && method === 'GET') {
        send(res, 200, {
          mode,
          halted: supervisor.isHalted(),
          haltReason: supervisor.getHaltReason(),
          kill: killSwitch?.isActivated() ?? false,
          metrics: supervisor.getMetrics(),
        });
        return;
      }

      if (path === '/api/plans' && method === 'GET') {
        send(res, 200, supervisor.listActivePlans());
        return;
      }

      if (path === '/api/plans' && method === 'POST') {
        const body = await readBody(req);
        if (!body.ok) {
          send(res, 400, { error: 'INVALID_BODY', message: body.error });
          return;
        }
        const id = supervisor.submitRequest(body.value);
        send(res, 201, { id });
        return;
      }

      if (path === '/api/plans/history' && method === 'GET') {
        send(res, 200, supervisor.listCompletedPlans(parseLimit(url.searchParams, 50, 500)));
        return;
      }

      if (path === '/api/plans/archive' && method === 'GET') {
        send(res, 200, archive ? archive.list(parseLimit(url.searchParams, 50, 1000)) : []);
        return;
      }

      const planMatch = PLAN_ID_PATH.exec(path);
      if (planMatch?.[1] !== undefined) {
        const planId = decodeURIComponent(planMatch[1]);
        if (method === 'GET') {
          try {
            send(res, 200, supervisor.getPlanStatus(planId));
          } catch (err) {
            const archived = err instanceof PlanNotFoundError ? archive?.getSnapshot(planId) : null;
            if (!archived) throw err;
            send(res, 200, archived);
          }
          return;
        }
        if (method === 'DELETE') {
          supervisor.cancelPlan(planId);
          send(res, 202, { id: planId, cancelling: true });
          return;
        }
      }

      if (path === '/api/orders/open' && method === 'GET') {
        if (!exchange) {
          send(res, 200, []);
          return;
        }
        send(res, 200, await exchange.getOpenOrders(url.searchParams.get('symbol') ?? undefined));
        return;
      }

      if (path === '/api/kill' && method === 'POST') {
        if (!killSwitch) {
          send(res, 503, { error: 'UNAVAILABLE', message: 'Kill switch not configured' });
          return;
        }
        const body = await readBody(req);
        const parsed = body.ok ? killBodySchema.safeParse(body.value) : null;
        if (!parsed?.success) {
          send(res, 400, { error: 'INVALID_BODY', message: body.ok ? 'Invalid kill request' : body.error });
          return;
        }
        const result = await killSwitch.activate(parsed.data.reason ?? 'API kill', {
          sweepOpenOrders: parsed.data.sweepOpenOrders,
          symbol: parsed.data.symbol,
        });
        send(res, 200, { ok: true, kill: true, ...result });
        return;
      }

      if (path === '/api/kill/reset' && method === 'POST') {
        if (!killSwitch) {
          send(res, 503, { error: 'UNAVAILABLE', message: 'Kill switch not configured' });
          return;
        }
        killSwitch.deactivate();
        send(res, 200, { ok: true, kill: false });
        return;
      }

      send(res, 404, { error: 'NOT_FOUND', message: `No route for ${method} ${path}` });
    } catch (err) {
      sendError(res, err);
    }
  };
}

export function startApiServer(deps: ApiDeps, port: number = config.apiServerPort): Server {
  const handler = createApiHandler(deps);
  const server = createServer((req, res) => {
    void handler(req, res);
  });
  server.listen(port, () => {
    log.info({ port }, 'API server listening');
  });
  return server;
}
