import type { PlanKind } from './types/index.js';

export interface ParsedArgs {
  readonly command: string | null;
  readonly positionals: string[];
  readonly flags: Map<string, string>;
}

export function parseArgs(args: string[]): ParsedArgs {
  const flags = new Map<string, string>();
  const positionals: string[] = [];
  let command: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags.set(arg, next);
        i++;
      } else {
        flags.set(arg, 'true');
      }
    } else if (command === null) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }
  return { command, positionals, flags };
}

const COMMANDS: Record<string, PlanKind> = {
  twap: 'TWAP',
  grid: 'GRID',
  trailing: 'TRAILING_STOP',
  oco: 'OCO',
};

export function commandKind(command: string | null): PlanKind | null {
  if (command === null) return null;
  return COMMANDS[command.toLowerCase()] ?? null;
}

/** Absent flags stay undefined; unparsable ones become NaN and fail validation */
function num(flags: Map<string, string>, key: string): number | undefined {
  const v = flags.get(key);
  return v === undefined ? undefined : Number(v);
}

function compact(params: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(params)) if (v !== undefined) out[k] = v;
  return out;
}

/**
 * Turns `<symbol> <side> --flags` into a `{ kind, params }` request. Values
 * are not checked here; the supervisor validates the request like any other.
 */
export function buildRequest(kind: PlanKind, parsed: ParsedArgs): { kind: PlanKind; params: Record<string, unknown> } {
  const [symbol, side] = parsed.positionals;
  const f = parsed.flags;
  const maxRetries = num(f, '--retries');
  const base = {
    symbol: symbol?.toUpperCase(),
    side: side?.toUpperCase(),
    retry: maxRetries === undefined ? undefined : { maxRetries },
  };

  switch (kind) {
    case 'TWAP':
      return {
        kind,
        params: compact({
          ...base,
          totalQuantity: num(f, '--qty'),
          durationMs: num(f, '--duration'),
          intervals: num(f, '--intervals'),
          quantityStep: num(f, '--step'),
        }),
      };
    case 'GRID':
      return {
        kind,
        params: compact({
          ...base,
          startPrice: num(f, '--start'),
          endPrice: num(f, '--end'),
          gridCount: num(f, '--levels'),
          totalQuantity: num(f, '--qty'),
          quantityStep: num(f, '--step'),
          priceTick: num(f, '--tick'),
          pollIntervalMs: num(f, '--poll'),
        }),
      };
    case 'TRAILING_STOP':
      return {
        kind,
        params: compact({
          ...base,
          quantity: num(f, '--qty'),
          callbackDistance: num(f, '--distance'),
          callbackRate: num(f, '--rate'),
          rearmThreshold: num(f, '--rearm'),
          pollIntervalMs: num(f, '--poll'),
        }),
      };
    case 'OCO':
      return {
        kind,
        params: compact({
          ...base,
          quantity: num(f, '--qty'),
          stopPrice: num(f, '--stop'),
          limitPrice: num(f, '--limit'),
          pollIntervalMs: num(f, '--poll'),
        }),
      };
  }
}
