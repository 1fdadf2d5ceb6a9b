#!/usr/bin/env node
import { config, type ExecutionMode } from './config.js';
import { getDb, closeDb } from './db/database.js';
import { PlanArchive } from './db/plan-archive.js';
import { AuditLog, auditEngineEvents } from './safety/audit-log.js';
import { ExecutionSupervisor } from './engine/execution-supervisor.js';
import { createExchange } from './execution/exchange-factory.js';
import { EngineError, describeError } from './errors.js';
import { isTerminal } from './engine/plan-state-machine.js';
import { buildRequest, commandKind, parseArgs } from './cli-args.js';
import type { PlanSnapshot } from './types/index.js';

function printUsage(): void {
  console.log(`
Usage:
  derived-orders twap <symbol> <side> --qty <n> --duration <ms> --intervals <n> [--step <n>]
  derived-orders grid <symbol> <side> --start <price> --end <price> --levels <n> --qty <n> [--step <n>] [--tick <n>]
  derived-orders trailing <symbol> <side> --qty <n> (--distance <n> | --rate <pct>) [--rearm <n>]
  derived-orders oco <symbol> <side> --qty <n> --stop <price> --limit <price>

Commands:
  twap        Split a market order into equal slices over a duration
  grid        Rest limit orders at evenly spaced prices
  trailing    Stop-market order that follows the best price seen
  oco         Stop-market and limit exit; the first fill cancels the other

Options:
  --mode <PAPER|LIVE>   Execution venue (default: MODE from .env, else PAPER)
  --retries <n>         Retries per leg on transient failures (default: ${config.retry.maxRetries})
  --poll <ms>           Status polling interval (grid, trailing, oco)

Ctrl+C cancels the plan and waits for its orders to be cleaned up.
`);
}

function parseMode(value: string | undefined): ExecutionMode {
  if (value === undefined) return config.mode;
  return value.toUpperCase() === 'LIVE' ? 'LIVE' : 'PAPER';
}

function printSummary(snap: PlanSnapshot): void {
  const m = snap.metrics;
  console.log('');
  console.log(`  Plan      ${snap.id} (${snap.kind} ${snap.side} ${snap.symbol})`);
  console.log(`  Status    ${snap.status}${snap.reason ? ` - ${snap.reason}` : ''}`);
  console.log(`  Filled    ${m.filledQuantity} / ${m.requestedQuantity} (${m.progressPct}%)`);
  if (m.avgFillPrice !== null) console.log(`  Avg price ${m.avgFillPrice}`);
  console.log(`  Legs      ${m.legCount} total, ${m.filledLegs} filled, ${m.rejectedLegs} rejected, ${m.cancelledLegs} cancelled, ${m.timedOutLegs} timed out`);
  console.log('');
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  const kind = commandKind(parsed.command);
  if (kind === null || parsed.positionals.length < 2) {
    printUsage();
    process.exit(1);
  }

  const mode = parseMode(parsed.flags.get('--mode'));
  const db = getDb();
  const audit = new AuditLog(db, mode);
  const archive = new PlanArchive(db, mode);
  const venue = createExchange(mode);
  if (venue.mode === 'PAPER') venue.client.start();

  const supervisor = new ExecutionSupervisor(venue.client, { maxConcurrentPlans: 1 });
  auditEngineEvents(supervisor.bus, audit);
  archive.attach(supervisor.bus);

  // one plan per run; legs may be placed before submitRequest returns
  supervisor.bus.on('LEG_SUBMITTED', (e) => {
    const price = e.leg.price === null ? 'market' : `@ ${e.leg.price}`;
    console.log(`  -> ${e.leg.tag} ${e.leg.type} ${e.leg.side} ${e.leg.quantity} ${price}`);
  });
  supervisor.bus.on('LEG_RESOLVED', (e) => {
    const fill = e.leg.filledQuantity > 0 ? ` ${e.leg.filledQuantity} @ ${e.leg.avgFillPrice ?? '-'}` : '';
    const error = e.leg.error ? ` (${e.leg.error})` : '';
    console.log(`  <- ${e.leg.tag} ${e.leg.resultState}${fill}${error}`);
  });
  supervisor.bus.on('DOUBLE_FILL', () => {
    console.log('  !! both OCO legs filled');
  });

  let planId: string;
  try {
    planId = supervisor.submitRequest(buildRequest(kind, parsed));
  } catch (err) {
    if (!(err instanceof EngineError)) throw err;
    console.error(`Rejected: ${err.message}`);
    if (venue.mode === 'PAPER') venue.client.stop();
    closeDb();
    process.exit(1);
  }
  console.log(`Submitted ${kind} plan ${planId} [${mode}]`);

  process.once('SIGINT', () => {
    if (isTerminal(supervisor.getPlanStatus(planId).status)) return;
    console.log('Cancelling...');
    supervisor.cancelPlan(planId);
  });

  const final = await supervisor.whenSettled(planId);
  printSummary(final);

  if (venue.mode === 'PAPER') venue.client.stop();
  closeDb();
  process.exit(final.status === 'COMPLETED' ? 0 : 2);
}

main().catch((err) => {
  console.error(describeError(err));
  process.exit(1);
});
