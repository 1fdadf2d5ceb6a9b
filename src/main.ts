import { config, type ExecutionMode } from './config.js';
import { createChildLogger } from './logger.js';
import { getDb, closeDb } from './db/database.js';
import { PlanArchive } from './db/plan-archive.js';
import { AuditLog, auditEngineEvents } from './safety/audit-log.js';
import { KillSwitch } from './safety/kill-switch.js';
import { ExecutionSupervisor } from './engine/execution-supervisor.js';
import { createExchange } from './execution/exchange-factory.js';
import { startApiServer } from './api-server.js';
import { describeError } from './errors.js';

const log = createChildLogger('main');

function parseMode(): ExecutionMode {
  const idx = process.argv.indexOf('--mode');
  const value = idx !== -1 ? process.argv[idx + 1] : undefined;
  if (value) {
    const m = value.toUpperCase();
    if (m === 'PAPER' || m === 'LIVE') return m;
  }
  return config.mode;
}

async function main(): Promise<void> {
  const mode = parseMode();
  log.info({ mode, version: '0.1.0' }, 'Starting order execution engine');

  const db = getDb();
  const audit = new AuditLog(db, mode);
  const archive = new PlanArchive(db, mode);

  const venue = createExchange(mode);
  if (venue.mode === 'LIVE') {
    if (!config.binance.apiKey || !config.binance.secretKey) {
      log.error('Binance API keys required for LIVE mode');
      process.exit(1);
    }
    // fails fast on bad keys or clock skew
    const account = await venue.client.getAccountSummary();
    log.info(account, 'Futures account reachable');
  } else {
    venue.client.start();
  }

  const supervisor = new ExecutionSupervisor(venue.client);
  const stopAudit = auditEngineEvents(supervisor.bus, audit);
  const stopArchive = archive.attach(supervisor.bus);
  const killSwitch = new KillSwitch(supervisor, audit, venue.client);

  audit.info('main', 'ENGINE_STARTED', `mode=${mode}`);

  const server = startApiServer({ supervisor, mode, killSwitch, exchange: venue.client, archive });

  // ── Graceful shutdown ──
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    audit.info('main', 'SHUTDOWN', signal);

    server.close();
    await supervisor.shutdown();
    if (venue.mode === 'PAPER') venue.client.stop();
    stopArchive();
    stopAudit();

    closeDb();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err: describeError(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  log.info({ port: config.apiServerPort }, 'Engine running. Waiting for plans...');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
