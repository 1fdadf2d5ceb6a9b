import { createChildLogger } from '../logger.js';
import { classifyError, describeError } from '../errors.js';
import type { AuditLog } from './audit-log.js';
import type { ExecutionSupervisor } from '../engine/execution-supervisor.js';
import type { ExchangeClient } from '../types/index.js';

const log = createChildLogger('kill-switch');

export interface KillSwitchResult {
  readonly cancelledPlans: string[];
  /** Venue orders cancelled by the sweep */
  readonly sweptOrders: number;
  readonly sweepErrors: number;
}

/**
 * Kill switch
 * - halts the supervisor: new submissions are refused
 * - cancels every active and queued plan
 * - optionally sweeps the venue's open orders, including ones no plan tracks
 */
export class KillSwitch {
  private activated = false;
  private activatedAt: number | null = null;
  private reason: string | null = null;

  constructor(
    private readonly supervisor: ExecutionSupervisor,
    private readonly audit: AuditLog,
    private readonly exchange: ExchangeClient | null = null,
  ) {}

  async activate(reason: string, options: { sweepOpenOrders?: boolean; symbol?: string } = {}): Promise<KillSwitchResult> {
    if (this.activated) {
      log.warn('Kill switch already activated');
      return { cancelledPlans: [], sweptOrders: 0, sweepErrors: 0 };
    }

    this.activated = true;
    this.activatedAt = Date.now();
    this.reason = reason;

    log.error({ reason, sweep: options.sweepOpenOrders ?? false }, 'KILL SWITCH ACTIVATED');
    this.audit.critical('kill-switch', 'ACTIVATED', reason);
    const cancelledPlans = this.supervisor.halt(reason);

    let sweptOrders = 0;
    let sweepErrors = 0;
    if (options.sweepOpenOrders && this.exchange) {
      try {
        const open = await this.exchange.getOpenOrders(options.symbol);
        for (const order of open) {
          try {
            await this.exchange.cancelOrder(order.symbol, order.exchangeOrderId);
            sweptOrders++;
          } catch (err) {
            sweepErrors++;
            log.warn({ orderId: order.exchangeOrderId, err: classifyError(err) }, 'Sweep cancel failed');
          }
        }
      } catch (err) {
        sweepErrors++;
        log.error({ err: classifyError(err) }, 'Open order sweep failed');
        this.audit.critical('kill-switch', 'SWEEP_FAILED', describeError(err));
      }
      this.audit.critical('kill-switch', 'SWEEP', `cancelled ${sweptOrders} open order(s), ${sweepErrors} error(s)`);
    }

    return { cancelledPlans, sweptOrders, sweepErrors };
  }

  /** Manual reset: submissions are accepted again */
  deactivate(): void {
    if (!this.activated) return;

    this.activated = false;
    this.reason = null;
    this.supervisor.resume();
    log.info('Kill switch deactivated');
    this.audit.info('kill-switch', 'DEACTIVATED');
  }

  isActivated(): boolean {
    return this.activated;
  }

  getActivatedAt(): number | null {
    return this.activatedAt;
  }

  getReason(): string | null {
    return this.reason;
  }
}
