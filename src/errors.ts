export type ErrorCode =
  | 'INVALID_PLAN'
  | 'INVALID_RANGE'
  | 'PLAN_NOT_FOUND'
  | 'ENGINE_HALTED'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'AUTH'
  | 'REJECTED'
  | 'ALREADY_FILLED'
  | 'ORDER_NOT_FOUND'
  | 'INVALID_RESPONSE';

export abstract class EngineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── submission / lookup ─────────────────────────────────────────────

export class InvalidPlanError extends EngineError {
  readonly code: ErrorCode = 'INVALID_PLAN';
}

export class InvalidRangeError extends InvalidPlanError {
  override readonly code: ErrorCode = 'INVALID_RANGE';
}

export class PlanNotFoundError extends EngineError {
  readonly code = 'PLAN_NOT_FOUND';

  constructor(readonly planId: string) {
    super(`Plan not found: ${planId}`);
  }
}

export class EngineHaltedError extends EngineError {
  readonly code = 'ENGINE_HALTED';
}

// ── exchange ────────────────────────────────────────────────────────

export abstract class ExchangeError extends EngineError {
  abstract readonly transient: boolean;
}

export abstract class TransientExchangeError extends ExchangeError {
  readonly transient = true;
}

export abstract class PermanentExchangeError extends ExchangeError {
  readonly transient = false;
}

export class NetworkError extends TransientExchangeError {
  readonly code = 'NETWORK';
}

export class TimeoutError extends TransientExchangeError {
  readonly code = 'TIMEOUT';
}

export class RateLimitedError extends TransientExchangeError {
  readonly code = 'RATE_LIMITED';

  constructor(message: string, readonly retryAfterMs: number | null = null) {
    super(message);
  }
}

export class AuthError extends PermanentExchangeError {
  readonly code = 'AUTH';
}

export class RejectedError extends PermanentExchangeError {
  readonly code = 'REJECTED';

  constructor(readonly reason: string, readonly venueCode: number | null = null) {
    super(`Order rejected: ${reason}`);
  }
}

/** cancelOrder: the order executed before the cancel landed */
export class AlreadyFilledError extends PermanentExchangeError {
  readonly code = 'ALREADY_FILLED';

  constructor(readonly exchangeOrderId: string) {
    super(`Order already filled: ${exchangeOrderId}`);
  }
}

/** cancelOrder: the venue does not know the order (or it is closed without fill) */
export class OrderNotFoundError extends PermanentExchangeError {
  readonly code = 'ORDER_NOT_FOUND';

  constructor(readonly exchangeOrderId: string) {
    super(`Order not found: ${exchangeOrderId}`);
  }
}

/** The venue answered with a body that does not match its documented shape */
export class InvalidResponseError extends PermanentExchangeError {
  readonly code = 'INVALID_RESPONSE';
}

const NETWORK_CODES = /ECONNRESET|ETIMEDOUT|ENETUNREACH|ECONNREFUSED|EAI_AGAIN|EPIPE|UND_ERR_SOCKET/;
const TIMEOUT_CODES = /UND_ERR_HEADERS_TIMEOUT|UND_ERR_BODY_TIMEOUT|UND_ERR_CONNECT_TIMEOUT/;

function errorCodeOf(err: unknown): string {
  if (!err || typeof err !== 'object') return '';
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string') return code.toUpperCase();
  const cause = 'cause' in err ? err.cause : undefined;
  return cause && cause !== err ? errorCodeOf(cause) : '';
}

/** Maps any thrown value onto the exchange taxonomy; unknown failures count as NetworkError */
export function classifyError(err: unknown): ExchangeError {
  if (err instanceof ExchangeError) return err;
  const code = errorCodeOf(err);
  const message = err instanceof Error ? err.message : String(err);
  if (TIMEOUT_CODES.test(code) || (err instanceof Error && err.name === 'TimeoutError')) {
    return new TimeoutError(message, { cause: err });
  }
  if (NETWORK_CODES.test(code)) {
    return new NetworkError(message, { cause: err });
  }
  return new NetworkError(message || 'Unknown exchange failure', { cause: err });
}

export function describeError(err: unknown): string {
  if (err instanceof EngineError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
