export interface LedgerErrorDescriptor {
  status: number;
  /** A retry of the same request may succeed once contention clears. */
  retryable: boolean;
}

export const LEDGER_ERROR_CODES = {
  NOT_FOUND: { status: 404, retryable: false },
  DUPLICATE_MOBILE: { status: 409, retryable: false },
  ACCOUNT_EXISTS: { status: 409, retryable: false },
  INVALID_PIN: { status: 401, retryable: false },
  INVALID_AMOUNT: { status: 400, retryable: false },
  INVALID_INPUT: { status: 400, retryable: false },
  INSUFFICIENT_FUNDS: { status: 400, retryable: false },
  SAME_ACCOUNT: { status: 400, retryable: false },
  CONFLICT: { status: 409, retryable: true },
  EXHAUSTED_KEYSPACE: { status: 503, retryable: false },
  INVALID_CONFIG: { status: 500, retryable: false },
} as const satisfies Record<string, LedgerErrorDescriptor>;

export type LedgerErrorCode = keyof typeof LEDGER_ERROR_CODES;

export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "LedgerError";
  }

  get status(): number {
    return LEDGER_ERROR_CODES[this.code].status;
  }

  get retryable(): boolean {
    return LEDGER_ERROR_CODES[this.code].retryable;
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}
