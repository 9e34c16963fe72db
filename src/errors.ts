export type ExchangeErrorCode =
  | "INVALID_RECORD"
  | "ROW_COMPUTATION"
  | "INVALID_CONFIG"
  | "INVALID_REFERENCE_DATA"
  | "MISSING_SETTLEMENT_DATE"
  | "INVALID_OPERATION";

export class ExchangeError extends Error {
  constructor(
    public readonly code: ExchangeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ExchangeError";
  }
}

/**
 * Failure while valuing a single row. Carries enough to point the user at the offending row.
 */
export class RowComputationError extends ExchangeError {
  constructor(
    public readonly index: number,
    public readonly identifier: string,
    message: string,
    code: ExchangeErrorCode = "ROW_COMPUTATION",
    options?: ErrorOptions
  ) {
    super(code, message, { index, identifier }, options);
    this.name = "RowComputationError";
  }
}
