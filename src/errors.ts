/**
 * Error type thrown by every curve operation.
 */

export type CurveErrorCode =
  | "MathError"
  | "InvalidTotalSupply"
  | "InvalidFeeShares"
  | "InvalidPricesLength"
  | "PricesAlreadySet"
  | "PricesNotSet"
  | "BidAskMismatch"
  | "DecreasingPrices"
  | "PriceTooHigh"
  | "AmountThresholdNotMet";

export class CurveError extends Error {
  readonly code: CurveErrorCode;

  constructor(code: CurveErrorCode, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "CurveError";
    this.code = code;
  }
}

/** Shorthand for the arithmetic failures raised all over the math module */
export function mathError(detail: string): CurveError {
  return new CurveError("MathError", detail);
}

export function isCurveError(value: unknown, code?: CurveErrorCode): value is CurveError {
  return value instanceof CurveError && (code === undefined || value.code === code);
}
