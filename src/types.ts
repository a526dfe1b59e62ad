/**
 * Trade direction: buying base with quote, or selling base for quote
 */
export enum SwapType {
  Buy = 0,
  Sell = 1,
}

/**
 * Which side of the trade the caller fixes
 */
export enum SwapAmountType {
  /** The amount given up is known */
  ExactInput = 0,
  /** The amount received is known */
  ExactOutput = 1,
}

/** Amounts a curve computation actually settled */
export type SettledAmounts = [baseAmount: bigint, quoteAmount: bigint];
