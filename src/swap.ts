/**
 * Swap Settlement
 *
 * Combines the curve quotes, the fee split and the reserve update into one
 * trade. Buyers pay the ask curve; the part of their payment above what the
 * bid curve values the same base at is the swap fee. Sellers are paid from the
 * bid curve and pay no fee.
 */

import { MAX_BPS } from "./constants";
import { CurveError, mathError } from "./errors";
import { distributeFee, type FeeDistribution } from "./fees";
import { amounts, createLogger } from "./logger";
import {
  circulatingSupply,
  getBaseAmountIn,
  getBaseAmountOut,
  getQuoteAmount,
  getQuoteAmountWithParameters,
  type Market,
} from "./market";
import { assertU16, assertU64, checkedSub, Rounding } from "./math";
import { SwapAmountType, SwapType } from "./types";

const log = createLogger("swap");

export interface SwapParams {
  swapType: SwapType;
  swapAmountType: SwapAmountType;
  /**
   * Fixed side of the trade: base for Buy/ExactOutput and Sell/ExactInput,
   * quote for Buy/ExactInput and Sell/ExactOutput.
   */
  amount: bigint;
  /**
   * Minimum output (ExactInput) or maximum input (ExactOutput).
   * Omit to accept any amount.
   */
  otherAmountThreshold?: bigint;
  /** Referrer's share of the protocol part of the fee, in basis points */
  referralFeeShare?: number;
}

export interface SwapQuote {
  /** Base tokens moved */
  baseAmount: bigint;
  /** Quote tokens moved, fee included */
  quoteAmount: bigint;
  /** Quote-side fee (zero on sells) */
  swapFee: bigint;
  /** Amount the trader gives up */
  amountIn: bigint;
  /** Amount the trader receives */
  amountOut: bigint;
}

export interface SwapResult extends SwapQuote {
  fees: FeeDistribution;
}

/**
 * Compute a swap without changing the market
 */
export function quoteSwap(market: Market, params: SwapParams): SwapQuote {
  const { swapType, swapAmountType, amount } = params;

  if (swapType === SwapType.Buy) {
    const [baseAmount, quoteAmount] =
      swapAmountType === SwapAmountType.ExactInput
        ? getBaseAmountOut(market, amount)
        : getQuoteAmount(market, amount, SwapAmountType.ExactOutput);

    // Value of the same base on the bid curve; the spread above it is the fee
    const [, bidQuote] = getQuoteAmountWithParameters(
      market,
      circulatingSupply(market),
      baseAmount,
      SwapAmountType.ExactInput,
      Rounding.Down
    );

    return {
      baseAmount,
      quoteAmount,
      swapFee: checkedSub(quoteAmount, bidQuote),
      amountIn: quoteAmount,
      amountOut: baseAmount,
    };
  }

  const [baseAmount, quoteAmount] =
    swapAmountType === SwapAmountType.ExactInput
      ? getQuoteAmount(market, amount, SwapAmountType.ExactInput)
      : getBaseAmountIn(market, amount);

  return {
    baseAmount,
    quoteAmount,
    swapFee: 0n,
    amountIn: baseAmount,
    amountOut: quoteAmount,
  };
}

/**
 * Execute a swap against the market's accounting.
 *
 * Moves base between the reserve and circulation and accrues creator and
 * staking fees. The market is unchanged if any check fails.
 *
 * @throws CurveError(AmountThresholdNotMet) if the slippage guard fails
 */
export function swap(market: Market, params: SwapParams): SwapResult {
  const quote = quoteSwap(market, params);
  const { otherAmountThreshold } = params;

  if (otherAmountThreshold !== undefined) {
    if (params.swapAmountType === SwapAmountType.ExactInput && quote.amountOut < otherAmountThreshold) {
      throw new CurveError(
        "AmountThresholdNotMet",
        `output ${quote.amountOut} below minimum ${otherAmountThreshold}`
      );
    }
    if (params.swapAmountType === SwapAmountType.ExactOutput && quote.amountIn > otherAmountThreshold) {
      throw new CurveError(
        "AmountThresholdNotMet",
        `input ${quote.amountIn} above maximum ${otherAmountThreshold}`
      );
    }
  }

  const baseReserve =
    params.swapType === SwapType.Buy
      ? checkedSub(market.baseReserve, quote.baseAmount)
      : market.baseReserve + quote.baseAmount;
  if (baseReserve > market.totalSupply) {
    throw mathError(`base reserve ${baseReserve} above total supply ${market.totalSupply}`);
  }

  // Fee accrual is the only other mutation and it is all-or-nothing
  const fees = distributeFee(market.fees, quote.swapFee, params.referralFeeShare);
  market.baseReserve = baseReserve;

  log.debug(
    {
      swapType: SwapType[params.swapType],
      swapAmountType: SwapAmountType[params.swapAmountType],
      ...amounts({
        baseAmount: quote.baseAmount,
        quoteAmount: quote.quoteAmount,
        swapFee: quote.swapFee,
        baseReserve,
      }),
    },
    "swap settled"
  );

  return { ...quote, fees };
}

// ============================================
// Slippage Helpers
// ============================================

function assertSlippageBps(slippageBps: number): bigint {
  if (assertU16(slippageBps, "slippageBps") > MAX_BPS) {
    throw mathError(`slippageBps out of range: ${slippageBps}`);
  }
  return BigInt(slippageBps);
}

/**
 * Minimum acceptable output for an ExactInput swap
 */
export function calculateMinAmountOut(expectedOutput: bigint, slippageBps: number): bigint {
  const bps = assertSlippageBps(slippageBps);
  return (assertU64(expectedOutput, "expectedOutput") * (BigInt(MAX_BPS) - bps)) / BigInt(MAX_BPS);
}

/**
 * Maximum acceptable input for an ExactOutput swap (rounded up)
 */
export function calculateMaxAmountIn(expectedInput: bigint, slippageBps: number): bigint {
  const bps = assertSlippageBps(slippageBps);
  const numerator = assertU64(expectedInput, "expectedInput") * (BigInt(MAX_BPS) + bps);
  return (numerator + BigInt(MAX_BPS) - 1n) / BigInt(MAX_BPS);
}
