/**
 * Bonding Curve Market
 *
 * A market sells a fixed base token supply along a piecewise-linear curve made
 * of INTERVAL_NUMBER equal-width intervals. Buyers pay the ask curve, sellers
 * receive the bid curve, and the spread between the two funds the swap fee.
 *
 * Amounts enter and leave in token base units. Internally supply is rescaled to
 * SCALE precision (base: x * SCALE / BASE_PRECISION, quote: x * SCALE / 10^decimals)
 * so integration over an interval does not lose precision.
 */

import {
  BASE_PRECISION,
  INTERVAL_NUMBER,
  MAX_BPS,
  MAX_PRICE,
  MAX_TOTAL_SUPPLY,
  PRICES_LENGTH,
  SCALE,
} from "./constants";
import { Traversal, walkIntervals, type SegmentStep } from "./curve";
import { CurveError, mathError } from "./errors";
import type { MarketFees } from "./fees";
import { amounts, createLogger } from "./logger";
import {
  assertU16,
  assertU64,
  assertU8,
  checkedMul,
  checkedSub,
  div,
  getDeltaBaseIn,
  getDeltaBaseOut,
  getDeltaQuote,
  mulDiv,
  Rounding,
} from "./math";
import { SwapAmountType, SwapType, type SettledAmounts } from "./types";

const log = createLogger("market");

const LAST_PRICE = PRICES_LENGTH - 1;

/**
 * Parameters fixed when a market is created
 */
export interface MarketParams {
  /** Base tokens sold by the curve, in base units */
  totalSupply: bigint;
  /** Creator share of swap fees in basis points */
  creatorFeeShare: number;
  /** Staking share of swap fees in basis points */
  stakingFeeShare: number;
  /** Decimals of the quote token */
  quoteTokenDecimals: number;
}

/**
 * Curve state of one market.
 *
 * After creation only `baseReserve` and the pending fee balances change.
 */
export interface Market {
  /** Unsold base tokens still held by the curve */
  baseReserve: bigint;
  /** Price paid to sellers at each interval boundary (zeros until set) */
  bidPrices: bigint[];
  /** Price charged to buyers at each interval boundary (zeros until set) */
  askPrices: bigint[];
  /** Interval width in normalized units */
  readonly widthScaled: bigint;
  readonly totalSupply: bigint;
  readonly quoteTokenDecimals: number;
  fees: MarketFees;
}

// ============================================
// Creation & Validation
// ============================================

/**
 * Create a market with its full supply in reserve and no prices.
 *
 * @throws CurveError(InvalidTotalSupply) if the supply is above MAX_TOTAL_SUPPLY,
 *   leaves less than BASE_PRECISION per interval, or is not a multiple of INTERVAL_NUMBER
 * @throws CurveError(InvalidFeeShares) if creator and staking shares exceed 100%
 */
export function initializeMarket(params: MarketParams): Market {
  const totalSupply = assertU64(params.totalSupply, "totalSupply");
  const creatorFeeShare = assertU16(params.creatorFeeShare, "creatorFeeShare");
  const stakingFeeShare = assertU16(params.stakingFeeShare, "stakingFeeShare");
  const quoteTokenDecimals = assertU8(params.quoteTokenDecimals, "quoteTokenDecimals");

  const intervalSupply = totalSupply / INTERVAL_NUMBER;
  if (
    totalSupply > MAX_TOTAL_SUPPLY ||
    intervalSupply < BASE_PRECISION ||
    intervalSupply * INTERVAL_NUMBER !== totalSupply
  ) {
    throw new CurveError("InvalidTotalSupply", `${totalSupply}`);
  }

  if (creatorFeeShare + stakingFeeShare > MAX_BPS) {
    throw new CurveError(
      "InvalidFeeShares",
      `creator ${creatorFeeShare} + staking ${stakingFeeShare} exceeds ${MAX_BPS} bps`
    );
  }

  const market: Market = {
    baseReserve: totalSupply,
    bidPrices: new Array<bigint>(PRICES_LENGTH).fill(0n),
    askPrices: new Array<bigint>(PRICES_LENGTH).fill(0n),
    widthScaled: assertU64(normalizeBase(intervalSupply), "widthScaled"),
    totalSupply,
    quoteTokenDecimals,
    fees: {
      creatorFeeShare,
      stakingFeeShare,
      pendingCreatorFees: 0n,
      pendingStakingFees: 0n,
    },
  };

  log.debug(
    { ...amounts({ totalSupply, widthScaled: market.widthScaled }), quoteTokenDecimals },
    "market created"
  );
  return market;
}

/**
 * Set both price curves. Prices can only be set once.
 *
 * For every boundary i: bid[i] <= ask[i], and for i > 0 both arrays strictly
 * increase. The last ask price may not exceed MAX_PRICE. Nothing is written
 * unless every check passes.
 */
export function checkAndSetPrices(
  market: Market,
  bidPrices: readonly bigint[],
  askPrices: readonly bigint[]
): void {
  if (arePricesSet(market)) {
    throw new CurveError("PricesAlreadySet");
  }

  if (bidPrices.length !== PRICES_LENGTH || askPrices.length !== PRICES_LENGTH) {
    throw new CurveError(
      "InvalidPricesLength",
      `expected ${PRICES_LENGTH} prices, got bid ${bidPrices.length} / ask ${askPrices.length}`
    );
  }

  for (let i = 0; i < PRICES_LENGTH; i++) {
    const bidPrice = assertU64(bidPrices[i], `bidPrices[${i}]`);
    const askPrice = assertU64(askPrices[i], `askPrices[${i}]`);

    if (bidPrice > askPrice) {
      throw new CurveError("BidAskMismatch", `bid ${bidPrice} > ask ${askPrice} at index ${i}`);
    }

    if (i > 0 && (askPrice <= askPrices[i - 1] || bidPrice <= bidPrices[i - 1])) {
      throw new CurveError("DecreasingPrices", `at index ${i}`);
    }
  }

  if (askPrices[LAST_PRICE] > MAX_PRICE) {
    throw new CurveError("PriceTooHigh", `${askPrices[LAST_PRICE]} > ${MAX_PRICE}`);
  }

  market.bidPrices = [...bidPrices];
  market.askPrices = [...askPrices];

  log.debug(
    { bidPrices: market.bidPrices.map(String), askPrices: market.askPrices.map(String) },
    "prices set"
  );
}

/**
 * Validated ask prices strictly increase from a non-negative first entry, so
 * the last ask is non-zero exactly when prices have been set.
 */
export function arePricesSet(market: Market): boolean {
  return market.askPrices[LAST_PRICE] !== 0n;
}

/** Base tokens held outside the curve */
export function circulatingSupply(market: Market): bigint {
  return market.totalSupply > market.baseReserve ? market.totalSupply - market.baseReserve : 0n;
}

function assertPricesSet(market: Market): void {
  if (!arePricesSet(market)) {
    throw new CurveError("PricesNotSet");
  }
}

// ============================================
// Scale Conversion
// ============================================

function normalizeBase(amount: bigint): bigint {
  return checkedMul(amount, SCALE) / BASE_PRECISION;
}

function quotePrecision(market: Market): bigint {
  return 10n ** BigInt(market.quoteTokenDecimals);
}

// Lossy above 10 quote decimals: a sell target rounds up, a buy budget down
function normalizeQuote(market: Market, amount: bigint, rounding: Rounding): bigint {
  return mulDiv(amount, SCALE, quotePrecision(market), rounding);
}

function denormalizeBase(normalized: bigint, rounding: Rounding): bigint {
  return div(checkedMul(normalized, BASE_PRECISION), SCALE, rounding);
}

function denormalizeQuote(market: Market, normalized: bigint, rounding: Rounding): bigint {
  return div(checkedMul(normalized, quotePrecision(market)), SCALE, rounding);
}

// ============================================
// Forward Quotes (base known)
// ============================================

/**
 * Quote for a known base amount at the current supply.
 *
 * - ExactInput (selling base): prices [circulating - base, circulating) on the
 *   bid curve, rounded down.
 * - ExactOutput (buying base): prices [circulating, circulating + base) on the
 *   ask curve, rounded up.
 *
 * @returns [base settled, quote] where base settled is capped by the curve's end
 */
export function getQuoteAmount(
  market: Market,
  baseAmount: bigint,
  swapAmountType: SwapAmountType
): SettledAmounts {
  assertPricesSet(market);
  assertU64(baseAmount, "baseAmount");

  const supply = circulatingSupply(market);
  if (swapAmountType === SwapAmountType.ExactInput) {
    if (baseAmount > supply) {
      throw mathError(`cannot sell ${baseAmount} with ${supply} in circulation`);
    }
    return getQuoteAmountWithParameters(
      market,
      supply - baseAmount,
      baseAmount,
      swapAmountType,
      Rounding.Down
    );
  }

  return getQuoteAmountWithParameters(market, supply, baseAmount, swapAmountType, Rounding.Up);
}

/**
 * Integrate the bid (ExactInput) or ask (ExactOutput) curve over
 * [supply, supply + baseAmount) with the given rounding.
 */
export function getQuoteAmountWithParameters(
  market: Market,
  supply: bigint,
  baseAmount: bigint,
  swapAmountType: SwapAmountType,
  rounding: Rounding
): SettledAmounts {
  const prices =
    swapAmountType === SwapAmountType.ExactInput ? market.bidPrices : market.askPrices;

  const step: SegmentStep = ({ price0, price1, width, position }, baseLeft) => {
    const available = width - position;
    const deltaBase = baseLeft < available ? baseLeft : available;
    return [deltaBase, getDeltaQuote(price0, price1, width, position, deltaBase, rounding)];
  };

  const { budgetLeft, produced } = walkIntervals(
    prices,
    market.widthScaled,
    normalizeBase(supply),
    Traversal.Forward,
    normalizeBase(baseAmount),
    step
  );

  const baseSwapped = checkedSub(baseAmount, denormalizeBase(budgetLeft, rounding));
  const quoteSwapped = denormalizeQuote(market, produced, rounding);

  if (budgetLeft > 0n) {
    log.debug(amounts({ requested: baseAmount, settled: baseSwapped }), "curve end reached");
  }

  return [baseSwapped, quoteSwapped];
}

// ============================================
// Inverse Quotes (quote known)
// ============================================

/**
 * Base bought with a quote budget, walking the ask curve up from the current
 * supply. Base rounds down; unspent quote (curve end) is not settled.
 */
export function getBaseAmountOut(market: Market, quoteAmount: bigint): SettledAmounts {
  assertPricesSet(market);
  assertU64(quoteAmount, "quoteAmount");

  const step: SegmentStep = ({ price0, price1, width, position }, quoteLeft) => {
    const [deltaBase, deltaQuote] = getDeltaBaseOut(price0, price1, width, position, quoteLeft);
    return [deltaQuote, deltaBase];
  };

  return settleInverse(market, quoteAmount, market.askPrices, Traversal.Forward, step, Rounding.Down);
}

/**
 * Base that must be sold to raise a quote amount, walking the bid curve down
 * from the current supply (highest prices first). Base and the normalized
 * payout both round up.
 */
export function getBaseAmountIn(market: Market, quoteAmount: bigint): SettledAmounts {
  assertPricesSet(market);
  assertU64(quoteAmount, "quoteAmount");

  const step: SegmentStep = ({ price0, price1, width, position }, quoteLeft) => {
    const [deltaBase, deltaQuote] = getDeltaBaseIn(price0, price1, width, position, quoteLeft);
    return [deltaQuote, deltaBase];
  };

  return settleInverse(market, quoteAmount, market.bidPrices, Traversal.Backward, step, Rounding.Up);
}

/**
 * Base for a known quote amount: Buy spends it, Sell raises it.
 */
export function getBaseAmount(
  market: Market,
  quoteAmount: bigint,
  swapType: SwapType
): SettledAmounts {
  return swapType === SwapType.Buy
    ? getBaseAmountOut(market, quoteAmount)
    : getBaseAmountIn(market, quoteAmount);
}

function settleInverse(
  market: Market,
  quoteAmount: bigint,
  prices: readonly bigint[],
  traversal: Traversal,
  step: SegmentStep,
  rounding: Rounding
): SettledAmounts {
  const { budgetLeft, produced } = walkIntervals(
    prices,
    market.widthScaled,
    normalizeBase(circulatingSupply(market)),
    traversal,
    normalizeQuote(market, quoteAmount, rounding),
    step
  );

  const baseSwapped = denormalizeBase(produced, rounding);
  const quoteSwapped = checkedSub(quoteAmount, denormalizeQuote(market, budgetLeft, rounding));

  if (budgetLeft > 0n) {
    log.debug(amounts({ requested: quoteAmount, settled: quoteSwapped }), "curve end reached");
  }

  return [baseSwapped, quoteSwapped];
}

// ============================================
// Price Functions
// ============================================

/**
 * Curve price at the current circulating supply.
 *
 * Buy reads the ask curve rounded up, Sell the bid curve rounded down.
 *
 * @returns Price in SCALE units of quote per whole base token
 */
export function getSpotPrice(market: Market, swapType: SwapType): bigint {
  assertPricesSet(market);

  const [prices, rounding]: [bigint[], Rounding] =
    swapType === SwapType.Buy
      ? [market.askPrices, Rounding.Up]
      : [market.bidPrices, Rounding.Down];

  const supply = normalizeBase(circulatingSupply(market));
  const index = Number(supply / market.widthScaled);
  if (index >= LAST_PRICE) {
    return prices[LAST_PRICE];
  }

  const position = supply % market.widthScaled;
  const price0 = prices[index];
  return (
    price0 +
    mulDiv(checkedSub(prices[index + 1], price0), position, market.widthScaled, rounding)
  );
}
