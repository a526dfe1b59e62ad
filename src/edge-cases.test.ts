/**
 * Edge case tests for markets at the supply and price ceilings.
 * Intermediates here reach the top of the u128/u256 ranges.
 */
import { describe, it, expect } from "vitest";
import {
  initializeMarket,
  checkAndSetPrices,
  getQuoteAmount,
  getBaseAmountOut,
  getBaseAmountIn,
  getSpotPrice,
  type Market,
} from "./market";
import { MAX_PRICE, MAX_TOTAL_SUPPLY, PRICES_LENGTH } from "./constants";
import { CurveError } from "./errors";
import { SwapAmountType, SwapType } from "./types";

// bid[i] = i * 1e17, ask one unit above, last ask exactly MAX_PRICE
const BID = Array.from({ length: PRICES_LENGTH }, (_, i) => BigInt(i) * 10n ** 17n);
const ASK = BID.map((p, i) => (i === PRICES_LENGTH - 1 ? MAX_PRICE : p + 1n));

function createMaxMarket(quoteTokenDecimals: number): Market {
  const market = initializeMarket({
    totalSupply: MAX_TOTAL_SUPPLY,
    creatorFeeShare: 0,
    stakingFeeShare: 0,
    quoteTokenDecimals,
  });
  checkAndSetPrices(market, BID, ASK);
  return market;
}

describe("Ceiling Markets", () => {
  describe("Maximum supply and price", () => {
    it("should use the widest interval", () => {
      expect(createMaxMarket(0).widthScaled).toBe(10n ** 18n);
    });

    it("should price the whole curve without overflow", () => {
      const market = createMaxMarket(0);
      expect(getQuoteAmount(market, MAX_TOTAL_SUPPLY, SwapAmountType.ExactOutput)).toEqual([
        MAX_TOTAL_SUPPLY,
        50_000_000_000_000_001n,
      ]);
    });

    it("should buy the whole curve back from its own price", () => {
      const market = createMaxMarket(0);
      expect(getBaseAmountOut(market, 50_000_000_000_000_001n)).toEqual([
        MAX_TOTAL_SUPPLY,
        50_000_000_000_000_001n,
      ]);
    });

    it("should sell from a fully distributed curve", () => {
      const market = createMaxMarket(0);
      market.baseReserve = 0n;

      expect(getQuoteAmount(market, MAX_TOTAL_SUPPLY, SwapAmountType.ExactInput)).toEqual([
        MAX_TOTAL_SUPPLY,
        50_000_000_000_000_000n,
      ]);
      expect(getBaseAmountIn(market, 10n ** 16n)).toEqual([105_572_809_000_085n, 10n ** 16n]);
      expect(getSpotPrice(market, SwapType.Buy)).toBe(MAX_PRICE);
    });

    it("should refuse a quote that does not fit u64 instead of truncating it", () => {
      const market = createMaxMarket(6);
      expect(() => getQuoteAmount(market, MAX_TOTAL_SUPPLY, SwapAmountType.ExactOutput)).toThrow(
        CurveError
      );
    });
  });

  describe("Near-zero prices", () => {
    it("should charge at least one unit for the smallest buy", () => {
      expect(getQuoteAmount(createMaxMarket(0), 1n, SwapAmountType.ExactOutput)).toEqual([1n, 1n]);
    });

    it("should solve on an almost flat start of the curve", () => {
      // sqrt(2 * width * SCALE * quote / slope) with price ~0 at zero supply
      expect(getBaseAmountOut(createMaxMarket(0), 1n)).toEqual([4_472_135n, 1n]);
      expect(getBaseAmountOut(createMaxMarket(0), 100_000_000n)).toEqual([44_721_359_549n, 100_000_000n]);
    });
  });
});
