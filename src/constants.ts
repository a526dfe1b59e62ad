/**
 * Shared constants used across the bonding curve math.
 *
 * Every amount is a bigint in token base units. Prices are quote tokens per
 * base token multiplied by SCALE.
 */

// ============================================
// Curve Shape
// ============================================

/** Number of entries in each price array (one per interval boundary) */
export const PRICES_LENGTH = 11;

/** Number of equal-width supply intervals */
export const INTERVAL_NUMBER = BigInt(PRICES_LENGTH - 1);

// ============================================
// Precision Constants
// ============================================

/** Decimals of every base token minted against a curve */
export const BASE_TOKEN_DECIMALS = 6;

/** One whole base token (1e6), also the smallest allowed interval width */
export const BASE_PRECISION = 10n ** BigInt(BASE_TOKEN_DECIMALS);

/** Working precision used while integrating over the curve (1e10) */
export const SCALE = 10n ** 10n;

// ============================================
// Limits
// ============================================

/** Largest total supply a market may be created with (1e9 tokens) */
export const MAX_TOTAL_SUPPLY = 1_000_000_000n * BASE_PRECISION;

/** Ceiling for the last ask price (1e18) */
export const MAX_PRICE = 10n ** 18n;

// ============================================
// Integer Widths
// ============================================

export const U8_MAX = 0xff;
export const U16_MAX = 0xffff;
export const U64_MAX = 2n ** 64n - 1n;
export const U128_MAX = 2n ** 128n - 1n;
export const U256_MAX = 2n ** 256n - 1n;

// ============================================
// Basis Points
// ============================================

/** Basis points denominator (10000 = 100%) */
export const MAX_BPS = 10_000;
