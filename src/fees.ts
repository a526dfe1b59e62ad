/**
 * Swap fee split between creator, staking pool, protocol and referrer.
 *
 * Creator and staking shares stay on the market as pending balances until
 * claimed. Protocol and referral shares are returned for the caller to settle.
 */

import { MAX_BPS, U64_MAX } from "./constants";
import { assertU16, assertU64, checkedAdd, checkedSub, mulDiv, Rounding } from "./math";

const BPS = BigInt(MAX_BPS);

/**
 * Fee configuration and accrued balances of one market
 */
export interface MarketFees {
  /** Creator share of every swap fee, in basis points */
  readonly creatorFeeShare: number;
  /** Staking pool share of every swap fee, in basis points */
  readonly stakingFeeShare: number;
  /** Creator fees not yet withdrawn */
  pendingCreatorFees: bigint;
  /** Staking fees not yet withdrawn */
  pendingStakingFees: bigint;
}

export interface FeeDistribution {
  creatorFee: bigint;
  stakingFee: bigint;
  protocolFee: bigint;
  referralFee: bigint;
}

export function shareOf(amount: bigint, shareBps: number): bigint {
  return mulDiv(amount, BigInt(shareBps), BPS, Rounding.Down);
}

/**
 * Split a swap fee and accrue the creator and staking parts.
 *
 * creator = fee * creatorShare / MAX_BPS, staking = fee * stakingShare / MAX_BPS,
 * referral = (fee - creator - staking) * referralShare / MAX_BPS, protocol gets the rest.
 * Every division floors, so the four parts always add up to `swapFee`.
 *
 * @param fees - Market fee state, updated in place
 * @param swapFee - Quote-side fee taken from the swap
 * @param referralFeeShare - Referrer's share of the non-creator, non-staking remainder
 * @throws CurveError(MathError) on overflow; pending balances are then left unchanged
 */
export function distributeFee(
  fees: MarketFees,
  swapFee: bigint,
  referralFeeShare?: number
): FeeDistribution {
  assertU64(swapFee, "swapFee");

  const creatorFee = shareOf(swapFee, fees.creatorFeeShare);
  const stakingFee = shareOf(swapFee, fees.stakingFeeShare);
  const remainingFee = checkedSub(checkedSub(swapFee, creatorFee), stakingFee);

  const referralFee =
    referralFeeShare === undefined
      ? 0n
      : shareOf(remainingFee, assertU16(referralFeeShare, "referralFeeShare"));
  const protocolFee = checkedSub(remainingFee, referralFee);

  const pendingCreatorFees = checkedAdd(fees.pendingCreatorFees, creatorFee, U64_MAX);
  const pendingStakingFees = checkedAdd(fees.pendingStakingFees, stakingFee, U64_MAX);
  fees.pendingCreatorFees = pendingCreatorFees;
  fees.pendingStakingFees = pendingStakingFees;

  return { creatorFee, stakingFee, protocolFee, referralFee };
}
