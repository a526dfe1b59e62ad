/**
 * Interval walk shared by every trade procedure.
 *
 * A trade consumes a budget (base or quote, normalized to SCALE) interval by
 * interval until the budget runs out or the curve ends. The walk only knows
 * how to locate the starting interval and move between intervals; what a
 * segment costs and yields is decided by the step callback.
 */

import { PRICES_LENGTH } from "./constants";
import { mathError } from "./errors";
import { checkedAdd, checkedSub } from "./math";

const LAST_INTERVAL = PRICES_LENGTH - 2;

export enum Traversal {
  /** Increasing supply, starting from the cursor's offset in its interval */
  Forward = 0,
  /** Decreasing supply, from the cursor down to zero */
  Backward = 1,
}

/**
 * One interval as seen by a step
 */
export interface IntervalSegment {
  /** Index of the interval (0-based) */
  index: number;
  /** Price at the interval's lower supply bound */
  price0: bigint;
  /** Price at the interval's upper supply bound */
  price1: bigint;
  /** Interval width in normalized units */
  width: bigint;
  /**
   * Forward: supply already used in the interval (offset from its lower bound).
   * Backward: supply available between the lower bound and the cursor.
   */
  position: bigint;
}

/**
 * Consume part of the budget in one interval
 * @returns [consumed, produced]
 */
export type SegmentStep = (segment: IntervalSegment, budgetLeft: bigint) => [bigint, bigint];

export interface WalkResult {
  /** Budget the curve could not absorb */
  budgetLeft: bigint;
  /** Sum of everything the steps produced */
  produced: bigint;
}

/**
 * Walk the curve from `normalizedSupply` in the given direction.
 *
 * @param prices - Bid or ask price array (PRICES_LENGTH entries)
 * @param width - Interval width in normalized units
 * @param normalizedSupply - Cursor position in normalized units
 * @param traversal - Direction of the walk
 * @param budget - Amount to consume
 * @param step - Per-interval pricing
 */
export function walkIntervals(
  prices: readonly bigint[],
  width: bigint,
  normalizedSupply: bigint,
  traversal: Traversal,
  budget: bigint,
  step: SegmentStep
): WalkResult {
  if (width <= 0n) {
    throw mathError("walkIntervals: interval width must be positive");
  }

  const startIndex = normalizedSupply / width;
  if (normalizedSupply < 0n || startIndex > BigInt(LAST_INTERVAL + 1)) {
    throw mathError(`walkIntervals: supply ${normalizedSupply} is beyond the curve`);
  }

  let index = Number(startIndex);
  let position = normalizedSupply % width;
  let budgetLeft = budget;
  let produced = 0n;

  if (traversal === Traversal.Backward && position === 0n) {
    // A cursor on a boundary belongs to the interval below it
    index -= 1;
    position = width;
  }

  const inRange = (): boolean =>
    traversal === Traversal.Forward ? index <= LAST_INTERVAL : index >= 0;

  while (budgetLeft > 0n && inRange()) {
    const [consumed, output] = step(
      { index, price0: prices[index], price1: prices[index + 1], width, position },
      budgetLeft
    );

    budgetLeft = checkedSub(budgetLeft, consumed);
    produced = checkedAdd(produced, output);

    if (traversal === Traversal.Forward) {
      position = 0n;
      index += 1;
    } else {
      position = width;
      index -= 1;
    }
  }

  return { budgetLeft, produced };
}
