/**
 * Unit tests for the interval walk
 */
import { describe, it, expect } from "vitest";
import { Traversal, walkIntervals, type IntervalSegment, type SegmentStep } from "./curve";
import { CurveError } from "./errors";

const PRICES = Array.from({ length: 11 }, (_, i) => BigInt(i * 100));
const WIDTH = 10n;

// Consumes as much of each interval as the budget allows and records what it saw
function recordingStep(seen: IntervalSegment[], traversal: Traversal): SegmentStep {
  return (segment, budgetLeft) => {
    seen.push(segment);
    const room =
      traversal === Traversal.Forward ? segment.width - segment.position : segment.position;
    const consumed = budgetLeft < room ? budgetLeft : room;
    return [consumed, consumed * BigInt(segment.index + 1)];
  };
}

describe("walkIntervals", () => {
  describe("Forward", () => {
    it("should start at the cursor's offset and reset it in later intervals", () => {
      const seen: IntervalSegment[] = [];
      const result = walkIntervals(
        PRICES,
        WIDTH,
        15n,
        Traversal.Forward,
        20n,
        recordingStep(seen, Traversal.Forward)
      );

      expect(seen).toEqual([
        { index: 1, price0: 100n, price1: 200n, width: WIDTH, position: 5n },
        { index: 2, price0: 200n, price1: 300n, width: WIDTH, position: 0n },
        { index: 3, price0: 300n, price1: 400n, width: WIDTH, position: 0n },
      ]);
      // 5 * 2 + 10 * 3 + 5 * 4
      expect(result).toEqual({ budgetLeft: 0n, produced: 60n });
    });

    it("should stop at the top of the curve", () => {
      const seen: IntervalSegment[] = [];
      const result = walkIntervals(
        PRICES,
        WIDTH,
        95n,
        Traversal.Forward,
        20n,
        recordingStep(seen, Traversal.Forward)
      );

      expect(seen.map((s) => s.index)).toEqual([9]);
      expect(result).toEqual({ budgetLeft: 15n, produced: 50n });
    });

    it("should do nothing from the end of the curve", () => {
      const seen: IntervalSegment[] = [];
      const result = walkIntervals(
        PRICES,
        WIDTH,
        100n,
        Traversal.Forward,
        7n,
        recordingStep(seen, Traversal.Forward)
      );

      expect(seen).toEqual([]);
      expect(result).toEqual({ budgetLeft: 7n, produced: 0n });
    });
  });

  describe("Backward", () => {
    it("should walk down from inside an interval", () => {
      const seen: IntervalSegment[] = [];
      const result = walkIntervals(
        PRICES,
        WIDTH,
        25n,
        Traversal.Backward,
        18n,
        recordingStep(seen, Traversal.Backward)
      );

      expect(seen).toEqual([
        { index: 2, price0: 200n, price1: 300n, width: WIDTH, position: 5n },
        { index: 1, price0: 100n, price1: 200n, width: WIDTH, position: 10n },
        { index: 0, price0: 0n, price1: 100n, width: WIDTH, position: 10n },
      ]);
      // 5 * 3 + 10 * 2 + 3 * 1
      expect(result).toEqual({ budgetLeft: 0n, produced: 38n });
    });

    it("should assign a boundary cursor to the interval below", () => {
      const seen: IntervalSegment[] = [];
      walkIntervals(PRICES, WIDTH, 100n, Traversal.Backward, 1n, recordingStep(seen, Traversal.Backward));

      expect(seen).toEqual([{ index: 9, price0: 900n, price1: 1000n, width: WIDTH, position: 10n }]);
    });

    it("should stop at zero supply", () => {
      const seen: IntervalSegment[] = [];
      const result = walkIntervals(
        PRICES,
        WIDTH,
        0n,
        Traversal.Backward,
        5n,
        recordingStep(seen, Traversal.Backward)
      );

      expect(seen).toEqual([]);
      expect(result).toEqual({ budgetLeft: 5n, produced: 0n });
    });
  });

  it("should skip the walk for an empty budget", () => {
    const seen: IntervalSegment[] = [];
    expect(
      walkIntervals(PRICES, WIDTH, 30n, Traversal.Forward, 0n, recordingStep(seen, Traversal.Forward))
    ).toEqual({ budgetLeft: 0n, produced: 0n });
    expect(seen).toEqual([]);
  });

  it("should reject a cursor beyond the curve", () => {
    const step: SegmentStep = () => [0n, 0n];
    expect(() => walkIntervals(PRICES, WIDTH, 110n, Traversal.Forward, 1n, step)).toThrow(CurveError);
    expect(() => walkIntervals(PRICES, WIDTH, -1n, Traversal.Backward, 1n, step)).toThrow(CurveError);
  });

  it("should reject a zero width", () => {
    const step: SegmentStep = () => [0n, 0n];
    expect(() => walkIntervals(PRICES, 0n, 0n, Traversal.Forward, 1n, step)).toThrow(
      "MathError: walkIntervals: interval width must be positive"
    );
  });

  it("should throw if a step consumes more than the budget", () => {
    const step: SegmentStep = () => [2n, 0n];
    expect(() => walkIntervals(PRICES, WIDTH, 0n, Traversal.Forward, 1n, step)).toThrow(CurveError);
  });
});
