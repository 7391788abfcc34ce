import { describe, it, expect } from "vitest";
import { summarizePositions } from "../src/position_valuation";
import { aggregateRangeDistribution, currentRangeAmounts } from "../src/range_distribution";
import { D, tickToPrice, tickToSqrtPrice } from "../src/tick_math";

// Two positions with spacing 10:
//   A: [-20, 20) with L = 1_000_000
//   B: [0, 30)   with L =   500_000
const TICK_DELTAS = new Map<number, bigint>([
  [-20, 1_000_000n],
  [0, 500_000n],
  [20, -1_000_000n],
  [30, -500_000n],
]);
const SPACING = 10;
const CURRENT_TICK = 5;

function liquidityByTick(ranges: Array<{ tickLower: number; liquidity: bigint }>): Array<[number, bigint]> {
  return ranges.map((r) => [r.tickLower, r.liquidity]);
}

describe("aggregateRangeDistribution - sweep from zero", () => {
  const distribution = aggregateRangeDistribution({
    tickDeltas: TICK_DELTAS,
    currentTick: CURRENT_TICK,
    tickSpacing: SPACING,
    currentPrice: tickToPrice(CURRENT_TICK),
  });

  it("should accumulate liquidityNet over every range", () => {
    expect(liquidityByTick(distribution.ranges)).toEqual([
      [-20, 1_000_000n],
      [-10, 1_000_000n],
      [0, 1_500_000n],
      [10, 1_500_000n],
      [20, 500_000n],
      [30, 0n],
    ]);
  });

  it("should classify ranges against the current range", () => {
    expect(distribution.currentRangeBottomTick).toBe(0);
    expect(distribution.ranges.map((r) => r.position)).toEqual([
      "below",
      "below",
      "current",
      "above",
      "above",
      "above",
    ]);
  });

  it("should lock token1 below the price and token0 above it", () => {
    const [lowest, , current, above] = distribution.ranges;

    expect(lowest.locked0.isZero()).toBe(true);
    expect(lowest.locked1.toFixed(2)).toBe("499.60");
    // What the locked token1 would be worth in token0
    expect(lowest.amount0.toFixed(2)).toBe("500.35");

    expect(current.amount0.toFixed(2)).toBe("374.84");
    expect(current.amount1.toFixed(2)).toBe("375.03");

    expect(above.locked1.isZero()).toBe(true);
    expect(above.locked0.toFixed(2)).toBe("749.40");
    expect(above.amount1.toFixed(2)).toBe("750.53");
  });

  it("should add up the locked amounts", () => {
    expect(distribution.totalAmount0.toFixed(2)).toBe("1373.92");
    expect(distribution.totalAmount1.toFixed(2)).toBe("1374.48");
  });

  it("should match the totals of the positions it was built from", () => {
    const summary = summarizePositions(
      [
        { id: "1", tickLower: -20, tickUpper: 20, liquidity: 1_000_000n },
        { id: "2", tickLower: 0, tickUpper: 30, liquidity: 500_000n },
      ],
      { currentTick: CURRENT_TICK, sqrtPrice: tickToSqrtPrice(CURRENT_TICK), liquidity: 1_500_000n }
    );
    expect(distribution.totalAmount0.sub(summary.totalAmount0).abs().lt(D("1e-50"))).toBe(true);
    expect(distribution.totalAmount1.sub(summary.totalAmount1).abs().lt(D("1e-50"))).toBe(true);
  });
});

describe("aggregateRangeDistribution - anchored sweep", () => {
  it("should agree with the zero-start sweep on a complete map", () => {
    const base = {
      tickDeltas: TICK_DELTAS,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
      currentPrice: tickToPrice(CURRENT_TICK),
    };
    const fromZero = aggregateRangeDistribution(base);
    const anchored = aggregateRangeDistribution({ ...base, anchorLiquidity: 1_500_000n });

    expect(liquidityByTick(anchored.ranges)).toEqual(liquidityByTick(fromZero.ranges));
    expect(anchored.totalAmount0.eq(fromZero.totalAmount0)).toBe(true);
    expect(anchored.totalAmount1.eq(fromZero.totalAmount1)).toBe(true);
  });

  it("should pin the current range to the anchor when lower ticks are missing", () => {
    // Only the ticks above the price were fetched
    const partial = new Map<number, bigint>([
      [20, -1_000_000n],
      [30, -500_000n],
    ]);
    const base = {
      tickDeltas: partial,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
      currentPrice: tickToPrice(CURRENT_TICK),
    };

    const fromZero = aggregateRangeDistribution(base);
    expect(liquidityByTick(fromZero.ranges)).toEqual([
      [20, -1_000_000n],
      [30, -1_500_000n],
    ]);

    const anchored = aggregateRangeDistribution({ ...base, anchorLiquidity: 1_500_000n });
    expect(liquidityByTick(anchored.ranges)).toEqual([
      [0, 1_500_000n],
      [10, 1_500_000n],
      [20, 500_000n],
      [30, 0n],
    ]);
  });

  it("should walk downward by undoing deltas", () => {
    const deltas = new Map<number, bigint>([
      [-30, 100n],
      [-10, 50n],
      [10, -150n],
    ]);
    const anchored = aggregateRangeDistribution({
      tickDeltas: deltas,
      currentTick: 0,
      tickSpacing: SPACING,
      currentPrice: 1,
      anchorLiquidity: 150n,
    });
    expect(liquidityByTick(anchored.ranges)).toEqual([
      [-30, 100n],
      [-20, 100n],
      [-10, 150n],
      [0, 150n],
      [10, 0n],
    ]);
  });
});

describe("aggregateRangeDistribution - edge cases", () => {
  it("should return an empty distribution for an empty map", () => {
    const distribution = aggregateRangeDistribution({
      tickDeltas: new Map(),
      currentTick: 123,
      tickSpacing: 60,
      currentPrice: tickToPrice(123),
    });
    expect(distribution.ranges).toEqual([]);
    expect(distribution.totalAmount0.isZero()).toBe(true);
    expect(distribution.totalAmount1.isZero()).toBe(true);
    expect(distribution.currentRangeBottomTick).toBe(120);
  });

  it("should treat a tick on a boundary as the bottom of its own range", () => {
    const distribution = aggregateRangeDistribution({
      tickDeltas: TICK_DELTAS,
      currentTick: 10,
      tickSpacing: SPACING,
      currentPrice: tickToPrice(10),
    });
    expect(distribution.currentRangeBottomTick).toBe(10);
    const positions = distribution.ranges.map((r) => [r.tickLower, r.position]);
    expect(positions).toContainEqual([0, "below"]);
    expect(positions).toContainEqual([10, "current"]);
  });

  it("should floor negative current ticks", () => {
    const distribution = aggregateRangeDistribution({
      tickDeltas: TICK_DELTAS,
      currentTick: -1,
      tickSpacing: SPACING,
      currentPrice: tickToPrice(-1),
    });
    expect(distribution.currentRangeBottomTick).toBe(-10);
  });

  it("should split the current range at the pool price without clamping", () => {
    // Price reported two ticks past the top of the current range
    const distribution = aggregateRangeDistribution({
      tickDeltas: TICK_DELTAS,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
      currentPrice: tickToPrice(12),
    });
    const current = distribution.ranges.find((r) => r.position === "current");
    expect(current).toBeDefined();
    if (!current) return;

    const L = D(1_500_000);
    const expected1 = L.mul(tickToSqrtPrice(12).sub(1));
    expect(current.amount1.sub(expected1).abs().lt(D("1e-60"))).toBe(true);
    expect(current.amount0.isNegative()).toBe(true);
  });
});

describe("currentRangeAmounts", () => {
  it("should split the pool liquidity at the tick's sqrt price by default", () => {
    const { tickLower, tickUpper, amount0, amount1 } = currentRangeAmounts({
      liquidity: 1_500_000n,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
    });
    expect(tickLower).toBe(0);
    expect(tickUpper).toBe(10);
    expect(amount0.toFixed(2)).toBe("374.84");
    expect(amount1.toFixed(2)).toBe("375.03");
  });

  it("should clamp a price outside the current range", () => {
    const below = currentRangeAmounts({
      liquidity: 1_500_000n,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
      sqrtPrice: 1,
    });
    expect(below.amount0.toFixed(2)).toBe("749.78");
    expect(below.amount1.isZero()).toBe(true);

    const above = currentRangeAmounts({
      liquidity: 1_500_000n,
      currentTick: CURRENT_TICK,
      tickSpacing: SPACING,
      sqrtPrice: tickToSqrtPrice(20),
    });
    expect(above.amount0.isZero()).toBe(true);
    expect(above.amount1.eq(D(1_500_000).mul(tickToSqrtPrice(10).sub(1)))).toBe(true);
  });
});
