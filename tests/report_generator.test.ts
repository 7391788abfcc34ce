import { describe, it, expect } from "vitest";
import { crossCheckBounds } from "../src/bound_solver";
import { aggregateRangeDistribution } from "../src/range_distribution";
import { formatBoundCheck, formatCurrentPrice, formatRangeDistribution, formatVolatility } from "../src/report_generator";
import { D, tickToPrice } from "../src/tick_math";

describe("formatCurrentPrice", () => {
  it("should adjust for token decimals", () => {
    // raw 1.0001^0 = 1 with 6 / 8 decimals -> 0.01
    const line = formatCurrentPrice({
      tick: 0,
      token0: { symbol: "USDC", decimals: 6 },
      token1: { symbol: "WBTC", decimals: 8 },
    });
    expect(line).toBe("Current price=0.010000 WBTC for USDC at tick 0");
  });
});

describe("formatRangeDistribution", () => {
  it("should print dollar prices when token0 is a stablecoin", () => {
    const pool = {
      tick: 5,
      token0: { symbol: "USDC", decimals: 0 },
      token1: { symbol: "WETH", decimals: 0 },
    };
    const distribution = aggregateRangeDistribution({
      tickDeltas: new Map([
        [-20, 100n],
        [20, -100n],
      ]),
      currentTick: 5,
      tickSpacing: 10,
      currentPrice: tickToPrice(5),
    });

    const lines = formatRangeDistribution(distribution, pool);

    expect(lines[0]).toBe("ticks=[-20, -10], bottom tick price=1.002002 USDC for WETH");
    expect(lines).toContain("        Current price=0.999500 USDC for WETH");
  });

  it("should still print totals for an empty pool", () => {
    const lines = formatRangeDistribution(
      { ranges: [], totalAmount0: D(0), totalAmount1: D(0), currentRangeBottomTick: 0 },
      { tick: 0, token0: { symbol: "AAA", decimals: 0 }, token1: { symbol: "BBB", decimals: 0 } }
    );
    expect(lines).toEqual(["In total: 0.00 AAA and 0.00 BBB"]);
  });
});

describe("formatBoundCheck", () => {
  it("should append one line per warning", () => {
    const input = { x: 1, y: 4, price: 20, lower: 19.027, upper: 25.993 };
    const lines = formatBoundCheck(input, crossCheckBounds({ ...input, tolerance: 0.0001 }));

    expect(lines).toHaveLength(9 + 6);
    expect(lines[lines.length - 1]).toBe("⚠️  amount0 off by 0.2578% (tolerance 0.01%)");
  });
});

describe("formatVolatility", () => {
  it("should print the locked value even without day data", () => {
    expect(formatVolatility(D("1234.4"), [])).toEqual(["1234 USD locked in the current tick range"]);
  });
});
