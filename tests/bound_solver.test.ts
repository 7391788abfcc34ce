import { describe, it, expect } from "vitest";
import {
  crossCheckBounds,
  lowerBoundFromAmounts,
  lowerBoundFromLiquidity,
  lowerRatio,
  upperBoundFromAmounts,
  upperBoundFromLiquidity,
  upperRatio,
} from "../src/bound_solver";
import { DomainError } from "../src/errors";
import { D } from "../src/tick_math";

function relativeError(expected: number, actual: number): number {
  return Math.abs(1 - actual / expected);
}

// Position with L = 2 in [4, 9] at price 6.25 (sqrt prices 2, 3, 2.5):
// x = 2 * 0.5 / 7.5 = 2/15, y = 2 * 0.5 = 1
const X = D(2).div(15);
const Y = 1;

describe("Lower bound solvers", () => {
  it("should solve through liquidity", () => {
    // (sp - y / L)^2 = (3 - 2 / 2)^2
    expect(lowerBoundFromLiquidity(2, 3, 2).toString()).toBe("4");
  });

  it("should solve through the amount ratio", () => {
    expect(lowerBoundFromAmounts(2.5, 3, X, Y).toNumber()).toBeCloseTo(4, 12);
  });

  it("should throw non-invertible on zero liquidity", () => {
    expect(() => lowerBoundFromLiquidity(0, 3, 1)).toThrow(DomainError);
  });

  it("should throw non-invertible on zero token0", () => {
    try {
      lowerBoundFromAmounts(2.5, 3, 0, 1);
      expect.unreachable("expected a DomainError");
    } catch (error) {
      expect(error).toBeInstanceOf(DomainError);
      if (error instanceof DomainError) {
        expect(error.kind).toBe("non-invertible");
      }
    }
  });
});

describe("Upper bound solvers", () => {
  it("should solve through liquidity", () => {
    // (L * sp / (L - sp * x))^2 = (6 * 2 / (6 - 2))^2
    expect(upperBoundFromLiquidity(6, 2, 1).toString()).toBe("9");
  });

  it("should solve through the amount ratio", () => {
    expect(upperBoundFromAmounts(2.5, 2, X, Y).toNumber()).toBeCloseTo(9, 12);
  });

  it("should throw non-invertible when L equals sp * x", () => {
    try {
      upperBoundFromLiquidity(2, 2, 1);
      expect.unreachable("expected a DomainError");
    } catch (error) {
      expect(error).toBeInstanceOf(DomainError);
      if (error instanceof DomainError) {
        expect(error.kind).toBe("non-invertible");
        expect(error.message).toBe("Non-invertible input: L - sp * x is zero");
      }
    }
  });
});

describe("Bounds as ratios of the price", () => {
  it("should recover c from d", () => {
    // d = 2 / 2.5, expected c = 3 / 2.5
    expect(upperRatio(6.25, 0.8, X, Y).toNumber()).toBeCloseTo(1.2, 12);
  });

  it("should recover d from c", () => {
    expect(lowerRatio(6.25, 1.2, X, Y).toNumber()).toBeCloseTo(0.8, 12);
  });

  it("should recover 1500 and 2500 for 2 token0 at 2000", () => {
    const price = D(2000);
    const sp = price.sqrt();
    const sa = D(1500).sqrt();
    const sb = D(2500).sqrt();
    const y = D("5076.1023594798770952818643356618877707652075176220362072588131043109");

    const c = upperRatio(price, sa.div(sp), 2, y);
    const d = lowerRatio(price, sb.div(sp), 2, y);
    expect(c.pow(2).mul(price).toNumber()).toBeCloseTo(2500, 8);
    expect(d.pow(2).mul(price).toNumber()).toBeCloseTo(1500, 8);
  });
});

describe("crossCheckBounds", () => {
  const simple = { x: 1, y: 4, price: 20, lower: 19.027, upper: 25.993 };

  it("should take the token1-bound liquidity", () => {
    // L0 = 36.411, L1 = 36.317
    const result = crossCheckBounds(simple);
    expect(result.liquidity.toNumber()).toBeCloseTo(36.317084939, 8);
  });

  it("should recover every bound within 1%", () => {
    const result = crossCheckBounds(simple);
    expect(result.lowerFromLiquidity.toNumber()).toBeCloseTo(19.027, 10);
    expect(result.lowerFromAmounts.toNumber()).toBeCloseTo(19.029477, 6);
    expect(result.upperFromLiquidity.toNumber()).toBeCloseTo(26.011826, 6);
    expect(result.upperFromAmounts.toNumber()).toBeCloseTo(26.011826, 6);

    for (const value of [result.lowerFromLiquidity, result.lowerFromAmounts]) {
      expect(relativeError(simple.lower, value.toNumber())).toBeLessThan(0.01);
    }
    for (const value of [result.upperFromLiquidity, result.upperFromAmounts]) {
      expect(relativeError(simple.upper, value.toNumber())).toBeLessThan(0.01);
    }
    expect(result.warnings).toEqual([]);
  });

  it("should give back the token amounts", () => {
    const result = crossCheckBounds(simple);
    // token1 binds exactly; token0 comes back slightly short
    expect(result.amount1.toNumber()).toBeCloseTo(4, 12);
    expect(result.amount0.toNumber()).toBeCloseTo(0.997422, 6);
  });

  it("should report the ratios squared", () => {
    const result = crossCheckBounds(simple);
    expect(result.lowerRatioSquared.toNumber()).toBeCloseTo(0.951474, 6);
    expect(result.upperRatioSquared.toNumber()).toBeCloseTo(1.300591, 6);
  });

  it("should warn on every quantity past a tight tolerance", () => {
    const result = crossCheckBounds({ ...simple, tolerance: 0.0001 });
    expect(result.warnings.map((w) => w.quantity)).toEqual([
      "lower (via amounts)",
      "upper (via liquidity)",
      "upper (via amounts)",
      "upper ratio",
      "lower ratio squared",
      "amount0",
    ]);

    const amount0 = result.warnings[5];
    expect(amount0.expected).toBe(1);
    expect(amount0.actual).toBeCloseTo(0.997422, 6);
    expect(amount0.relativeError).toBeCloseTo(0.002578, 6);
    expect(amount0.tolerance).toBe(0.0001);
  });

  it("should stay within 1% on a wide ETH/USDC-like range", () => {
    const result = crossCheckBounds({ x: 1, y: 5096.06, price: 3227.02, lower: 1626.3, upper: 4846.3 });
    expect(result.warnings).toEqual([]);
    expect(result.lowerFromLiquidity.toNumber()).toBeCloseTo(1624.205, 2);
  });

  it("should throw on a degenerate range", () => {
    expect(() => crossCheckBounds({ ...simple, lower: 25.993 })).toThrow(DomainError);
  });
});
