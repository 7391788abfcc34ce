/**
 * Inverse solvers: recover a missing price bound from known amounts.
 *
 * Each bound has two derivations, one going through liquidity and one
 * solving the amount ratio directly. They agree only approximately, since
 * on-chain state is discretized into integer liquidity and ticks.
 */

import Decimal from "decimal.js";
import { DomainError, type PrecisionWarning } from "./errors";
import { amount0FromLiquidity, amount1FromLiquidity, liquidityFromAmounts } from "./liquidity_math";
import { D, toDecimal, type Numeric } from "./tick_math";

export const DEFAULT_BOUND_TOLERANCE = 0.01;

function safeDiv(numerator: Decimal, denominator: Decimal, what: string): Decimal {
  if (denominator.isZero()) {
    throw new DomainError("non-invertible", `Non-invertible input: ${what} is zero`);
  }
  return numerator.div(denominator);
}

/***************** Lower bound *****************/

/**
 * Solves L = y / (sp - √Pa) for Pa.
 * @returns the lower price bound Pa
 */
export function lowerBoundFromLiquidity(L: Numeric, sp: Numeric, y: Numeric): Decimal {
  const sa = toDecimal(sp).sub(safeDiv(toDecimal(y), toDecimal(L), "liquidity"));
  return sa.pow(2);
}

/**
 * Equates the token0 and token1 liquidity formulas and solves for Pa:
 * √Pa = y / (sb * x) + sp - y / (sp * x)
 */
export function lowerBoundFromAmounts(
  sp: Numeric,
  sb: Numeric,
  x: Numeric,
  y: Numeric
): Decimal {
  const p = toDecimal(sp);
  const b = toDecimal(sb);
  const xd = toDecimal(x);
  const yd = toDecimal(y);
  const sa = safeDiv(yd, b.mul(xd), "sqrt upper bound * amount0")
    .add(p)
    .sub(safeDiv(yd, p.mul(xd), "sqrt price * amount0"));
  return sa.pow(2);
}

/***************** Upper bound *****************/

/**
 * Solves L = x * sp * √Pb / (√Pb - sp) for Pb:
 * √Pb = L * sp / (L - sp * x)
 */
export function upperBoundFromLiquidity(L: Numeric, sp: Numeric, x: Numeric): Decimal {
  const Ld = toDecimal(L);
  const p = toDecimal(sp);
  const sb = safeDiv(Ld.mul(p), Ld.sub(p.mul(toDecimal(x))), "L - sp * x");
  return sb.pow(2);
}

/**
 * √Pb = sp * y / ((sa * sp - P) * x + y), P = sp^2
 */
export function upperBoundFromAmounts(
  sp: Numeric,
  sa: Numeric,
  x: Numeric,
  y: Numeric
): Decimal {
  const p = toDecimal(sp);
  const P = p.pow(2);
  const yd = toDecimal(y);
  const denominator = toDecimal(sa).mul(p).sub(P).mul(toDecimal(x)).add(yd);
  const sb = safeDiv(p.mul(yd), denominator, "(sa * sp - P) * x + y");
  return sb.pow(2);
}

/***************** Bounds as ratios of the current price *****************/

/**
 * c = √Pb / √P given d = √Pa / √P.
 */
export function upperRatio(price: Numeric, d: Numeric, x: Numeric, y: Numeric): Decimal {
  const yd = toDecimal(y);
  const denominator = toDecimal(d).sub(1).mul(toDecimal(price)).mul(toDecimal(x)).add(yd);
  return safeDiv(yd, denominator, "(d - 1) * P * x + y");
}

/**
 * d = √Pa / √P given c = √Pb / √P.
 */
export function lowerRatio(price: Numeric, c: Numeric, x: Numeric, y: Numeric): Decimal {
  const cd = toDecimal(c);
  const numerator = toDecimal(y).mul(D(1).sub(cd));
  const denominator = cd.mul(toDecimal(price)).mul(toDecimal(x));
  return D(1).add(safeDiv(numerator, denominator, "c * P * x"));
}

/***************** Cross-validation *****************/

export interface BoundCheckInput {
  x: Numeric;
  y: Numeric;
  price: Numeric;
  lower: Numeric;
  upper: Numeric;
  tolerance?: number;
}

export interface BoundCheckResult {
  liquidity: Decimal;
  lowerFromLiquidity: Decimal;
  lowerFromAmounts: Decimal;
  upperFromLiquidity: Decimal;
  upperFromAmounts: Decimal;
  /** c^2 and d^2, i.e. bounds as fractions of the current price */
  upperRatioSquared: Decimal;
  lowerRatioSquared: Decimal;
  amount0: Decimal;
  amount1: Decimal;
  warnings: PrecisionWarning[];
}

function relativeError(expected: Decimal, actual: Decimal): number {
  if (expected.isZero()) {
    return actual.isZero() ? 0 : Number.POSITIVE_INFINITY;
  }
  return D(1).sub(actual.div(expected)).abs().toNumber();
}

/**
 * Computes liquidity for (x, y) over [lower, upper] at `price`, then
 * re-derives every bound, ratio and amount and compares it with the input.
 * Disagreements beyond `tolerance` come back as warnings; nothing throws
 * unless a formula is singular.
 */
export function crossCheckBounds(input: BoundCheckInput): BoundCheckResult {
  const tolerance = input.tolerance ?? DEFAULT_BOUND_TOLERANCE;
  const price = toDecimal(input.price);
  const lower = toDecimal(input.lower);
  const upper = toDecimal(input.upper);
  const sp = price.sqrt();
  const sa = lower.sqrt();
  const sb = upper.sqrt();

  const liquidity = liquidityFromAmounts(input.x, input.y, sp, sa, sb);

  const lowerFromLiquidity = lowerBoundFromLiquidity(liquidity, sp, input.y);
  const lowerFromAmounts = lowerBoundFromAmounts(sp, sb, input.x, input.y);
  const upperFromLiquidity = upperBoundFromLiquidity(liquidity, sp, input.x);
  const upperFromAmounts = upperBoundFromAmounts(sp, sa, input.x, input.y);

  const c = sb.div(sp);
  const d = sa.div(sp);
  const ic = upperRatio(price, d, input.x, input.y);
  const id = lowerRatio(price, c, input.x, input.y);

  const amount0 = amount0FromLiquidity(liquidity, sp, sa, sb);
  const amount1 = amount1FromLiquidity(liquidity, sp, sa, sb);

  const checks: Array<[string, Decimal, Decimal]> = [
    ["lower (via liquidity)", lower, lowerFromLiquidity],
    ["lower (via amounts)", lower, lowerFromAmounts],
    ["upper (via liquidity)", upper, upperFromLiquidity],
    ["upper (via amounts)", upper, upperFromAmounts],
    ["upper ratio", c, ic],
    ["lower ratio squared", d.pow(2), id.pow(2)],
    ["amount0", toDecimal(input.x), amount0],
    ["amount1", toDecimal(input.y), amount1],
  ];

  const warnings: PrecisionWarning[] = [];
  for (const [quantity, expected, actual] of checks) {
    const error = relativeError(expected, actual);
    if (error > tolerance) {
      warnings.push({
        quantity,
        expected: expected.toNumber(),
        actual: actual.toNumber(),
        relativeError: error,
        tolerance,
      });
    }
  }

  return {
    liquidity,
    lowerFromLiquidity,
    lowerFromAmounts,
    upperFromLiquidity,
    upperFromAmounts,
    upperRatioSquared: ic.pow(2),
    lowerRatioSquared: id.pow(2),
    amount0,
    amount1,
    warnings,
  };
}
