/**
 * Liquidity <-> token amount formulas over a single price range.
 *
 * All prices here are square roots of raw prices (sp = √P, sa = √Pa,
 * sb = √Pb). Amounts are in raw token units.
 */

import Decimal from "decimal.js";
import { DomainError } from "./errors";
import { D, toDecimal, type Numeric } from "./tick_math";

export interface TokenAmounts {
  amount0: Decimal;
  amount1: Decimal;
}

function rangeWidth(sa: Decimal, sb: Decimal): Decimal {
  const width = sb.sub(sa);
  if (width.lte(0)) {
    throw new DomainError(
      "degenerate-range",
      `Degenerate range: upper sqrt price ${sb.toString()} must exceed lower ${sa.toString()}`
    );
  }
  return width;
}

function clamp(sp: Decimal, sa: Decimal, sb: Decimal): Decimal {
  return Decimal.max(Decimal.min(sp, sb), sa);
}

/***************** Amount -> liquidity *****************/

/**
 * L = x * sa * sb / (sb - sa). Valid when the price sits at or below sa,
 * i.e. the range holds token0 only.
 */
export function liquidityFromAmount0(x: Numeric, sa: Numeric, sb: Numeric): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  return toDecimal(x).mul(a).mul(b).div(rangeWidth(a, b));
}

/**
 * L = y / (sb - sa). Valid when the price sits at or above sb.
 */
export function liquidityFromAmount1(y: Numeric, sa: Numeric, sb: Numeric): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  return toDecimal(y).div(rangeWidth(a, b));
}

/**
 * Largest liquidity that the budgets (x, y) can fund at the current price.
 * Inside the range the binding constraint is whichever asset runs out first.
 */
export function liquidityFromAmounts(
  x: Numeric,
  y: Numeric,
  sp: Numeric,
  sa: Numeric,
  sb: Numeric
): Decimal {
  const p = toDecimal(sp);
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  rangeWidth(a, b);

  if (p.lte(a)) {
    return liquidityFromAmount0(x, a, b);
  } else if (p.lt(b)) {
    const L0 = liquidityFromAmount0(x, p, b);
    const L1 = liquidityFromAmount1(y, a, p);
    return Decimal.min(L0, L1);
  } else {
    return liquidityFromAmount1(y, a, b);
  }
}

/***************** Liquidity -> amount *****************/

// A price outside the range is treated as sitting on the nearest boundary,
// which makes these total over every sp.

export function amount0FromLiquidity(
  L: Numeric,
  sp: Numeric,
  sa: Numeric,
  sb: Numeric
): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  rangeWidth(a, b);
  const p = clamp(toDecimal(sp), a, b);
  return toDecimal(L).mul(b.sub(p)).div(p.mul(b));
}

export function amount1FromLiquidity(
  L: Numeric,
  sp: Numeric,
  sa: Numeric,
  sb: Numeric
): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  rangeWidth(a, b);
  const p = clamp(toDecimal(sp), a, b);
  return toDecimal(L).mul(p.sub(a));
}

export function amountsFromLiquidity(
  L: Numeric,
  sp: Numeric,
  sa: Numeric,
  sb: Numeric
): TokenAmounts {
  return {
    amount0: amount0FromLiquidity(L, sp, sa, sb),
    amount1: amount1FromLiquidity(L, sp, sa, sb),
  };
}

/***************** Fully one-sided ranges *****************/

/** Token1 locked in a range that lies entirely below the current price. */
export function lockedAmount1(L: Numeric, sa: Numeric, sb: Numeric): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  return toDecimal(L).mul(rangeWidth(a, b));
}

/** Token0 locked in a range that lies entirely above the current price. */
export function lockedAmount0(L: Numeric, sa: Numeric, sb: Numeric): Decimal {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  return lockedAmount1(L, a, b).div(a.mul(b));
}

/**
 * Change in token amounts when the price moves from `spFrom` to `spTo`
 * with liquidity held fixed. Both prices are clamped into [sa, sb] first,
 * since the incremental form only holds inside the range.
 */
export function amountDeltasForPriceMove(
  L: Numeric,
  spFrom: Numeric,
  spTo: Numeric,
  sa: Numeric,
  sb: Numeric
): { delta0: Decimal; delta1: Decimal } {
  const a = toDecimal(sa);
  const b = toDecimal(sb);
  rangeWidth(a, b);
  const from = clamp(toDecimal(spFrom), a, b);
  const to = clamp(toDecimal(spTo), a, b);
  const Ld = toDecimal(L);
  return {
    delta0: Ld.mul(D(1).div(to).sub(D(1).div(from))),
    delta1: Ld.mul(to.sub(from)),
  };
}
