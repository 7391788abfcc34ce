import Decimal from "decimal.js";

/***************** Precision setup *****************/
export const D = (x: Decimal.Value) => new Decimal(x);
Decimal.set({
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -1e6,
  toExpPos: 1e6,
});

/** Any numeric input accepted by the math helpers. */
export type Numeric = Decimal.Value | bigint;

export function toDecimal(x: Numeric): Decimal {
  return typeof x === "bigint" ? D(x.toString()) : D(x);
}

/***************** Constants *****************/
export const TICK_BASE = D("1.0001");
const LN_TICK_BASE = TICK_BASE.ln();
const Q96 = D(2).pow(96);

export const DEFAULT_TICK_SPACING = 60;

// Fee tier in hundredths of a bip -> tick spacing
const TICK_SPACING_BY_FEE_TIER: ReadonlyMap<number, number> = new Map([
  [100, 1],
  [500, 10],
  [3000, 60],
  [10000, 200],
]);

/***************** Tick <-> price *****************/

/**
 * price = 1.0001^tick (token1 per token0, raw units).
 * Fractional ticks are allowed: `tickToPrice(tick / 2)` is the square root
 * of the price at `tick`.
 */
export function tickToPrice(tick: number): Decimal {
  return TICK_BASE.pow(tick);
}

export function tickToSqrtPrice(tick: number): Decimal {
  return tickToPrice(tick / 2);
}

export function priceToTick(price: Numeric): number {
  return toDecimal(price)
    .ln()
    .div(LN_TICK_BASE)
    .toNearest(1, Decimal.ROUND_HALF_EVEN)
    .toNumber();
}

/**
 * Unknown tiers alias to the 0.3% spacing rather than failing.
 */
export function feeTierToSpacing(feeTier: number): number {
  return TICK_SPACING_BY_FEE_TIER.get(feeTier) ?? DEFAULT_TICK_SPACING;
}

/**
 * Lower edge of the spacing-aligned range containing `tick`. Uses a true
 * floor, so -1 with spacing 60 maps to -60, and a tick sitting on a
 * boundary is the bottom of its own range.
 */
export function rangeBottomTick(tick: number, tickSpacing: number): number {
  if (!Number.isInteger(tickSpacing) || tickSpacing <= 0) {
    throw new Error(`Invalid tick spacing: ${tickSpacing}`);
  }
  return Math.floor(tick / tickSpacing) * tickSpacing;
}

/***************** Fixed-point rescale *****************/

/** Q64.96 sqrt price (as reported on-chain) -> real sqrt price. */
export function sqrtPriceX96ToSqrtPrice(sqrtPriceX96: bigint | string): Decimal {
  const raw = typeof sqrtPriceX96 === "bigint" ? sqrtPriceX96 : BigInt(sqrtPriceX96);
  return D(raw.toString()).div(Q96);
}

export function sqrtPriceX96ToPrice(sqrtPriceX96: bigint | string): Decimal {
  const s = sqrtPriceX96ToSqrtPrice(sqrtPriceX96);
  return s.mul(s);
}

/**
 * Raw price -> human units, i.e. whole token1 per whole token0.
 */
export function adjustPriceForDecimals(
  price: Numeric,
  decimals0: number,
  decimals1: number
): Decimal {
  return toDecimal(price).div(D(10).pow(decimals1 - decimals0));
}

export function toHumanAmount(raw: Numeric, decimals: number): Decimal {
  return toDecimal(raw).div(D(10).pow(decimals));
}
