/**
 * Distribution of locked token amounts across every spacing-sized range of
 * a pool, built by sweeping the per-tick liquidityNet values.
 */

import Decimal from "decimal.js";
import { amount0FromLiquidity, amount1FromLiquidity, lockedAmount0, lockedAmount1 } from "./liquidity_math";
import { D, rangeBottomTick, tickToSqrtPrice, toDecimal, type Numeric } from "./tick_math";

/** Where a range sits relative to the current price. */
export type RangePosition = "below" | "current" | "above";

export interface RangeAmounts {
  tickLower: number;
  tickUpper: number;
  /** Active liquidity inside [tickLower, tickUpper) */
  liquidity: bigint;
  position: RangePosition;
  /**
   * Token amounts the range represents. For one-sided ranges the amount of
   * the other token is what the locked side would be worth if swapped.
   */
  amount0: Decimal;
  amount1: Decimal;
  /** Amounts actually locked, i.e. what the totals add up */
  locked0: Decimal;
  locked1: Decimal;
}

export interface RangeDistribution {
  ranges: RangeAmounts[];
  totalAmount0: Decimal;
  totalAmount1: Decimal;
  currentRangeBottomTick: number;
}

export interface RangeDistributionInput {
  /** tick -> signed liquidityNet */
  tickDeltas: ReadonlyMap<number, bigint>;
  currentTick: number;
  tickSpacing: number;
  /** Raw current price (token1 per token0) */
  currentPrice: Numeric;
  /**
   * Pool's reported active liquidity. When set, the current range is pinned
   * to it and the sweep runs outward in both directions; otherwise the
   * accumulator starts at zero below the lowest populated tick.
   */
  anchorLiquidity?: bigint;
}

function tickDomain(tickDeltas: ReadonlyMap<number, bigint>): { minTick: number; maxTick: number } | null {
  let minTick = Number.POSITIVE_INFINITY;
  let maxTick = Number.NEGATIVE_INFINITY;
  for (const tick of tickDeltas.keys()) {
    if (tick < minTick) minTick = tick;
    if (tick > maxTick) maxTick = tick;
  }
  return Number.isFinite(minTick) ? { minTick, maxTick } : null;
}

/**
 * Active liquidity for each range bottom, accumulated from zero upward.
 */
function sweepFromZero(
  tickDeltas: ReadonlyMap<number, bigint>,
  minTick: number,
  maxTick: number,
  tickSpacing: number
): Array<[number, bigint]> {
  const out: Array<[number, bigint]> = [];
  let liquidity = 0n;
  for (let tick = minTick; tick <= maxTick; tick += tickSpacing) {
    liquidity += tickDeltas.get(tick) ?? 0n;
    out.push([tick, liquidity]);
  }
  return out;
}

/**
 * Active liquidity for each range bottom, pinned to `anchor` at the current
 * range and walked outward.
 */
function sweepFromAnchor(
  tickDeltas: ReadonlyMap<number, bigint>,
  minTick: number,
  maxTick: number,
  tickSpacing: number,
  currentBottom: number,
  anchor: bigint
): Array<[number, bigint]> {
  const below: Array<[number, bigint]> = [];
  let liquidity = anchor;
  for (let tick = currentBottom - tickSpacing; tick >= minTick; tick -= tickSpacing) {
    // Crossing tick + spacing downward undoes its delta
    liquidity -= tickDeltas.get(tick + tickSpacing) ?? 0n;
    below.push([tick, liquidity]);
  }
  below.reverse();

  const out: Array<[number, bigint]> = [...below, [currentBottom, anchor]];
  liquidity = anchor;
  for (let tick = currentBottom + tickSpacing; tick <= maxTick; tick += tickSpacing) {
    liquidity += tickDeltas.get(tick) ?? 0n;
    out.push([tick, liquidity]);
  }
  return out;
}

function valueRange(
  tick: number,
  liquidity: bigint,
  tickSpacing: number,
  currentBottom: number,
  currentSqrtPrice: Decimal
): RangeAmounts {
  const tickUpper = tick + tickSpacing;
  const sa = tickToSqrtPrice(tick);
  const sb = tickToSqrtPrice(tickUpper);
  const L = D(liquidity.toString());
  const zero = D(0);

  if (tick < currentBottom) {
    const amount1 = lockedAmount1(L, sa, sb);
    return {
      tickLower: tick,
      tickUpper,
      liquidity,
      position: "below",
      amount0: amount1.div(sb.mul(sa)),
      amount1,
      locked0: zero,
      locked1: amount1,
    };
  }

  if (tick === currentBottom) {
    // Split at the pool's own sqrt price, not clamped to [sa, sb]
    const amount0 = L.mul(sb.sub(currentSqrtPrice)).div(currentSqrtPrice.mul(sb));
    const amount1 = L.mul(currentSqrtPrice.sub(sa));
    return {
      tickLower: tick,
      tickUpper,
      liquidity,
      position: "current",
      amount0,
      amount1,
      locked0: amount0,
      locked1: amount1,
    };
  }

  const amount0 = lockedAmount0(L, sa, sb);
  return {
    tickLower: tick,
    tickUpper,
    liquidity,
    position: "above",
    amount0,
    amount1: lockedAmount1(L, sa, sb),
    locked0: amount0,
    locked1: zero,
  };
}

/**
 * Sweeps [minTick, maxTick] in steps of `tickSpacing` and values every
 * range. Ticks are visited strictly in increasing order; the running
 * liquidity depends on it.
 */
export function aggregateRangeDistribution(input: RangeDistributionInput): RangeDistribution {
  const { tickDeltas, currentTick, tickSpacing, anchorLiquidity } = input;
  const currentRangeBottomTick = rangeBottomTick(currentTick, tickSpacing);
  const currentSqrtPrice = toDecimal(input.currentPrice).sqrt();

  const domain = tickDomain(tickDeltas);
  if (!domain) {
    return { ranges: [], totalAmount0: D(0), totalAmount1: D(0), currentRangeBottomTick };
  }

  let liquidityByTick: Array<[number, bigint]>;
  if (anchorLiquidity === undefined) {
    liquidityByTick = sweepFromZero(tickDeltas, domain.minTick, domain.maxTick, tickSpacing);
  } else {
    // Keep the stepping grid aligned with the current range
    const offset = domain.minTick - currentRangeBottomTick;
    const alignedMin = currentRangeBottomTick + Math.floor(offset / tickSpacing) * tickSpacing;
    liquidityByTick = sweepFromAnchor(
      tickDeltas,
      Math.min(alignedMin, currentRangeBottomTick),
      Math.max(domain.maxTick, currentRangeBottomTick),
      tickSpacing,
      currentRangeBottomTick,
      anchorLiquidity
    );
  }

  const ranges: RangeAmounts[] = [];
  let totalAmount0 = D(0);
  let totalAmount1 = D(0);
  for (const [tick, liquidity] of liquidityByTick) {
    const range = valueRange(tick, liquidity, tickSpacing, currentRangeBottomTick, currentSqrtPrice);
    totalAmount0 = totalAmount0.add(range.locked0);
    totalAmount1 = totalAmount1.add(range.locked1);
    ranges.push(range);
  }

  return { ranges, totalAmount0, totalAmount1, currentRangeBottomTick };
}

export interface CurrentRangeInput {
  liquidity: bigint;
  currentTick: number;
  tickSpacing: number;
  /** Real sqrt price; falls back to the one implied by `currentTick` */
  sqrtPrice?: Numeric;
}

export interface CurrentRangeAmounts {
  tickLower: number;
  tickUpper: number;
  amount0: Decimal;
  amount1: Decimal;
}

/**
 * Amounts backing the pool's active liquidity inside the current range
 * only. Amounts are clamped, so a price on the range edge yields zero of
 * one token rather than a negative amount.
 */
export function currentRangeAmounts(input: CurrentRangeInput): CurrentRangeAmounts {
  const tickLower = rangeBottomTick(input.currentTick, input.tickSpacing);
  const tickUpper = tickLower + input.tickSpacing;
  const sa = tickToSqrtPrice(tickLower);
  const sb = tickToSqrtPrice(tickUpper);
  const sp = input.sqrtPrice === undefined ? tickToSqrtPrice(input.currentTick) : toDecimal(input.sqrtPrice);
  return {
    tickLower,
    tickUpper,
    amount0: amount0FromLiquidity(input.liquidity, sp, sa, sb),
    amount1: amount1FromLiquidity(input.liquidity, sp, sa, sb),
  };
}
