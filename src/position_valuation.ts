import Decimal from "decimal.js";
import { D, tickToSqrtPrice, toDecimal, type Numeric } from "./tick_math";
import { lockedAmount0, lockedAmount1 } from "./liquidity_math";
import type { PositionRecord } from "./types";

export type PositionStatus = "below" | "active" | "above";

export interface PositionValue {
  amount0: Decimal;
  amount1: Decimal;
  /** Range relative to the current price */
  status: PositionStatus;
}

export interface PoolPrice {
  currentTick: number;
  /** Real sqrt price of the pool (sqrtPriceX96 / 2^96) */
  sqrtPrice: Numeric;
}

/**
 * Token amounts of a position at the pool's current price.
 *
 * - tickUpper <= currentTick: the range is below the price, token1 only
 * - tickLower < currentTick < tickUpper: both tokens, split at sqrtPrice
 * - otherwise: the range is above the price, token0 only
 */
export function valuePosition(
  position: Pick<PositionRecord, "tickLower" | "tickUpper" | "liquidity">,
  pool: PoolPrice
): PositionValue {
  const { tickLower, tickUpper, liquidity } = position;
  const sa = tickToSqrtPrice(tickLower);
  const sb = tickToSqrtPrice(tickUpper);
  const L = D(liquidity.toString());

  if (tickUpper <= pool.currentTick) {
    return { amount0: D(0), amount1: lockedAmount1(L, sa, sb), status: "below" };
  }
  if (tickLower < pool.currentTick && pool.currentTick < tickUpper) {
    const sp = toDecimal(pool.sqrtPrice);
    return {
      amount0: L.mul(sb.sub(sp)).div(sp.mul(sb)),
      amount1: L.mul(sp.sub(sa)),
      status: "active",
    };
  }
  return { amount0: lockedAmount0(L, sa, sb), amount1: D(0), status: "above" };
}

export interface ValuedPosition extends PositionRecord, PositionValue {}

export interface PositionsSummary {
  positions: ValuedPosition[];
  totalAmount0: Decimal;
  totalAmount1: Decimal;
  /** Sum of liquidity over positions with tickLower <= currentTick < tickUpper */
  activeLiquidity: bigint;
  poolLiquidity: bigint;
  /** activeLiquidity === poolLiquidity */
  consistent: boolean;
}

function compareIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const x = BigInt(a);
    const y = BigInt(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function comparePositions(a: PositionRecord, b: PositionRecord): number {
  if (a.tickLower !== b.tickLower) return a.tickLower - b.tickLower;
  if (a.tickUpper !== b.tickUpper) return a.tickUpper - b.tickUpper;
  if (a.liquidity !== b.liquidity) return a.liquidity < b.liquidity ? -1 : 1;
  return compareIds(a.id, b.id);
}

/**
 * Values every position against one pool snapshot and totals the result.
 * Inputs are not mutated.
 */
export function summarizePositions(
  positions: readonly PositionRecord[],
  pool: PoolPrice & { liquidity: bigint }
): PositionsSummary {
  const sorted = [...positions].sort(comparePositions);
  const valued: ValuedPosition[] = [];
  let totalAmount0 = D(0);
  let totalAmount1 = D(0);
  let activeLiquidity = 0n;

  for (const position of sorted) {
    const value = valuePosition(position, pool);
    totalAmount0 = totalAmount0.add(value.amount0);
    totalAmount1 = totalAmount1.add(value.amount1);
    // A range starting at the current tick is valued as token0 only but
    // still counts toward the pool's active liquidity
    if (position.tickLower <= pool.currentTick && pool.currentTick < position.tickUpper) {
      activeLiquidity += position.liquidity;
    }
    valued.push({ ...position, ...value });
  }

  return {
    positions: valued,
    totalAmount0,
    totalAmount1,
    activeLiquidity,
    poolLiquidity: pool.liquidity,
    consistent: activeLiquidity === pool.liquidity,
  };
}
