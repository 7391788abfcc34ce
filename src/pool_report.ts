/**
 * Report runners behind the scripts/ entry points.
 *
 * Each runner takes its data source and every identifier explicitly, writes
 * lines to `out` and returns them.
 */

import Decimal from "decimal.js";
import { crossCheckBounds, lowerBoundFromAmounts, lowerRatio, upperRatio } from "./bound_solver";
import { currentRangeLocked, dailyImpliedVolatility } from "./implied_volatility";
import {
  amount0FromLiquidity,
  amount1FromLiquidity,
  amountDeltasForPriceMove,
  liquidityFromAmount0,
  liquidityFromAmounts,
} from "./liquidity_math";
import { summarizePositions, valuePosition } from "./position_valuation";
import { STABLECOINS } from "./price_display";
import { aggregateRangeDistribution, currentRangeAmounts } from "./range_distribution";
import {
  formatBoundCheck,
  formatCurrentRange,
  formatPosition,
  formatPositionsSummary,
  formatRangeDistribution,
  formatVolatility,
} from "./report_generator";
import {
  D,
  feeTierToSpacing,
  sqrtPriceX96ToSqrtPrice,
  tickToPrice,
  toHumanAmount,
} from "./tick_math";
import type { PoolSnapshot, PositionDetails, PositionRecord } from "./types";

/** The subset of SubgraphClient the reports need. */
export interface PoolDataSource {
  getPool(poolId: string): Promise<PoolSnapshot>;
  getPoolWithDayData(poolId: string, numDays: number): Promise<PoolSnapshot>;
  getTickDeltas(poolId: string): Promise<Map<number, bigint>>;
  getPositions(poolId: string): Promise<PositionRecord[]>;
  getPosition(positionId: string): Promise<PositionDetails>;
}

export type LineSink = (line: string) => void;

function emit(out: LineSink, lines: string[]): string[] {
  for (const line of lines) out(line);
  return lines;
}

/**
 * Locked amounts for every range of the pool, plus totals.
 */
export async function runRangeReport(
  source: PoolDataSource,
  poolId: string,
  out: LineSink,
  options: { anchored?: boolean } = {}
): Promise<string[]> {
  const pool = await source.getPool(poolId);
  const tickDeltas = await source.getTickDeltas(poolId);
  const distribution = aggregateRangeDistribution({
    tickDeltas,
    currentTick: pool.tick,
    tickSpacing: feeTierToSpacing(pool.feeTier),
    currentPrice: tickToPrice(pool.tick),
    anchorLiquidity: options.anchored ? pool.liquidity : undefined,
  });
  return emit(out, formatRangeDistribution(distribution, pool));
}

/**
 * Amounts backing the active liquidity in the current range.
 */
export async function runCurrentRangeReport(
  source: PoolDataSource,
  poolId: string,
  out: LineSink
): Promise<string[]> {
  const pool = await source.getPool(poolId);
  const amounts = currentRangeAmounts({
    liquidity: pool.liquidity,
    currentTick: pool.tick,
    tickSpacing: feeTierToSpacing(pool.feeTier),
    sqrtPrice: sqrtPriceX96ToSqrtPrice(pool.sqrtPriceX96),
  });
  return emit(out, formatCurrentRange(pool, amounts));
}

/**
 * Every open position of the pool; active ones are listed individually.
 */
export async function runPositionsReport(
  source: PoolDataSource,
  poolId: string,
  out: LineSink
): Promise<string[]> {
  const pool = await source.getPool(poolId);
  const positions = await source.getPositions(poolId);
  const summary = summarizePositions(positions, {
    currentTick: pool.tick,
    sqrtPrice: sqrtPriceX96ToSqrtPrice(pool.sqrtPriceX96),
    liquidity: pool.liquidity,
  });
  return emit(out, formatPositionsSummary(summary, pool));
}

export async function runPositionReport(
  source: PoolDataSource,
  positionId: string,
  out: LineSink
): Promise<string[]> {
  const position = await source.getPosition(positionId);
  const pool = await source.getPool(position.poolId);
  const value = valuePosition(position, {
    currentTick: pool.tick,
    sqrtPrice: sqrtPriceX96ToSqrtPrice(pool.sqrtPriceX96),
  });
  return emit(out, formatPosition(position, value, pool));
}

/**
 * Daily implied volatility over the last `days` full days. One side of the
 * pool must be a stablecoin so that the locked value is in dollars.
 */
export async function runVolatilityReport(
  source: PoolDataSource,
  poolId: string,
  days: number,
  out: LineSink
): Promise<string[]> {
  // One extra day: the newest entry is today's partial volume
  const pool = await source.getPoolWithDayData(poolId, days + 1);
  const locked = currentRangeLocked(pool.liquidity, pool.tick, feeTierToSpacing(pool.feeTier));

  let lockedUsd: Decimal;
  if (STABLECOINS.includes(pool.token0.symbol)) {
    lockedUsd = toHumanAmount(locked.amount0, pool.token0.decimals);
  } else if (STABLECOINS.includes(pool.token1.symbol)) {
    lockedUsd = toHumanAmount(locked.amount1, pool.token1.decimals);
  } else {
    throw new Error(
      `Pool ${poolId} has no stablecoin leg (${pool.token0.symbol}/${pool.token1.symbol}); cannot value it in USD`
    );
  }

  const history = (pool.dayData ?? []).slice(1);
  return emit(out, formatVolatility(lockedUsd, dailyImpliedVolatility(pool.feeTier, history, lockedUsd)));
}

/***************** Offline walkthroughs *****************/

const CROSS_CHECK_CASES = [
  { name: "simple values", x: 1, y: 4, price: 20, lower: 19.027, upper: 25.993 },
  { name: "ETH/USDC-like values", x: 1, y: 5096.06, price: 3227.02, lower: 1626.3, upper: 4846.3 },
];

/**
 * Worked liquidity-math scenarios that need no network access.
 */
export function runLiquidityExamples(out: LineSink): string[] {
  const lines: string[] = [];

  for (const c of CROSS_CHECK_CASES) {
    lines.push(`Cross-check: ${c.name}`);
    lines.push(...formatBoundCheck(c, crossCheckBounds(c)));
    lines.push("");
  }

  // How much token1 goes with 2 token0 at 2000 in [1500, 2500]?
  {
    const price = D(2000);
    const sp = price.sqrt();
    const sa = D(1500).sqrt();
    const sb = D(2500).sqrt();
    const x = D(2);
    const L = liquidityFromAmount0(x, sp, sb);
    const y = amount1FromLiquidity(L, sp, sa, sb);
    lines.push(`Providing 2 token0 at price 2000 in [1500, 2500] needs y=${y.toFixed(2)} token1`);

    const C = upperRatio(price, sa.div(sp), x, y).pow(2);
    const Dr = lowerRatio(price, sb.div(sp), x, y).pow(2);
    lines.push(
      `p_a=${Dr.mul(price).toFixed(2)} (${Dr.mul(100).toFixed(2)}% of P), p_b=${C.mul(price).toFixed(2)} (${C.mul(100).toFixed(2)}% of P)`
    );
    lines.push("");
  }

  // 2 token0 and 4000 token1 at 2000 with the top of the range at 3000
  {
    const a = lowerBoundFromAmounts(D(2000).sqrt(), D(3000).sqrt(), 2, 4000);
    lines.push(`Lower bound for 2 token0 + 4000 token1 at 2000 with top 3000: p_a=${a.toFixed(2)}`);
    lines.push("");
  }

  // Same position after the price moves to 2500
  {
    const sp = D(2000).sqrt();
    const sa = D(1333.33).sqrt();
    const sb = D(3000).sqrt();
    const L = liquidityFromAmounts(2, 4000, sp, sa, sb);
    const sp1 = D(2500).sqrt();
    const x1 = amount0FromLiquidity(L, sp1, sa, sb);
    const y1 = amount1FromLiquidity(L, sp1, sa, sb);
    lines.push(`At 2500: x=${x1.toFixed(2)} y=${y1.toFixed(2)}`);

    const { delta0, delta1 } = amountDeltasForPriceMove(L, sp, sp1, sa, sb);
    lines.push(`delta_x=${delta0.toFixed(2)} delta_y=${delta1.toFixed(2)}`);
    lines.push(`At 2500 (incremental): x=${delta0.add(2).toFixed(2)} y=${delta1.add(4000).toFixed(2)}`);
  }

  return emit(out, lines);
}
