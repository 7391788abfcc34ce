/**
 * Report Generator
 * Turns core results into printable lines. Nothing here does math beyond
 * unit conversion for display.
 */

import Decimal from "decimal.js";
import type { BoundCheckResult } from "./bound_solver";
import type { DailyVolatility } from "./implied_volatility";
import type { PositionValue, PositionsSummary } from "./position_valuation";
import { displayPrice, shouldInvertPrice } from "./price_display";
import type { CurrentRangeAmounts, RangeDistribution } from "./range_distribution";
import { adjustPriceForDecimals, tickToPrice, toHumanAmount } from "./tick_math";
import type { PoolSnapshot, PositionDetails, TokenInfo } from "./types";

export interface TokenPair {
  token0: TokenInfo;
  token1: TokenInfo;
}

const INDENT = "        ";

function human(raw: Decimal, token: TokenInfo, digits = 2): string {
  return toHumanAmount(raw, token.decimals).toFixed(digits);
}

function adjustedTickPrice(tick: number, pair: TokenPair): Decimal {
  return adjustPriceForDecimals(tickToPrice(tick), pair.token0.decimals, pair.token1.decimals);
}

/**
 * "Current price=<p> <t1> for <t0> at tick <tick>"
 */
export function formatCurrentPrice(pool: Pick<PoolSnapshot, "tick" | "token0" | "token1">): string {
  const price = adjustedTickPrice(pool.tick, pool);
  return `Current price=${price.toFixed(6)} ${pool.token1.symbol} for ${pool.token0.symbol} at tick ${pool.tick}`;
}

/**
 * One block per range holding liquidity (the current range always prints),
 * followed by the pool totals.
 */
export function formatRangeDistribution(
  distribution: RangeDistribution,
  pool: Pick<PoolSnapshot, "tick" | "token0" | "token1">
): string[] {
  const { token0, token1 } = pool;
  const currentAdjusted = adjustedTickPrice(pool.tick, pool);
  const invert = shouldInvertPrice(token0.symbol, token1.symbol, currentAdjusted);
  const lines: string[] = [];

  for (const range of distribution.ranges) {
    const isCurrent = range.position === "current";
    if (range.liquidity === 0n && !isCurrent) {
      continue;
    }

    const bottom = displayPrice(adjustedTickPrice(range.tickLower, pool), token0.symbol, token1.symbol, invert);
    lines.push(
      `ticks=[${range.tickLower}, ${range.tickUpper}], bottom tick price=${bottom.value.toFixed(6)} ${bottom.label}`
    );

    if (range.position === "below") {
      lines.push(
        `${INDENT}${human(range.amount1, token1)} ${token1.symbol} locked, potentially worth ${human(range.amount0, token0)} ${token0.symbol}`
      );
    } else if (isCurrent) {
      const current = displayPrice(currentAdjusted, token0.symbol, token1.symbol, invert);
      lines.push(`${INDENT}Current tick, both assets present!`);
      lines.push(`${INDENT}Current price=${current.value.toFixed(6)} ${current.label}`);
      lines.push(
        `${INDENT}${human(range.amount0, token0)} ${token0.symbol} and ${human(range.amount1, token1)} ${token1.symbol} remaining in the current tick range`
      );
    } else {
      lines.push(
        `${INDENT}${human(range.amount0, token0)} ${token0.symbol} locked, potentially worth ${human(range.amount1, token1)} ${token1.symbol}`
      );
    }
  }

  lines.push(
    `In total: ${human(distribution.totalAmount0, token0)} ${token0.symbol} and ${human(distribution.totalAmount1, token1)} ${token1.symbol}`
  );
  return lines;
}

export function formatCurrentRange(pool: PoolSnapshot, amounts: CurrentRangeAmounts): string[] {
  const { token0, token1 } = pool;
  const price = adjustedTickPrice(pool.tick, pool);
  return [
    `L=${pool.liquidity}`,
    `tick=${pool.tick}`,
    `Current price: ${price.toFixed(6)} ${token1.symbol} for 1 ${token0.symbol} (${new Decimal(1).div(price).toFixed(6)} ${token0.symbol} for 1 ${token1.symbol})`,
    `Amounts at the current tick range: ${human(amounts.amount0, token0)} ${token0.symbol} and ${human(amounts.amount1, token1)} ${token1.symbol}`,
  ];
}

function positionLine(
  id: string,
  tickLower: number,
  tickUpper: number,
  value: PositionValue,
  pair: TokenPair
): string {
  return `  position ${id.padStart(7)} in range [${tickLower},${tickUpper}]: ${human(value.amount0, pair.token0)} ${pair.token0.symbol} and ${human(value.amount1, pair.token1)} ${pair.token1.symbol} at the current price`;
}

/**
 * Active positions are listed; inactive ones only count toward the totals.
 */
export function formatPositionsSummary(summary: PositionsSummary, pool: PoolSnapshot): string[] {
  const lines = [formatCurrentPrice(pool)];
  for (const position of summary.positions) {
    if (position.status === "active") {
      lines.push(positionLine(position.id, position.tickLower, position.tickUpper, position, pool));
    }
  }
  lines.push(
    `In total (including inactive positions): ${human(summary.totalAmount0, pool.token0)} ${pool.token0.symbol} and ${human(summary.totalAmount1, pool.token1)} ${pool.token1.symbol}`
  );
  lines.push(
    `Total liquidity from active positions: ${summary.activeLiquidity}, from pool: ${summary.poolLiquidity} (${summary.consistent ? "equal" : "MISMATCH"})`
  );
  return lines;
}

export function formatPosition(
  position: PositionDetails,
  value: PositionValue,
  pool: Pick<PoolSnapshot, "tick">
): string[] {
  return [
    formatCurrentPrice({ tick: pool.tick, token0: position.token0, token1: position.token1 }),
    positionLine(position.id, position.tickLower, position.tickUpper, value, position),
  ];
}

function percentError(expected: Decimal.Value, actual: Decimal): string {
  return new Decimal(1).sub(actual.div(expected)).mul(100).toFixed(6);
}

/**
 * Input vs re-derived value for every bound, ratio and amount.
 */
export function formatBoundCheck(
  input: { x: Decimal.Value; y: Decimal.Value; price: Decimal.Value; lower: Decimal.Value; upper: Decimal.Value },
  result: BoundCheckResult
): string[] {
  const price = new Decimal(input.price);
  const c2 = new Decimal(input.upper).div(price);
  const d2 = new Decimal(input.lower).div(price);
  const row = (name: string, expected: Decimal.Value, actual: Decimal) =>
    `${name}: ${new Decimal(expected).toFixed(2)} vs ${actual.toFixed(2)}, error ${percentError(expected, actual)}%`;

  const lines = [
    `L: ${result.liquidity.toFixed(2)}`,
    row("a", input.lower, result.lowerFromLiquidity),
    row("a", input.lower, result.lowerFromAmounts),
    row("b", input.upper, result.upperFromLiquidity),
    row("b", input.upper, result.upperFromAmounts),
    row("c^2", c2, result.upperRatioSquared),
    row("d^2", d2, result.lowerRatioSquared),
    row("x", input.x, result.amount0),
    row("y", input.y, result.amount1),
  ];
  for (const warning of result.warnings) {
    lines.push(
      `⚠️  ${warning.quantity} off by ${(warning.relativeError * 100).toFixed(4)}% (tolerance ${(warning.tolerance * 100).toFixed(2)}%)`
    );
  }
  return lines;
}

export function formatVolatility(lockedUsd: Decimal, days: readonly DailyVolatility[]): string[] {
  const lines = [`${lockedUsd.toFixed(0)} USD locked in the current tick range`];
  for (const day of days) {
    const date = new Date(day.date * 1000).toISOString().slice(0, 10);
    lines.push(
      `${date} volume=${day.volumeUSD.toFixed(0)} USD IV=${day.impliedVolatility.mul(100).toFixed(2)}%`
    );
  }
  return lines;
}
