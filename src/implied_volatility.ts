/**
 * Implied volatility from fee income, after the "volatility from LP fees"
 * estimate: IV = 2 * fee * sqrt(volume / tickTvl) * sqrt(365).
 *
 * tickTvl is the value locked in the current range only, expressed in the
 * same unit as the volume.
 */

import Decimal from "decimal.js";
import { DomainError } from "./errors";
import { lockedAmount0, lockedAmount1 } from "./liquidity_math";
import { D, rangeBottomTick, tickToSqrtPrice, toDecimal, type Numeric } from "./tick_math";
import type { PoolDayVolume } from "./types";

const DAYS_PER_YEAR = 365;
const FEE_TIER_DENOMINATOR = 1_000_000;

/**
 * Value of the current range's liquidity if it were all token0, and if it
 * were all token1.
 */
export function currentRangeLocked(
  liquidity: bigint,
  currentTick: number,
  tickSpacing: number
): { amount0: Decimal; amount1: Decimal } {
  const bottom = rangeBottomTick(currentTick, tickSpacing);
  const sa = tickToSqrtPrice(bottom);
  const sb = tickToSqrtPrice(bottom + tickSpacing);
  return {
    amount0: lockedAmount0(liquidity, sa, sb),
    amount1: lockedAmount1(liquidity, sa, sb),
  };
}

/**
 * @param feeTier - pool fee in hundredths of a bip (3000 = 0.3%)
 * @returns annualized volatility as a fraction (0.85 = 85%)
 */
export function impliedVolatility(feeTier: number, volumeUsd: Numeric, tvlUsd: Numeric): Decimal {
  const tvl = toDecimal(tvlUsd);
  if (tvl.lte(0)) {
    throw new DomainError("non-invertible", "Non-invertible input: locked value must be positive");
  }
  const fee = D(feeTier).div(FEE_TIER_DENOMINATOR);
  return fee
    .mul(2)
    .mul(toDecimal(volumeUsd).div(tvl).sqrt())
    .mul(D(DAYS_PER_YEAR).sqrt());
}

export interface DailyVolatility {
  date: number;
  volumeUSD: number;
  impliedVolatility: Decimal;
}

/**
 * One estimate per day, oldest first. The locked value is today's, so
 * older days are approximations.
 */
export function dailyImpliedVolatility(
  feeTier: number,
  days: readonly PoolDayVolume[],
  tvlUsd: Numeric
): DailyVolatility[] {
  return [...days]
    .sort((a, b) => a.date - b.date)
    .map((day) => ({
      date: day.date,
      volumeUSD: day.volumeUSD,
      impliedVolatility: impliedVolatility(feeTier, day.volumeUSD, tvlUsd),
    }));
}
