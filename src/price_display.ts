// Presentation only: which way round to print a pool price.

import Decimal from "decimal.js";
import { D, toDecimal, type Numeric } from "./tick_math";

export const STABLECOINS: readonly string[] = ["USDC", "DAI", "USDT", "TUSD", "LUSD", "BUSD", "GUSD", "UST"];

/**
 * Prefer dollar-denominated prices; failing that, prefer a price above 1.
 */
export function shouldInvertPrice(symbol0: string, symbol1: string, adjustedPrice: Numeric): boolean {
  if (STABLECOINS.includes(symbol0) && !STABLECOINS.includes(symbol1)) {
    return true;
  }
  return toDecimal(adjustedPrice).lt(1);
}

export interface DisplayPrice {
  value: Decimal;
  /** e.g. "WETH for USDC" */
  label: string;
}

export function displayPrice(
  adjustedPrice: Numeric,
  symbol0: string,
  symbol1: string,
  invert: boolean
): DisplayPrice {
  const price = toDecimal(adjustedPrice);
  return invert
    ? { value: D(1).div(price), label: `${symbol0} for ${symbol1}` }
    : { value: price, label: `${symbol1} for ${symbol0}` };
}
