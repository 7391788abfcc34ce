import { z } from "zod";
import type { PoolSnapshot, PositionDetails, PositionRecord, TickRecord } from "./types";

// The subgraph serializes BigInt/BigDecimal fields as strings; small ints
// sometimes arrive as numbers.
const integerString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .refine((v) => /^-?\d+$/.test(v), { message: "expected an integer" });

const bigIntField = integerString.transform((v) => BigInt(v));
const intField = integerString.transform((v) => Number(v));
const decimalField = z
  .union([z.string(), z.number()])
  .transform((v) => Number(v))
  .refine((v) => Number.isFinite(v), { message: "expected a number" });

export const TokenSchema = z.object({
  symbol: z.string(),
  decimals: intField,
});

export const PoolSchema = z.object({
  id: z.string().optional(),
  tick: intField,
  sqrtPrice: bigIntField,
  liquidity: bigIntField,
  feeTier: intField,
  token0: TokenSchema,
  token1: TokenSchema,
  poolDayData: z
    .array(z.object({ date: intField, volumeUSD: decimalField }))
    .optional(),
});

export const PoolsResponseSchema = z.object({ pools: z.array(PoolSchema) });

export const TickSchema = z.object({
  tickIdx: intField,
  liquidityNet: bigIntField,
});

export const TicksResponseSchema = z.object({ ticks: z.array(TickSchema) });

const tickRef = z.object({ tickIdx: intField });

export const PositionSchema = z.object({
  id: z.string(),
  liquidity: bigIntField,
  tickLower: tickRef,
  tickUpper: tickRef,
});

export const PositionsResponseSchema = z.object({ positions: z.array(PositionSchema) });

export const PositionDetailsSchema = PositionSchema.extend({
  pool: z.object({ id: z.string() }),
  token0: TokenSchema,
  token1: TokenSchema,
});

export const PositionDetailsResponseSchema = z.object({ positions: z.array(PositionDetailsSchema) });

export function toPoolSnapshot(id: string, pool: z.infer<typeof PoolSchema>): PoolSnapshot {
  return {
    id: pool.id ?? id,
    tick: pool.tick,
    liquidity: pool.liquidity,
    sqrtPriceX96: pool.sqrtPrice,
    feeTier: pool.feeTier,
    token0: pool.token0,
    token1: pool.token1,
    dayData: pool.poolDayData,
  };
}

export function toTickRecord(tick: z.infer<typeof TickSchema>): TickRecord {
  return { tickIdx: tick.tickIdx, liquidityNet: tick.liquidityNet };
}

export function toPositionRecord(position: z.infer<typeof PositionSchema>): PositionRecord {
  return {
    id: position.id,
    tickLower: position.tickLower.tickIdx,
    tickUpper: position.tickUpper.tickIdx,
    liquidity: position.liquidity,
  };
}

export function toPositionDetails(position: z.infer<typeof PositionDetailsSchema>): PositionDetails {
  return {
    ...toPositionRecord(position),
    poolId: position.pool.id,
    token0: position.token0,
    token1: position.token1,
  };
}
