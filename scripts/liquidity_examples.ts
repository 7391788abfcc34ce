#!/usr/bin/env tsx
/**
 * Worked liquidity-math scenarios: bound cross-checks and price-move
 * examples. Runs offline.
 *
 * Usage:
 *   tsx scripts/liquidity_examples.ts
 */

import { runLiquidityExamples } from "../src/pool_report";

runLiquidityExamples(console.log);
