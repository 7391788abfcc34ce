#!/usr/bin/env tsx
/**
 * Daily implied volatility of a pool from its fee income
 *
 * Usage:
 *   tsx scripts/implied_volatility.ts <poolId> [--url <subgraph url>] [--days <n>]
 */

import { parseReportArgs, usage } from "../src/cli_args";
import { runVolatilityReport } from "../src/pool_report";
import { SubgraphClient } from "../src/subgraph_client";

async function main() {
  const args = parseReportArgs();
  if (args.help || !args.id) {
    console.log(usage("scripts/implied_volatility.ts", "poolId"));
    process.exit(args.help ? 0 : 1);
  }

  const client = new SubgraphClient({ url: args.url });
  await runVolatilityReport(client, args.id, args.days, console.log);
}

main().catch((error) => {
  console.error("❌ Report failed:", error);
  process.exit(1);
});
