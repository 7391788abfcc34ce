#!/usr/bin/env tsx
/**
 * All open positions of a pool valued at the current price
 *
 * Usage:
 *   tsx scripts/positions.ts <poolId> [--url <subgraph url>]
 */

import { parseReportArgs, usage } from "../src/cli_args";
import { runPositionsReport } from "../src/pool_report";
import { SubgraphClient } from "../src/subgraph_client";

async function main() {
  const args = parseReportArgs();
  if (args.help || !args.id) {
    console.log(usage("scripts/positions.ts", "poolId"));
    process.exit(args.help ? 0 : 1);
  }

  const client = new SubgraphClient({ url: args.url });
  await runPositionsReport(client, args.id, console.log);
}

main().catch((error) => {
  console.error("❌ Report failed:", error);
  process.exit(1);
});
