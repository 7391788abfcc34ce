#!/usr/bin/env tsx
/**
 * Token amounts backing the active liquidity in a pool's current tick range
 *
 * Usage:
 *   tsx scripts/current_range.ts <poolId> [--url <subgraph url>]
 */

import { parseReportArgs, usage } from "../src/cli_args";
import { runCurrentRangeReport } from "../src/pool_report";
import { SubgraphClient } from "../src/subgraph_client";

async function main() {
  const args = parseReportArgs();
  if (args.help || !args.id) {
    console.log(usage("scripts/current_range.ts", "poolId"));
    process.exit(args.help ? 0 : 1);
  }

  const client = new SubgraphClient({ url: args.url });
  await runCurrentRangeReport(client, args.id, console.log);
}

main().catch((error) => {
  console.error("❌ Report failed:", error);
  process.exit(1);
});
