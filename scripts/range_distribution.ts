#!/usr/bin/env tsx
/**
 * Locked token amounts across every tick range of a pool
 *
 * Usage:
 *   tsx scripts/range_distribution.ts <poolId> [--url <subgraph url>] [--anchored]
 */

import { parseReportArgs, usage } from "../src/cli_args";
import { runRangeReport } from "../src/pool_report";
import { SubgraphClient } from "../src/subgraph_client";

async function main() {
  const args = parseReportArgs();
  if (args.help || !args.id) {
    console.log(usage("scripts/range_distribution.ts", "poolId"));
    process.exit(args.help ? 0 : 1);
  }

  const client = new SubgraphClient({ url: args.url });
  await runRangeReport(client, args.id, console.log, { anchored: args.anchored });
}

main().catch((error) => {
  console.error("❌ Report failed:", error);
  process.exit(1);
});
