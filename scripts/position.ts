#!/usr/bin/env tsx
/**
 * A single position valued at its pool's current price
 *
 * Usage:
 *   tsx scripts/position.ts <positionId> [--url <subgraph url>]
 */

import { parseReportArgs, usage } from "../src/cli_args";
import { runPositionReport } from "../src/pool_report";
import { SubgraphClient } from "../src/subgraph_client";

async function main() {
  const args = parseReportArgs();
  if (args.help || !args.id) {
    console.log(usage("scripts/position.ts", "positionId"));
    process.exit(args.help ? 0 : 1);
  }

  const client = new SubgraphClient({ url: args.url });
  await runPositionReport(client, args.id, console.log);
}

main().catch((error) => {
  console.error("❌ Report failed:", error);
  process.exit(1);
});
