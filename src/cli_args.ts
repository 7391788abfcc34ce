import { parseArgs } from "node:util";

export interface ReportArgs {
  /** Pool id, or position id for the single-position report */
  id?: string;
  url?: string;
  days: number;
  anchored: boolean;
  help: boolean;
}

const DEFAULT_DAYS = 5;

/**
 * Parse report CLI arguments.
 *
 * @param argv - Command line arguments (default: process.argv.slice(2))
 */
export function parseReportArgs(argv: string[] = process.argv.slice(2)): ReportArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      url: { type: "string", short: "u" },
      days: { type: "string", short: "d" },
      anchored: { type: "boolean", short: "a" },
      help: { type: "boolean", short: "h" },
    },
  });

  let days = DEFAULT_DAYS;
  if (values.days !== undefined) {
    days = Number(values.days);
    if (!Number.isInteger(days) || days <= 0) {
      throw new Error(`--days must be a positive integer, got "${values.days}"`);
    }
  }

  return {
    id: positionals[0],
    url: values.url,
    days,
    anchored: values.anchored ?? false,
    help: values.help ?? false,
  };
}

export function usage(script: string, idName: string): string {
  return `
Usage:
  tsx ${script} <${idName}> [options]

Options:
  --url, -u <url>       Subgraph endpoint (default: SUBGRAPH_URL or the public Uniswap v3 subgraph)
  --days, -d <number>   Days of volume for the volatility report (default: ${DEFAULT_DAYS})
  --anchored, -a        Pin the range sweep to the pool's reported liquidity
  --help, -h            Show this help
`;
}
