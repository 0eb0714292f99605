#!/usr/bin/env node
import * as dotenv from "dotenv";
import { loadConfig } from "./shared/config";
import ActivitySync from "./activitySync";

// Load environment variables
dotenv.config();

export const getArgValue = (argv: string[], flag: string): string | undefined => {
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (inline) return inline.slice(flag.length + 1);
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  return argv[index + 1];
};

export const parseYear = (argv: string[]): number | undefined => {
  if (!argv.some((arg) => arg === "--year" || arg.startsWith("--year="))) {
    return undefined;
  }
  const value = getArgValue(argv, "--year");
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`--year expects an integer, got: ${value ?? "nothing"}`);
  }
  const year = parseInt(value, 10);
  // --year 0 means no year
  return year === 0 ? undefined : year;
};

export interface CliOptions {
  year?: number;
  saveRaw: boolean;
  mock: boolean;
}

export const parseArgs = (argv: string[]): CliOptions => ({
  year: parseYear(argv),
  saveRaw: argv.includes("--raw"),
  mock: argv.includes("--mock"),
});

async function main() {
  const { year, saveRaw, mock } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  if (mock) {
    config.mockMode = true;
  }

  console.log("🚀 Strava Activity Sync");
  console.log("=======================\n");
  if (config.mockMode) {
    console.log("🔄 Running in MOCK mode (test data)\n");
  }
  if (saveRaw) {
    console.log("📋 Raw data will be saved for inspection\n");
  }

  const sync = new ActivitySync(config);
  const result = await sync.run({ year, saveRaw });

  console.log(
    `\n✅ Sync completed: ${result.fetched} fetched, ${result.loadedFiles.length} files merged, ${result.totalRows} activities stored`
  );
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
