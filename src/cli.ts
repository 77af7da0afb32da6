#!/usr/bin/env node
import { UsageError, USAGE, runCommand } from "./commands.js";
import { isStatsError } from "./core/errors.js";
import { loadStatsConfig } from "./runtime/config.js";

async function main() {
  const config = loadStatsConfig();
  try {
    const result = await runCommand(process.argv.slice(2), config);
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[HostStats] ${err.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    if (isStatsError(err)) {
      console.error(`[HostStats] error ${err.code}: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("[HostStats] fatal:", err);
  process.exit(1);
});
