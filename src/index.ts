#!/usr/bin/env node

/**
 * vehicle-connect CLI
 *
 * Logs in to a vehicle-cloud account and runs one control or query command
 * against a vehicle identified by its VIN.
 *
 * Credentials come from command-line options, then the VEHICLE_CONNECT_*
 * environment variables, then config.json (see config.example.json).
 *
 * Optional env vars:
 *   LOG_LEVEL   = fatal | error | warn | info | debug | trace | silent  (default: warn)
 *   LOG_FORMAT  = json   (default: pretty output on stderr)
 */

import { run } from "./cli/run.js";

async function main() {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  process.exitCode = await run(process.argv.slice(2), { signal: controller.signal });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exitCode = 1;
});
