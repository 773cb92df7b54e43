#!/usr/bin/env node

import { runCli } from "./cli.js";

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((err) => {
  console.error("corpuslint failed:", err);
  process.exit(1);
});
