#!/usr/bin/env node
import { runPkgPrune } from "../commands/pkgprune";

async function main(): Promise<void> {
  const exitCode = await runPkgPrune(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
