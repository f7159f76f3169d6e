#!/usr/bin/env node
import { runPkgSync } from "../commands/pkgsync";

async function main(): Promise<void> {
  const exitCode = await runPkgSync(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
