import { CliHelpRequested, CliUsageError } from "../shared/cli-errors";
import { createCommandRunner } from "../shared/exec";
import { createKubectl } from "../shared/kubectl";
import { createLogger } from "../shared/logger";
import { sleep } from "../shared/poll";
import { renderCliError } from "../shared/render-cli-error";
import { resolveSettings } from "../shared/settings";
import { parsePkgSyncArgs } from "../pkgsync/cli/args";
import { pkgSyncUsage } from "../pkgsync/cli/usage";
import { executeSync } from "../pkgsync/pipeline/execute";
import { buildDryRunPlan } from "../pkgsync/pipeline/plan";
import { dockerArch } from "../pkgsync/registry/image-reference";
import type { SyncContext } from "../pkgsync/types";

export function createSyncContext(): SyncContext {
  const logger = createLogger();
  const runner = createCommandRunner(logger);

  return {
    runner,
    controlPlane: createKubectl(runner),
    settings: resolveSettings(),
    logger,
    sleep,
    arch: dockerArch(process.arch),
  };
}

export async function runPkgSync(argv: string[], context?: SyncContext): Promise<number> {
  try {
    const options = parsePkgSyncArgs(argv);
    const syncContext = context ?? createSyncContext();

    if (options.dryRun) {
      const plan = buildDryRunPlan(options, syncContext.settings);
      console.log(JSON.stringify(plan, null, 2));
      return 0;
    }

    const result = await executeSync(options, syncContext);
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (error) {
    if (error instanceof CliHelpRequested) {
      console.log(pkgSyncUsage());
      return 0;
    }

    console.error(renderCliError(error));

    if (error instanceof CliUsageError) {
      console.error("\n" + pkgSyncUsage());
    }

    return 1;
  }
}
