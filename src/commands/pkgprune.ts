import { CliHelpRequested, CliUsageError } from "../shared/cli-errors";
import { createCommandRunner } from "../shared/exec";
import { createKubectl } from "../shared/kubectl";
import { createLogger } from "../shared/logger";
import { sleep } from "../shared/poll";
import { renderCliError } from "../shared/render-cli-error";
import { resolveSettings } from "../shared/settings";
import { parsePkgPruneArgs } from "../pkgprune/cli/args";
import { pkgPruneUsage } from "../pkgprune/cli/usage";
import { executePrune } from "../pkgprune/pipeline/execute";
import { buildPruneDryRunPlan } from "../pkgprune/pipeline/plan";
import { resolvePruneTargets } from "../pkgprune/targets";
import type { PruneContext } from "../pkgprune/types";

export function createPruneContext(): PruneContext {
  const logger = createLogger();

  return {
    controlPlane: createKubectl(createCommandRunner(logger)),
    settings: resolveSettings(),
    logger,
    sleep,
  };
}

export async function runPkgPrune(argv: string[], context?: PruneContext): Promise<number> {
  try {
    const options = parsePkgPruneArgs(argv);
    const targets = resolvePruneTargets(options.selector);

    if (options.dryRun) {
      const plan = buildPruneDryRunPlan(options, targets);
      console.log(JSON.stringify(plan, null, 2));
      return 0;
    }

    const result = await executePrune(options, targets, context ?? createPruneContext());
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (error) {
    if (error instanceof CliHelpRequested) {
      console.log(pkgPruneUsage());
      return 0;
    }

    console.error(renderCliError(error));

    if (error instanceof CliUsageError) {
      console.error("\n" + pkgPruneUsage());
    }

    return 1;
  }
}
