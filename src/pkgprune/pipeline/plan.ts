import type { PkgPruneDryRunPlan, PkgPruneOptions, PruneStep, PruneTargets } from "../types";

const PRUNE_STEPS: PruneStep[] = [
  { id: "snapshot-lock", description: "Record the {kind, source} pairs in the package lock." },
  { id: "delete-configurations", description: "Delete the target Configurations and wait until they are gone." },
  { id: "wait-for-lock", description: "Wait for the lock to drop the deleted Configurations' revisions." },
  { id: "diff-lock", description: "Snapshot the lock again; sources that disappeared are orphaned." },
  {
    id: "prune-orphaned-packages",
    description: "Delete package and revision resources whose package resolves to an orphaned source.",
  },
  {
    id: "prune-image-configs",
    description: "Delete ImageConfig rewrites whose match prefix is an orphaned or hinted render source.",
  },
];

const HINT_STEP: PruneStep = {
  id: "prune-hinted-packages",
  description: "Delete package and revision resources whose package matches a source from local artifacts.",
};

export function buildPruneDryRunPlan(options: PkgPruneOptions, targets: PruneTargets): PkgPruneDryRunPlan {
  const steps =
    targets.sourceHints.length > 0
      ? [...PRUNE_STEPS.slice(0, 5), HINT_STEP, ...PRUNE_STEPS.slice(5)]
      : PRUNE_STEPS;

  return {
    command: "pkgprune",
    dryRun: true,
    selector: options.selector,
    names: targets.names,
    sourceHints: targets.sourceHints,
    steps,
  };
}
