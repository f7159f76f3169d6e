import { resourcesForKind } from "../../shared/crossplane";
import {
  diffSourceSets,
  fetchLockPackages,
  lockSourceSet,
  waitForConfigurationsDeleted,
  waitForLockWithoutConfigurations,
} from "../lock";
import { pruneHintedSources, pruneImageConfigs, pruneOrphanedSources, renderSourcesToPrune } from "../packages";
import type { DeletedResource, KindPruneSummary, PkgPruneOptions, PruneContext, PruneResult, PruneTargets } from "../types";

async function deleteConfigurations(context: PruneContext, names: string[]): Promise<void> {
  const { resource } = resourcesForKind("Configuration");
  for (const name of names) {
    context.logger.info(`Deleting Configuration '${name}'...`);
    await context.controlPlane.delete(resource, name);
  }
}

export async function executePrune(
  options: PkgPruneOptions,
  targets: PruneTargets,
  context: PruneContext,
): Promise<PruneResult> {
  const { names, sourceHints } = targets;
  context.logger.info(`Preparing to remove configurations: ${names.join(", ")}`);

  const before = lockSourceSet(await fetchLockPackages(context.controlPlane));

  await deleteConfigurations(context, names);
  await waitForConfigurationsDeleted(context, names);
  const lockConverged = await waitForLockWithoutConfigurations(context, names);

  const after = lockSourceSet(await fetchLockPackages(context.controlPlane));
  const orphanedSources = diffSourceSets(before, after);

  let pruned: KindPruneSummary[] = [];
  if (orphanedSources.length === 0) {
    context.logger.info("No orphaned package sources detected from lock diff after removing configurations");
  } else {
    pruned = await pruneOrphanedSources(context, orphanedSources);
  }

  let hintedDeletions: DeletedResource[] = [];
  if (sourceHints.length > 0) {
    hintedDeletions = await pruneHintedSources(context, sourceHints);
    if (hintedDeletions.length > 0) {
      context.logger.info(
        `Pruned ${hintedDeletions.length} package resources matching sources derived from --path artifacts`,
      );
    }
  }

  const imageConfigsDeleted = await pruneImageConfigs(context, renderSourcesToPrune(orphanedSources, sourceHints));

  context.logger.info(
    `Removed configurations; lock-diff orphaned sources: ${orphanedSources.length}, path-source package resources pruned: ${hintedDeletions.length}`,
  );

  return {
    command: "pkgprune",
    selector: options.selector,
    names,
    sourceHints,
    orphanedSources,
    pruned,
    hintedDeletions,
    imageConfigsDeleted,
    lockConverged,
  };
}
