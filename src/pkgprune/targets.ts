import { CliUsageError } from "../shared/cli-errors";
import { configurationNameForRepo } from "../shared/names";
import { configurationNameForReference } from "../pkgsync/pipeline/sync-images";
import { buildOutputDir, listArtifacts } from "../pkgsync/archive/artifacts";
import { listRepoTags } from "../pkgsync/archive/inspector";
import { packageSource, splitReference } from "../pkgsync/registry/image-reference";
import type { PkgPruneSelector, PruneTargets } from "./types";

const CONFIGURATION_TAG = "configuration";

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

function repoTagsUnder(projectDir: string): string[] {
  return listArtifacts(buildOutputDir(projectDir)).flatMap((artifactPath) => listRepoTags(artifactPath));
}

export function configurationNamesFromTags(repoTags: string[]): string[] {
  const names: string[] = [];
  for (const repoTag of repoTags) {
    if (splitReference(repoTag)[1] === CONFIGURATION_TAG) {
      names.push(configurationNameForReference(repoTag));
    }
  }
  return uniqueSorted(names);
}

export function sourceHintsFromTags(repoTags: string[]): string[] {
  return uniqueSorted(repoTags.map((repoTag) => packageSource(repoTag)).filter((source) => source.length > 0));
}

export function resolvePruneTargets(selector: PkgPruneSelector): PruneTargets {
  switch (selector.kind) {
    case "name":
      return { names: [selector.name], sourceHints: [] };

    case "repo":
      return { names: [configurationNameForRepo(selector)], sourceHints: [] };

    case "path": {
      const repoTags = repoTagsUnder(selector.path);
      const names = configurationNamesFromTags(repoTags);
      if (names.length === 0) {
        throw new CliUsageError(`No configuration images found under ${buildOutputDir(selector.path)}.`, [
          "Expected .uppkg artifacts with an image tagged ':configuration'.",
          "Build the project first, or pass --name explicitly.",
        ]);
      }
      return { names, sourceHints: sourceHintsFromTags(repoTags) };
    }
  }
}
