import path from "node:path";

import { configurationNameForRepo } from "../../shared/names";
import { buildOutputDir } from "../archive/artifacts";
import { ensureRegistry, syncRegistryHostsEntry } from "../cluster/registry";
import type { PkgSyncOptions, SyncContext, SyncResult } from "../types";
import { assertDirectoryExists } from "../utils/fs";
import { cleanupPaths, createTempDir } from "../utils/temp";
import { applyConfiguration, syncImages } from "./sync-images";

export const UPSTREAM_PACKAGE_REGISTRY = "ghcr.io";

function repoCloneUrl(org: string, repo: string): string {
  return `https://github.com/${org}/${repo}`;
}

function toResult(options: PkgSyncOptions, partial: Omit<SyncResult, "command" | "source">): SyncResult {
  return {
    command: "pkgsync",
    source: options.source,
    ...partial,
  };
}

async function buildAndSync(
  options: PkgSyncOptions,
  context: SyncContext,
  projectDir: string,
): Promise<SyncResult> {
  assertDirectoryExists(projectDir, "Project directory");
  await ensureRegistry(context);
  await syncRegistryHostsEntry(context);

  context.logger.info(`Building package project in ${projectDir}...`);
  await context.runner.stream("up", ["project", "build"], { cwd: projectDir });

  const synced = await syncImages(context, buildOutputDir(projectDir));
  return toResult(options, {
    ...synced,
    renderRewrites: Object.fromEntries(synced.renderRewrites),
  });
}

export async function executeSync(options: PkgSyncOptions, context: SyncContext): Promise<SyncResult> {
  const { source } = options;

  switch (source.kind) {
    case "repo-version": {
      const configuration = {
        name: configurationNameForRepo({ org: source.org, repo: source.repo }),
        package: `${UPSTREAM_PACKAGE_REGISTRY}/${source.org}/${source.repo}:${source.version}`,
        skipDependencyResolution: false,
      };
      await applyConfiguration(context, configuration);
      return toResult(options, {
        artifacts: [],
        loadedImages: [],
        pushed: [],
        renderRewrites: {},
        imageConfigs: [],
        configurations: [configuration],
      });
    }

    case "repo": {
      const workDir = createTempDir("pkgsync-repo-");
      const cloneDir = path.join(workDir, source.repo);
      try {
        context.logger.info(`Cloning ${source.org}/${source.repo}...`);
        await context.runner.stream("git", ["clone", repoCloneUrl(source.org, source.repo), cloneDir]);
        return await buildAndSync(options, context, cloneDir);
      } finally {
        cleanupPaths([workDir], context.logger);
      }
    }

    case "path":
      return buildAndSync(options, context, source.path);

    case "output": {
      const synced = await syncImages(context, source.path);
      return toResult(options, {
        ...synced,
        renderRewrites: Object.fromEntries(synced.renderRewrites),
      });
    }
  }
}
