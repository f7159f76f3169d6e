import type { ControlPlane } from "../shared/kubectl";
import type { CommandRunner } from "../shared/exec";
import type { Logger } from "../shared/logger";
import type { Sleep } from "../shared/poll";
import type { Settings } from "../shared/settings";

export type PkgSyncSource =
  | {
      kind: "path";
      path: string;
    }
  | {
      kind: "output";
      path: string;
    }
  | {
      kind: "repo";
      org: string;
      repo: string;
    }
  | {
      kind: "repo-version";
      org: string;
      repo: string;
      version: string;
    };

export interface PkgSyncOptions {
  source: PkgSyncSource;
  dryRun: boolean;
}

/** One element of the `manifest.json` index written by `docker save`. */
export interface SaveManifestEntry {
  Config: string;
  RepoTags?: string[];
  Layers: string[];
}

export interface LoadedImage {
  sourceReference: string;
  originArtifactPath: string;
}

export interface RenderRewrite {
  pushedDigest: string;
  targetPullPrefix: string;
}

/** Keyed by the original image path (registry included, tag excluded). */
export type RenderRewrites = Map<string, RenderRewrite>;

export interface SyncContext {
  runner: CommandRunner;
  controlPlane: ControlPlane;
  settings: Settings;
  logger: Logger;
  sleep: Sleep;
  /** Architecture name as it appears in image tags (amd64, arm64, ...). */
  arch: string;
}

export interface AppliedConfiguration {
  name: string;
  package: string;
  skipDependencyResolution: boolean;
}

export interface PushedImage {
  source: string;
  pushReference: string;
  patched: boolean;
  digest?: string;
}

export interface SyncResult {
  command: "pkgsync";
  source: PkgSyncSource;
  artifacts: string[];
  loadedImages: LoadedImage[];
  pushed: PushedImage[];
  renderRewrites: Record<string, RenderRewrite>;
  imageConfigs: string[];
  configurations: AppliedConfiguration[];
}

export interface PipelineStep {
  id: string;
  stage: "cluster" | "build" | "load" | "push" | "patch" | "apply";
  description: string;
}

export interface PkgSyncDryRunPlan {
  command: "pkgsync";
  dryRun: true;
  source: PkgSyncSource;
  pushRegistry: string;
  pullRegistry: string;
  steps: PipelineStep[];
}
