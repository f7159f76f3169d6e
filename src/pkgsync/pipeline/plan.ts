import type { Settings } from "../../shared/settings";
import type { PipelineStep, PkgSyncDryRunPlan, PkgSyncOptions, PkgSyncSource } from "../types";

const CLUSTER_STEPS: PipelineStep[] = [
  {
    id: "ensure-registry",
    stage: "cluster",
    description: "Deploy the in-cluster package registry if it is not available and wait for it.",
  },
  {
    id: "sync-registry-hosts-entry",
    stage: "cluster",
    description: "Point the VM hosts entry for the pull registry at the registry Service ClusterIP.",
  },
];

const BUILD_STEP: PipelineStep = {
  id: "build-project",
  stage: "build",
  description: "Run 'up project build' in the project directory, writing .uppkg artifacts to _output.",
};

const ARTIFACT_STEPS: PipelineStep[] = [
  {
    id: "load-artifacts",
    stage: "load",
    description: "Load every .uppkg artifact with 'docker load' and deduplicate the loaded images.",
  },
  {
    id: "push-supporting-images",
    stage: "push",
    description: "Rebuild render function images, push them and capture digests for the host architecture.",
  },
  {
    id: "apply-image-configs",
    stage: "apply",
    description: "Apply one ImageConfig per captured render digest, rewriting the source path to the pull registry.",
  },
  {
    id: "patch-configurations",
    stage: "patch",
    description: "Pin dependsOn versions in package.yaml to the captured digests and rebuild changed configuration images.",
  },
  {
    id: "push-configurations",
    stage: "push",
    description: "Tag configuration images for the push registry and push them.",
  },
  {
    id: "apply-configurations",
    stage: "apply",
    description: "Apply one Configuration per configuration image, pulling from the pull registry.",
  },
];

export function stepsForSource(source: PkgSyncSource): PipelineStep[] {
  switch (source.kind) {
    case "repo-version":
      return [
        {
          id: "apply-upstream-configuration",
          stage: "apply",
          description: `Apply a Configuration for ghcr.io/${source.org}/${source.repo}:${source.version}.`,
        },
      ];
    case "repo":
      return [
        ...CLUSTER_STEPS,
        {
          id: "clone-repo",
          stage: "build",
          description: `Clone https://github.com/${source.org}/${source.repo} to a temporary directory.`,
        },
        BUILD_STEP,
        ...ARTIFACT_STEPS,
      ];
    case "path":
      return [...CLUSTER_STEPS, BUILD_STEP, ...ARTIFACT_STEPS];
    case "output":
      return ARTIFACT_STEPS;
  }
}

export function buildDryRunPlan(options: PkgSyncOptions, settings: Settings): PkgSyncDryRunPlan {
  return {
    command: "pkgsync",
    dryRun: true,
    source: options.source,
    pushRegistry: settings.pushRegistry,
    pullRegistry: settings.pullRegistry,
    steps: stepsForSource(options.source),
  };
}
