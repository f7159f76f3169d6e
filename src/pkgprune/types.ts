import type { PackageKind } from "../shared/crossplane";
import type { ControlPlane } from "../shared/kubectl";
import type { Logger } from "../shared/logger";
import type { Sleep } from "../shared/poll";
import type { Settings } from "../shared/settings";

export type PkgPruneSelector =
  | {
      kind: "name";
      name: string;
    }
  | {
      kind: "repo";
      org: string;
      repo: string;
    }
  | {
      kind: "path";
      path: string;
    };

export interface PkgPruneOptions {
  selector: PkgPruneSelector;
  dryRun: boolean;
}

export interface PruneTargets {
  names: string[];
  /** Package sources named by local artifacts; only set for the path selector. */
  sourceHints: string[];
}

/** One row of the package lock. */
export interface LockPackage {
  kind: string;
  name: string;
  source: string;
}

/** A lock row reduced for set diffing. Unknown kinds are kept but never pruned. */
export interface SourceKey {
  kind: string;
  source: string;
}

export interface PruneContext {
  controlPlane: ControlPlane;
  settings: Settings;
  logger: Logger;
  sleep: Sleep;
}

export interface DeletedResource {
  resource: string;
  name: string;
  source: string;
}

export interface KindPruneSummary {
  kind: PackageKind;
  primary: DeletedResource[];
  revisions: DeletedResource[];
}

export interface PruneResult {
  command: "pkgprune";
  selector: PkgPruneSelector;
  names: string[];
  sourceHints: string[];
  orphanedSources: SourceKey[];
  pruned: KindPruneSummary[];
  hintedDeletions: DeletedResource[];
  imageConfigsDeleted: string[];
  lockConverged: boolean;
}

export interface PruneStep {
  id: string;
  description: string;
}

export interface PkgPruneDryRunPlan {
  command: "pkgprune";
  dryRun: true;
  selector: PkgPruneSelector;
  names: string[];
  sourceHints: string[];
  steps: PruneStep[];
}
