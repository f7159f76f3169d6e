import { ConvergenceTimeoutError, ParseError, ResourceNotFoundError } from "../shared/cli-errors";
import { LOCK_NAME, LOCK_RESOURCE, resourcesForKind } from "../shared/crossplane";
import { isRecord, safeParseJson } from "../shared/json";
import type { ControlPlane } from "../shared/kubectl";
import { pollUntil } from "../shared/poll";
import type { LockPackage, PruneContext, SourceKey } from "./types";

export const CONFIGURATION_DELETE_ATTEMPTS = 60;
export const LOCK_CONVERGENCE_ATTEMPTS = 45;

export function parseLockPackages(raw: string): LockPackage[] {
  const parsed = safeParseJson(raw, `${LOCK_RESOURCE}/${LOCK_NAME}`);
  if (!isRecord(parsed)) {
    throw new ParseError(`Invalid ${LOCK_RESOURCE}/${LOCK_NAME}: expected an object.`);
  }

  const packages = parsed.packages;
  if (packages === undefined || packages === null) {
    return [];
  }
  if (!Array.isArray(packages)) {
    throw new ParseError(`Invalid ${LOCK_RESOURCE}/${LOCK_NAME}: packages must be a list.`);
  }

  const rows: LockPackage[] = [];
  for (const item of packages) {
    if (
      isRecord(item) &&
      typeof item.kind === "string" &&
      typeof item.name === "string" &&
      typeof item.source === "string"
    ) {
      rows.push({ kind: item.kind, name: item.name, source: item.source });
    }
  }
  return rows;
}

/** A missing lock means nothing is installed yet. */
export async function fetchLockPackages(controlPlane: ControlPlane): Promise<LockPackage[]> {
  let raw: string;
  try {
    raw = await controlPlane.get(LOCK_RESOURCE, { name: LOCK_NAME, output: "json" });
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return [];
    }
    throw error;
  }

  return parseLockPackages(raw);
}

function sourceKeyId(key: SourceKey): string {
  return `${key.kind}\n${key.source}`;
}

export function lockSourceSet(packages: LockPackage[]): Map<string, SourceKey> {
  const set = new Map<string, SourceKey>();
  for (const row of packages) {
    const key = { kind: row.kind, source: row.source };
    set.set(sourceKeyId(key), key);
  }
  return set;
}

/** `before - after`: sources that disappeared from the lock. */
export function diffSourceSets(before: Map<string, SourceKey>, after: Map<string, SourceKey>): SourceKey[] {
  const orphaned: SourceKey[] = [];
  for (const [id, key] of before) {
    if (!after.has(id)) {
      orphaned.push(key);
    }
  }
  return orphaned;
}

export function lockHoldsConfigurations(packages: LockPackage[], names: string[]): boolean {
  return names.some((name) =>
    packages.some((row) => row.kind === "Configuration" && row.name.startsWith(`${name}-`)),
  );
}

async function configurationExists(controlPlane: ControlPlane, name: string): Promise<boolean> {
  try {
    await controlPlane.get(resourcesForKind("Configuration").resource, { name, output: "name" });
    return true;
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return false;
    }
    throw error;
  }
}

export async function waitForConfigurationsDeleted(context: PruneContext, names: string[]): Promise<void> {
  const deleted = await pollUntil(
    async () => {
      for (const name of names) {
        if (await configurationExists(context.controlPlane, name)) {
          return false;
        }
      }
      return true;
    },
    {
      attempts: CONFIGURATION_DELETE_ATTEMPTS,
      intervalMs: context.settings.pollIntervalMs,
      sleep: context.sleep,
    },
  );

  if (!deleted) {
    throw new ConvergenceTimeoutError(
      `Configuration deletion (${names.join(", ")})`,
      CONFIGURATION_DELETE_ATTEMPTS,
      context.settings.pollIntervalMs,
    );
  }
}

/**
 * Waits for the lock to drop the revisions of the deleted Configurations.
 * Resolves false on timeout; the lock is updated asynchronously and cleanup
 * proceeds regardless.
 */
export async function waitForLockWithoutConfigurations(context: PruneContext, names: string[]): Promise<boolean> {
  const converged = await pollUntil(
    async () => {
      try {
        return !lockHoldsConfigurations(await fetchLockPackages(context.controlPlane), names);
      } catch (error) {
        context.logger.debug({ err: error }, "Lock read failed; retrying");
        return false;
      }
    },
    {
      attempts: LOCK_CONVERGENCE_ATTEMPTS,
      intervalMs: context.settings.pollIntervalMs,
      sleep: context.sleep,
    },
  );

  if (!converged) {
    context.logger.warn("Timed out waiting for lock to drop configuration revisions; continuing cleanup");
  }
  return converged;
}
