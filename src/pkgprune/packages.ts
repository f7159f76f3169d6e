import { ParseError } from "../shared/cli-errors";
import { IMAGE_CONFIG_RESOURCE, PACKAGE_KINDS } from "../shared/crossplane";
import { isRecord, safeParseJson } from "../shared/json";
import { isRenderPath, packageSource } from "../pkgsync/registry/image-reference";
import type { DeletedResource, KindPruneSummary, PruneContext, SourceKey } from "./types";

interface ListedPackage {
  name: string;
  packageRef?: string;
}

interface ListedImageConfig {
  name: string;
  prefixes: string[];
}

function listItems(raw: string, resource: string): Array<Record<string, unknown>> {
  const parsed = safeParseJson(raw, `${resource} list`);
  if (!isRecord(parsed) || !Array.isArray(parsed.items)) {
    throw new ParseError(`Invalid ${resource} list: expected an object with items.`);
  }

  return parsed.items.filter(isRecord);
}

function itemName(item: Record<string, unknown>): string | undefined {
  const metadata = item.metadata;
  if (!isRecord(metadata) || typeof metadata.name !== "string") {
    return undefined;
  }
  return metadata.name;
}

export function parsePackageList(raw: string, resource: string): ListedPackage[] {
  const listed: ListedPackage[] = [];
  for (const item of listItems(raw, resource)) {
    const name = itemName(item);
    if (!name) {
      continue;
    }

    const spec = item.spec;
    const packageRef = isRecord(spec) && typeof spec.package === "string" ? spec.package : undefined;
    listed.push({ name, packageRef });
  }
  return listed;
}

export function parseImageConfigList(raw: string): ListedImageConfig[] {
  const listed: ListedImageConfig[] = [];
  for (const item of listItems(raw, IMAGE_CONFIG_RESOURCE)) {
    const name = itemName(item);
    if (!name) {
      continue;
    }

    const spec = item.spec;
    const matchImages = isRecord(spec) && Array.isArray(spec.matchImages) ? spec.matchImages : [];
    const prefixes = matchImages.flatMap((match: unknown) =>
      isRecord(match) && typeof match.prefix === "string" ? [match.prefix] : [],
    );
    listed.push({ name, prefixes });
  }
  return listed;
}

/**
 * Deletes every `resource` whose spec.package normalizes to one of `sources`.
 */
export async function deleteResourcesBySource(
  context: PruneContext,
  resource: string,
  sources: ReadonlySet<string>,
): Promise<DeletedResource[]> {
  if (sources.size === 0) {
    return [];
  }

  const raw = await context.controlPlane.get(resource, { output: "json" });
  const deleted: DeletedResource[] = [];

  for (const item of parsePackageList(raw, resource)) {
    if (item.packageRef === undefined) {
      continue;
    }

    const source = packageSource(item.packageRef);
    if (!sources.has(source)) {
      continue;
    }

    await context.controlPlane.delete(resource, item.name);
    deleted.push({ resource, name: item.name, source });
  }

  return deleted;
}

export async function pruneOrphanedSources(context: PruneContext, orphaned: SourceKey[]): Promise<KindPruneSummary[]> {
  const summaries: KindPruneSummary[] = [];

  for (const entry of PACKAGE_KINDS) {
    const sources = new Set(orphaned.filter((key) => key.kind === entry.kind).map((key) => key.source));
    if (sources.size === 0) {
      continue;
    }

    const primary = await deleteResourcesBySource(context, entry.resource, sources);
    const revisions = await deleteResourcesBySource(context, entry.revisionResource, sources);
    if (primary.length > 0 || revisions.length > 0) {
      context.logger.info(
        `Pruned orphaned ${entry.kind} package resources: ${primary.length} primary, ${revisions.length} revisions`,
      );
    }
    summaries.push({ kind: entry.kind, primary, revisions });
  }

  return summaries;
}

export async function pruneHintedSources(context: PruneContext, hints: string[]): Promise<DeletedResource[]> {
  const sources = new Set(hints);
  const deleted: DeletedResource[] = [];

  for (const entry of PACKAGE_KINDS) {
    deleted.push(...(await deleteResourcesBySource(context, entry.resource, sources)));
    deleted.push(...(await deleteResourcesBySource(context, entry.revisionResource, sources)));
  }

  return deleted;
}

/** Orphaned Function sources and hinted sources that name a render image. */
export function renderSourcesToPrune(orphaned: SourceKey[], hints: string[]): Set<string> {
  const sources = new Set<string>();
  for (const key of orphaned) {
    if (key.kind === "Function" && isRenderPath(key.source)) {
      sources.add(key.source);
    }
  }
  for (const hint of hints) {
    if (isRenderPath(hint)) {
      sources.add(hint);
    }
  }
  return sources;
}

export async function pruneImageConfigs(context: PruneContext, sources: ReadonlySet<string>): Promise<string[]> {
  if (sources.size === 0) {
    return [];
  }

  const raw = await context.controlPlane.get(IMAGE_CONFIG_RESOURCE, { output: "json" });
  const deleted: string[] = [];

  for (const item of parseImageConfigList(raw)) {
    if (!item.prefixes.some((prefix) => sources.has(prefix))) {
      continue;
    }

    await context.controlPlane.delete(IMAGE_CONFIG_RESOURCE, item.name);
    deleted.push(item.name);
  }

  if (deleted.length > 0) {
    context.logger.info(`Pruned ${deleted.length} ImageConfig rewrite(s) for render sources`);
  }
  return deleted;
}
