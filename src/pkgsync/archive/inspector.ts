import { ArchiveEntryError, ParseError } from "../../shared/cli-errors";
import { isRecord, isStringArray, safeParseJson } from "../../shared/json";
import type { SaveManifestEntry } from "../types";
import { findTarEntry, gunzipLayer, parseTarBuffer, readTarEntry } from "../utils/tar";

export const MANIFEST_ENTRY = "manifest.json";
export const PACKAGE_YAML_ENTRY = "package.yaml";

const BASE_LAYER_LABEL_PREFIX = "io.crossplane.xpkg:sha256:";
const BASE_LAYER_LABEL_VALUE = "base";

export function readArchiveEntry(artifactPath: string, entryName: string): Buffer {
  return readTarEntry(artifactPath, entryName);
}

export function readSaveManifest(artifactPath: string): SaveManifestEntry[] {
  const raw = readArchiveEntry(artifactPath, MANIFEST_ENTRY).toString("utf8");
  const parsed = safeParseJson(raw, `${MANIFEST_ENTRY} in ${artifactPath}`);
  return asSaveManifest(parsed, `${MANIFEST_ENTRY} in ${artifactPath}`);
}

export function listRepoTags(artifactPath: string): string[] {
  return readSaveManifest(artifactPath).flatMap((entry) => entry.RepoTags ?? []);
}

export function findManifestEntry(
  manifest: SaveManifestEntry[],
  artifactPath: string,
  repoTag: string,
): SaveManifestEntry {
  const entry = manifest.find((candidate) => candidate.RepoTags?.includes(repoTag) ?? false);
  if (!entry) {
    throw new ArchiveEntryError("manifest-entry", artifactPath, repoTag, [
      `Known tags: ${manifest.flatMap((candidate) => candidate.RepoTags ?? []).join(", ") || "none"}`,
    ]);
  }
  return entry;
}

/**
 * Picks the layer carrying package metadata: the layer named by a
 * `io.crossplane.xpkg:sha256:<digest>=base` label if it is declared,
 * otherwise the first declared layer.
 */
export function selectBaseLayer(entry: SaveManifestEntry, labels: Record<string, string>): string | undefined {
  for (const [key, value] of Object.entries(labels)) {
    if (value !== BASE_LAYER_LABEL_VALUE || !key.startsWith(BASE_LAYER_LABEL_PREFIX)) {
      continue;
    }

    const candidate = `${key.slice(BASE_LAYER_LABEL_PREFIX.length)}.tar.gz`;
    if (entry.Layers.includes(candidate)) {
      return candidate;
    }
  }

  return entry.Layers[0];
}

export function extractPackageYaml(artifactPath: string, repoTag: string): string {
  const manifest = readSaveManifest(artifactPath);
  const entry = findManifestEntry(manifest, artifactPath, repoTag);

  const configRaw = readArchiveEntry(artifactPath, entry.Config).toString("utf8");
  const labels = readConfigLabels(configRaw);

  const baseLayer = selectBaseLayer(entry, labels);
  if (!baseLayer) {
    throw new ArchiveEntryError("layer", artifactPath, `${repoTag} (no layers declared)`);
  }

  let layerBytes: Buffer;
  try {
    layerBytes = readArchiveEntry(artifactPath, baseLayer);
  } catch (error) {
    if (error instanceof ArchiveEntryError) {
      throw new ArchiveEntryError("layer", artifactPath, baseLayer);
    }
    throw error;
  }

  const layerEntries = parseTarBuffer(gunzipLayer(layerBytes, baseLayer));
  const packageYaml = findTarEntry(layerEntries, PACKAGE_YAML_ENTRY);
  if (!packageYaml) {
    throw new ArchiveEntryError("package-yaml", artifactPath, `${PACKAGE_YAML_ENTRY} in layer ${baseLayer}`);
  }

  return packageYaml.content?.toString("utf8") ?? "";
}

// The config blob is only consulted for labels; an unreadable one just means
// falling back to the first layer.
function readConfigLabels(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }

  if (!isRecord(parsed) || !isRecord(parsed.config) || !isRecord(parsed.config.Labels)) {
    return {};
  }

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.config.Labels)) {
    if (typeof value === "string") {
      labels[key] = value;
    }
  }
  return labels;
}

function asSaveManifest(value: unknown, label: string): SaveManifestEntry[] {
  if (!Array.isArray(value)) {
    throw new ParseError(`Invalid ${label}: expected an array of image entries.`, []);
  }

  return value.map((item, index) => {
    if (!isRecord(item) || typeof item.Config !== "string" || !isStringArray(item.Layers)) {
      throw new ParseError(`Invalid ${label}: entry ${index} needs Config and Layers.`, []);
    }

    const repoTags = item.RepoTags;
    if (repoTags !== undefined && repoTags !== null && !isStringArray(repoTags)) {
      throw new ParseError(`Invalid ${label}: entry ${index} has non-string RepoTags.`, []);
    }

    return {
      Config: item.Config,
      RepoTags: isStringArray(repoTags) ? repoTags : undefined,
      Layers: item.Layers,
    };
  });
}
