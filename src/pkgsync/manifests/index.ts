import {
  IMAGE_CONFIG_API_VERSION,
  resourcesForKind,
} from "../../shared/crossplane";
import { MAX_RESOURCE_NAME_LENGTH, sanitizeNameComponent, shortHash } from "../../shared/names";

const IMAGE_CONFIG_NAME_PREFIX = "pkgsync-rewrite-";

export interface ConfigurationManifest {
  name: string;
  packageRef: string;
  skipDependencyResolution: boolean;
}

export interface ImageConfigManifest {
  name: string;
  matchPrefix: string;
  rewritePrefix: string;
}

export function buildConfigurationYaml(manifest: ConfigurationManifest): string {
  const lines = [
    `apiVersion: ${resourcesForKind("Configuration").apiVersion}`,
    "kind: Configuration",
    "metadata:",
    `  name: ${manifest.name}`,
    "spec:",
    `  package: ${manifest.packageRef}`,
    "  packagePullPolicy: Always",
  ];

  if (manifest.skipDependencyResolution) {
    lines.push("  skipDependencyResolution: true");
  }

  return `${lines.join("\n")}\n`;
}

export function buildImageConfigYaml(manifest: ImageConfigManifest): string {
  return [
    `apiVersion: ${IMAGE_CONFIG_API_VERSION}`,
    "kind: ImageConfig",
    "metadata:",
    `  name: ${manifest.name}`,
    "spec:",
    "  matchImages:",
    "    - type: Prefix",
    `      prefix: ${manifest.matchPrefix}`,
    "  rewriteImage:",
    `    prefix: ${manifest.rewritePrefix}`,
    "",
  ].join("\n");
}

/**
 * "pkgsync-rewrite-<sanitized source>-<hash>", with the body truncated so the
 * whole name stays a valid DNS label.
 */
export function imageConfigName(source: string): string {
  const hash = shortHash(source);
  const maxBodyLength = MAX_RESOURCE_NAME_LENGTH - IMAGE_CONFIG_NAME_PREFIX.length - hash.length - 1;
  const body = sanitizeNameComponent(source).slice(0, maxBodyLength).replace(/-+$/, "") || "image";
  return `${IMAGE_CONFIG_NAME_PREFIX}${body}-${hash}`;
}
