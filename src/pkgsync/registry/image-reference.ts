interface ImageReference {
  registry?: string;
  path: string;
  tag: string;
}

export type ImageRole = "configuration" | "render-function" | "other";

const DEFAULT_TAG = "latest";
const CONFIGURATION_TAG = "configuration";
const RENDER_SUFFIX = "_render";

/**
 * Splits "path:tag" on the last colon that follows the last slash, so a
 * registry port (localhost:5000/app) is never mistaken for a tag.
 */
export function splitReference(reference: string): [path: string, tag: string] {
  const lastColon = reference.lastIndexOf(":");
  const lastSlash = reference.lastIndexOf("/");
  if (lastColon === -1 || lastColon < lastSlash) {
    return [reference, DEFAULT_TAG];
  }

  return [reference.slice(0, lastColon), reference.slice(lastColon + 1)];
}

// A first segment counts as a registry host only if it contains "." or ":".
// Paths whose first segment is a dotted user name are misread as registries.
export function isRegistrySegment(segment: string): boolean {
  return segment.includes(".") || segment.includes(":");
}

export function stripRegistryPrefix(imagePath: string): string {
  const slashIndex = imagePath.indexOf("/");
  if (slashIndex === -1) {
    return imagePath;
  }

  return isRegistrySegment(imagePath.slice(0, slashIndex)) ? imagePath.slice(slashIndex + 1) : imagePath;
}

function formatImageReference(reference: ImageReference): string {
  const prefix = reference.registry ? `${reference.registry}/` : "";
  return `${prefix}${reference.path}:${reference.tag}`;
}

/**
 * "ghcr.io/org/app:configuration" -> "<registry>/org/app:configuration"
 */
export function rewriteRegistry(reference: string, registry: string): string {
  const [fullPath, tag] = splitReference(reference);
  return formatImageReference({ registry, path: stripRegistryPrefix(fullPath), tag });
}

export function classifyImage(reference: string): ImageRole {
  const [fullPath, tag] = splitReference(reference);
  if (tag === CONFIGURATION_TAG) {
    return "configuration";
  }

  if (isRenderPath(fullPath)) {
    return "render-function";
  }

  return "other";
}

export function isRenderPath(imagePath: string): boolean {
  return imagePath.endsWith(RENDER_SUFFIX);
}

/**
 * Normalizes a package reference to its source by dropping an "@digest"
 * suffix or a ":tag" after the last slash.
 */
export function packageSource(packageRef: string): string {
  const trimmed = packageRef.trim();
  const atIndex = trimmed.indexOf("@");
  if (atIndex !== -1) {
    return trimmed.slice(0, atIndex);
  }

  return splitReference(trimmed)[0];
}

export function lastPathSegment(imagePath: string): string {
  const slashIndex = imagePath.lastIndexOf("/");
  return slashIndex === -1 ? imagePath : imagePath.slice(slashIndex + 1);
}

/**
 * Maps a host CPU architecture (Node's process.arch or uname -m) to the name
 * the container runtime uses in platform tags.
 */
export function dockerArch(hostArch: string): string {
  switch (hostArch) {
    case "aarch64":
    case "arm64":
      return "arm64";
    case "x86_64":
    case "x64":
      return "amd64";
    default:
      return hostArch;
  }
}
