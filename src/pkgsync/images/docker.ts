import fs from "node:fs";
import path from "node:path";

import { ParseError } from "../../shared/cli-errors";
import type { CommandRunner } from "../../shared/exec";
import { shortHash } from "../../shared/names";
import { PACKAGE_YAML_ENTRY } from "../archive/inspector";
import type { LoadedImage } from "../types";
import { cleanupPaths, createTempDir } from "../utils/temp";

const LOADED_IMAGE_PREFIX = "Loaded image: ";
const PUSH_DIGEST_MARKER = "digest: sha256:";

export const PATCHED_IMAGE_REPOSITORY = "pkgsync-local/config-patched";

export function parseLoadedImages(output: string, artifactPath: string): LoadedImage[] {
  const images: LoadedImage[] = [];
  for (const line of output.split("\n")) {
    if (!line.startsWith(LOADED_IMAGE_PREFIX)) {
      continue;
    }

    const reference = line.slice(LOADED_IMAGE_PREFIX.length).trim();
    if (reference) {
      images.push({ sourceReference: reference, originArtifactPath: artifactPath });
    }
  }
  return images;
}

export function dedupeLoadedImages(images: LoadedImage[]): LoadedImage[] {
  const seen = new Set<string>();
  return images.filter((image) => {
    if (seen.has(image.sourceReference)) {
      return false;
    }
    seen.add(image.sourceReference);
    return true;
  });
}

/**
 * Returns the "sha256:<hex>" token that follows the first "digest: sha256:"
 * in `docker push` output, or undefined if there is none.
 */
export function parsePushDigest(output: string): string | undefined {
  const markerIndex = output.indexOf(PUSH_DIGEST_MARKER);
  if (markerIndex === -1) {
    return undefined;
  }

  const rest = output.slice(markerIndex + "digest: ".length);
  const token = rest.split(/\s+/)[0];
  return token || undefined;
}

export async function loadArtifact(runner: CommandRunner, artifactPath: string): Promise<LoadedImage[]> {
  const { stdout } = await runner.capture("docker", ["load", "-i", artifactPath]);
  return parseLoadedImages(stdout, artifactPath);
}

export async function tagImage(runner: CommandRunner, source: string, target: string): Promise<void> {
  await runner.stream("docker", ["tag", source, target]);
}

export async function pushImage(runner: CommandRunner, reference: string): Promise<void> {
  await runner.stream("docker", ["push", reference]);
}

export async function pushImageAndCaptureDigest(runner: CommandRunner, reference: string): Promise<string> {
  const { stdout, stderr } = await runner.capture("docker", ["push", reference], { echo: true });
  const digest = parsePushDigest(`${stdout}\n${stderr}`);
  if (!digest) {
    throw new ParseError(`Unable to parse digest from docker push output for ${reference}.`, [
      "Expected a line such as '<tag>: digest: sha256:<hex> size: <n>'.",
    ]);
  }
  return digest;
}

/**
 * Rebuilds `source` as `FROM <source>` so the runtime writes a complete image
 * config. Render function images from the package build carry an empty
 * rootfs type that registries reject.
 */
export async function rebuildImageConfig(runner: CommandRunner, source: string, target: string): Promise<void> {
  await runner.stream("docker", ["build", "-t", target, "-"], { input: `FROM ${source}\n` });
}

export function patchedConfigurationDockerfile(source: string): string {
  return [
    `FROM ${source} AS src`,
    "FROM scratch",
    "COPY --from=src / /",
    `COPY ${PACKAGE_YAML_ENTRY} /${PACKAGE_YAML_ENTRY}`,
    "",
  ].join("\n");
}

export async function buildPatchedConfigurationImage(
  runner: CommandRunner,
  source: string,
  packageYaml: string,
  now: () => number = Date.now,
): Promise<string> {
  const buildDir = createTempDir("pkgsync-config-");

  try {
    fs.writeFileSync(path.join(buildDir, PACKAGE_YAML_ENTRY), packageYaml);
    fs.writeFileSync(path.join(buildDir, "Dockerfile"), patchedConfigurationDockerfile(source));

    const target = `${PATCHED_IMAGE_REPOSITORY}-${shortHash(source)}:${now()}`;
    await runner.stream("docker", ["build", "-t", target, buildDir]);
    return target;
  } finally {
    cleanupPaths([buildDir]);
  }
}
