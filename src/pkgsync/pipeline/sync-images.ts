import { CliUsageError } from "../../shared/cli-errors";
import { resourceName } from "../../shared/names";
import { discoverArtifacts } from "../archive/artifacts";
import { extractPackageYaml } from "../archive/inspector";
import {
  buildPatchedConfigurationImage,
  dedupeLoadedImages,
  loadArtifact,
  pushImage,
  pushImageAndCaptureDigest,
  rebuildImageConfig,
  tagImage,
} from "../images/docker";
import { buildConfigurationYaml, buildImageConfigYaml, imageConfigName } from "../manifests";
import { listDependencies, rewriteDependencyVersions } from "../metadata/depends-on";
import {
  classifyImage,
  lastPathSegment,
  rewriteRegistry,
  splitReference,
  stripRegistryPrefix,
} from "../registry/image-reference";
import type {
  AppliedConfiguration,
  LoadedImage,
  PushedImage,
  RenderRewrites,
  SyncContext,
} from "../types";

export interface ImageSyncResult {
  artifacts: string[];
  loadedImages: LoadedImage[];
  pushed: PushedImage[];
  renderRewrites: RenderRewrites;
  imageConfigs: string[];
  configurations: AppliedConfiguration[];
}

export async function loadArtifacts(context: SyncContext, artifacts: string[]): Promise<LoadedImage[]> {
  const loaded: LoadedImage[] = [];
  for (const artifactPath of artifacts) {
    context.logger.info(`Loading ${artifactPath}...`);
    loaded.push(...(await loadArtifact(context.runner, artifactPath)));
  }

  const unique = dedupeLoadedImages(loaded);
  if (unique.length === 0) {
    throw new CliUsageError("No images were loaded from the package artifacts.", [
      `Artifacts: ${artifacts.join(", ")}`,
      "Expected 'docker load' to report at least one 'Loaded image: <ref>' line.",
    ]);
  }
  return unique;
}

async function pushSupportingImage(
  context: SyncContext,
  image: LoadedImage,
  rewrites: RenderRewrites,
): Promise<PushedImage> {
  const { runner, settings, logger, arch } = context;
  const pushReference = rewriteRegistry(image.sourceReference, settings.pushRegistry);
  const [imagePath, tag] = splitReference(image.sourceReference);

  if (classifyImage(image.sourceReference) !== "render-function") {
    await tagImage(runner, image.sourceReference, pushReference);
    logger.info(`Pushing ${pushReference}...`);
    await pushImage(runner, pushReference);
    return { source: image.sourceReference, pushReference, patched: false };
  }

  logger.info(`Rebuilding ${pushReference} (fix image config)...`);
  await rebuildImageConfig(runner, image.sourceReference, pushReference);

  if (tag !== arch) {
    logger.info(`Pushing ${pushReference}...`);
    await pushImage(runner, pushReference);
    return { source: image.sourceReference, pushReference, patched: true };
  }

  logger.info(`Pushing ${pushReference} and capturing digest...`);
  const digest = await pushImageAndCaptureDigest(runner, pushReference);
  rewrites.set(imagePath, {
    pushedDigest: digest,
    targetPullPrefix: `${settings.pullRegistry}/${stripRegistryPrefix(imagePath)}`,
  });
  return { source: image.sourceReference, pushReference, patched: true, digest };
}

async function applyRewriteRules(context: SyncContext, rewrites: RenderRewrites): Promise<string[]> {
  const names: string[] = [];
  for (const [source, rewrite] of rewrites) {
    const name = imageConfigName(source);
    context.logger.info(`Applying ImageConfig rewrite for ${source} -> ${rewrite.targetPullPrefix}...`);
    await context.controlPlane.apply(
      buildImageConfigYaml({ name, matchPrefix: source, rewritePrefix: rewrite.targetPullPrefix }),
    );
    names.push(name);
  }
  return names;
}

async function pushConfigurationImage(
  context: SyncContext,
  image: LoadedImage,
  rewrites: RenderRewrites,
): Promise<PushedImage> {
  const { runner, settings, logger } = context;
  const pushReference = rewriteRegistry(image.sourceReference, settings.pushRegistry);

  const packageYaml = extractPackageYaml(image.originArtifactPath, image.sourceReference);
  logger.debug(
    { dependencies: listDependencies(packageYaml) },
    `Package metadata for ${image.sourceReference}`,
  );

  const patch = rewriteDependencyVersions(packageYaml, rewrites);
  let toPush = image.sourceReference;
  if (patch.changed) {
    logger.info(`Patching package metadata for ${image.sourceReference} to use local render digests...`);
    toPush = await buildPatchedConfigurationImage(runner, image.sourceReference, patch.text);
  }

  await tagImage(runner, toPush, pushReference);
  logger.info(`Pushing ${pushReference}...`);
  await pushImage(runner, pushReference);
  return { source: image.sourceReference, pushReference, patched: patch.changed };
}

export function configurationNameForReference(reference: string): string {
  const [imagePath] = splitReference(reference);
  return resourceName(lastPathSegment(imagePath));
}

export async function applyConfiguration(
  context: SyncContext,
  configuration: AppliedConfiguration,
): Promise<void> {
  context.logger.info(`Applying Configuration '${configuration.name}'...`);
  await context.controlPlane.apply(
    buildConfigurationYaml({
      name: configuration.name,
      packageRef: configuration.package,
      skipDependencyResolution: configuration.skipDependencyResolution,
    }),
  );
}

/**
 * Loads every artifact in `outputDir`, pushes supporting images (rebuilding
 * render functions and recording their digests), pushes configuration images
 * with dependency pins patched to those digests, and applies one
 * Configuration per configuration image.
 */
export async function syncImages(context: SyncContext, outputDir: string): Promise<ImageSyncResult> {
  const artifacts = discoverArtifacts(outputDir);
  const loadedImages = await loadArtifacts(context, artifacts);

  const configurationImages = loadedImages.filter((image) => classifyImage(image.sourceReference) === "configuration");
  const supportingImages = loadedImages.filter((image) => classifyImage(image.sourceReference) !== "configuration");

  const rewrites: RenderRewrites = new Map();
  const pushed: PushedImage[] = [];

  // Configuration pins depend on render digests, so those go first.
  for (const image of supportingImages) {
    pushed.push(await pushSupportingImage(context, image, rewrites));
  }

  const imageConfigs = await applyRewriteRules(context, rewrites);

  const configurations: AppliedConfiguration[] = [];
  for (const image of configurationImages) {
    pushed.push(await pushConfigurationImage(context, image, rewrites));
    configurations.push({
      name: configurationNameForReference(image.sourceReference),
      package: rewriteRegistry(image.sourceReference, context.settings.pullRegistry),
      skipDependencyResolution: false,
    });
  }

  // Dependency resolution stays enabled; the package manager resolves the
  // pushed dependencies itself.
  for (const configuration of configurations) {
    await applyConfiguration(context, configuration);
  }

  return {
    artifacts,
    loadedImages,
    pushed,
    renderRewrites: rewrites,
    imageConfigs,
    configurations,
  };
}
