import fs from "node:fs";
import path from "node:path";

import { CliUsageError } from "../../shared/cli-errors";
import { assertDirectoryExists } from "../utils/fs";

export const ARTIFACT_EXTENSION = ".uppkg";
export const BUILD_OUTPUT_DIRNAME = "_output";

export function buildOutputDir(projectDir: string): string {
  return path.join(projectDir, BUILD_OUTPUT_DIRNAME);
}

export function listArtifacts(outputDir: string): string[] {
  assertDirectoryExists(outputDir, "Build output directory");

  return fs
    .readdirSync(outputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(ARTIFACT_EXTENSION))
    .map((entry) => path.join(outputDir, entry.name))
    .sort();
}

export function discoverArtifacts(outputDir: string): string[] {
  const artifacts = listArtifacts(outputDir);
  if (artifacts.length === 0) {
    throw new CliUsageError(`No ${ARTIFACT_EXTENSION} files found in ${outputDir}.`, [
      "Run the package build first (up project build), or point --output at its output directory.",
    ]);
  }
  return artifacts;
}
