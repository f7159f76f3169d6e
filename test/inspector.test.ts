import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ArchiveEntryError, CliUsageError, ParseError } from "../src/shared/cli-errors";
import { discoverArtifacts } from "../src/pkgsync/archive/artifacts";
import { extractPackageYaml, listRepoTags, readArchiveEntry } from "../src/pkgsync/archive/inspector";
import { buildTar, writeArtifact } from "./helpers/tar-fixture";

const CONFIG_TAG = "xpkg.upbound.io/acme/platform:configuration";
const PACKAGE_YAML = "apiVersion: meta.pkg.crossplane.io/v1\nkind: Configuration\n";

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pkgsync-inspector-"));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe("readArchiveEntry", () => {
  it("reads entries by ustar prefix and PAX path", () => {
    const artifactPath = path.join(tempDir, "names.tar");
    fs.writeFileSync(
      artifactPath,
      buildTar([
        { name: "skip/me.txt", content: "x".repeat(700) },
        { name: "blobs/sha256/config.json", content: "prefixed", usePrefix: true },
        { name: "short-name", content: "from pax", paxPath: "./very/long/pax/path.json" },
      ]),
    );

    expect(readArchiveEntry(artifactPath, "blobs/sha256/config.json").toString("utf8")).toBe("prefixed");
    expect(readArchiveEntry(artifactPath, "very/long/pax/path.json").toString("utf8")).toBe("from pax");
  });

  it("names the artifact and entry when the entry is missing", () => {
    const artifactPath = path.join(tempDir, "empty.tar");
    fs.writeFileSync(artifactPath, buildTar([{ name: "a.txt", content: "a" }]));

    expect(() => readArchiveEntry(artifactPath, "manifest.json")).toThrow(
      `Entry 'manifest.json' not found in ${artifactPath}.`,
    );
  });
});

describe("readArchiveEntry on a truncated artifact", () => {
  it("fails with the artifact and entry name", () => {
    const artifactPath = path.join(tempDir, "truncated.tar");
    const full = buildTar([{ name: "data.bin", content: "y".repeat(1000) }]);
    fs.writeFileSync(artifactPath, full.subarray(0, 512 + 600));

    const read = () => readArchiveEntry(artifactPath, "data.bin");
    expect(read).toThrow(ParseError);
    expect(read).toThrow(`Archive ${artifactPath} is truncated inside entry 'data.bin'.`);
  });
});

describe("extractPackageYaml", () => {
  it("returns package.yaml from the only layer", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [
      { repoTag: CONFIG_TAG, packageYaml: PACKAGE_YAML, layerDigest: "aaaa" },
    ]);

    expect(extractPackageYaml(artifactPath, CONFIG_TAG)).toBe(PACKAGE_YAML);
  });

  it("prefers the layer named by the base label", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [
      {
        repoTag: CONFIG_TAG,
        packageYaml: PACKAGE_YAML,
        layerDigest: "bbbb",
        labelBase: true,
        extraLayers: ["missing.tar.gz"],
      },
    ]);

    expect(extractPackageYaml(artifactPath, CONFIG_TAG)).toBe(PACKAGE_YAML);
  });

  it("falls back to the first layer without a base label", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [
      { repoTag: CONFIG_TAG, packageYaml: PACKAGE_YAML, layerDigest: "cccc", extraLayers: ["missing.tar.gz"] },
    ]);

    expect(() => extractPackageYaml(artifactPath, CONFIG_TAG)).toThrow(
      `Layer 'missing.tar.gz' not found in ${artifactPath}.`,
    );
  });

  it("reports an unknown repo tag", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [
      { repoTag: CONFIG_TAG, packageYaml: PACKAGE_YAML, layerDigest: "dddd" },
    ]);

    try {
      extractPackageYaml(artifactPath, "xpkg.upbound.io/acme/other:configuration");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArchiveEntryError);
      if (error instanceof ArchiveEntryError) {
        expect(error.reason).toBe("manifest-entry");
        expect(error.hints).toEqual([`Known tags: ${CONFIG_TAG}`]);
      }
    }
  });

  it("reports a layer without package.yaml", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [{ repoTag: CONFIG_TAG, layerDigest: "eeee" }]);

    expect(() => extractPackageYaml(artifactPath, CONFIG_TAG)).toThrow(
      `package.yaml 'package.yaml in layer eeee.tar.gz' not found in ${artifactPath}.`,
    );
  });

  it("rejects a malformed manifest", () => {
    const artifactPath = path.join(tempDir, "broken.uppkg");
    fs.writeFileSync(artifactPath, buildTar([{ name: "manifest.json", content: "{not json" }]));

    expect(() => extractPackageYaml(artifactPath, CONFIG_TAG)).toThrow(ParseError);
    expect(() => extractPackageYaml(artifactPath, CONFIG_TAG)).toThrow(
      `Failed to parse manifest.json in ${artifactPath} JSON.`,
    );
  });
});

describe("listRepoTags", () => {
  it("lists tags across manifest entries", () => {
    const artifactPath = writeArtifact(tempDir, "platform.uppkg", [
      { repoTag: CONFIG_TAG, packageYaml: PACKAGE_YAML, layerDigest: "1111" },
      { repoTag: "xpkg.upbound.io/acme/platform_render:arm64", layerDigest: "2222" },
    ]);

    expect(listRepoTags(artifactPath)).toEqual([CONFIG_TAG, "xpkg.upbound.io/acme/platform_render:arm64"]);
  });
});

describe("discoverArtifacts", () => {
  it("returns sorted .uppkg paths", () => {
    fs.writeFileSync(path.join(tempDir, "b.uppkg"), "");
    fs.writeFileSync(path.join(tempDir, "a.uppkg"), "");
    fs.writeFileSync(path.join(tempDir, "notes.txt"), "");

    expect(discoverArtifacts(tempDir)).toEqual([path.join(tempDir, "a.uppkg"), path.join(tempDir, "b.uppkg")]);
  });

  it("fails when there are no artifacts", () => {
    expect(() => discoverArtifacts(tempDir)).toThrow(CliUsageError);
    expect(() => discoverArtifacts(tempDir)).toThrow(`No .uppkg files found in ${tempDir}.`);
  });
});
