import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConvergenceTimeoutError } from "../src/shared/cli-errors";
import { buildImageConfigYaml, imageConfigName } from "../src/pkgsync/manifests";
import { ensureRegistry, syncRegistryHostsEntry } from "../src/pkgsync/cluster/registry";
import { executeSync } from "../src/pkgsync/pipeline/execute";
import { configurationNameForReference } from "../src/pkgsync/pipeline/sync-images";
import type { SyncContext } from "../src/pkgsync/types";
import { FakeControlPlane, FakeRunner, noSleep, silentLogger, testSettings } from "./helpers/fakes";
import type { FakeRunnerHandlers } from "./helpers/fakes";
import { writeArtifact } from "./helpers/tar-fixture";

const CONFIG_IMAGE = "xpkg.upbound.io/acme/platform:configuration";
const RENDER_PATH = "xpkg.upbound.io/acme/platform_render";
const PULL_REGISTRY = "registry.crossplane-system.svc.cluster.local:5000";

const PACKAGE_YAML = [
  "apiVersion: meta.pkg.crossplane.io/v1",
  "kind: Configuration",
  "metadata:",
  "  name: platform",
  "dependsOn:",
  "  - kind: Function",
  `    package: ${RENDER_PATH}`,
  "    version: sha256:upstream",
  "",
].join("\n");

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pkgsync-sync-"));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeBuildOutput(outputDir: string): void {
  fs.mkdirSync(outputDir, { recursive: true });
  writeArtifact(outputDir, "a-config.uppkg", [
    { repoTag: CONFIG_IMAGE, packageYaml: PACKAGE_YAML, layerDigest: "aaaa" },
  ]);
  writeArtifact(outputDir, "b-render.uppkg", [{ repoTag: `${RENDER_PATH}:arm64`, layerDigest: "bbbb" }]);
}

function dockerHandlers(patchedYaml: string[]): FakeRunnerHandlers {
  return {
    capture: (program, args) => {
      if (program === "docker" && args[0] === "load") {
        return args[2].endsWith("a-config.uppkg")
          ? { stdout: `Loaded image: ${CONFIG_IMAGE}\n`, stderr: "" }
          : { stdout: `Loaded image: ${RENDER_PATH}:arm64\nLoaded image: ${RENDER_PATH}:amd64\n`, stderr: "" };
      }
      if (program === "docker" && args[0] === "push") {
        return { stdout: "arm64: digest: sha256:feed size: 528\n", stderr: "" };
      }
      if (program === "colima") {
        return { stdout: "10.43.0.10\n", stderr: "" };
      }
      return undefined;
    },
    stream: (program, args) => {
      if (program === "docker" && args[0] === "build" && args[3] !== "-") {
        patchedYaml.push(fs.readFileSync(path.join(args[3], "package.yaml"), "utf8"));
      }
    },
  };
}

function dockerRunner(patchedYaml: string[]): FakeRunner {
  return new FakeRunner(dockerHandlers(patchedYaml));
}

function context(runner: FakeRunner, controlPlane: FakeControlPlane): SyncContext {
  return {
    runner,
    controlPlane,
    settings: testSettings(),
    logger: silentLogger(),
    sleep: noSleep,
    arch: "arm64",
  };
}

describe("configurationNameForReference", () => {
  it("names the Configuration after the last path segment", () => {
    expect(configurationNameForReference("xpkg.upbound.io/acme/Platform_Config:configuration")).toBe("platform-config");
  });

  it("clamps long image names to a DNS label", () => {
    const name = configurationNameForReference(`ghcr.io/acme/${"a".repeat(70)}:configuration`);
    expect(name).toBe("a".repeat(63));
  });
});

describe("executeSync", () => {
  it("pushes render images, rewrites pins and applies one Configuration", async () => {
    writeBuildOutput(tempDir);
    const patchedYaml: string[] = [];
    const runner = dockerRunner(patchedYaml);
    const controlPlane = new FakeControlPlane();

    const result = await executeSync({ source: { kind: "output", path: tempDir }, dryRun: false }, context(runner, controlPlane));

    const lines = runner.lines();
    expect(lines.slice(0, 8)).toEqual([
      `docker load -i ${path.join(tempDir, "a-config.uppkg")}`,
      `docker load -i ${path.join(tempDir, "b-render.uppkg")}`,
      "docker build -t localhost:30500/acme/platform_render:arm64 -",
      "docker push localhost:30500/acme/platform_render:arm64",
      "docker build -t localhost:30500/acme/platform_render:amd64 -",
      "docker push localhost:30500/acme/platform_render:amd64",
      expect.stringMatching(/^docker build -t pkgsync-local\/config-patched-[0-9a-f]{8}:\d+ /),
      expect.stringMatching(/^docker tag pkgsync-local\/config-patched-[0-9a-f]{8}:\d+ localhost:30500\/acme\/platform:configuration$/),
    ]);
    expect(lines[8]).toBe("docker push localhost:30500/acme/platform:configuration");
    expect(lines).toHaveLength(9);

    expect(patchedYaml).toEqual([PACKAGE_YAML.replace("sha256:upstream", "sha256:feed")]);

    expect(result.imageConfigs).toEqual([imageConfigName(RENDER_PATH)]);
    expect(result.renderRewrites).toEqual({
      [RENDER_PATH]: { pushedDigest: "sha256:feed", targetPullPrefix: `${PULL_REGISTRY}/acme/platform_render` },
    });
    expect(result.configurations).toEqual([
      { name: "platform", package: `${PULL_REGISTRY}/acme/platform:configuration`, skipDependencyResolution: false },
    ]);

    expect(controlPlane.applied).toEqual([
      buildImageConfigYaml({
        name: imageConfigName(RENDER_PATH),
        matchPrefix: RENDER_PATH,
        rewritePrefix: `${PULL_REGISTRY}/acme/platform_render`,
      }),
      [
        "apiVersion: pkg.crossplane.io/v1",
        "kind: Configuration",
        "metadata:",
        "  name: platform",
        "spec:",
        `  package: ${PULL_REGISTRY}/acme/platform:configuration`,
        "  packagePullPolicy: Always",
        "",
      ].join("\n"),
    ]);
    expect(controlPlane.applied[0]).toContain(`      prefix: ${RENDER_PATH}\n`);
  });

  it("pushes configuration images unchanged without render digests", async () => {
    writeArtifact(tempDir, "only.uppkg", [{ repoTag: CONFIG_IMAGE, packageYaml: PACKAGE_YAML, layerDigest: "cccc" }]);
    const runner = new FakeRunner({
      capture: () => ({ stdout: `Loaded image: ${CONFIG_IMAGE}\n`, stderr: "" }),
    });
    const controlPlane = new FakeControlPlane();

    const result = await executeSync({ source: { kind: "output", path: tempDir }, dryRun: false }, context(runner, controlPlane));

    expect(runner.lines()).toEqual([
      `docker load -i ${path.join(tempDir, "only.uppkg")}`,
      `docker tag ${CONFIG_IMAGE} localhost:30500/acme/platform:configuration`,
      "docker push localhost:30500/acme/platform:configuration",
    ]);
    expect(result.imageConfigs).toEqual([]);
    expect(result.pushed).toEqual([
      { source: CONFIG_IMAGE, pushReference: "localhost:30500/acme/platform:configuration", patched: false },
    ]);
  });

  it("fails when docker load reports no images", async () => {
    writeArtifact(tempDir, "only.uppkg", [{ repoTag: CONFIG_IMAGE, packageYaml: PACKAGE_YAML, layerDigest: "dddd" }]);
    const runner = new FakeRunner();

    await expect(
      executeSync({ source: { kind: "output", path: tempDir }, dryRun: false }, context(runner, new FakeControlPlane())),
    ).rejects.toThrow("No images were loaded from the package artifacts.");
  });

  it("applies the upstream package for a repo and version", async () => {
    const runner = new FakeRunner();
    const controlPlane = new FakeControlPlane();

    const result = await executeSync(
      { source: { kind: "repo-version", org: "Acme", repo: "platform", version: "v1.2.0" }, dryRun: false },
      context(runner, controlPlane),
    );

    expect(runner.commands).toEqual([]);
    expect(result.configurations).toEqual([
      { name: "acme-platform", package: "ghcr.io/Acme/platform:v1.2.0", skipDependencyResolution: false },
    ]);
    expect(controlPlane.applied[0]).toContain("  name: acme-platform\n");
  });

  it("prepares the cluster and builds a project path", async () => {
    writeBuildOutput(path.join(tempDir, "_output"));
    const runner = dockerRunner([]);
    const controlPlane = new FakeControlPlane((resource) => {
      if (resource === "deployment") {
        return "1";
      }
      if (resource === "svc") {
        return "10.43.0.10";
      }
      return undefined;
    });

    await executeSync({ source: { kind: "path", path: tempDir }, dryRun: false }, context(runner, controlPlane));

    expect(runner.commands[0].program).toBe("colima");
    expect(runner.commands[1]).toEqual({
      mode: "stream",
      program: "up",
      args: ["project", "build"],
      options: { cwd: tempDir },
    });
    expect(runner.lines()[2]).toBe(`docker load -i ${path.join(tempDir, "_output", "a-config.uppkg")}`);
  });

  it("clones a repository, syncs it and removes the clone", async () => {
    let cloneDir = "";
    const handlers = dockerHandlers([]);
    const runner = new FakeRunner({
      capture: handlers.capture,
      stream: (program, args, options) => {
        if (program === "git") {
          cloneDir = args[2];
          writeBuildOutput(path.join(cloneDir, "_output"));
        }
        handlers.stream?.(program, args, options);
      },
    });
    const controlPlane = new FakeControlPlane((resource) => (resource === "deployment" ? "1" : "10.43.0.10"));

    const result = await executeSync(
      { source: { kind: "repo", org: "acme", repo: "platform" }, dryRun: false },
      context(runner, controlPlane),
    );

    expect(runner.lines()[0]).toBe(`git clone https://github.com/acme/platform ${cloneDir}`);
    expect(path.basename(cloneDir)).toBe("platform");
    expect(runner.commands[2]).toEqual({
      mode: "stream",
      program: "up",
      args: ["project", "build"],
      options: { cwd: cloneDir },
    });
    expect(result.configurations.map((configuration) => configuration.name)).toEqual(["platform"]);
    expect(fs.existsSync(path.dirname(cloneDir))).toBe(false);
  });
});

describe("ensureRegistry", () => {
  it("does nothing when the registry is available", async () => {
    const controlPlane = new FakeControlPlane(() => "1");
    await ensureRegistry(context(new FakeRunner(), controlPlane));

    expect(controlPlane.applied).toEqual([]);
    expect(controlPlane.gets).toEqual([
      {
        resource: "deployment",
        options: { name: "registry", namespace: "crossplane-system", output: "jsonpath={.status.availableReplicas}" },
      },
    ]);
  });

  it("applies the registry manifest and waits for it", async () => {
    const answers = ["", "0"];
    const controlPlane = new FakeControlPlane(() => answers.shift() ?? "1");

    await ensureRegistry(context(new FakeRunner(), controlPlane));

    expect(controlPlane.applied).toHaveLength(1);
    expect(controlPlane.applied[0]).toContain("  namespace: crossplane-system\n");
    expect(controlPlane.applied[0]).not.toContain("${NAMESPACE}");
    expect(controlPlane.gets).toHaveLength(3);
  });

  it("times out after 60 attempts", async () => {
    const controlPlane = new FakeControlPlane(() => "0");

    await expect(ensureRegistry(context(new FakeRunner(), controlPlane))).rejects.toBeInstanceOf(ConvergenceTimeoutError);
    expect(controlPlane.gets).toHaveLength(61);
  });
});

describe("syncRegistryHostsEntry", () => {
  it("rewrites a stale hosts entry", async () => {
    const runner = new FakeRunner({ capture: () => ({ stdout: "10.0.0.1\n", stderr: "" }) });
    const controlPlane = new FakeControlPlane(() => "10.43.0.10");

    await syncRegistryHostsEntry(context(runner, controlPlane));

    expect(runner.lines().slice(1)).toEqual([
      "colima ssh -- sudo sed -i /registry\\.crossplane-system\\.svc\\.cluster\\.local/d /etc/hosts",
      "colima ssh -- sudo sh -c echo '10.43.0.10 registry.crossplane-system.svc.cluster.local' >> /etc/hosts",
    ]);
  });

  it("rejects a Service without a ClusterIP", async () => {
    const controlPlane = new FakeControlPlane(() => "  ");

    await expect(syncRegistryHostsEntry(context(new FakeRunner(), controlPlane))).rejects.toThrow(
      "Service crossplane-system/registry has no ClusterIP.",
    );
  });
});
