import fs from "node:fs";
import path from "node:path";

import { ConvergenceTimeoutError, ParseError, ResourceNotFoundError } from "../../shared/cli-errors";
import { pollUntil } from "../../shared/poll";
import type { SyncContext } from "../types";

export const REGISTRY_READY_ATTEMPTS = 60;

export function registryManifestPath(): string {
  return path.resolve(__dirname, "../../../manifests/registry.yaml");
}

export function renderRegistryManifest(namespace: string, manifestPath: string = registryManifestPath()): string {
  return fs.readFileSync(manifestPath, "utf8").split("${NAMESPACE}").join(namespace);
}

async function registryAvailable(context: SyncContext): Promise<boolean> {
  try {
    const replicas = await context.controlPlane.get("deployment", {
      name: context.settings.registryService,
      namespace: context.settings.registryNamespace,
      output: "jsonpath={.status.availableReplicas}",
    });
    return replicas.trim() === "1";
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return false;
    }
    throw error;
  }
}

export async function ensureRegistry(context: SyncContext): Promise<void> {
  if (await registryAvailable(context)) {
    return;
  }

  context.logger.info("Deploying local package registry...");
  await context.controlPlane.apply(renderRegistryManifest(context.settings.registryNamespace));

  const ready = await pollUntil(() => registryAvailable(context), {
    attempts: REGISTRY_READY_ATTEMPTS,
    intervalMs: context.settings.pollIntervalMs,
    sleep: context.sleep,
  });

  if (!ready) {
    throw new ConvergenceTimeoutError("registry deployment", REGISTRY_READY_ATTEMPTS, context.settings.pollIntervalMs);
  }
}

/**
 * Points the VM's /etc/hosts entry for the in-cluster registry hostname at the
 * registry Service's ClusterIP, so the node's runtime can pull from it.
 */
export async function syncRegistryHostsEntry(context: SyncContext): Promise<void> {
  const { registryNamespace, registryService, pullRegistryHostname } = context.settings;

  const clusterIp = (
    await context.controlPlane.get("svc", {
      name: registryService,
      namespace: registryNamespace,
      output: "jsonpath={.spec.clusterIP}",
    })
  ).trim();

  if (!clusterIp) {
    throw new ParseError(`Service ${registryNamespace}/${registryService} has no ClusterIP.`, [
      "Check the registry Service with: kubectl get svc -n " + registryNamespace,
    ]);
  }

  const { stdout } = await context.runner.capture("colima", [
    "ssh",
    "--",
    "sh",
    "-c",
    `awk '$2 == "${pullRegistryHostname}" {print $1; exit}' /etc/hosts`,
  ]);
  if (stdout.trim() === clusterIp) {
    return;
  }

  context.logger.info(`Updating hosts entry: ${pullRegistryHostname} -> ${clusterIp}`);

  const escapedHost = pullRegistryHostname.split(".").join("\\.");
  await context.runner.stream("colima", ["ssh", "--", "sudo", "sed", "-i", `/${escapedHost}/d`, "/etc/hosts"]);
  await context.runner.stream("colima", [
    "ssh",
    "--",
    "sudo",
    "sh",
    "-c",
    `echo '${clusterIp} ${pullRegistryHostname}' >> /etc/hosts`,
  ]);
}
