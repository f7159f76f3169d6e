import { CliUsageError } from "./cli-errors";

export interface Settings {
  /** Registry address reachable from the build host (`docker push`). */
  pushRegistry: string;
  /** Address of the same registry as seen from inside the cluster. */
  pullRegistry: string;
  /** Host part of `pullRegistry`, kept in the VM's /etc/hosts. */
  pullRegistryHostname: string;
  registryNamespace: string;
  registryService: string;
  pollIntervalMs: number;
}

const DEFAULT_PUSH_REGISTRY = "localhost:30500";
const DEFAULT_PULL_REGISTRY = "registry.crossplane-system.svc.cluster.local:5000";
const DEFAULT_REGISTRY_NAMESPACE = "crossplane-system";
const DEFAULT_POLL_INTERVAL_MS = 2000;

export function resolveSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const pushRegistry = readRegistry(env, "PKGSYNC_PUSH_REGISTRY", DEFAULT_PUSH_REGISTRY);
  const pullRegistry = readRegistry(env, "PKGSYNC_PULL_REGISTRY", DEFAULT_PULL_REGISTRY);
  const registryNamespace = readNonEmpty(env, "PKGSYNC_REGISTRY_NAMESPACE") ?? DEFAULT_REGISTRY_NAMESPACE;

  return {
    pushRegistry,
    pullRegistry,
    pullRegistryHostname: hostnameOf(pullRegistry),
    registryNamespace,
    registryService: "registry",
    pollIntervalMs: readPollInterval(env),
  };
}

function readNonEmpty(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

function readRegistry(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = readNonEmpty(env, key);
  if (!value) {
    return fallback;
  }

  if (value.includes("://") || value.includes("/")) {
    throw new CliUsageError(`Invalid ${key} '${value}'.`, [
      "Use a bare registry address: host[:port], without scheme or path.",
      `Example: ${key}=${fallback}`,
    ]);
  }

  return value;
}

function readPollInterval(env: NodeJS.ProcessEnv): number {
  const raw = readNonEmpty(env, "PKGSYNC_POLL_INTERVAL_MS");
  if (!raw) {
    return DEFAULT_POLL_INTERVAL_MS;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`Invalid PKGSYNC_POLL_INTERVAL_MS '${raw}'.`, [
      "Use a positive whole number of milliseconds, e.g. 2000.",
    ]);
  }

  return parsed;
}

function hostnameOf(registry: string): string {
  const colonIndex = registry.lastIndexOf(":");
  return colonIndex === -1 ? registry : registry.slice(0, colonIndex);
}
