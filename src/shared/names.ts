import crypto from "node:crypto";

import { CliUsageError } from "./cli-errors";

export const MAX_RESOURCE_NAME_LENGTH = 63;
const NAME_FALLBACK = "xrd";

export interface RepoSpec {
  org: string;
  repo: string;
}

export function sanitizeNameComponent(input: string): string {
  const sanitized = collapseToLabel(input);
  return sanitized || NAME_FALLBACK;
}

/**
 * Joins sanitized parts with `-` and clamps the result to a DNS label.
 */
export function resourceName(...parts: string[]): string {
  const joined = parts.map((part) => sanitizeNameComponent(part)).join("-");
  return clampLabel(joined) || NAME_FALLBACK;
}

export function configurationNameForRepo(spec: RepoSpec): string {
  return resourceName(spec.org, spec.repo);
}

export function parseRepoSpec(repo: string): RepoSpec {
  const trimmed = repo.trim().replace(/\/+$/, "");
  if (!trimmed) {
    throw new CliUsageError("--repo cannot be empty.", [
      "Pass a GitHub repository such as my-org/my-config.",
    ]);
  }

  let withoutPrefix = trimmed;
  for (const prefix of ["https://github.com/", "http://github.com/", "github.com/"]) {
    if (withoutPrefix.startsWith(prefix)) {
      withoutPrefix = withoutPrefix.slice(prefix.length);
      break;
    }
  }

  const withoutSuffix = withoutPrefix.endsWith(".git") ? withoutPrefix.slice(0, -".git".length) : withoutPrefix;
  const parts = withoutSuffix.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new CliUsageError(`Invalid --repo '${repo}': expected <org>/<repo>.`, [
      "Accepted forms: org/repo, github.com/org/repo, https://github.com/org/repo.git",
    ]);
  }

  return {
    org: parts[0],
    repo: parts[1],
  };
}

export function shortHash(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex").slice(0, 8);
}

function collapseToLabel(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

function clampLabel(value: string): string {
  return value.slice(0, MAX_RESOURCE_NAME_LENGTH).replace(/-+$/, "");
}
