import path from "node:path";

import {
  assertNoInlineValue,
  readValue,
  setOnce,
  splitLongOption,
  unexpectedArgument,
} from "../../shared/cli-args";
import { CliHelpRequested, CliUsageError } from "../../shared/cli-errors";
import { parseRepoSpec } from "../../shared/names";
import type { PkgSyncOptions, PkgSyncSource } from "../types";

type ValueFlag = "path" | "repo" | "version" | "output";

type RawArgs = {
  values: Partial<Record<ValueFlag, string>>;
  dryRun: boolean;
};

const VALUE_FLAGS: Record<"--path" | "--repo" | "--version" | "--output", ValueFlag> = {
  "--path": "path",
  "--repo": "repo",
  "--version": "version",
  "--output": "output",
};

function resolveSource(raw: RawArgs): PkgSyncSource {
  const { values } = raw;
  const selectors = (["path", "repo", "output"] as const).filter((key) => values[key] !== undefined);

  if (selectors.length > 1) {
    throw new CliUsageError("Source flags are mutually exclusive.", [
      `Received: ${selectors.map((key) => `--${key}`).join(", ")}.`,
      "Pass at most one of: --path, --repo, --output.",
    ]);
  }

  if (values.version !== undefined && values.repo === undefined) {
    throw new CliUsageError("--version requires --repo.", [
      "Example: pkgsync --repo my-org/my-config --version v1.2.0",
    ]);
  }

  if (values.repo !== undefined) {
    const { org, repo } = parseRepoSpec(values.repo);
    if (values.version !== undefined) {
      return { kind: "repo-version", org, repo, version: values.version.trim() };
    }
    return { kind: "repo", org, repo };
  }

  if (values.output !== undefined) {
    return { kind: "output", path: path.resolve(values.output) };
  }

  return { kind: "path", path: path.resolve(values.path ?? ".") };
}

export function parsePkgSyncArgs(argv: string[]): PkgSyncOptions {
  const raw: RawArgs = {
    values: {},
    dryRun: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const { flag, inlineValue } = splitLongOption(token);

    switch (flag) {
      case "--help":
      case "-h":
        throw new CliHelpRequested();

      case "--dry-run":
        assertNoInlineValue(flag, inlineValue);
        raw.dryRun = true;
        break;

      case "--path":
      case "--repo":
      case "--version":
      case "--output": {
        const result = readValue(argv, i, flag, inlineValue);
        setOnce(raw.values, VALUE_FLAGS[flag], result.value, flag);
        i = result.nextIndex;
        break;
      }

      default:
        throw unexpectedArgument(token, "pkgsync");
    }
  }

  return {
    source: resolveSource(raw),
    dryRun: raw.dryRun,
  };
}
