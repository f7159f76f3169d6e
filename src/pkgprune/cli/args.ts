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
import type { PkgPruneOptions, PkgPruneSelector } from "../types";

type ValueFlag = "name" | "repo" | "path";

type RawArgs = {
  values: Partial<Record<ValueFlag, string>>;
  dryRun: boolean;
};

const VALUE_FLAGS: Record<"--name" | "--repo" | "--path", ValueFlag> = {
  "--name": "name",
  "--repo": "repo",
  "--path": "path",
};

function resolveSelector(raw: RawArgs): PkgPruneSelector {
  const { values } = raw;
  const provided = (["name", "repo", "path"] as const).filter((key) => values[key] !== undefined);

  if (provided.length === 0) {
    throw new CliUsageError("Exactly one target selector is required.", [
      "Pass one of: --name, --repo, --path.",
      "Example: pkgprune --repo my-org/my-config --dry-run",
    ]);
  }

  if (provided.length > 1) {
    throw new CliUsageError("Target selector flags are mutually exclusive.", [
      `Received: ${provided.map((key) => `--${key}`).join(", ")}.`,
      "Pass exactly one of: --name, --repo, --path.",
    ]);
  }

  if (values.name !== undefined) {
    return { kind: "name", name: values.name.trim() };
  }

  if (values.repo !== undefined) {
    const { org, repo } = parseRepoSpec(values.repo);
    return { kind: "repo", org, repo };
  }

  return { kind: "path", path: path.resolve(values.path ?? ".") };
}

export function parsePkgPruneArgs(argv: string[]): PkgPruneOptions {
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

      case "--name":
      case "--repo":
      case "--path": {
        const result = readValue(argv, i, flag, inlineValue);
        setOnce(raw.values, VALUE_FLAGS[flag], result.value, flag);
        i = result.nextIndex;
        break;
      }

      default:
        throw unexpectedArgument(token, "pkgprune");
    }
  }

  return {
    selector: resolveSelector(raw),
    dryRun: raw.dryRun,
  };
}
