import type { RenderRewrites } from "../types";

export interface DependencyPatchResult {
  text: string;
  changed: boolean;
}

export interface Dependency {
  kind: string;
  packageReference: string;
}

const BLOCK_HEADER = "dependsOn:";

type LineVisitor = (line: string, trimmed: string, item: { kind?: string; pkg?: string }) => string;

/**
 * Walks the `dependsOn:` block line by line. The block ends at the first
 * non-blank line without leading whitespace. Lines are split on "\n" only, so
 * whatever the visitor returns unchanged is reproduced byte for byte.
 */
function walkDependsOn(text: string, visit: LineVisitor): string[] {
  const lines = text.split("\n");
  let inBlock = false;
  let item: { kind?: string; pkg?: string } = {};

  return lines.map((line) => {
    const trimmed = line.trim();

    if (trimmed === BLOCK_HEADER) {
      inBlock = true;
      item = {};
      return line;
    }

    if (inBlock && trimmed.length > 0 && !line.startsWith(" ") && !line.startsWith("\t")) {
      inBlock = false;
      item = {};
    }

    if (!inBlock) {
      return line;
    }

    if (trimmed.startsWith("- ") || trimmed === "-") {
      item = {};
      readKey(trimmed.slice(1).trim(), item);
      return visit(line, trimmed, item);
    }

    readKey(trimmed, item);
    return visit(line, trimmed, item);
  });
}

function readKey(content: string, item: { kind?: string; pkg?: string }): void {
  if (content.startsWith("package:")) {
    item.pkg = cleanScalar(content.slice("package:".length));
  } else if (content.startsWith("kind:")) {
    item.kind = cleanScalar(content.slice("kind:".length));
  }
}

export function cleanScalar(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === "'" || first === '"') && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

export function rewriteDependencyVersions(text: string, rewrites: RenderRewrites): DependencyPatchResult {
  if (rewrites.size === 0) {
    return { text, changed: false };
  }

  let changed = false;
  const lines = walkDependsOn(text, (line, trimmed, item) => {
    if (!trimmed.startsWith("version:") || item.pkg === undefined) {
      return line;
    }

    const rewrite = rewrites.get(item.pkg);
    if (!rewrite) {
      return line;
    }

    const indent = line.slice(0, line.length - line.trimStart().length);
    const lineEnding = line.endsWith("\r") ? "\r" : "";
    const replaced = `${indent}version: ${rewrite.pushedDigest}${lineEnding}`;
    if (replaced !== line) {
      changed = true;
    }
    return replaced;
  });

  return { text: changed ? lines.join("\n") : text, changed };
}

export function listDependencies(text: string): Dependency[] {
  const items: Array<{ kind?: string; pkg?: string }> = [];
  walkDependsOn(text, (line, _trimmed, item) => {
    if (!items.includes(item)) {
      items.push(item);
    }
    return line;
  });

  return items.flatMap((item) =>
    item.pkg === undefined ? [] : [{ kind: item.kind ?? "", packageReference: item.pkg }],
  );
}
