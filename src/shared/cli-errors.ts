export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

export class CliHelpRequested extends Error {
  constructor() {
    super("help requested");
    this.name = "CliHelpRequested";
  }
}

export class ExternalCommandError extends Error {
  public readonly hints: string[];

  constructor(
    public readonly program: string,
    public readonly args: string[],
    public readonly exitStatus: number | null,
    public readonly stderr: string = "",
  ) {
    super(`${program} exited with status ${exitStatus ?? "unknown"}.`);
    this.name = "ExternalCommandError";

    const hints = [`Command: ${[program, ...args].join(" ")}`];
    const trimmed = stderr.trim();
    if (trimmed) {
      hints.push(trimmed);
    }
    this.hints = hints;
  }
}

export class ResourceNotFoundError extends Error {
  public readonly hints: string[] = [];

  constructor(
    public readonly resource: string,
    public readonly resourceName: string | undefined,
  ) {
    super(resourceName ? `${resource} '${resourceName}' not found.` : `${resource} not found.`);
    this.name = "ResourceNotFoundError";
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = [],
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export type ArchiveEntryFailure = "entry" | "manifest-entry" | "layer" | "package-yaml";

const ARCHIVE_FAILURE_LABELS: Record<ArchiveEntryFailure, string> = {
  entry: "Entry",
  "manifest-entry": "Manifest entry",
  layer: "Layer",
  "package-yaml": "package.yaml",
};

export class ArchiveEntryError extends ParseError {
  constructor(
    public readonly reason: ArchiveEntryFailure,
    public readonly artifactPath: string,
    public readonly entryName: string,
    hints: string[] = [],
  ) {
    super(`${ARCHIVE_FAILURE_LABELS[reason]} '${entryName}' not found in ${artifactPath}.`, hints);
    this.name = "ArchiveEntryError";
  }
}

export class ConvergenceTimeoutError extends Error {
  public readonly hints: string[];

  constructor(
    public readonly subject: string,
    public readonly attempts: number,
    public readonly intervalMs: number,
  ) {
    super(`Timed out waiting for ${subject}.`);
    this.name = "ConvergenceTimeoutError";
    this.hints = [
      `Gave up after ${attempts} attempts, ${intervalMs}ms apart.`,
      "Every step is safe to rerun once the cluster settles.",
    ];
  }
}
