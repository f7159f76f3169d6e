import {
  ConvergenceTimeoutError,
  CliUsageError,
  ExternalCommandError,
  ParseError,
  ResourceNotFoundError,
} from "./cli-errors";

type HintedError =
  | CliUsageError
  | ExternalCommandError
  | ResourceNotFoundError
  | ParseError
  | ConvergenceTimeoutError;

function isHintedError(error: unknown): error is HintedError {
  return (
    error instanceof CliUsageError ||
    error instanceof ExternalCommandError ||
    error instanceof ResourceNotFoundError ||
    error instanceof ParseError ||
    error instanceof ConvergenceTimeoutError
  );
}

export function renderCliError(error: unknown): string {
  if (isHintedError(error)) {
    const lines = [`Error: ${error.message}`];
    if (error.hints.length > 0) {
      lines.push("", "How to fix:");
      for (const hint of error.hints) {
        lines.push(`  - ${hint}`);
      }
    }
    return lines.join("\n");
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}
