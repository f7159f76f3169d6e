import { CliUsageError } from "./cli-errors";

export function splitLongOption(token: string): { flag: string; inlineValue: string | undefined } {
  if (!token.startsWith("--")) {
    return { flag: token, inlineValue: undefined };
  }

  const equalsIndex = token.indexOf("=");
  if (equalsIndex === -1) {
    return { flag: token, inlineValue: undefined };
  }

  return {
    flag: token.slice(0, equalsIndex),
    inlineValue: token.slice(equalsIndex + 1),
  };
}

export function readValue(
  argv: string[],
  index: number,
  flag: string,
  inlineValue: string | undefined
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined) {
    if (inlineValue.trim().length === 0) {
      throw new CliUsageError(`${flag} cannot be empty.`, [`Provide a non-empty value for ${flag}.`]);
    }

    return {
      value: inlineValue,
      nextIndex: index,
    };
  }

  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value.`, [`Example: ${flag} <value>`]);
  }

  if (value.trim().length === 0) {
    throw new CliUsageError(`${flag} cannot be empty.`, [`Provide a non-empty value for ${flag}.`]);
  }

  return {
    value,
    nextIndex: index + 1,
  };
}

export function setOnce<K extends string>(
  values: Partial<Record<K, string>>,
  key: K,
  value: string,
  flag: string
): void {
  const existing = values[key];
  if (existing !== undefined) {
    throw new CliUsageError(`${flag} was provided more than once.`, [
      `Pass ${flag} only once. Received '${existing}' and '${value}'.`,
    ]);
  }

  values[key] = value;
}

export function assertNoInlineValue(flag: string, inlineValue: string | undefined): void {
  if (inlineValue !== undefined) {
    throw new CliUsageError(`${flag} does not accept a value.`, [`Use ${flag} as a standalone flag.`]);
  }
}

export function unexpectedArgument(token: string, command: string): CliUsageError {
  if (token.startsWith("-")) {
    return new CliUsageError(`Unknown option '${token}'.`, [`Run ${command} --help to see supported options.`]);
  }

  return new CliUsageError(`Unexpected positional argument '${token}'.`, [
    "This command accepts only named flags.",
    `Run ${command} --help for examples.`,
  ]);
}
