import fs from "node:fs";

import { CliUsageError } from "../../shared/cli-errors";

export function assertDirectoryExists(dirPath: string, label: string): void {
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    throw new CliUsageError(`${label} not found: ${dirPath}`, [
      `Verify that ${label.toLowerCase()} exists and is a directory.`,
    ]);
  }
}
