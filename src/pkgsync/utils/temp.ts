import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../../shared/logger";

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupPaths(paths: string[], logger?: Logger): void {
  for (const targetPath of paths) {
    try {
      fs.rmSync(targetPath, { recursive: true, force: true });
    } catch (error) {
      logger?.warn({ path: targetPath, err: error }, "Failed to remove temporary path");
    }
  }
}
