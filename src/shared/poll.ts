import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface PollOptions {
  attempts: number;
  intervalMs: number;
  sleep: Sleep;
}

/**
 * Calls `check` until it returns true or `attempts` runs out. Resolves false on
 * exhaustion; callers decide whether that is fatal.
 */
export async function pollUntil(check: () => Promise<boolean>, options: PollOptions): Promise<boolean> {
  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    if (await check()) {
      return true;
    }

    if (attempt < options.attempts) {
      await options.sleep(options.intervalMs);
    }
  }

  return false;
}
