import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";

import { CliUsageError, ExternalCommandError } from "./cli-errors";
import type { Logger } from "./logger";

export interface RunOptions {
  cwd?: string;
  input?: string;
}

export interface CaptureOptions extends RunOptions {
  /** Mirror captured output to this process' stdout/stderr while it runs. */
  echo?: boolean;
}

export interface CapturedOutput {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  stream(program: string, args: string[], options?: RunOptions): Promise<void>;
  capture(program: string, args: string[], options?: CaptureOptions): Promise<CapturedOutput>;
}

export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    stream: (program, args, options = {}) => {
      logger.debug({ cwd: options.cwd }, `Running: ${program} ${args.join(" ")}`);
      return runStreaming(program, args, options);
    },
    capture: (program, args, options = {}) => {
      logger.debug({ cwd: options.cwd }, `Running: ${program} ${args.join(" ")}`);
      return runCapturing(program, args, options);
    },
  };
}

async function runStreaming(program: string, args: string[], options: RunOptions): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(program, args, {
      cwd: options.cwd,
      stdio: [options.input === undefined ? "inherit" : "pipe", "inherit", "inherit"],
      env: process.env,
    });

    child.on("error", (error) => {
      reject(spawnFailure(program, error));
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve();
        return;
      }

      reject(new ExternalCommandError(program, args, code));
    });

    if (options.input !== undefined) {
      writeInput(child, options.input, reject);
    }
  });
}

async function runCapturing(program: string, args: string[], options: CaptureOptions): Promise<CapturedOutput> {
  return await new Promise<CapturedOutput>((resolve, reject) => {
    const child = spawn(program, args, {
      cwd: options.cwd,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      env: process.env,
    });

    let stdout = "";
    let stderr = "";

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");

    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
      if (options.echo) {
        process.stdout.write(chunk);
      }
    });

    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
      if (options.echo) {
        process.stderr.write(chunk);
      }
    });

    child.on("error", (error) => {
      reject(spawnFailure(program, error));
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }

      reject(new ExternalCommandError(program, args, code, stderr));
    });

    if (options.input !== undefined) {
      writeInput(child, options.input, reject);
    }
  });
}

// A child that exits before draining stdin closes the pipe; its exit status is
// reported by the "close" handler instead.
function writeInput(child: ChildProcess, input: string, reject: (error: Error) => void): void {
  child.stdin?.on("error", (error) => {
    if ("code" in error && error.code === "EPIPE") {
      return;
    }
    reject(error);
  });
  child.stdin?.end(input);
}

function spawnFailure(program: string, error: Error): CliUsageError {
  return new CliUsageError(`Failed to start ${program}.`, [
    error.message,
    `Install ${program} and make sure it is on PATH, then retry.`,
  ]);
}
