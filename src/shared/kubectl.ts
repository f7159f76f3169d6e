import { ExternalCommandError, ResourceNotFoundError } from "./cli-errors";
import type { CommandRunner } from "./exec";

export interface GetOptions {
  name?: string;
  namespace?: string;
  /** Passed to `-o`, e.g. `json`, `name` or `jsonpath={...}`. */
  output: string;
}

export interface ControlPlane {
  apply(manifest: string): Promise<void>;
  /** Rejects with ResourceNotFoundError when the named resource does not exist. */
  get(resource: string, options: GetOptions): Promise<string>;
  delete(resource: string, name: string): Promise<void>;
}

const NOT_FOUND_PATTERN = /\(NotFound\)|not found/i;

export function createKubectl(runner: CommandRunner): ControlPlane {
  return {
    apply: async (manifest) => {
      await runner.stream("kubectl", ["apply", "-f", "-"], { input: manifest });
    },

    get: async (resource, options) => {
      const args = ["get", resource];
      if (options.name) {
        args.push(options.name);
      }
      if (options.namespace) {
        args.push("-n", options.namespace);
      }
      args.push("-o", options.output);

      try {
        const { stdout } = await runner.capture("kubectl", args);
        return stdout;
      } catch (error) {
        if (error instanceof ExternalCommandError && NOT_FOUND_PATTERN.test(error.stderr)) {
          throw new ResourceNotFoundError(resource, options.name);
        }
        throw error;
      }
    },

    delete: async (resource, name) => {
      await runner.stream("kubectl", ["delete", resource, name, "--ignore-not-found"]);
    },
  };
}
