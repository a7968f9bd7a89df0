/**
 * Environment and filesystem capabilities used by the config resolver.
 *
 * Every environment-variable read and directory operation goes through this
 * interface, so tests can hand the resolver a fake instead of mutating
 * process.env or touching the real home directory.
 */

import { existsSync, mkdirSync } from 'fs';
import os from 'os';

export interface ConfigEnvironment {
  /** Platform whose home-directory and path-list rules apply */
  readonly platform: NodeJS.Platform;

  /**
   * Value of an environment variable, or undefined when unset.
   * An empty string means the variable is set to an empty value.
   */
  getVar(name: string): string | undefined;

  pathExists(path: string): boolean;

  /** Create a directory and its parents; succeeds if it already exists */
  mkdirAll(path: string, mode: number): void;
}

/**
 * Environment backed by the running process
 *
 * @param env - Variables to read (defaults to process.env)
 * @param platform - Platform rules to apply (defaults to the host's)
 */
export function createNodeEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = os.platform()
): ConfigEnvironment {
  return {
    platform,
    getVar: (name) => env[name],
    pathExists: (path) => existsSync(path),
    mkdirAll: (path, mode) => {
      mkdirSync(path, { recursive: true, mode });
    }
  };
}
