/**
 * Okteto Home Directory Resolution
 *
 * Resolves the user's home directory, the okteto folder, per-namespace and
 * per-deployment folders, the kubeconfig location and the per-action timeout.
 *
 * Precedence for every value:
 * 1. Explicit override environment variable
 * 2. Platform convention (HOME, or the Windows home variables)
 * 3. Built-in default
 *
 * Directories are created on demand with owner-only permissions.
 * Resolution failures throw a ConfigurationError; the CLI entry point is
 * responsible for turning them into a non-zero exit.
 */

import path from 'path';
import { ConfigEnvironment, createNodeEnvironment } from './environment.js';
import {
  DirectoryCreateError,
  NoHomeDirectoryError,
  OverridePathMissingError,
  getErrorMessage
} from './errors.js';
import { Duration, SECOND, formatDuration, parseDuration } from './duration.js';
import { logger } from './logger.js';

export const OKTETO_FOLDER_NAME = '.okteto';
export const DEFAULT_TIMEOUT: Duration = 30 * SECOND;
export const DIRECTORY_MODE = 0o700;

export const ENV = {
  FOLDER: 'OKTETO_FOLDER',
  HOME: 'OKTETO_HOME',
  TIMEOUT: 'OKTETO_TIMEOUT',
  KUBECONFIG: 'KUBECONFIG',
  USER_HOME: 'HOME',
  USER_PROFILE: 'USERPROFILE',
  HOME_DRIVE: 'HOMEDRIVE',
  HOME_PATH: 'HOMEPATH'
} as const;

export class ConfigResolver {
  private timeout: Duration | undefined;

  constructor(private readonly env: ConfigEnvironment = createNodeEnvironment()) {}

  private get isWindows(): boolean {
    return this.env.platform === 'win32';
  }

  private get paths(): path.PlatformPath {
    return this.isWindows ? path.win32 : path.posix;
  }

  /**
   * Get the user's home directory
   *
   * OKTETO_HOME must point to an existing path. On Windows the first
   * non-empty of HOME, USERPROFILE and HOMEDRIVE+HOMEPATH is used.
   * Elsewhere HOME is returned as-is, without checking that it exists
   * (an unset HOME yields '').
   */
  resolveHomeDirectory(): string {
    const override = this.env.getVar(ENV.HOME);
    if (override !== undefined) {
      if (!this.env.pathExists(override)) {
        throw new OverridePathMissingError(
          ENV.HOME,
          override,
          `${ENV.HOME} points to a non-existing directory: ${override}`
        );
      }
      return override;
    }

    if (this.isWindows) {
      return this.resolveWindowsHomeDirectory();
    }

    return this.env.getVar(ENV.USER_HOME) ?? '';
  }

  private resolveWindowsHomeDirectory(): string {
    const home = this.env.getVar(ENV.USER_HOME);
    if (home) {
      return home;
    }

    const profile = this.env.getVar(ENV.USER_PROFILE);
    if (profile) {
      return profile;
    }

    const drive = this.env.getVar(ENV.HOME_DRIVE) ?? '';
    const homePath = this.env.getVar(ENV.HOME_PATH) ?? '';
    if (drive === '' || homePath === '') {
      throw new NoHomeDirectoryError([ENV.USER_HOME, ENV.USER_PROFILE, ENV.HOME_DRIVE, ENV.HOME_PATH]);
    }

    return drive + homePath;
  }

  /**
   * Get the okteto folder
   *
   * @example
   * resolver.resolveAppHomeDirectory() // => '/home/dev/.okteto'
   *
   * // OKTETO_FOLDER=/data/okteto
   * resolver.resolveAppHomeDirectory() // => '/data/okteto'
   */
  resolveAppHomeDirectory(): string {
    const override = this.env.getVar(ENV.FOLDER);
    if (override !== undefined) {
      if (!this.env.pathExists(override)) {
        throw new OverridePathMissingError(ENV.FOLDER, override);
      }
      return override;
    }

    return this.ensureDirectory(this.paths.join(this.resolveHomeDirectory(), OKTETO_FOLDER_NAME));
  }

  /**
   * Get the folder for a namespace, e.g. ~/.okteto/<namespace>
   */
  resolveNamespaceDirectory(namespace: string): string {
    return this.ensureDirectory(this.paths.join(this.resolveAppHomeDirectory(), namespace));
  }

  /**
   * Get the folder for a deployment, e.g. ~/.okteto/<namespace>/<name>
   */
  resolveDeploymentDirectory(namespace: string, name: string): string {
    return this.ensureDirectory(this.paths.join(this.resolveAppHomeDirectory(), namespace, name));
  }

  /**
   * Get the kubeconfig file path
   *
   * Defaults to <home>/.kube/config. When KUBECONFIG holds a path list,
   * only its first entry is used. The file is not required to exist.
   */
  resolveKubeconfigPath(): string {
    const kubeconfigEnv = this.env.getVar(ENV.KUBECONFIG);
    if (kubeconfigEnv) {
      return kubeconfigEnv.split(this.paths.delimiter)[0];
    }

    return this.paths.join(this.resolveHomeDirectory(), '.kube', 'config');
  }

  /**
   * Get the per-action timeout
   *
   * Computed on first call and cached for the lifetime of the resolver.
   * An OKTETO_TIMEOUT that cannot be parsed is reported and ignored.
   */
  getTimeout(): Duration {
    if (this.timeout === undefined) {
      this.timeout = this.computeTimeout();
    }
    return this.timeout;
  }

  private computeTimeout(): Duration {
    const value = this.env.getVar(ENV.TIMEOUT);
    if (value === undefined) {
      return DEFAULT_TIMEOUT;
    }

    let parsed: Duration;
    try {
      parsed = parseDuration(value);
    } catch (error) {
      logger.warn(`'${value}' is not a valid duration, ignoring`);
      logger.debug(`[ConfigResolver] ${ENV.TIMEOUT} rejected: ${getErrorMessage(error)}`);
      return DEFAULT_TIMEOUT;
    }

    logger.info(`${ENV.TIMEOUT} applied: '${formatDuration(parsed)}'`);
    return parsed;
  }

  private ensureDirectory(dir: string): string {
    try {
      this.env.mkdirAll(dir, DIRECTORY_MODE);
    } catch (error) {
      throw new DirectoryCreateError(dir, error instanceof Error ? error : new Error(String(error)));
    }
    return dir;
  }
}

let defaultResolver: ConfigResolver | undefined;

/**
 * Shared resolver for the running process, created on first use
 */
export function getConfigResolver(): ConfigResolver {
  if (!defaultResolver) {
    defaultResolver = new ConfigResolver();
  }
  return defaultResolver;
}
