import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Read the CLI version from package.json (same relative location in src/ and dist/)
 */
export function getVersion(): string {
  const packageJsonPath = join(__dirname, '..', '..', '..', 'package.json');
  try {
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version?: unknown };
    return typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
  } catch (error) {
    logger.debug(`[version] Could not read ${packageJsonPath}: ${getErrorMessage(error)}`);
    return 'unknown';
  }
}

export function createVersionCommand(): Command {
  const command = new Command('version');

  command
    .description('Show version information')
    .action(() => {
      console.log(`okteto-config v${getVersion()}`);
    });

  return command;
}
