import { Command } from 'commander';
import { join } from 'path';
import { ConfigResolver, getConfigResolver } from '../utils/okteto-home.js';
import { logger } from '../utils/logger.js';
import { createHomeCommand } from './commands/home.js';
import { createAppHomeCommand } from './commands/app-home.js';
import { createNamespaceCommand } from './commands/namespace.js';
import { createDeploymentCommand } from './commands/deployment.js';
import { createKubeconfigCommand } from './commands/kubeconfig.js';
import { createTimeoutCommand } from './commands/timeout.js';
import { createPathsCommand } from './commands/paths.js';
import { createVersionCommand, getVersion } from './commands/version.js';

export function createCLI(resolver: ConfigResolver = getConfigResolver()): Command {
  const program = new Command();

  program
    .name('okteto-config')
    .description('Resolve okteto home, namespace and deployment folders, kubeconfig and timeout')
    .version(getVersion())
    .option('-v, --verbose', 'Enable debug output and write a debug log under the okteto folder')
    .hook('preAction', () => {
      if (!program.opts<{ verbose?: boolean }>().verbose) {
        return;
      }

      process.env.OKTETO_DEBUG = 'true';
      logger.setLogDirectory(join(resolver.resolveAppHomeDirectory(), 'logs'));
      logger.debug(`Debug logs: ${logger.getLogFilePath() ?? 'disabled'}`);
    });

  program.addCommand(createHomeCommand(resolver));
  program.addCommand(createAppHomeCommand(resolver));
  program.addCommand(createNamespaceCommand(resolver));
  program.addCommand(createDeploymentCommand(resolver));
  program.addCommand(createKubeconfigCommand(resolver));
  program.addCommand(createTimeoutCommand(resolver));
  program.addCommand(createPathsCommand(resolver));
  program.addCommand(createVersionCommand());

  return program;
}
