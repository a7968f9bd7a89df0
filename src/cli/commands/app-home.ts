import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';

export function createAppHomeCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('app-home');

  command
    .description('Print the okteto folder, creating it if needed (OKTETO_FOLDER overrides)')
    .action(() => {
      console.log(resolver.resolveAppHomeDirectory());
    });

  return command;
}
