import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';

export function createHomeCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('home');

  command
    .description('Print the user home directory (OKTETO_HOME, or the platform default)')
    .action(() => {
      console.log(resolver.resolveHomeDirectory());
    });

  return command;
}
