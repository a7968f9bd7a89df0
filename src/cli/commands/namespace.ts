import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';
import { parsePathSegment } from '../validation.js';

export function createNamespaceCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('namespace');

  command
    .description('Print the folder for a namespace, creating it if needed')
    .argument('<namespace>', 'Namespace name')
    .action((namespace: string) => {
      console.log(resolver.resolveNamespaceDirectory(parsePathSegment('namespace', namespace)));
    });

  return command;
}
