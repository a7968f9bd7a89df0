import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';
import { parsePathSegment } from '../validation.js';

export function createDeploymentCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('deployment');

  command
    .description('Print the folder for a deployment, creating it if needed')
    .argument('<namespace>', 'Namespace name')
    .argument('<name>', 'Deployment name')
    .action((namespace: string, name: string) => {
      const dir = resolver.resolveDeploymentDirectory(
        parsePathSegment('namespace', namespace),
        parsePathSegment('deployment name', name)
      );
      console.log(dir);
    });

  return command;
}
