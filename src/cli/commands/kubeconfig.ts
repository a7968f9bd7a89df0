import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';

export function createKubeconfigCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('kubeconfig');

  command
    .description('Print the kubeconfig path (first entry of KUBECONFIG, or ~/.kube/config)')
    .action(() => {
      console.log(resolver.resolveKubeconfigPath());
    });

  return command;
}
