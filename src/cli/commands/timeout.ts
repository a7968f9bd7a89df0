import { Command } from 'commander';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';
import { formatDuration } from '../../utils/duration.js';

export function createTimeoutCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('timeout');

  command
    .description('Print the per-action timeout (OKTETO_TIMEOUT overrides the 30s default)')
    .option('--ms', 'Print milliseconds instead of a duration string')
    .action((options: { ms?: boolean }) => {
      const timeout = resolver.getTimeout();
      console.log(options.ms ? String(timeout) : formatDuration(timeout));
    });

  return command;
}
