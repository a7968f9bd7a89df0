import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigResolver, getConfigResolver } from '../../utils/okteto-home.js';
import { formatDuration } from '../../utils/duration.js';
import { PathsReport, PathsReportSchema, parseOutputFormat, parsePathSegment } from '../validation.js';

/**
 * Resolve every location in one pass
 *
 * The deployment folder needs a namespace; a deployment without one is ignored.
 */
export function buildPathsReport(
  resolver: ConfigResolver,
  options: { namespace?: string; deployment?: string } = {}
): PathsReport {
  const report: PathsReport = {
    home: resolver.resolveHomeDirectory(),
    appHome: resolver.resolveAppHomeDirectory(),
    kubeconfig: resolver.resolveKubeconfigPath(),
    timeout: formatDuration(resolver.getTimeout())
  };

  if (options.namespace) {
    const namespace = parsePathSegment('namespace', options.namespace);
    report.namespace = resolver.resolveNamespaceDirectory(namespace);

    if (options.deployment) {
      const name = parsePathSegment('deployment name', options.deployment);
      report.deployment = resolver.resolveDeploymentDirectory(namespace, name);
    }
  }

  return PathsReportSchema.parse(report);
}

const FIELDS: Array<[keyof PathsReport, string]> = [
  ['home', 'Home'],
  ['appHome', 'Okteto folder'],
  ['kubeconfig', 'Kubeconfig'],
  ['timeout', 'Timeout'],
  ['namespace', 'Namespace'],
  ['deployment', 'Deployment']
];

export function formatPathsTable(report: PathsReport): string {
  const lines = [chalk.bold('\nResolved configuration:\n')];

  for (const [key, label] of FIELDS) {
    const value = report[key];
    if (value === undefined) continue;
    lines.push(`  ${chalk.white(label.padEnd(14))} ${chalk.cyan(value)}`);
  }

  lines.push('');
  return lines.join('\n');
}

export function createPathsCommand(resolver: ConfigResolver = getConfigResolver()): Command {
  const command = new Command('paths');

  command
    .description('Show all resolved locations and the timeout')
    .option('-n, --namespace <namespace>', 'Also resolve the folder for this namespace')
    .option('-d, --deployment <name>', 'Also resolve the folder for this deployment (requires --namespace)')
    .option('-o, --output <format>', 'Output format: table | json', 'table')
    .action((options: { namespace?: string; deployment?: string; output: string }) => {
      const format = parseOutputFormat(options.output);
      const report = buildPathsReport(resolver, options);

      if (format === 'json') {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatPathsTable(report));
      }
    });

  return command;
}
