import { Command } from 'commander';
import chalk from 'chalk';
import { checkDeployment, hasErrors, type DeploymentIssue } from '@chanfront/settings';
import { consoleOutput, describeError, errorJson, loadForCommand, type Output } from '../output.js';

export interface CheckOptions {
  config?: string;
  deploy?: boolean;
  json?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_DEPLOY_ERRORS = 2;

function formatIssue(issue: DeploymentIssue): string {
  const tag = issue.level === 'error' ? chalk.red('ERROR  ') : chalk.yellow('WARNING');
  return `${tag} ${chalk.gray(issue.id)} ${issue.message}`;
}

/**
 * Load the settings and, with --deploy, run the deployment checks.
 * Resolves to the process exit code.
 */
export async function runCheck(options: CheckOptions, out: Output = consoleOutput): Promise<number> {
  const result = await loadForCommand(options, out);

  if (!result.ok) {
    if (options.json) {
      out.log(JSON.stringify({ valid: false, error: errorJson(result.error) }, null, 2));
    } else {
      out.error(describeError(result.error));
    }
    return EXIT_INVALID;
  }

  const issues = options.deploy ? checkDeployment(result.settings) : [];
  const exitCode = hasErrors(issues) ? EXIT_DEPLOY_ERRORS : EXIT_OK;

  if (options.json) {
    out.log(JSON.stringify({ valid: true, source: result.source, issues }, null, 2));
    return exitCode;
  }

  out.log(`${chalk.green('✓')} Settings valid (${result.source ?? 'defaults'})`);
  if (options.deploy) {
    if (issues.length === 0) {
      out.log(`${chalk.green('✓')} No deployment issues`);
    }
    for (const issue of issues) {
      out.log(formatIssue(issue));
    }
  }
  return exitCode;
}

export function checkCommand(program: Command): void {
  program
    .command('check')
    .description('Validate a settings file')
    .option('-c, --config <file>', 'Settings file (default: search paths)')
    .option('-d, --deploy', 'Also run deployment checks')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: CheckOptions) => {
      process.exitCode = await runCheck(options);
    });
}
