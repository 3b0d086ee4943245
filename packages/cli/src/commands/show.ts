import { Command } from 'commander';
import chalk from 'chalk';
import {
  databaseDsn,
  nntpEndpoint,
  redactSettings,
  type Settings,
} from '@chanfront/settings';
import { consoleOutput, describeError, errorJson, loadForCommand, type Output } from '../output.js';

export interface ShowOptions {
  config?: string;
  json?: boolean;
}

/** Summary rows; expects settings that are already redacted */
function summary(settings: Settings): Array<[string, string]> {
  return [
    ['Site', settings.site.name],
    ['Debug', String(settings.site.debug)],
    ['Allowed hosts', settings.site.allowedHosts.join(', ') || '(none)'],
    ['Listen', `${settings.server.host}:${settings.server.port}`],
    ['Database', databaseDsn(settings.database)],
    ['NNTP', nntpEndpoint(settings.nntp).url],
    ['NNTP login', settings.nntp.user ?? '(anonymous)'],
    ['Assets root', settings.assets.assetsRoot],
    ['Media root', settings.assets.mediaRoot],
    ['Captcha fonts', String(settings.captcha.fonts.length)],
    ['convert', settings.tools.convertPath],
    ['ffmpeg', settings.tools.ffmpegPath],
  ];
}

export async function runShow(options: ShowOptions, out: Output = consoleOutput): Promise<number> {
  const result = await loadForCommand(options, out);

  if (!result.ok) {
    if (options.json) {
      out.log(JSON.stringify({ error: errorJson(result.error) }, null, 2));
    } else {
      out.error(describeError(result.error));
    }
    return 1;
  }

  const settings = redactSettings(result.settings);

  if (options.json) {
    out.log(JSON.stringify(settings, null, 2));
    return 0;
  }

  out.log(chalk.bold(`Settings (${result.source ?? 'defaults'})`));
  out.log(chalk.gray('─'.repeat(50)));
  for (const [label, value] of summary(settings)) {
    out.log(`${label.padEnd(14)} ${chalk.cyan(value)}`);
  }
  return 0;
}

export function showCommand(program: Command): void {
  program
    .command('show')
    .description('Print the effective settings with secrets masked')
    .option('-c, --config <file>', 'Settings file (default: search paths)')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: ShowOptions) => {
      process.exitCode = await runShow(options);
    });
}
