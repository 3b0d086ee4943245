import { Command } from 'commander';
import chalk from 'chalk';
import { consoleOutput, describeError, loadForCommand, type Output } from '../output.js';

export interface FontsOptions {
  config?: string;
}

export async function runFonts(options: FontsOptions, out: Output = consoleOutput): Promise<number> {
  const result = await loadForCommand(options, out);
  if (!result.ok) {
    out.error(describeError(result.error));
    return 1;
  }

  const { fontDir, fonts } = result.settings.captcha;
  if (fonts.length === 0) {
    out.error(chalk.yellow(`No captcha fonts in ${fontDir}`));
    return 1;
  }
  for (const font of fonts) {
    out.log(font);
  }
  return 0;
}

export function fontsCommand(program: Command): void {
  program
    .command('fonts')
    .description('List the TrueType fonts available to the captcha renderer')
    .option('-c, --config <file>', 'Settings file (default: search paths)')
    .action(async (options: FontsOptions) => {
      process.exitCode = await runFonts(options);
    });
}
