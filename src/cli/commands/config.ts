import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { resolveSshPath } from '../../lib/config';
import { ValidationError } from '../../lib/sanitization';
import { hasPlaceholder, TRANSCRIPT_PLACEHOLDER } from '../../lib/shell';
import { parseTarget } from '../../lib/target';
import {
  type ConfigOptions,
  createCliLogger,
  errorMessage,
  resolveConfig,
  withConfigOptions,
} from '../options';

export function registerConfigCommands(program: Command) {
  // example: npx tsx src/cli/index.ts config
  withConfigOptions(
    program
      .command('config')
      .description('Show the resolved forward configuration')
  ).action((options: ConfigOptions) => {
    const logger = createCliLogger(options);

    try {
      const config = resolveConfig(options, logger);
      const parsed = parseTarget(config.target);

      const table = new Table({
        head: ['Setting', 'Value'],
        colWidths: [16, 60],
        wordWrap: true,
      });

      table.push(
        ['Enabled', config.enabled ? chalk.green('yes') : chalk.red('no')],
        ['Target', config.target || chalk.dim('(none)')],
        ['User', parsed?.user ?? chalk.dim('(ssh default)')],
        ['Host', parsed ? parsed.host : chalk.red('invalid')],
        ['Port', parsed ? String(parsed.port) : '-'],
        ['Identity', config.identityPath ?? chalk.dim('(ssh default)')],
        ['Command', config.commandTemplate],
        ['Timeout', `${config.timeout}s`],
        ['ssh', resolveSshPath()]
      );

      console.log(table.toString());

      if (!hasPlaceholder(config.commandTemplate)) {
        console.log(
          chalk.yellow(
            `⚠️  Command template has no ${TRANSCRIPT_PLACEHOLDER}, the transcript will not be sent`
          )
        );
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        console.error(chalk.red(`✗ Validation Error: ${error.message}`));
      } else {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
      }
      process.exit(1);
    }
  });
}
