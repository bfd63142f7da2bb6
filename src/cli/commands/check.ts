import { Command } from 'commander';
import chalk from 'chalk';
import { Forwarder } from '../../classes/forwarder';
import { resolveSshPath } from '../../lib/config';
import { ValidationError } from '../../lib/sanitization';
import { formatDestination, parseTarget } from '../../lib/target';
import {
  type ConfigOptions,
  createCliLogger,
  errorMessage,
  resolveConfig,
  withConfigOptions,
} from '../options';

export function registerCheckCommands(program: Command) {
  // example: npx tsx src/cli/index.ts check --target pi@studio.local:2222 --identity ~/.ssh/id_ed25519
  withConfigOptions(
    program
      .command('check')
      .description('Test that the destination accepts a non-interactive ssh login')
  ).action(async (options: ConfigOptions) => {
    const logger = createCliLogger(options);

    try {
      const config = resolveConfig(options, logger);
      const parsed = parseTarget(config.target);
      if (parsed) {
        console.log(
          chalk.dim(`Connecting to ${formatDestination(parsed)}:${parsed.port}\n`)
        );
      }

      const forwarder = new Forwarder({ logger, sshPath: resolveSshPath() });
      const result = await forwarder.checkConnection(config);

      if (result.ok) {
        console.log(chalk.green('✅ SSH connection test successful!'));
        return;
      }

      console.log(chalk.red(`❌ ${result.error.message}`));
      process.exit(1);
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
