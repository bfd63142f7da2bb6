import { Command } from 'commander';
import chalk from 'chalk';
import shellEscape from 'shell-escape';
import { Forwarder } from '../../classes/forwarder';
import { resolveSshPath } from '../../lib/config';
import { sanitizeTranscript, ValidationError } from '../../lib/sanitization';
import { parseTarget } from '../../lib/target';
import {
  type ConfigOptions,
  createCliLogger,
  errorMessage,
  resolveConfig,
  withConfigOptions,
} from '../options';

interface ForwardOptions extends ConfigOptions {
  stdin?: boolean;
  dryRun?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export function registerForwardCommands(program: Command) {
  // example: npx tsx src/cli/index.ts forward --target pi@studio.local "turn the lights off"
  withConfigOptions(
    program
      .command('forward')
      .description('Relay a transcript to the remote command over ssh')
      .argument('[transcript...]', 'Transcript words, read from stdin when omitted')
      .option('--stdin', 'Read the transcript from stdin')
      .option('--dry-run', 'Print the ssh invocation instead of running it')
  ).action(async (words: string[], options: ForwardOptions) => {
    const logger = createCliLogger(options);

    try {
      const config = resolveConfig(options, logger);
      const raw =
        options.stdin || words.length === 0
          ? await readStdin()
          : words.join(' ');
      const transcript = sanitizeTranscript(raw.trim());

      if (transcript.length === 0) {
        throw new ValidationError('Transcript cannot be empty');
      }

      const forwarder = new Forwarder({
        logger,
        sshPath: resolveSshPath(),
      });

      if (options.dryRun) {
        const parsed = parseTarget(config.target);
        if (!parsed) {
          throw new ValidationError('Missing or invalid SSH target');
        }
        const args = forwarder.buildForwardArgs(parsed, config, transcript);
        console.log(shellEscape([forwarder.executable, ...args]));
        return;
      }

      if (!config.enabled) {
        console.log(chalk.dim('Forwarding is disabled, nothing sent'));
        return;
      }

      await forwarder.forward(transcript, config);
      logger.debug('forward finished');
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
