import type { Command } from 'commander';
import type { ForwardConfig } from '../interfaces';
import { isDebugEnabled, loadForwardConfig } from '../lib/config';
import { createConsoleLogger, type Logger } from '../lib/logger';

export interface ConfigOptions {
  target?: string;
  identity?: string;
  command?: string;
  timeout?: string;
  disabled?: boolean;
  verbose?: boolean;
}

/**
 * Options shared by every command that resolves a ForwardConfig.
 */
export function withConfigOptions(command: Command): Command {
  return command
    .option('-t, --target <target>', 'Destination, [user@]host[:port]')
    .option('-i, --identity <path>', 'Identity file passed to ssh -i')
    .option('-c, --command <template>', 'Remote command template, ${text} is replaced by the transcript')
    .option('--timeout <seconds>', 'Seconds to wait for the remote command')
    .option('--disabled', 'Treat forwarding as disabled')
    .option('-v, --verbose', 'Print debug output');
}

export function createCliLogger(options: ConfigOptions): Logger {
  return createConsoleLogger({
    debug: options.verbose === true || isDebugEnabled(),
    scope: 'vfwd',
  });
}

export function resolveConfig(
  options: ConfigOptions,
  logger: Logger
): ForwardConfig {
  return loadForwardConfig(
    {
      enabled: options.disabled ? false : undefined,
      target: options.target,
      identityPath: options.identity,
      commandTemplate: options.command,
      timeout: options.timeout,
    },
    process.env,
    logger
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
