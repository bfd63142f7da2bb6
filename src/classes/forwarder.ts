import type { ForwardConfig, ParsedTarget } from '../interfaces';
import { DEFAULT_SSH_PATH } from '../lib/config';
import {
  err,
  type ForwardFailure,
  InvalidTargetError,
  LaunchFailedError,
  NonZeroExitError,
  ok,
  ProcessLaunchError,
  type Result,
} from '../lib/errors';
import { type Logger, silentLogger } from '../lib/logger';
import { renderCommand, shellQuote } from '../lib/shell';
import { formatDestination, parseTarget } from '../lib/target';
import { ProcessRunner } from './process-runner';

export const CHECK_CONNECT_TIMEOUT_SECONDS = 4;
export const CHECK_TIMEOUT_SECONDS = 6;
const CHECK_REMOTE_COMMAND = 'true';

export interface ForwarderOptions {
  runner?: ProcessRunner;
  logger?: Logger;
  sshPath?: string;
}

export class Forwarder {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly sshPath: string;

  constructor(options: ForwarderOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.runner = options.runner ?? new ProcessRunner({ logger: this.logger });
    this.sshPath = options.sshPath ?? DEFAULT_SSH_PATH;
  }

  get executable(): string {
    return this.sshPath;
  }

  /**
   * Relay a transcript to the configured remote command. Best effort: every
   * failure is logged and none reaches the caller.
   */
  async forward(transcript: string, config: ForwardConfig): Promise<void> {
    if (!config.enabled) return;

    const parsed = parseTarget(config.target);
    if (!parsed) {
      this.logger.error('voice forward skipped: host missing');
      return;
    }

    const args = this.buildForwardArgs(parsed, config, transcript);

    try {
      const result = await this.runner.run({
        executable: this.sshPath,
        args,
        stdinText: transcript,
        timeout: config.timeout,
        captureOutput: true,
      });

      if (result.timedOut) {
        this.logger.error(
          `voice forward to ${parsed.host} timed out after ${config.timeout}s`
        );
      } else if (result.exitCode !== 0) {
        this.logger.error(
          `voice forward to ${parsed.host} failed: ${new NonZeroExitError(result.exitCode, result.output).message}`
        );
      } else {
        this.logger.debug(
          `voice forward to ${parsed.host} done in ${result.duration}ms`
        );
      }
    } catch (error) {
      if (error instanceof ProcessLaunchError) {
        this.logger.error(
          `voice forward failed to start ssh: ${error.message}`
        );
      } else {
        this.logger.error(`voice forward failed: ${error}`);
      }
    }
  }

  /**
   * Probe the destination with a no-op remote command.
   */
  async checkConnection(
    config: ForwardConfig
  ): Promise<Result<void, ForwardFailure>> {
    const parsed = parseTarget(config.target);
    if (!parsed) {
      return err(new InvalidTargetError());
    }

    try {
      const result = await this.runner.run({
        executable: this.sshPath,
        args: this.buildCheckArgs(parsed, config),
        timeout: CHECK_TIMEOUT_SECONDS,
        captureOutput: true,
      });

      return result.exitCode === 0
        ? ok(undefined)
        : err(new NonZeroExitError(result.exitCode, result.output));
    } catch (error) {
      return err(
        new LaunchFailedError(
          error instanceof Error ? error.message : String(error)
        )
      );
    }
  }

  /**
   * ssh arguments for a relay. ssh joins the words after the destination
   * with spaces before the remote shell reads them, so the rendered command
   * is quoted once more to reach `sh -c` as a single word.
   */
  buildForwardArgs(
    parsed: ParsedTarget,
    config: ForwardConfig,
    transcript: string
  ): string[] {
    const rendered = renderCommand(config.commandTemplate, transcript);

    return [
      ...this.connectionArgs(parsed, config, []),
      'sh',
      '-c',
      shellQuote(rendered),
    ];
  }

  buildCheckArgs(parsed: ParsedTarget, config: ForwardConfig): string[] {
    return [
      ...this.connectionArgs(parsed, config, [
        `ConnectTimeout=${CHECK_CONNECT_TIMEOUT_SECONDS}`,
      ]),
      CHECK_REMOTE_COMMAND,
    ];
  }

  private connectionArgs(
    parsed: ParsedTarget,
    config: ForwardConfig,
    extraOptions: string[]
  ): string[] {
    const args = ['-o', 'BatchMode=yes', '-o', 'IdentitiesOnly=yes'];

    for (const option of extraOptions) {
      args.push('-o', option);
    }

    if (parsed.port > 0) {
      args.push('-p', String(parsed.port));
    }

    const identityPath = config.identityPath;
    if (identityPath && identityPath.trim().length > 0) {
      args.push('-i', identityPath);
    }

    args.push(formatDestination(parsed));
    return args;
  }
}
