import { spawn } from 'child_process';
import { constants } from 'os';
import type { Readable } from 'stream';
import { finished } from 'stream/promises';
import { TextDecoder } from 'util';
import type {
  ChildHandle,
  ProcessResult,
  ProcessRunnerOptions,
  RunOptions,
  SpawnFunction,
} from '../interfaces';
import { ProcessLaunchError } from '../lib/errors';
import { type Logger, silentLogger } from '../lib/logger';

const MIN_TIMEOUT_MS = 100;
const DEFAULT_KILL_GRACE_MS = 2000;

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface CaptureSink {
  readonly chunks: Buffer[];
  readonly streams: Readable[];
  readonly closed: Promise<void>;
}

const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, args, options);

export class ProcessRunner {
  private readonly spawnProcess: SpawnFunction;
  private readonly logger: Logger;
  private readonly killGraceMs: number;

  constructor(options: ProcessRunnerOptions = {}) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.logger = options.logger ?? silentLogger;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  /**
   * Run an executable until it exits or the timeout fires, whichever comes
   * first. Rejects with ProcessLaunchError when it cannot be started.
   */
  async run(options: RunOptions): Promise<ProcessResult> {
    const startTime = Date.now();

    const child = this.spawnChild(options);
    const exited = waitForExit(child);
    const sink = this.capture(child, options.captureOutput);

    await waitForSpawn(child, options.executable);
    child.on('error', (error: Error) => {
      this.logger.debug(`${options.executable} process error: ${error.message}`);
    });

    this.writeInput(child, options.stdinText);

    const { status, timedOut } = await this.waitWithTimeout(
      child,
      exited,
      options.timeout
    );
    const output = await this.drain(sink);
    const exitCode = toExitCode(status);

    if (exitCode !== 0) {
      this.logger.debug(
        `${options.executable} exited with code ${exitCode}${output ? `: ${output}` : ''}`
      );
    }

    return {
      exitCode,
      signal: status.signal,
      output,
      timedOut,
      duration: Date.now() - startTime,
    };
  }

  private spawnChild(options: RunOptions): ChildHandle {
    const outputMode = options.captureOutput ? 'pipe' : 'ignore';

    try {
      return this.spawnProcess(options.executable, options.args, {
        stdio: [
          options.stdinText === undefined ? 'ignore' : 'pipe',
          outputMode,
          outputMode,
        ],
      });
    } catch (error) {
      throw new ProcessLaunchError(options.executable, error);
    }
  }

  /**
   * Merge stdout and stderr into one sink, in arrival order.
   */
  private capture(child: ChildHandle, enabled: boolean): CaptureSink {
    const chunks: Buffer[] = [];
    const streams = enabled
      ? [child.stdout, child.stderr].filter(
          (stream): stream is Readable => stream !== null
        )
      : [];

    for (const stream of streams) {
      stream.on('data', (chunk: Buffer | string) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      });
    }

    const closed = Promise.all(
      streams.map((stream) =>
        finished(stream).catch((error: unknown) => {
          this.logger.debug(`output stream closed early: ${errorMessage(error)}`);
        })
      )
    ).then(() => undefined);

    return { chunks, streams, closed };
  }

  private writeInput(child: ChildHandle, stdinText?: string): void {
    const stdin = child.stdin;
    if (!stdin) return;

    // the child may exit without reading its input
    stdin.on('error', (error: Error) => {
      this.logger.debug(`stdin closed early: ${error.message}`);
    });

    if (stdinText !== undefined) {
      stdin.end(stdinText);
    } else {
      stdin.end();
    }
  }

  /**
   * Race natural exit against the timeout. The timer sends SIGTERM only if
   * the child is still running when it fires; the loser is cancelled.
   */
  private async waitWithTimeout(
    child: ChildHandle,
    exited: Promise<ExitStatus>,
    timeoutSeconds: number
  ): Promise<{ status: ExitStatus; timedOut: boolean }> {
    const timeoutMs = Math.max(timeoutSeconds * 1000, MIN_TIMEOUT_MS);
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;

    const expired = new Promise<'expired'>((resolve) => {
      timer = setTimeout(() => {
        if (isRunning(child)) {
          timedOut = true;
          this.logger.debug(
            `process still running after ${timeoutMs}ms, sending SIGTERM`
          );
          child.kill('SIGTERM');
        }
        resolve('expired');
      }, timeoutMs);
    });

    try {
      const first = await Promise.race([exited, expired]);
      if (first !== 'expired') {
        return { status: first, timedOut };
      }
    } finally {
      clearTimeout(timer);
    }

    return { status: await this.reap(child, exited), timedOut };
  }

  /**
   * Wait for a signalled child to go away, escalating to SIGKILL.
   */
  private async reap(
    child: ChildHandle,
    exited: Promise<ExitStatus>
  ): Promise<ExitStatus> {
    if (!isRunning(child)) {
      return exited;
    }

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<'grace'>((resolve) => {
      timer = setTimeout(() => resolve('grace'), this.killGraceMs);
    });

    try {
      const first = await Promise.race([exited, grace]);
      if (first !== 'grace') {
        return first;
      }
    } finally {
      clearTimeout(timer);
    }

    this.logger.debug('process ignored SIGTERM, sending SIGKILL');
    child.kill('SIGKILL');
    return exited;
  }

  /**
   * Read the capture sink to end-of-stream. Streams a grandchild keeps open
   * are destroyed after the grace period.
   */
  private async drain(sink: CaptureSink): Promise<string> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<'grace'>((resolve) => {
      timer = setTimeout(() => resolve('grace'), this.killGraceMs);
    });

    try {
      const first = await Promise.race([
        sink.closed.then(() => 'closed' as const),
        grace,
      ]);
      if (first === 'grace') {
        this.logger.debug('output still open after exit, closing capture');
        sink.streams.forEach((stream) => stream.destroy());
      }
    } finally {
      clearTimeout(timer);
    }

    return this.decode(Buffer.concat(sink.chunks));
  }

  private decode(buffer: Buffer): string {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(buffer).trim();
    } catch (error) {
      this.logger.debug(`discarding undecodable output: ${errorMessage(error)}`);
      return '';
    }
  }
}

function waitForSpawn(child: ChildHandle, executable: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(new ProcessLaunchError(executable, error));
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function waitForExit(child: ChildHandle): Promise<ExitStatus> {
  return new Promise((resolve) => {
    child.once(
      'exit',
      (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal });
      }
    );
  });
}

function isRunning(child: ChildHandle): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * A signalled process reports 128 + the signal number, as shells do.
 */
function toExitCode(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }

  const entry = Object.entries(constants.signals).find(
    ([name]) => name === status.signal
  );
  return 128 + (entry && typeof entry[1] === 'number' ? entry[1] : 0);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
