import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import type { SpawnOptions } from 'child_process';
import type { Logger } from '../lib/logger';

/**
 * The part of a spawned child process the runner relies on.
 * `ChildProcess` from `child_process` satisfies it.
 */
export interface ChildHandle extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildHandle;

export interface ProcessRunnerOptions {
  spawn?: SpawnFunction;
  logger?: Logger;
  killGraceMs?: number; // wait after SIGTERM before SIGKILL, default 2000
}

export interface RunOptions {
  executable: string;
  args: readonly string[];
  stdinText?: string;
  timeout: number; // seconds
  captureOutput: boolean;
}

export interface ProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  output: string;
  timedOut: boolean;
  duration: number;
}
