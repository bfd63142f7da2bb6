import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import type { Logger } from './logger';

/**
 * Sanitization utilities for configuration and CLI input validation
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/**
 * Validates boolean flags given as booleans or strings
 */
export function sanitizeBoolean(
  value: boolean | string,
  fieldName: string
): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  const normalized = value.trim().toLowerCase();

  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;

  throw new ValidationError(
    `${fieldName} must be one of: ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
  );
}

/**
 * Validates timeouts in seconds, fractions allowed
 */
export function sanitizeTimeout(value: number | string): number {
  if (typeof value === 'string' && value.trim().length === 0) {
    throw new ValidationError('Timeout is required');
  }

  const num = typeof value === 'number' ? value : Number(value.trim());

  if (!Number.isFinite(num)) {
    throw new ValidationError('Timeout must be a valid number of seconds');
  }

  if (num < 0) {
    throw new ValidationError('Timeout cannot be negative');
  }

  if (num > 3600) {
    throw new ValidationError('Timeout cannot exceed 3600 seconds');
  }

  return num;
}

/**
 * Validates raw destination strings. Structure is checked by the parser.
 */
export function sanitizeTarget(target: string): string {
  const trimmed = target.trim();

  if (trimmed.length > 300) {
    throw new ValidationError('Target cannot exceed 300 characters');
  }

  if (/[\x00-\x1F\x7F]/.test(trimmed)) {
    throw new ValidationError('Target contains invalid control characters');
  }

  return trimmed;
}

/**
 * Validates SSH identity file path and permissions
 */
export function sanitizeIdentityPath(
  identityPath: string,
  logger?: Logger
): string | undefined {
  const trimmed = identityPath.trim();

  if (trimmed.length === 0) {
    return undefined;
  }

  if (trimmed.includes('\0')) {
    throw new ValidationError('Identity path contains null bytes');
  }

  const expanded =
    trimmed === '~' || trimmed.startsWith('~/')
      ? path.join(os.homedir(), trimmed.slice(1))
      : trimmed;
  const resolved = path.resolve(expanded);

  if (resolved.length > 500) {
    throw new ValidationError('Identity path is too long');
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`Identity file does not exist: ${resolved}`);
    }
    throw new ValidationError(`Cannot access identity file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('Identity path must point to a file');
  }

  // ssh refuses keys readable by others
  const mode = stats.mode & parseInt('777', 8);
  if (mode & parseInt('044', 8)) {
    logger?.warn(
      'Warning: identity file is readable by others, ssh may refuse to use it'
    );
  }

  return resolved;
}

/**
 * Validates remote command templates
 */
export function sanitizeCommandTemplate(template: string): string {
  const trimmed = template.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Command template cannot be empty');
  }

  if (trimmed.length > 1000) {
    throw new ValidationError('Command template cannot exceed 1000 characters');
  }

  if (trimmed.includes('\0')) {
    throw new ValidationError('Command template contains null bytes');
  }

  return trimmed;
}

/**
 * Validates transcripts handed to the CLI
 */
export function sanitizeTranscript(transcript: string): string {
  if (transcript.length > 10000) {
    throw new ValidationError('Transcript cannot exceed 10000 characters');
  }

  if (transcript.includes('\0')) {
    throw new ValidationError('Transcript contains null bytes');
  }

  return transcript;
}
