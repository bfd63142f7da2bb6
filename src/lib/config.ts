import type { ForwardConfig, ForwardConfigOverrides } from '../interfaces';
import type { Logger } from './logger';
import {
  sanitizeBoolean,
  sanitizeCommandTemplate,
  sanitizeIdentityPath,
  sanitizeTarget,
  sanitizeTimeout,
} from './sanitization';

export const DEFAULT_SSH_PATH = '/usr/bin/ssh';
export const DEFAULT_COMMAND_TEMPLATE = "printf '%s\\n' ${text}";
export const DEFAULT_TIMEOUT_SECONDS = 10;

type Env = Record<string, string | undefined>;

/**
 * @description Resolve the forward configuration.
 * @description CLI overrides win over environment variables, which win over defaults.
 * @returns A frozen config, safe to share between concurrent calls.
 */
export function loadForwardConfig(
  overrides: ForwardConfigOverrides = {},
  env: Env = process.env,
  logger?: Logger
): ForwardConfig {
  const enabled = sanitizeBoolean(
    overrides.enabled ?? env.VOICE_FORWARD_ENABLED ?? true,
    'enabled'
  );
  const target = sanitizeTarget(
    overrides.target ?? env.VOICE_FORWARD_TARGET ?? ''
  );
  const identityPath = sanitizeIdentityPath(
    overrides.identityPath ?? env.VOICE_FORWARD_IDENTITY ?? '',
    logger
  );
  const commandTemplate = sanitizeCommandTemplate(
    overrides.commandTemplate ??
      env.VOICE_FORWARD_COMMAND ??
      DEFAULT_COMMAND_TEMPLATE
  );
  const timeout = sanitizeTimeout(
    overrides.timeout ?? env.VOICE_FORWARD_TIMEOUT ?? DEFAULT_TIMEOUT_SECONDS
  );

  const config: ForwardConfig = identityPath
    ? { enabled, target, identityPath, commandTemplate, timeout }
    : { enabled, target, commandTemplate, timeout };

  return Object.freeze(config);
}

export function resolveSshPath(env: Env = process.env): string {
  const configured = env.VOICE_FORWARD_SSH_PATH?.trim();
  return configured ? configured : DEFAULT_SSH_PATH;
}

export function isDebugEnabled(env: Env = process.env): boolean {
  const value = env.VOICE_FORWARD_DEBUG?.trim();
  return !!value && sanitizeBoolean(value, 'VOICE_FORWARD_DEBUG');
}
