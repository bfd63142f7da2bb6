import type { ParsedTarget } from '../interfaces';

export const DEFAULT_SSH_PORT = 22;

const CLIENT_PREFIX = 'ssh ';

/**
 * Parse a `[ssh ][user@]host[:port]` destination.
 * Returns undefined when the input is blank or names no host.
 */
export function parseTarget(raw: string): ParsedTarget | undefined {
  let remainder = raw.trim();
  if (remainder.length === 0) return undefined;

  // users paste the whole invocation sometimes
  if (remainder.startsWith(CLIENT_PREFIX)) {
    remainder = remainder.slice(CLIENT_PREFIX.length).trim();
  }

  let user: string | undefined;
  const at = remainder.indexOf('@');
  if (at !== -1) {
    user = remainder.slice(0, at).trim();
    remainder = remainder.slice(at + 1);
  }

  let host = remainder;
  let port = DEFAULT_SSH_PORT;
  const colon = remainder.lastIndexOf(':');
  if (colon > 0) {
    const parsedPort = parseInteger(remainder.slice(colon + 1));
    if (parsedPort !== undefined) {
      port = parsedPort;
      host = remainder.slice(0, colon);
    }
  }

  host = host.trim();
  if (host.length === 0) return undefined;

  return user ? { user, host, port } : { host, port };
}

/**
 * Render the `user@host` (or bare `host`) argument passed to ssh.
 */
export function formatDestination(target: ParsedTarget): string {
  return target.user ? `${target.user}@${target.host}` : target.host;
}

function parseInteger(text: string): number | undefined {
  if (!/^[+-]?\d+$/.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}
