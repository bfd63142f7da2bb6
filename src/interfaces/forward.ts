export interface ForwardConfig {
  readonly enabled: boolean;
  readonly target: string; // raw destination, e.g. "user@host:2222"
  readonly identityPath?: string;
  readonly commandTemplate: string; // contains the ${text} placeholder
  readonly timeout: number; // seconds, fractional allowed
}

export interface ParsedTarget {
  user?: string;
  host: string;
  port: number; // default 22
}

export interface ForwardConfigOverrides {
  enabled?: boolean | string;
  target?: string;
  identityPath?: string;
  commandTemplate?: string;
  timeout?: number | string;
}
