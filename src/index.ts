export * from './interfaces';
export { Forwarder, type ForwarderOptions } from './classes/forwarder';
export { ProcessRunner } from './classes/process-runner';
export * from './lib/errors';
export * from './lib/config';
export { createConsoleLogger, silentLogger, type Logger } from './lib/logger';
export { ValidationError } from './lib/sanitization';
export * from './lib/shell';
export * from './lib/target';
