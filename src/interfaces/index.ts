export * from './forward';
export * from './process';
