export * from './command/parser';
export * from './command/types';
export * from './runner/runner';
export * from './runner/env';
export * from './harness';
