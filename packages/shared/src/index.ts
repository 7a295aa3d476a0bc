export const name = '@patchloop/shared';

export * from './errors';
export * from './logger';
export * from './redaction';
export * from './string-utils';
export * from './fs';
export * from './config/schema';
export * from './observability/jsonl-event-writer';

export * from './types/events';
export * from './types/llm';
export * from './types/patch';
export * from './types/session';
export * from './types/testing';
