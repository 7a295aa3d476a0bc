export const name = '@patchloop/adapters';

export * from './types';
export * from './adapter';
export * from './errors';
export * from './common';
export * from './openai';
export * from './fake/adapter';
