export const name = '@patchloop/core';

export * from './config/budget';
export * from './config/loader';
export * from './controller';
export * from './feedback';
export * from './transcript';
export * from './session';
export * from './registry';
export * from './ui';
export * from './prototype';
