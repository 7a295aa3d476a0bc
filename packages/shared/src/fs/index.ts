export * from './io';
export * from './path';
