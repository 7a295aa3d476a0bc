export * from './workspace';
export * from './patch';
export * from './scanner';
export * from './project';
