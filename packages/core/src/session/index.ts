export * from './paths';
export * from './summary';
export * from './recorder';
export * from './reader';
