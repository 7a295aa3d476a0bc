export * from './harness';
export * from './output-parser';
