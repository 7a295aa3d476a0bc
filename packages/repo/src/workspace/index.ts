export * from './snapshot';
export * from './store';
export * from './checkout';
export { applyHunks, type HunkApplyResult } from './hunks';
export { isBinaryContent } from './binary';
