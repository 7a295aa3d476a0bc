export * from './composer';
export { SYSTEM_PROMPT } from './prompt';
