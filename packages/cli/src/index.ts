#!/usr/bin/env node
import { main } from './program';

export const name = '@patchloop/cli';
export { main, createProgram } from './program';
export { OutputRenderer, describeRound, formatEvent } from './output/renderer';

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
