import * as path from 'path';
import { Command } from 'commander';
import { readSession } from '@patchloop/core';
import { findProjectRoot } from '@patchloop/repo';
import { OutputRenderer } from '../output/renderer';
import type { CliContext, GlobalFlags } from '../context';

export function registerTranscriptCommand(program: Command, context: CliContext) {
  program
    .command('transcript')
    .argument('<sessionId>', 'Session to show')
    .description('Print the recorded rounds of a session')
    .option('--cwd <dir>', 'Project directory (defaults to the current directory)')
    .action(async (sessionId: string, flags: { cwd?: string }) => {
      const globals = program.opts<GlobalFlags>();
      const projectRoot = await findProjectRoot(path.resolve(flags.cwd ?? process.cwd()));
      const stored = await readSession(projectRoot, sessionId);
      new OutputRenderer(!!globals.json).renderTranscript(stored);
      context.exitCode = 0;
    });
}
