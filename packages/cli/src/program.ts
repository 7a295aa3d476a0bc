import { Command, CommanderError } from 'commander';
import { AppError, exitCodeFor } from '@patchloop/shared';
import { version } from '../package.json';
import { registerPrototypeCommand } from './commands/prototype';
import { registerTranscriptCommand } from './commands/transcript';
import type { CliContext, GlobalFlags } from './context';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('patchloop')
    .description('Iterates on a project with generated patches until its tests pass')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerPrototypeCommand(program, context);
  registerTranscriptCommand(program, context);
  return program;
}

export function reportError(e: unknown, opts: GlobalFlags): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Runs the CLI and resolves to the process exit code: 0 on success, 2 for
 * errors the user can correct, 1 for everything else.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const context: CliContext = { exitCode: 0 };
  const program = createProgram(context);
  try {
    await program.parseAsync(argv);
    return context.exitCode;
  } catch (e: unknown) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage error.
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<GlobalFlags>());
    return exitCodeFor(e);
  }
}
