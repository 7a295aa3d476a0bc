import * as path from 'path';
import { Command } from 'commander';
import { ConfigLoader, Prototyper, parseBudget, type Budget } from '@patchloop/core';
import { findProjectRoot } from '@patchloop/repo';
import { ConsoleLogger, UsageError, type AgentConfig, type ConfigInput } from '@patchloop/shared';
import { OutputRenderer } from '../output/renderer';
import { ConsoleUI } from '../ui/console';
import type { CliContext, GlobalFlags } from '../context';

export interface PrototypeFlags {
  cwd?: string;
  model?: string;
  provider?: string;
  maxIters?: number;
  budget?: Budget;
  testCommand?: string;
  interactive?: boolean;
  /** False when `--no-checkout` is given */
  checkout?: boolean;
}

const PROVIDERS: ReadonlyArray<AgentConfig['provider']> = ['openai', 'fake'];

function parseBudgetFlag(value: string, previous: Budget | undefined): Budget {
  return { ...previous, ...parseBudget(value) };
}

function parseCountFlag(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new UsageError(`Invalid --max-iters value: ${value}`);
  }
  return count;
}

/**
 * Translates command flags into the highest-precedence configuration layer.
 * `--max-iters` wins over the `iter` key of `--budget`.
 */
export function buildConfigFlags(flags: PrototypeFlags): ConfigInput {
  const provider = PROVIDERS.find((p) => p === flags.provider);
  if (flags.provider !== undefined && !provider) {
    throw new UsageError(`Unknown provider '${flags.provider}'. Expected one of: ${PROVIDERS.join(', ')}`);
  }

  const maxIterations = flags.maxIters ?? flags.budget?.iter;
  const agent: NonNullable<ConfigInput['agent']> = {
    ...(provider ? { provider } : {}),
    ...(flags.model ? { model: flags.model } : {}),
    ...(maxIterations !== undefined ? { maxIterations } : {}),
    ...(flags.budget?.time !== undefined ? { maxWallTimeMs: flags.budget.time } : {}),
  };
  const session: NonNullable<ConfigInput['session']> = {
    ...(flags.interactive ? { interactive: true } : {}),
    ...(flags.checkout === false ? { checkout: false } : {}),
  };

  return {
    ...(Object.keys(agent).length > 0 ? { agent } : {}),
    ...(flags.testCommand ? { tests: { command: flags.testCommand } } : {}),
    ...(Object.keys(session).length > 0 ? { session } : {}),
  };
}

export async function runPrototype(
  flags: PrototypeFlags,
  globals: GlobalFlags,
  signal?: AbortSignal,
): Promise<number> {
  const renderer = new OutputRenderer(!!globals.json);
  const logger = new ConsoleLogger({ verbose: !!globals.verbose, quiet: !!globals.json });

  const projectRoot = await findProjectRoot(path.resolve(flags.cwd ?? process.cwd()));
  const config = ConfigLoader.load({
    configPath: globals.config ? path.resolve(globals.config) : undefined,
    flags: buildConfigFlags(flags),
    cwd: projectRoot,
  });

  if (globals.verbose) {
    renderer.log(`Project: ${projectRoot}`);
    renderer.log(`Provider: ${config.agent.provider} (${config.agent.model})`);
    renderer.log(`Test command: ${config.tests.command}`);
  }

  const prototyper = new Prototyper({
    config,
    projectRoot,
    logger,
    ui: config.session.interactive ? new ConsoleUI() : undefined,
  });
  const outcome = await prototyper.run({
    signal,
    onStream: (stream) => {
      stream.on((event) => renderer.renderEvent(event));
    },
  });

  renderer.render({
    ...outcome.summary,
    sessionDir: outcome.sessionDir,
    ...(outcome.checkout ? { checkout: outcome.checkout } : {}),
  });
  return outcome.result.status === 'succeeded' ? 0 : 1;
}

export function registerPrototypeCommand(program: Command, context: CliContext) {
  program
    .command('prototype')
    .description('Generate, apply and test patches until the project tests pass')
    .option('--cwd <dir>', 'Project directory (defaults to the current directory)')
    .option('--model <model>', 'Model used for generation')
    .option('--provider <provider>', `Generation provider: ${PROVIDERS.join(', ')}`)
    .option('--max-iters <n>', 'Maximum number of rounds', parseCountFlag)
    .option('--budget <limits>', 'Session limits (e.g. iter=5,time=20m)', parseBudgetFlag)
    .option('--test-command <cmd>', 'Command that runs the project tests')
    .option('--interactive', 'Ask before every further round')
    .option('--no-checkout', 'Keep the result out of the project directory')
    .action(async (flags: PrototypeFlags) => {
      const abort = new AbortController();
      const onSigint = () => abort.abort();
      process.once('SIGINT', onSigint);
      try {
        context.exitCode = await runPrototype(flags, program.opts<GlobalFlags>(), abort.signal);
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
