import { spawn, spawnSync } from 'child_process';
import { ExecutionError, TimeoutError, isWindows, type Logger } from '@patchloop/shared';
import { needsShell, parseCommand } from '../command/parser';
import { getSafeEnv, type EnvPolicy } from './env';

export interface RunRequest extends EnvPolicy {
  command: string;
  cwd: string;
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL once the timeout fires */
  gracePeriodMs?: number;
  maxOutputBytes: number;
  env?: Record<string, string>;
}

export interface RunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Combined stdout and stderr, in arrival order */
  output: string;
  durationMs: number;
  truncated: boolean;
}

const TRUNCATION_NOTICE = '\n[Output truncated due to limit]\n';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (isWindows()) {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  try {
    // Negative PID targets the process group; the child is spawned detached.
    process.kill(-pid, signal);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) throw error;
  }
}

/**
 * Runs one command with a filtered environment, a bounded wall-clock time
 * and a bounded amount of captured output.
 */
export class ProcessRunner {
  constructor(private readonly logger?: Logger) {}

  run(req: RunRequest): Promise<RunResult> {
    const useShell = needsShell(req.command);
    let bin: string;
    let args: string[];
    let commandEnv: Record<string, string> = {};

    if (useShell) {
      bin = req.command;
      args = [];
    } else {
      const parsed = parseCommand(req.command);
      if (!parsed.bin) {
        return Promise.reject(new ExecutionError(`Could not parse command: ${req.command}`));
      }
      bin = parsed.bin;
      args = parsed.args;
      commandEnv = parsed.env;
    }

    const env = getSafeEnv(req, process.env, { ...req.env, ...commandEnv });
    const gracePeriodMs = req.gracePeriodMs ?? 2000;
    const chunks: Buffer[] = [];
    let capturedBytes = 0;
    let truncated = false;
    const start = Date.now();

    return new Promise<RunResult>((resolve, reject) => {
      let timedOut = false;
      let spawnFailed = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(bin, args, {
        cwd: req.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: useShell,
        detached: true,
      });

      const terminate = () => {
        if (!child.pid) return;
        killProcessTree(child.pid, 'SIGTERM');
        killTimer = setTimeout(() => {
          if (child.pid && child.exitCode === null && child.signalCode === null) {
            void this.logger?.debug(`Process ${child.pid} ignored SIGTERM, sending SIGKILL`);
            killProcessTree(child.pid, 'SIGKILL');
          }
        }, gracePeriodMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        void this.logger?.debug(`Command timed out after ${req.timeoutMs}ms: ${req.command}`);
        terminate();
      }, req.timeoutMs);

      const onData = (chunk: Buffer) => {
        if (truncated) return;
        const room = req.maxOutputBytes - capturedBytes;
        if (chunk.length > room) {
          chunks.push(chunk.subarray(0, Math.max(0, room)), Buffer.from(TRUNCATION_NOTICE));
          capturedBytes = req.maxOutputBytes;
          truncated = true;
          terminate();
          return;
        }
        chunks.push(chunk);
        capturedBytes += chunk.length;
      };

      child.stdout.on('data', onData);
      child.stderr.on('data', onData);

      child.on('error', (err) => {
        spawnFailed = true;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        reject(
          new ExecutionError(`Failed to start process: ${err.message}`, {
            cause: err,
            details: { command: req.command, cwd: req.cwd },
          }),
        );
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        if (spawnFailed) return;

        const output = Buffer.concat(chunks).toString('utf8');
        if (timedOut) {
          reject(
            new TimeoutError(`Command timed out after ${req.timeoutMs}ms`, {
              partialOutput: output,
              details: { command: req.command },
            }),
          );
          return;
        }

        resolve({
          exitCode: code,
          signal,
          output,
          durationMs: Date.now() - start,
          truncated,
        });
      });
    });
  }
}
