import pc from 'picocolors';
import type { LoopEvent } from '@patchloop/shared';
import type { SessionSummary, StoredSession } from '@patchloop/core';
import { formatTable } from './table';

/**
 * The parts of a round the renderer reads; satisfied both by live records
 * and by transcript entries read back from disk.
 */
export interface RoundView {
  iteration: number;
  outcome: string;
  apply:
    | { status: 'applied'; filesChanged: string[] }
    | { status: 'conflict'; conflicts: Array<{ path: string; reason: string }> }
    | { status: 'rejected'; issues: Array<{ message: string }> }
    | null;
  test: { status: string; exitCode: number | null; tests: Array<{ name: string; passed: boolean }> } | null;
}

export interface PrototypeReport extends SessionSummary {
  sessionDir: string;
  checkout?: { written: string[]; removed: string[] };
}

const MAX_LISTED_FILES = 10;

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function describeTests(test: NonNullable<RoundView['test']>): string {
  const passing = test.tests.filter((t) => t.passed).length;
  const counts = test.tests.length > 0 ? ` (${passing}/${test.tests.length} passing)` : '';
  return `tests ${test.status}${counts}`;
}

/**
 * One-line description of a completed round.
 */
export function describeRound(round: RoundView): string {
  if (round.outcome === 'no-change') {
    return round.test ? `no change proposed; ${describeTests(round.test)}` : 'no change proposed';
  }
  const { apply } = round;
  if (!apply) return round.outcome;
  switch (apply.status) {
    case 'rejected':
      return `rejected: ${apply.issues.map((i) => i.message).join('; ')}`;
    case 'conflict':
      return `conflict: ${apply.conflicts.map((c) => `${c.path} (${c.reason})`).join(', ')}`;
    case 'applied': {
      const files = `applied ${plural(apply.filesChanged.length, 'file')}`;
      return round.test ? `${files}; ${describeTests(round.test)}` : files;
    }
  }
}

/**
 * Progress lines for one event of a running session.
 */
export function formatEvent(event: LoopEvent): string[] {
  const lines: string[] = [];
  if (event.record) {
    const ok = event.record.test?.status === 'passed';
    const text = `  round ${event.record.iteration}: ${describeRound(event.record)}`;
    lines.push(ok ? pc.green(text) : text);
  }
  switch (event.state) {
    case 'generating':
      lines.push(pc.bold(`Round ${event.iteration + 1}`) + pc.gray(' generating a patch'));
      break;
    case 'testing':
      lines.push(pc.gray(`  running tests (${event.detail ?? 'patch applied'})`));
      break;
    case 'succeeded':
      lines.push(pc.green(`✅ Tests pass after ${plural(event.iteration, 'round')}.`));
      break;
    case 'failed':
      lines.push(pc.red(`❌ Session failed: ${event.detail ?? 'unknown reason'}`));
      break;
    case 'aborted':
      lines.push(pc.yellow(`⏹ Session stopped: ${event.detail ?? 'cancelled'}`));
      break;
    default:
      break;
  }
  return lines;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  /** Live progress; JSON mode only prints the final report. */
  renderEvent(event: LoopEvent): void {
    if (this.isJson) return;
    for (const line of formatEvent(event)) {
      console.log(line);
    }
  }

  render(report: PrototypeReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
    } else if (report.status === 'succeeded') {
      this.renderSuccess(report);
    } else {
      this.renderFailure(report);
    }
  }

  renderTranscript(stored: StoredSession): void {
    if (this.isJson) {
      console.log(JSON.stringify(stored, null, 2));
      return;
    }

    const status = stored.summary ? stored.summary.status : 'running or interrupted';
    console.log(pc.bold(`Session ${stored.sessionId}: ${status}`));
    if (stored.transcript.length === 0) {
      console.log(pc.gray('  No rounds recorded.'));
    } else {
      console.log(
        formatTable(
          ['Round', 'Outcome', 'Result'],
          stored.transcript.map((round) => [String(round.iteration), round.outcome, describeRound(round)]),
        ),
      );
    }
    for (const round of stored.transcript) {
      const failing = (round.test?.tests ?? []).filter((t) => !t.passed);
      if (failing.length === 0) continue;
      console.log(pc.bold(`Failing tests in round ${round.iteration}:`));
      failing.forEach((test) => console.log(pc.red(`  ✗ ${test.name}`)));
    }
    if (stored.summary?.error) {
      console.log(`  ${pc.bold('Reason:')} ${stored.summary.error.message}`);
    }
  }

  private renderSuccess(report: PrototypeReport): void {
    console.log(`\n${pc.green('✅ Session succeeded.')}`);
    this.renderChangedFiles(report);
    this.renderArtifacts(report);

    console.log(pc.bold('\nNext steps:'));
    if (!report.checkout && report.filesChanged.length > 0) {
      console.log(`  - Changes were not written; run again without ${pc.cyan('--no-checkout')} to keep them.`);
    }
    console.log(`  - To review every round, run: ${pc.cyan(`patchloop transcript ${report.sessionId}`)}`);
  }

  private renderFailure(report: PrototypeReport): void {
    const title = report.status === 'aborted' ? '⏹ Session stopped.' : '❌ Session failed.';
    console.log(`\n${report.status === 'aborted' ? pc.yellow(title) : pc.red(title)}`);

    if (report.error) {
      console.log(`  ${pc.bold('Reason:')} ${report.error.message}`);
    }
    if (report.lastTestStatus) {
      console.log(`  ${pc.bold('Last test run:')} ${report.lastTestStatus}`);
    }
    this.renderChangedFiles(report);
    this.renderArtifacts(report);

    console.log(pc.bold('\nNext steps:'));
    console.log(`  - Review the rounds with ${pc.cyan(`patchloop transcript ${report.sessionId}`)}.`);
    console.log(`  - Allow more rounds with the ${pc.cyan('--max-iters')} flag.`);
    console.log(`  - Clarify the specification and run again.`);
  }

  private renderChangedFiles(report: PrototypeReport): void {
    if (report.filesChanged.length === 0) return;
    console.log(pc.bold('\nChanged files:'));
    report.filesChanged.slice(0, MAX_LISTED_FILES).forEach((file) => console.log(`  - ${file}`));
    if (report.filesChanged.length > MAX_LISTED_FILES) {
      console.log(`  ... and ${report.filesChanged.length - MAX_LISTED_FILES} more.`);
    }
  }

  private renderArtifacts(report: PrototypeReport): void {
    console.log(pc.bold('\nSession:'));
    console.log(`  ID: ${report.sessionId}`);
    console.log(`  Rounds: ${report.iterations}`);
    console.log(`  Dir: ${report.sessionDir}`);
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
