import { hash } from 'ohash';
import {
  tail,
  truncateMiddle,
  type ChatMessage,
  type IterationRecord,
  type TestResult,
  type ToolSpec,
} from '@patchloop/shared';
import { isBinaryContent, PATCH_TOOLS, type Snapshot } from '@patchloop/repo';
import type { Session } from '../controller/session';
import { SYSTEM_PROMPT } from './prompt';

export interface ComposeOptions {
  maxTreeChars: number;
  maxFeedbackChars: number;
}

/**
 * Everything the generation service is given for one round.
 */
export interface GenerationRequest {
  specText: string;
  /** Rendered project files */
  fileTree: string;
  /** Digest of the previous round, empty on the first one */
  feedback: string;
  /** Round this request is for, 1-based */
  iteration: number;
  messages: ChatMessage[];
  tools: ToolSpec[];
  /** Stable hash of the request body */
  digest: string;
}

export function renderFileTree(snapshot: Snapshot, maxChars: number): string {
  const blocks = snapshot.paths.map((filePath) => {
    const body = snapshot.read(filePath) ?? Buffer.alloc(0);
    if (isBinaryContent(filePath, body)) {
      return `=== ${filePath} (binary, ${body.length} bytes) ===`;
    }
    return `=== ${filePath} ===\n${body.toString('utf8')}`;
  });
  if (blocks.length === 0) return '(no files)';
  return truncateMiddle(blocks.join('\n\n'), maxChars);
}

function describeTest(test: TestResult, outputChars: number): string[] {
  const lines: string[] = [];
  switch (test.status) {
    case 'passed':
      lines.push('The tests passed.');
      break;
    case 'failed':
      lines.push(`The tests failed (exit code ${test.exitCode ?? 'none'}).`);
      break;
    case 'timed-out':
      lines.push('The test command timed out.');
      break;
    case 'execution-error':
      lines.push('The test command could not be run.');
      break;
  }
  const failing = test.tests.filter((t) => !t.passed).map((t) => `- ${t.name}`);
  if (failing.length > 0) {
    lines.push('Failing tests:', ...failing);
  }
  if (test.status !== 'passed' && test.output.trim()) {
    lines.push('Test output (tail):', tail(test.output.trimEnd(), outputChars));
  }
  return lines;
}

/**
 * Summarizes one round for the next prompt, bounded by `maxChars`.
 */
export function renderFeedback(record: IterationRecord | undefined, maxChars: number): string {
  if (!record) return '';

  const lines = [`Round ${record.iteration}:`];
  const apply = record.apply;
  if (record.outcome === 'no-change') {
    lines.push('You reported that no further change is needed.');
  } else if (apply?.status === 'rejected') {
    lines.push('The previous response was rejected and nothing was changed:');
    for (const issue of apply.issues) {
      lines.push(`- ${issue.path ? `${issue.path}: ` : ''}${issue.message} (${issue.reason})`);
    }
  } else if (apply?.status === 'conflict') {
    lines.push('The previous patch did not apply to the current files and nothing was changed:');
    for (const conflict of apply.conflicts) {
      lines.push(`- ${conflict.path}: ${conflict.message} (${conflict.reason})`);
    }
  } else if (apply?.status === 'applied') {
    lines.push(`The patch was applied to ${apply.filesChanged.join(', ')}.`);
  }

  if (record.test) {
    lines.push(...describeTest(record.test, Math.floor(maxChars / 2)));
  }
  return truncateMiddle(lines.join('\n'), maxChars);
}

function userMessage(specText: string, fileTree: string, feedback: string, iteration: number) {
  const sections = [`# Specification\n\n${specText.trim()}`, `# Project files\n\n${fileTree}`];
  if (feedback) {
    sections.push(`# Result of the previous round\n\n${feedback}`);
  }
  sections.push(
    `# Task\n\nThis is round ${iteration}. Propose the next patch that brings the project closer to passing its tests.`,
  );
  return sections.join('\n\n');
}

/**
 * Builds the next generation request from the session. Pure: identical
 * session state gives a byte-identical request.
 */
export function compose(session: Session, options: ComposeOptions): GenerationRequest {
  const iteration = session.iterations + 1;
  const fileTree = renderFileTree(session.current, options.maxTreeChars);
  const feedback = renderFeedback(
    session.transcript[session.transcript.length - 1],
    options.maxFeedbackChars,
  );

  const messages: ChatMessage[] = [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: userMessage(session.specText, fileTree, feedback, iteration) },
  ];

  return {
    specText: session.specText,
    fileTree,
    feedback,
    iteration,
    messages,
    tools: PATCH_TOOLS,
    digest: hash({ specText: session.specText, fileTree, feedback, iteration }),
  };
}
