import { stripAnsi, type TestCaseResult } from '@patchloop/shared';

type OutputParser = (lines: string[]) => TestCaseResult[];

function joinBlock(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end).join('\n');
}

const PYTEST_RESULT = /^(\S+::\S+)\s+(PASSED|FAILED|ERROR|XPASS|XFAIL|SKIPPED)\b/;
const PYTEST_SECTION = /^_{3,} (.+?) _{3,}$/;
const PYTEST_BANNER = /^={3,}/;

const pytest: OutputParser = (lines) => {
  const failures = new Map<string, string[]>();
  let currentSection: string[] | undefined;
  for (const line of lines) {
    const section = PYTEST_SECTION.exec(line);
    if (section) {
      currentSection = [];
      failures.set(section[1], currentSection);
    } else if (PYTEST_BANNER.test(line)) {
      currentSection = undefined;
    } else {
      currentSection?.push(line);
    }
  }

  const results: TestCaseResult[] = [];
  for (const line of lines) {
    const match = PYTEST_RESULT.exec(line);
    if (!match || match[2] === 'SKIPPED') continue;
    const [, nodeId, outcome] = match;
    const passed = outcome === 'PASSED' || outcome === 'XFAIL';
    const sectionName = nodeId.split('::').slice(1).join('.');
    const output = passed ? '' : joinBlock(failures.get(sectionName) ?? []);
    results.push({ name: nodeId, passed, output });
  }
  return results;
};

const GO_RUN = /^=== RUN\s+(\S+)/;
const GO_RESULT = /^\s*--- (PASS|FAIL|SKIP): (\S+)/;

const goTest: OutputParser = (lines) => {
  const logs = new Map<string, string[]>();
  const results: TestCaseResult[] = [];
  let running: string | undefined;
  for (const line of lines) {
    const run = GO_RUN.exec(line);
    if (run) {
      running = run[1];
      logs.set(running, []);
      continue;
    }
    const result = GO_RESULT.exec(line);
    if (result) {
      const [, outcome, name] = result;
      running = undefined;
      if (outcome === 'SKIP') continue;
      const passed = outcome === 'PASS';
      const log = (logs.get(name) ?? []).map((l) => l.trim());
      results.push({ name, passed, output: passed ? '' : joinBlock(log) });
      continue;
    }
    if (running) logs.get(running)?.push(line);
  }
  return results;
};

const JS_RESULT = /^\s*(✓|✔|√|×|✗|✕)\s+(.+?)(?:\s+\d+(?:\.\d+)?\s*m?s)?$/;
const JS_FAILED = new Set(['×', '✗', '✕']);

const jsRunner: OutputParser = (lines) => {
  const results: TestCaseResult[] = [];
  for (const line of lines) {
    const match = JS_RESULT.exec(line);
    if (!match) continue;
    const name = match[2].replace(/\s+\(\d+(?:\.\d+)?\s*m?s\)$/, '');
    results.push({ name, passed: !JS_FAILED.has(match[1]), output: '' });
  }
  return results;
};

const TAP_RESULT = /^(not )?ok\s+\d+(?:\s+-)?\s*(.*?)\s*(#\s*(SKIP|TODO)\b.*)?$/i;

const tap: OutputParser = (lines) => {
  const results: TestCaseResult[] = [];
  for (const line of lines) {
    const match = TAP_RESULT.exec(line);
    if (!match || match[4]) continue;
    results.push({ name: match[2], passed: !match[1], output: '' });
  }
  return results;
};

const PARSERS: OutputParser[] = [pytest, goTest, jsRunner, tap];

/**
 * Recovers per-test results from common runner formats (pytest -v,
 * go test -v, vitest/jest, TAP). Unknown formats yield an empty list.
 */
export function parseTestOutput(output: string): TestCaseResult[] {
  const lines = stripAnsi(output).replace(/\r\n/g, '\n').split('\n');
  for (const parser of PARSERS) {
    const results = parser(lines);
    if (results.length > 0) return results;
  }
  return [];
}
