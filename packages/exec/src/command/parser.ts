import { ParsedCommand } from './types';

const ENV_ASSIGNMENT = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/s;

/**
 * Splits a command line into words, honouring quotes and backslash escapes,
 * and peels off leading `KEY=value` assignments.
 */
export function parseCommand(input: string): ParsedCommand {
  const tokens: string[] = [];
  let current = '';
  let quote: "'" | '"' | null = null;
  let escape = false;
  let inToken = false;

  const trimmed = input.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  const env: Record<string, string> = {};
  let cmdIndex = 0;
  for (; cmdIndex < tokens.length; cmdIndex++) {
    const assignment = ENV_ASSIGNMENT.exec(tokens[cmdIndex]);
    if (!assignment) break;
    env[assignment[1]] = assignment[2];
  }

  if (cmdIndex >= tokens.length) {
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}

/** True when the command uses pipes, redirection, chaining or expansion. */
export function needsShell(command: string): boolean {
  return /[|&;<>`$]/.test(command);
}
