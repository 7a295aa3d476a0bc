import { UsageError } from '@patchloop/shared';

/**
 * Limits given with `--budget`, e.g. `iter=5,time=20m`.
 */
export interface Budget {
  /** Maximum number of generate/apply/test rounds */
  iter?: number;
  /** Wall-clock limit in milliseconds */
  time?: number;
}

export function parseBudget(input: string): Budget {
  const parts = input.split(',');
  const budget: Budget = {};

  for (const part of parts) {
    const [key, valStr] = part.split('=');
    if (!key || !valStr) {
      throw new UsageError(`Invalid budget format: ${part}. Expected key=value.`);
    }

    const cleanKey = key.trim();
    const cleanVal = valStr.trim();

    if (cleanKey === 'time') {
      budget.time = parseDuration(cleanVal);
    } else if (cleanKey === 'iter') {
      const val = Number(cleanVal);
      if (!Number.isInteger(val) || val < 1) {
        throw new UsageError(`Invalid iter value: ${cleanVal}`);
      }
      budget.iter = val;
    } else {
      throw new UsageError(`Unknown budget key: ${cleanKey}`);
    }
  }
  return budget;
}

export function parseDuration(input: string): number {
  const match = input.match(/^(\d+)(ms|s|m|h)?$/);
  if (!match) {
    throw new UsageError(
      `Invalid duration format: ${input}. Expected number with optional unit (ms, s, m, h).`,
    );
  }
  const value = parseInt(match[1], 10);
  switch (match[2] ?? 'ms') {
    case 's':
      return value * 1000;
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    default:
      return value;
  }
}
