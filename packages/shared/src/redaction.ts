const REDACTION_PLACEHOLDER = '[REDACTED]';

const secretPatterns = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI style
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
  /Bearer\s+[a-zA-Z0-9._~+/-]{16,}=*/g,
  /(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?[a-zA-Z0-9_-]+['"]?/g,
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of secretPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

/**
 * Deep-copies a JSON-like value with every string passed through {@link redactString}.
 */
export function redact<T>(input: T): T;
export function redact(input: unknown): unknown {
  if (typeof input === 'string') {
    return redactString(input).redacted;
  }

  if (Array.isArray(input)) {
    return input.map((item: unknown) => redact(item));
  }

  if (typeof input === 'object' && input !== null) {
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      redactedObj[key] = redact(value);
    }
    return redactedObj;
  }

  return input;
}
