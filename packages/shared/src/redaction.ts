const PLACEHOLDER = '[REDACTED]';

interface SecretPattern {
  name: string;
  pattern: RegExp;
}

// Order matters: the Anthropic prefix would otherwise be half-eaten by the OpenAI pattern.
const SECRET_PATTERNS: readonly SecretPattern[] = [
  { name: 'anthropic-key', pattern: /sk-ant-[a-zA-Z0-9-]{20,}/g },
  { name: 'openai-key', pattern: /sk-[a-zA-Z0-9]{20,}/g },
  { name: 'github-token', pattern: /gh[pousr]_[a-zA-Z0-9]{20,}/g },
  { name: 'bearer', pattern: /Bearer\s+[A-Za-z0-9._~+/-]{8,}=*/g },
  { name: 'env-assignment', pattern: /(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?[a-zA-Z0-9_-]+['"]?/g },
  // api_key entries in provider config echoed back in errors
  { name: 'config-api-key', pattern: /\bapi_key\s*:\s*['"]?[^\s'",}]+['"]?/g },
  {
    name: 'private-key',
    pattern: /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----[\s\S]*?-----END (?:[A-Z]+ )?PRIVATE KEY-----/g,
  },
];

export interface Redaction<T> {
  redacted: T;
  redactionCount: number;
}

/** Replaces API keys, tokens and private keys in a string. */
export function redactString(input: string): Redaction<string> {
  let redacted = input;
  let redactionCount = 0;

  for (const { pattern } of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, () => {
      redactionCount++;
      return PLACEHOLDER;
    });
  }

  return { redacted, redactionCount };
}

/** Walks arrays and plain objects, redacting every string leaf. */
export function redactUnknown(input: unknown): Redaction<unknown> {
  if (typeof input === 'string') {
    return redactString(input);
  }

  let total = 0;
  const visit = (value: unknown): unknown => {
    const { redacted, redactionCount } = redactUnknown(value);
    total += redactionCount;
    return redacted;
  };

  if (Array.isArray(input)) {
    const redacted = input.map(visit);
    return { redacted, redactionCount: total };
  }

  if (typeof input === 'object' && input !== null) {
    const redacted = Object.fromEntries(
      Object.entries(input).map(([key, value]) => [key, visit(value)]),
    );
    return { redacted, redactionCount: total };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
