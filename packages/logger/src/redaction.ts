type JsonValue = null | boolean | number | string | JsonObject | JsonValue[];
interface JsonObject {
  [key: string]: JsonValue;
}

export type RedactionMode = 'development' | 'staging' | 'production' | 'test';

export const MAX_LOGGED_TEXT_LENGTH = 200;

// Reviewer identity fields never reach the log sink.
const PII_KEY_REGEX = /^(email|phone|author_name|reviewer_name|ip|ip_address)$/i;

export function redactDeep(value: unknown, mode: RedactionMode): unknown {
  return redactDeepInternal(value, mode, undefined);
}

function redactDeepInternal(value: unknown, mode: RedactionMode, key: string | undefined): unknown {
  if (value == null) return value;
  if (typeof value === 'string') {
    if (key && PII_KEY_REGEX.test(key)) {
      return '[REDACTED_PII]';
    }
    return redactStringValue(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Error) {
    const out: JsonObject = {
      name: value.name,
      message: redactStringValue(value.message),
    };
    if (typeof value.stack === 'string') {
      out['stack'] = truncateStack(value.stack, mode);
    }
    return out;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactDeepInternal(item, mode, key));
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (PII_KEY_REGEX.test(k)) {
        out[k] = '[REDACTED_PII]';
        continue;
      }
      if (k === 'stack' && typeof v === 'string') {
        out[k] = truncateStack(v, mode);
        continue;
      }
      out[k] = redactDeepInternal(v, mode, k);
    }
    return out;
  }
  return value;
}

function truncateStack(stack: string, mode: RedactionMode): string {
  if (mode !== 'production') return stack;
  return stack.split('\n').slice(0, 3).join('\n');
}

function redactStringValue(input: string): string {
  const value = input.trim();
  if (!value) return input;

  // Email embedded as a bare value
  const emailMatch = /^([^@\s]+)@([^@\s]+)$/.exec(value);
  if (emailMatch) {
    const local = emailMatch[1] ?? '';
    const domain = emailMatch[2] ?? '';
    const tld = domain.split('.').pop() ?? 'com';
    const firstChar = local.slice(0, 1) || 'x';
    return `${firstChar}***@***.${tld}`;
  }

  // Review bodies can be arbitrarily long.
  if (input.length > MAX_LOGGED_TEXT_LENGTH) {
    return `${input.slice(0, MAX_LOGGED_TEXT_LENGTH)}… [${input.length - MAX_LOGGED_TEXT_LENGTH} more chars]`;
  }

  return input;
}
