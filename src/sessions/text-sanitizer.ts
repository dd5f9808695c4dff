/**
 * Cleans raw session text before it is stored, sent to a model or quoted
 * in a guidance document.
 *
 * Terminal noise (ANSI escapes, carriage returns, control characters) is
 * stripped, whitespace is normalized, and credential-shaped substrings are
 * replaced with `[REDACTED:<kind>]`.
 */

// ============================================================================
// Terminal noise
// ============================================================================

const ANSI_ESCAPE_RE = /\x1B\[[0-9;?]*[ -/]*[@-~]/g;
const CONTROL_CHAR_RE = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

// ============================================================================
// Secret shapes
// ============================================================================

/** Named pattern for one kind of credential. */
export interface SecretPattern {
  name: string;
  pattern: RegExp;
}

/**
 * Ordered from most to least specific so provider-prefixed keys are
 * labelled before the generic assignment patterns see them.
 */
export const SECRET_PATTERNS: SecretPattern[] = [
  { name: 'anthropic-key', pattern: /sk-ant-[A-Za-z0-9\-_]{20,}/g },
  { name: 'openai-key', pattern: /sk-(?:proj-)?[A-Za-z0-9]{32,}/g },
  { name: 'aws-key', pattern: /AKIA[0-9A-Z]{16}/g },
  { name: 'github-token', pattern: /gh[pousr]_[A-Za-z0-9]{36,}/g },
  { name: 'npm-token', pattern: /npm_[A-Za-z0-9]{30,}/g },
  {
    name: 'private-key',
    pattern: /-----BEGIN\s[A-Z\s]*PRIVATE KEY-----[\s\S]*?-----END\s[A-Z\s]*PRIVATE KEY-----/g,
  },
  { name: 'bearer-token', pattern: /(?<=Bearer\s)[A-Za-z0-9\-_=]+\.[A-Za-z0-9\-_=]+(?:\.[A-Za-z0-9\-_.+/=]*)?/g },
  { name: 'password', pattern: /(?:password|passwd)\s*[=:]\s*\S{8,}/gi },
  { name: 'api-key', pattern: /(?:api[_-]?key)\s*[=:]\s*\S{12,}/gi },
  { name: 'generic-secret', pattern: /(?:secret|token)\s*[=:]\s*[A-Za-z0-9\-_]{16,}/gi },
];

/** Replace every known secret shape with `[REDACTED:<name>]`. */
export function redactSecrets(text: string): string {
  if (text === '') return '';

  let result = text;
  for (const { name, pattern } of SECRET_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, `[REDACTED:${name}]`);
  }
  return result;
}

/**
 * Normalize one message of session text.
 *
 * Returns an empty string when nothing printable remains, which readers
 * treat as "drop this message".
 */
export function sanitizeText(value: string): string {
  if (!value) return '';

  const cleaned = value
    .replace(ANSI_ESCAPE_RE, '')
    .replace(/\r/g, '')
    .replace(CONTROL_CHAR_RE, '')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .trim();

  return redactSecrets(cleaned);
}

/** Collapse all whitespace runs (including newlines) to single spaces. */
export function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter((part) => part.length > 0).join(' ');
}

/**
 * Cut `value` to `limit` code points, ending in `...` when shortened.
 * Surrogate pairs are never split.
 */
export function truncateText(value: string, limit: number): string {
  const chars = Array.from(value);
  if (chars.length <= limit) return value;
  if (limit <= 3) return chars.slice(0, limit).join('');
  return `${chars.slice(0, limit - 3).join('')}...`;
}
