/**
 * Log redaction
 *
 * Two classes of values never reach log output: credentials, and the text of
 * the documents being ingested (chunk text, block text, search queries).
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are credentials (matched case-insensitively).
 */
const SECRET_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
]);

/**
 * Keys whose values are document content (matched case-insensitively).
 */
const CONTENT_KEYS: ReadonlySet<string> = new Set(["text", "content", "query"]);

/**
 * user:password@ section of connection strings such as DATABASE_URL.
 */
const URL_CREDENTIALS_REGEX = /(\b[a-z][a-z0-9+.-]*:\/\/[^:/@\s]+):[^@\s]+@/gi;

/**
 * Redact a single key/value pair.
 *
 * - Credential keys are replaced with "[REDACTED]".
 * - Content keys keep only their length, e.g. "[REDACTED 42 chars]".
 * - Connection strings lose their password.
 */
export function redactValue(key: string, value: unknown): unknown {
  const normalizedKey = key.toLowerCase();

  if (SECRET_KEYS.has(normalizedKey)) {
    return REDACTED;
  }

  if (CONTENT_KEYS.has(normalizedKey) && typeof value === "string") {
    return `[REDACTED ${String(value.length)} chars]`;
  }

  if (typeof value === "string") {
    return value.replace(URL_CREDENTIALS_REGEX, `$1:${REDACTED}@`);
  }

  return value;
}

const REDACTED_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "text",
  "content",
  "query",
];

/**
 * JSON paths for Pino's `redact` option: every redacted field at the top level
 * and one level down (e.g. `chunk.text`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...REDACTED_FIELDS,
  ...REDACTED_FIELDS.map((field) => `*.${field}`),
];
