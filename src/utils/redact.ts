const SENSITIVE_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'api_key', pattern: /(api[_-]?key|apikey)[=:\s]+([a-zA-Z0-9_-]{20,})/gi },
  { name: 'auth_token', pattern: /(auth[_-]?token|token)[=:\s]+([a-zA-Z0-9_-]{20,})/gi },
  { name: 'bearer', pattern: /(bearer)\s+([a-zA-Z0-9._~+/-]{20,}=*)/gi },
  { name: 'private_key', pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g },
];

/** Replace credential-looking substrings with [REDACTED_*] placeholders. */
export function redactSensitiveData(text: string): string {
  let result = text;
  for (const { name, pattern } of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, `[REDACTED_${name.toUpperCase()}]`);
  }
  return result;
}

export const MAX_ERROR_CHARS = 500;

/** Scrub, trim and cap an error message before it is stored or returned. */
export function sanitizeErrorMessage(message: string, fallback: string, maxChars = MAX_ERROR_CHARS): string {
  const scrubbed = redactSensitiveData(message).trim();
  if (!scrubbed) return fallback;
  return scrubbed.length > maxChars ? scrubbed.slice(0, maxChars - 1) + '…' : scrubbed;
}
