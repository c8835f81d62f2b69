// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":\s=]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s=]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":\s=]+['"]?\S+['"]?/gi,
  /key['":\s=]+['"]?[A-Za-z0-9_\-./]{16,}['"]?/gi,
];

/**
 * Redact potential secret values from a string for safe logging.
 * Applied to logger messages and to every line a supervised child prints.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}
