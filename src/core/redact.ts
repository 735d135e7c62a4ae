// Sensitive data patterns to filter
export const SENSITIVE_PATTERNS = [
  /token[=:]\s*["']?[\w-]+["']?/gi,
  /passw(?:ord)?[=:]\s*["']?[^"'\s]+["']?/gi,
  /secret[=:]\s*["']?[\w-]+["']?/gi,
];

export function redactSensitive(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}
