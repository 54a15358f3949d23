// redact.ts - Scrub secrets and user identities from log output

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[A-Za-z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["']?\s*[:=]\s*["']?[A-Za-z0-9\-_]+/gi, replacement: 'apiKey: [REDACTED]' },
  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },
  { pattern: /secret["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'secret: [REDACTED]' },
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },

  // Startup commands and temp paths are full of profile directories
  { pattern: /([A-Z]:\\Users\\)[^\\"\s]+/gi, replacement: '$1[USER]' },
];

const SENSITIVE_KEYS = new Set(['apikey', 'api_key', 'password', 'secret', 'token', 'authorization']);

export function redact(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => redact(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : redact(value);
    }
    return sanitized;
  }

  return data;
}

export function redactText(text: string): string {
  const result = redact(text);
  return typeof result === 'string' ? result : text;
}
