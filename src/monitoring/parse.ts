// parse.ts - Coercion helpers for ConvertTo-Json output

/** `undefined` when the output is empty or not JSON; a literal `null` stays `null`. */
export function tryParseJson(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** ConvertTo-Json collapses one-element arrays into the element itself. */
export function asRecords(value: unknown): JsonRecord[] {
  if (value === null || value === undefined) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.filter(isRecord);
}

export function toStr(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function toOptionalStr(value: unknown): string | null {
  const str = toStr(value).trim();
  return str === '' ? null : str;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toBool(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
  }
  if (typeof value === 'number') return value !== 0;
  return null;
}

/**
 * Task Scheduler repetition intervals are ISO-8601 durations (`PT5M`, `P1DT2H`).
 * Returns seconds, or null for empty/unparseable input.
 */
export function parseIsoDuration(value: string | null): number | null {
  if (!value) return null;
  const match = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/.exec(value.trim());
  if (!match || value.trim() === 'P' || value.trim().endsWith('T')) return null;

  const [, days, hours, minutes, seconds] = match;
  return (Number(days ?? 0) * 86400)
    + (Number(hours ?? 0) * 3600)
    + (Number(minutes ?? 0) * 60)
    + Number(seconds ?? 0);
}

/** `C:\Users\x\AppData\Local\Temp` -> `C:`; null when the path has no drive letter. */
export function driveOf(filePath: string): string | null {
  const match = /^([A-Za-z]):/.exec(filePath);
  return match ? `${match[1].toUpperCase()}:` : null;
}
