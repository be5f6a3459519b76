/**
 * Coercions for driver row values, which arrive as JS primitives, Dates,
 * arrays or their string forms depending on the column type.
 */

export function toStr(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  return String(value);
}

export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return Number(toStr(value));
}

export function toBool(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  const text = toStr(value)?.toLowerCase();
  return text === 'true' || text === '1' || text === 'yes';
}

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'number') return new Date(value);
  return new Date(toStr(value) ?? 0);
}

/** Array columns may come back as arrays or as JSON text */
export function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(String);
  const text = toStr(value)?.trim();
  if (!text) return [];
  if (text.startsWith('[')) {
    const parsed = parseJson(text);
    if (Array.isArray(parsed)) return parsed.map(String);
    return text
      .slice(1, -1)
      .split(',')
      .map(s => s.trim())
      .filter(Boolean);
  }
  return [text];
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
