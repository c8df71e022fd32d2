import { DetailRow, DetailValue } from '../risk-record';

/** Raised when a provider payload does not have the shape a probe reads. */
export class PayloadShapeError extends Error {
  constructor(readonly path: string, expected: string) {
    super(`Expected ${expected} at ${path}`);
    this.name = PayloadShapeError.name;
  }
}

export type PayloadRecord = Readonly<Record<string, unknown>>;

export function isPlainRecord(value: unknown): value is PayloadRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown, path: string): PayloadRecord {
  if (!isPlainRecord(value)) {
    throw new PayloadShapeError(path, 'an object');
  }
  return value;
}

/** Absent fields read as an empty object; anything else that is not an object is a shape error. */
export function optionalRecord(value: unknown, path: string): PayloadRecord {
  if (value === undefined || value === null) return {};
  return asRecord(value, path);
}

export function optionalArray(value: unknown, path: string): readonly unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new PayloadShapeError(path, 'an array');
  }
  return value;
}

export function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/** Empty strings and whitespace count as "no value", as the providers send both. */
export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function toDetailValue(value: unknown): DetailValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toDetailValue(item));
  }
  if (isPlainRecord(value)) {
    const copy: Record<string, DetailValue> = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = toDetailValue(nested);
    }
    return copy;
  }
  return String(value);
}

/** Copies the named fields out of a payload object into a detail row, in the given order. */
export function pickRow(source: PayloadRecord, fields: Readonly<Record<string, string>>): DetailRow {
  const row: Record<string, DetailValue> = {};
  for (const [column, field] of Object.entries(fields)) {
    row[column] = toDetailValue(source[field]);
  }
  return row;
}
