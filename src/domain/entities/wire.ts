import Decimal from 'decimal.js';

/**
 * Readers for loosely-typed API payloads.
 * Every reader is total: a missing or mistyped field yields the fallback.
 */

export type WireRecord = Record<string, unknown>;

export function isWireRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asWireRecord(value: unknown): WireRecord {
  return isWireRecord(value) ? value : {};
}

export function readOptionalString(data: WireRecord, key: string): string | null {
  const value = data[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function readString(data: WireRecord, key: string, fallback = ''): string {
  return readOptionalString(data, key) ?? fallback;
}

export function readOptionalBoolean(data: WireRecord, key: string): boolean | null {
  const value = data[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
  }
  return null;
}

export function readBoolean(data: WireRecord, key: string, fallback = false): boolean {
  return readOptionalBoolean(data, key) ?? fallback;
}

export function readOptionalInteger(data: WireRecord, key: string): number | null {
  const value = data[key];
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : null;
}

export function toDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) return value;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(String(value)) : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    try {
      const parsed = new Decimal(value.trim());
      return parsed.isFinite() ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

export function readOptionalDecimal(data: WireRecord, key: string): Decimal | null {
  return toDecimal(data[key]);
}

export function readDecimal(data: WireRecord, key: string): Decimal {
  return toDecimal(data[key]) ?? new Decimal(0);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const UTC_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/;

/**
 * ISO 8601 dates and timestamps, read in UTC whatever the host timezone.
 * Date-only values are UTC midnight; timestamps without an offset are UTC.
 */
export function parseIsoDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();

  let normalized: string;
  if (DATE_ONLY.test(trimmed)) {
    normalized = `${trimmed}T00:00:00Z`;
  } else if (ISO_TIMESTAMP.test(trimmed)) {
    const withT = trimmed.replace(' ', 'T');
    normalized = UTC_OFFSET.test(withT) ? withT : `${withT}Z`;
  } else {
    return null;
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function readOptionalDate(data: WireRecord, key: string): Date | null {
  return parseIsoDate(data[key]);
}

export function readRecordList(data: WireRecord, key: string): WireRecord[] {
  const value = data[key];
  return Array.isArray(value) ? value.filter(isWireRecord) : [];
}

/**
 * Plain decimal string for outbound amounts: at least two places, never exponent notation
 */
export function toWireAmount(amount: Decimal): string {
  return amount.decimalPlaces() <= 2 ? amount.toFixed(2) : amount.toFixed();
}
