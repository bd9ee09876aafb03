import { asWireRecord, parseIsoDate, readString } from './wire.js';

/**
 * Document entity - a statement or tax certificate available for an account
 *
 * When the API omits documentDate or sends something unparsable, the date falls
 * back to today (UTC midnight) and documentDateIsFallback is set. The fallback
 * is kept for compatibility with existing consumers; check the flag before
 * trusting the date.
 */
export interface Document {
  readonly documentType: string;
  readonly documentDate: Date;
  readonly documentDateIsFallback: boolean;
}

export function startOfTodayUtc(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function parseDocument(value: unknown, now: Date = new Date()): Document {
  const data = asWireRecord(value);
  const parsedDate = parseIsoDate(data.documentDate);
  return {
    documentType: readString(data, 'documentType'),
    documentDate: parsedDate ?? startOfTodayUtc(now),
    documentDateIsFallback: parsedDate === null,
  };
}
