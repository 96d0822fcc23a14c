/**
 * Date helpers for market-local calendar days
 */

import { ValidationError } from './errors.js';
import type { Timestamp } from '../types/index.js';

const MINUTE = 60_000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * YYYYMMDD of the market-local day containing t
 */
export function formatYmd(t: Timestamp, utcOffsetMinutes: number): string {
  const local = new Date(t + utcOffsetMinutes * MINUTE);
  return `${local.getUTCFullYear()}${pad(local.getUTCMonth() + 1)}${pad(local.getUTCDate())}`;
}

/**
 * Start of the market-local day written as YYYYMMDD (or YYYY-MM-DD)
 */
export function parseYmd(value: string, utcOffsetMinutes: number): Timestamp {
  const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid date: "${value}"`);
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const utc = Date.UTC(year, month - 1, day);
  const check = new Date(utc);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ValidationError(`Invalid date: "${value}"`);
  }
  return utc - utcOffsetMinutes * MINUTE;
}

/**
 * Parse a user-supplied instant: a calendar day (market-local midnight),
 * an ISO-8601 timestamp, or epoch milliseconds
 */
export function parseDateInput(value: string | number, utcOffsetMinutes = 0): Timestamp {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ValidationError(`Invalid timestamp: ${value}`);
    return value;
  }
  const trimmed = value.trim();
  if (/^\d{4}-?\d{2}-?\d{2}$/.test(trimmed)) {
    return parseYmd(trimmed, utcOffsetMinutes);
  }
  if (/^\d{10,}$/.test(trimmed)) {
    return Number(trimmed);
  }
  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) {
    throw new ValidationError(`Invalid date: "${value}"`);
  }
  return parsed;
}

/**
 * Midnight (market-local) at or before t
 */
export function startOfLocalDay(t: Timestamp, utcOffsetMinutes: number): Timestamp {
  return parseYmd(formatYmd(t, utcOffsetMinutes), utcOffsetMinutes);
}
