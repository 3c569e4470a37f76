/**
 * Field parsers for metadata envelope values.
 *
 * Each parser returns a FieldResult: the parsed value plus its FieldStatus,
 * so "absent upstream" and "present but empty" stay distinguishable.
 */

import type { FieldStatus, FinancialAmount } from '@decision-corpus/shared';
import { isRecord } from '../lib/files';

export interface FieldResult<T> {
  value: T;
  status: FieldStatus;
}

export const ID_SHAPE = /^\d{1,12}$/;

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function cleanString(value: string): string {
  return value.normalize('NFC').replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Strings
// ============================================================================

/**
 * Scalar text field. Numbers are accepted and stringified; blank strings
 * count as missing.
 */
export function parseText(value: unknown): FieldResult<string | null> {
  if (isAbsent(value)) {
    return { value: null, status: 'missing' };
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return { value: String(value), status: 'present' };
  }
  if (typeof value !== 'string') {
    return { value: null, status: 'invalid' };
  }
  const cleaned = cleanString(value);
  return cleaned === '' ? { value: null, status: 'missing' } : { value: cleaned, status: 'present' };
}

/**
 * List of strings. A bare string is treated as a one-element list; blank
 * entries are dropped.
 */
export function parseStringList(value: unknown): FieldResult<string[]> {
  if (isAbsent(value)) {
    return { value: [], status: 'missing' };
  }
  const items = Array.isArray(value) ? value : [value];
  const parsed: string[] = [];
  let rejected = 0;
  for (const item of items) {
    const text = parseText(item);
    if (text.value !== null) {
      parsed.push(text.value);
    } else if (text.status === 'invalid') {
      rejected += 1;
    }
  }
  if (parsed.length > 0) {
    return { value: parsed, status: 'present' };
  }
  return { value: [], status: rejected > 0 ? 'invalid' : 'empty' };
}

// ============================================================================
// Identifiers
// ============================================================================

export interface IdCheck<T> extends FieldResult<T> {
  /** Values kept but not matching the known id shape */
  nonconforming: string[];
}

export function parseOrganizationId(value: unknown): IdCheck<string | null> {
  const parsed = parseText(value);
  const nonconforming = parsed.value !== null && !ID_SHAPE.test(parsed.value) ? [parsed.value] : [];
  return { ...parsed, nonconforming };
}

export function parseUnitIds(value: unknown): IdCheck<string[]> {
  const parsed = parseStringList(value);
  const unique = [...new Set(parsed.value)];
  return {
    value: unique,
    status: parsed.status,
    nonconforming: unique.filter((id) => !ID_SHAPE.test(id)),
  };
}

// ============================================================================
// Dates
// ============================================================================

const DMY = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATETIME_LOCAL = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const ISO_DATETIME_ZONED = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function calendarDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Calendar date of an instant as seen in `timeZone`.
 */
export function dateInTimeZone(epochMs: number, timeZone: string): string | null {
  const date = new Date(epochMs);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((entry) => entry.type === type)?.value);
  return calendarDate(part('year'), part('month'), part('day'));
}

/**
 * Parse an issue date into `YYYY-MM-DD`.
 *
 * Accepts epoch milliseconds (number or digit string), ISO dates and
 * datetimes, and day-first `dd/mm/yyyy`, `dd-mm-yyyy`, `dd.mm.yyyy`. Instants
 * (epoch values, zoned datetimes) are converted to the calendar date in
 * `timeZone`; local datetimes keep their own date.
 */
export function parseDate(value: unknown, timeZone: string): FieldResult<string | null> {
  if (isAbsent(value) || value === '') {
    return { value: null, status: 'missing' };
  }

  let parsed: string | null = null;
  if (typeof value === 'number') {
    parsed = Number.isFinite(value) ? dateInTimeZone(value, timeZone) : null;
  } else if (typeof value === 'string') {
    const text = value.trim();
    let match: RegExpMatchArray | null;
    if (/^\d{9,}$/.test(text)) {
      parsed = dateInTimeZone(Number(text), timeZone);
    } else if ((match = text.match(ISO_DATE))) {
      parsed = calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
    } else if (ISO_DATETIME_ZONED.test(text)) {
      parsed = dateInTimeZone(Date.parse(text), timeZone);
    } else if ((match = text.match(ISO_DATETIME_LOCAL))) {
      parsed = calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
    } else if ((match = text.match(DMY))) {
      parsed = calendarDate(Number(match[3]), Number(match[2]), Number(match[1]));
    }
  }

  return parsed === null ? { value: null, status: 'invalid' } : { value: parsed, status: 'present' };
}

// ============================================================================
// Amounts
// ============================================================================

const CURRENCY_SYMBOLS: Record<string, string> = {
  '€': 'EUR',
  $: 'USD',
  '£': 'GBP',
};

const CURRENCY_WORD = /(ευρώ|ευρω|euro|eur)\.?/iu;

function validGrouping(intPart: string, mark: string): boolean {
  const groups = intPart.split(mark);
  return /^\d{1,3}$/.test(groups[0]) && groups.slice(1).every((group) => /^\d{3}$/.test(group));
}

/**
 * Normalize a decimal number written with Greek (`1.234,56`) or English
 * (`1,234.56`) separators into `[sign, integer digits, fraction digits]`.
 *
 * With both separators present, the last one is the decimal mark. A lone
 * comma is a decimal mark; a lone dot followed by exactly three digits is a
 * thousands separator.
 */
export function splitDecimal(text: string): [string, string, string] | null {
  const match = text.match(/^([+-]?)(\d[\d.,]*)$/);
  if (!match) {
    return null;
  }
  const [, sign, body] = match;
  const commas = body.split(',').length - 1;
  const dots = body.split('.').length - 1;

  let decimalMark: ',' | '.' | null = null;
  if (commas > 0 && dots > 0) {
    decimalMark = body.lastIndexOf(',') > body.lastIndexOf('.') ? ',' : '.';
  } else if (commas === 1) {
    decimalMark = ',';
  } else if (dots === 1 && !/^\d{1,3}\.\d{3}$/.test(body)) {
    decimalMark = '.';
  }

  let intPart = body;
  let fracPart = '';
  if (decimalMark !== null) {
    const index = body.lastIndexOf(decimalMark);
    intPart = body.slice(0, index);
    fracPart = body.slice(index + 1);
  }

  const thousandsMark = decimalMark === '.' ? ',' : decimalMark === ',' ? '.' : commas > 0 ? ',' : '.';
  if (intPart.includes(thousandsMark) && !validGrouping(intPart, thousandsMark)) {
    return null;
  }
  const integer = intPart.split(thousandsMark).join('');
  if (!/^\d+$/.test(integer) || !/^\d*$/.test(fracPart)) {
    return null;
  }
  return [sign, integer, fracPart];
}

/**
 * Round `[sign, integer, fraction]` half-up to a two-decimal fixed-point
 * string.
 */
function toFixedPoint(sign: string, integer: string, fraction: string): string {
  const padded = (fraction + '000').slice(0, 3);
  let cents = BigInt(integer) * 100n + BigInt(padded.slice(0, 2));
  if (Number(padded[2]) >= 5) {
    cents += 1n;
  }
  const whole = cents / 100n;
  const rest = (cents % 100n).toString().padStart(2, '0');
  return `${cents === 0n ? '' : sign}${whole.toString()}.${rest}`;
}

/**
 * Parse one monetary value into a two-decimal fixed-point string, rounding
 * half-up. Strings may carry a currency symbol, code or word; EUR otherwise.
 */
export function parseAmount(value: unknown, currencyHint?: unknown): FinancialAmount | null {
  let currency = typeof currencyHint === 'string' && /^[A-Za-z]{3}$/.test(currencyHint.trim())
    ? currencyHint.trim().toUpperCase()
    : null;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    const text = Math.abs(value) < 1e21 ? value.toFixed(10).replace(/0+$/, '') : null;
    if (text === null) {
      return null;
    }
    const [integer, fraction] = text.replace('-', '').split('.');
    return { amount: toFixedPoint(value < 0 ? '-' : '', integer, fraction ?? ''), currency: currency ?? 'EUR' };
  }

  if (typeof value !== 'string') {
    return null;
  }

  let text = value.normalize('NFC').trim();
  for (const [symbol, code] of Object.entries(CURRENCY_SYMBOLS)) {
    if (text.includes(symbol)) {
      currency = currency ?? code;
      text = text.split(symbol).join('');
    }
  }
  const codeMatch = text.match(/\b([A-Z]{3})\b/);
  if (codeMatch && codeMatch[1] !== 'EUR') {
    currency = currency ?? codeMatch[1];
    text = text.replace(codeMatch[0], '');
  }
  if (CURRENCY_WORD.test(text)) {
    currency = currency ?? 'EUR';
    text = text.replace(CURRENCY_WORD, '');
  }
  text = text.replace(/[\s']/g, '');

  const parts = splitDecimal(text);
  if (!parts) {
    return null;
  }
  return { amount: toFixedPoint(...parts), currency: currency ?? 'EUR' };
}

/**
 * Walk an envelope subtree collecting `{ amount, currency }` objects.
 * Returns the parsed amounts and how many candidates could not be parsed.
 */
export function collectAmounts(value: unknown, depth = 0): { amounts: FinancialAmount[]; unparsable: number } {
  const amounts: FinancialAmount[] = [];
  let unparsable = 0;
  if (depth > 4 || isAbsent(value)) {
    return { amounts, unparsable };
  }

  if (isRecord(value) && 'amount' in value) {
    const amount = parseAmount(value.amount, value.currency);
    if (amount) {
      amounts.push(amount);
    } else if (!isAbsent(value.amount) && value.amount !== '') {
      unparsable += 1;
    }
    return { amounts, unparsable };
  }

  const children = Array.isArray(value) ? value : isRecord(value) ? Object.values(value) : [];
  for (const child of children) {
    const nested = collectAmounts(child, depth + 1);
    amounts.push(...nested.amounts);
    unparsable += nested.unparsable;
  }
  return { amounts, unparsable };
}

// ============================================================================
// Tags
// ============================================================================

/**
 * Merge tag sources, trimmed, deduplicated and sorted by code point so the
 * order is independent of the host's collation data.
 */
export function normalizeTags(...sources: unknown[]): FieldResult<string[]> {
  if (sources.every(isAbsent)) {
    return { value: [], status: 'missing' };
  }
  const tags = new Set<string>();
  let invalid = false;
  for (const source of sources) {
    if (isAbsent(source)) continue;
    const parsed = parseStringList(source);
    parsed.value.forEach((tag) => tags.add(tag));
    invalid = invalid || parsed.status === 'invalid';
  }
  const sorted = [...tags].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  if (sorted.length > 0) {
    return { value: sorted, status: 'present' };
  }
  return { value: [], status: invalid ? 'invalid' : 'empty' };
}
