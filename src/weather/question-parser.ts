import { CITY_ALIASES } from '../config';
import {
  ParsedEventTitle,
  TempBucket,
  TempUnit,
  UNBOUNDED_HIGH,
  UNBOUNDED_LOW,
} from '../types';

const EVENT_TITLE_PATTERN = /Highest temperature in (.+) on (.+)\?/i;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

// "°F" anywhere, or an F that is not part of a word ("41F", "41 F")
const FAHRENHEIT_MARKER = /°\s*F|(?<![A-Za-z])F(?![A-Za-z])/;

const NUM = '(-?\\d+(?:\\.\\d+)?)';
const DEGREES = '\\s*°?\\s*[CF]?';

export type BucketMatch =
  | { matched: true; bucket: TempBucket }
  | { matched: false };

export interface BucketMatcher {
  name: string;
  match(question: string, unit: TempUnit): BucketMatch;
}

function patternMatcher(
  name: string,
  pattern: RegExp,
  build: (values: number[]) => { min: number; max: number }
): BucketMatcher {
  return {
    name,
    match(question, unit) {
      const m = question.match(pattern);
      if (!m) return { matched: false };
      const values = m.slice(1).map(v => parseFloat(v));
      if (values.some(v => !Number.isFinite(v))) return { matched: false };
      const { min, max } = build(values);
      if (min > max) return { matched: false };
      return { matched: true, bucket: { min, max, unit } };
    },
  };
}

/**
 * Bucket phrasings, tried in order. The first match wins.
 */
export const BUCKET_MATCHERS: readonly BucketMatcher[] = [
  patternMatcher('or-below', new RegExp(`be ${NUM}${DEGREES} or below`), ([n]) => ({
    min: UNBOUNDED_LOW,
    max: n,
  })),
  patternMatcher('or-higher', new RegExp(`be ${NUM}${DEGREES} or higher`), ([n]) => ({
    min: n,
    max: UNBOUNDED_HIGH,
  })),
  patternMatcher('between', new RegExp(`be between ${NUM}\\s*-\\s*${NUM}${DEGREES}`), ([lo, hi]) => ({
    min: lo,
    max: hi,
  })),
];

export function detectUnit(text: string): TempUnit {
  return FAHRENHEIT_MARKER.test(text) ? 'F' : 'C';
}

/**
 * Parse the temperature range a market question asks about.
 * Handles "be 41°F or below", "be 52°F or higher" and "be between 42-43°F".
 */
export function parseBucketQuestion(
  question: string,
  matchers: readonly BucketMatcher[] = BUCKET_MATCHERS
): TempBucket | null {
  const unit = detectUnit(question);
  for (const matcher of matchers) {
    const result = matcher.match(question, unit);
    if (result.matched) return result.bucket;
  }
  return null;
}

export function bucketLabel(bucket: TempBucket): string {
  return `${bucket.min} to ${bucket.max} ${bucket.unit}`;
}

export function normalizeCity(city: string): string {
  const trimmed = city.trim();
  return CITY_ALIASES[trimmed.toUpperCase()] ?? trimmed;
}

/**
 * "January 14" in the year of `now`, as YYYY-MM-DD. Null for unknown months
 * and days the month does not have.
 */
export function parseMonthDay(text: string, now: Date = new Date()): string | null {
  const m = text.trim().match(/^([A-Za-z]+)\.?\s+(\d{1,2})$/);
  if (!m) return null;

  const month = MONTHS.indexOf(m[1].toLowerCase());
  if (month === -1) return null;

  const year = now.getFullYear();
  const day = parseInt(m[2], 10);
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) return null;

  return date.toISOString().split('T')[0];
}

/**
 * Parse "Highest temperature in {City} on {Month Day}?".
 */
export function parseEventTitle(title: string, now: Date = new Date()): ParsedEventTitle | null {
  const match = title.match(EVENT_TITLE_PATTERN);
  if (!match) return null;

  const date = parseMonthDay(match[2], now);
  if (!date) return null;

  return {
    city: normalizeCity(match[1]),
    date,
  };
}
