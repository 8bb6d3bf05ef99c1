import type { NormalizedArticle, RawArticle } from './article.js';
import { MalformedDateError } from '../shared/errors.js';

/** Appwrite string attribute size for `content`, counted in characters. */
export const MAX_CONTENT_LENGTH = 50000;
const ELLIPSIS = '...';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// 2024-03-05T14:22:01.000+02:00, 2024-03-05 14:22, 2024-03-05
const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// 20240305T142201Z, 20240305T1422, 20240305
const BASIC_ISO_RE =
  /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(?:(\d{2})(?:[.,]\d+)?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// 2024/03/05 14:22:01, 2024/3/5,14:22
const SLASH_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:[ ,T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

// Tue, 05 Mar 2024 14:22:01 GMT, 5 March 2024 14:22 +0000
const RFC_RE =
  /^(?:[a-z]{3,9},?\s+)?(\d{1,2})\s+([a-z]{3,9})\.?\s+(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?(?:\s*(?:[a-z]{1,5}|[+-]\d{4}|[+-]\d{2}:\d{2}))?$/i;

// March 5, 2024 14:22, Tue, Mar. 5, 2024 2:22:01 PM EST
const US_RE =
  /^(?:[a-z]{3,9},?\s+)?([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([ap])\.?m\.?)?)?(?:\s*(?:[a-z]{1,5}|[+-]\d{4}|[+-]\d{2}:\d{2}))?$/i;

interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function toNumber(part: string | undefined): number {
  return part === undefined ? 0 : Number(part);
}

function monthIndex(name: string | undefined): number {
  return MONTHS.indexOf((name ?? '').slice(0, 3).toLowerCase()) + 1;
}

// 12-hour clock to 24-hour; an hour outside 1-12 with a meridiem fails validation.
function toHour(part: string | undefined, meridiem: string | undefined): number {
  const hour = toNumber(part);
  if (!meridiem) return hour;
  if (hour < 1 || hour > 12) return 24;
  const pm = meridiem.toLowerCase() === 'p';
  return (hour % 12) + (pm ? 12 : 0);
}

function matchDate(input: string): DateFields | null {
  const numeric = ISO_RE.exec(input) ?? BASIC_ISO_RE.exec(input) ?? SLASH_RE.exec(input);
  if (numeric) {
    return {
      year: toNumber(numeric[1]),
      month: toNumber(numeric[2]),
      day: toNumber(numeric[3]),
      hour: toNumber(numeric[4]),
      minute: toNumber(numeric[5]),
      second: toNumber(numeric[6]),
    };
  }

  const rfc = RFC_RE.exec(input);
  if (rfc) {
    const month = monthIndex(rfc[2]);
    if (month === 0) return null;
    return {
      year: toNumber(rfc[3]),
      month,
      day: toNumber(rfc[1]),
      hour: toNumber(rfc[4]),
      minute: toNumber(rfc[5]),
      second: toNumber(rfc[6]),
    };
  }

  const us = US_RE.exec(input);
  if (us) {
    const month = monthIndex(us[1]);
    if (month === 0) return null;
    return {
      year: toNumber(us[3]),
      month,
      day: toNumber(us[2]),
      hour: toHour(us[4], us[7]),
      minute: toNumber(us[5]),
      second: toNumber(us[6]),
    };
  }

  return null;
}

function isValid(f: DateFields): boolean {
  if (f.month < 1 || f.month > 12) return false;
  // Day 0 of the following month is the last day of this one.
  const daysInMonth = new Date(Date.UTC(f.year, f.month, 0)).getUTCDate();
  if (f.day < 1 || f.day > daysInMonth) return false;
  return f.hour < 24 && f.minute < 60 && f.second < 60;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Reformat a WordPress timestamp as `YYYY/MM/DD,HH:MM:SS`.
 *
 * The wall-clock fields are emitted exactly as written in the input. A zone
 * suffix (`Z`, `+02:00`, `GMT`) is accepted but never applied.
 */
export function formatDate(input: string): string {
  const fields = matchDate(input.trim());
  if (!fields || !isValid(fields)) {
    throw new MalformedDateError(input);
  }
  const { year, month, day, hour, minute, second } = fields;
  return `${pad(year, 4)}/${pad(month)}/${pad(day)},${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * Cap text at {@link MAX_CONTENT_LENGTH} characters, ending in `...` when cut.
 * Length is counted in code points so astral characters count once.
 */
export function truncateContent(text: string): string {
  const limit = MAX_CONTENT_LENGTH - ELLIPSIS.length;
  // Cheap exit: a string can't hold more code points than UTF-16 units.
  if (text.length <= limit) return text;

  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit).join('') + ELLIPSIS;
}

export function extractFeaturedImage(article: RawArticle): string | null {
  const media = article._embedded?.['wp:featuredmedia'];
  const url = media?.[0]?.source_url;
  return typeof url === 'string' && url.length > 0 ? url : null;
}

export function normalizeArticle(article: RawArticle): NormalizedArticle {
  return {
    wp_id: String(article.id),
    title: article.title.rendered,
    content: truncateContent(article.content.rendered),
    excerpt: article.excerpt.rendered,
    slug: article.slug,
    link: article.link,
    published_date: formatDate(article.date),
    modified_date: formatDate(article.modified),
    featured_image: extractFeaturedImage(article),
  };
}
