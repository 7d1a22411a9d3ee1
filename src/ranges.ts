import { RangeParseError, UnsupportedLanguageError } from './errors.js';
import {
  ALWAYS_INCLUDED_GROUPS,
  BMP_LIMIT,
  LANGUAGE_RANGES,
  RANGE_GROUPS,
  type LanguageCode,
  type RangeGroupName,
} from './unicode-ranges.js';
import type { Interval, PartitionedRanges } from './types.js';

const INTERVAL_PATTERN = /^0x([0-9a-f]+)-0x([0-9a-f]+)$/i;
const MAX_START = 0xFFFFFFFF;

export function isSupportedLanguage(language: string): language is LanguageCode {
  return Object.hasOwn(LANGUAGE_RANGES, language);
}

/** Supported language codes, in table order */
export function supportedLanguages(): LanguageCode[] {
  return Object.keys(LANGUAGE_RANGES).filter(isSupportedLanguage);
}

/**
 * Parse one "0xSTART-0xEND" token. The returned interval keeps the token
 * (trimmed) so callers can emit it unchanged.
 */
export function parseInterval(token: string): Interval {
  const trimmed = token.trim();
  const match = INTERVAL_PATTERN.exec(trimmed);
  if (!match) {
    throw new RangeParseError(token, 'expected 0xSTART-0xEND');
  }

  const start = parseInt(match[1]!, 16);
  const end = parseInt(match[2]!, 16);
  if (start > MAX_START) {
    throw new RangeParseError(token, 'start does not fit in 32 bits');
  }
  if (start > end) {
    throw new RangeParseError(token, 'start is greater than end');
  }

  return { start, end, token: trimmed };
}

/** Parse a comma-joined range list. The empty string is an empty list. */
export function parseIntervalList(list: string): Interval[] {
  if (list.trim() === '') return [];
  return list.split(',').map(parseInterval);
}

/**
 * The deduplicated group labels for a language: the always-included groups
 * first, then the language's own, in table order.
 */
export function selectRangeGroups(language: string): RangeGroupName[] {
  if (!isSupportedLanguage(language)) {
    throw new UnsupportedLanguageError(language);
  }

  const selected = new Set<RangeGroupName>(ALWAYS_INCLUDED_GROUPS);
  for (const group of LANGUAGE_RANGES[language]) {
    selected.add(group);
  }
  return [...selected];
}

function joinSorted(intervals: Interval[]): string {
  return intervals
    .sort((a, b) => a.start - b.start)
    .map(i => i.token)
    .join(',');
}

/**
 * Resolve a language to the ranges lv_font_conv should take from each font.
 *
 * Intervals are split by start code point at BMP_LIMIT (no group crosses it),
 * each side sorted ascending by start, and emitted as their original tokens.
 * Throws UnsupportedLanguageError before doing any work for unknown languages.
 */
export function resolveRanges(language: string): PartitionedRanges {
  const low: Interval[] = [];
  const high: Interval[] = [];

  for (const group of selectRangeGroups(language)) {
    for (const interval of parseIntervalList(RANGE_GROUPS[group])) {
      if (interval.start >= BMP_LIMIT) {
        high.push(interval);
      } else {
        low.push(interval);
      }
    }
  }

  return { low: joinSorted(low), high: joinSorted(high) };
}
