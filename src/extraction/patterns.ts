/**
 * Shared pattern helpers for the regex extractors
 */

import type { Tally, VoteOutcome } from '../types/index.js';
import { EMPTY_TALLY, VOTE_OUTCOMES } from '../types/index.js';

/** Hyphen, en dash and em dash as written by minute-takers and OCR */
export const DASH = '[-\\u2013\\u2014]';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex alternation of role titles, longest first, whitespace-tolerant
 */
export function titleAlternation(titleTokens: readonly string[]): string {
  return [...titleTokens]
    .sort((a, b) => b.length - a.length)
    .map((title) => title.trim().split(/\s+/).map(escapeRegExp).join('\\s+'))
    .join('|');
}

// ============================================================================
// Item Lists
// ============================================================================

/** "10", "10, 11 and 14", "10 & 12", "10 through 12", "10-12" */
export const ITEM_LIST = `\\d+(?:\\s*(?:,|&|\\band\\b|\\bthrough\\b|\\bthru\\b|\\bto\\b|${DASH})\\s*(?:and\\s+)?\\d+)*`;

const MAX_LIST_RANGE = 500;

export function parseItemList(list: string): number[] {
  const numbers: number[] = [];
  const normalized = list.replace(/\b(?:through|thru|to)\b|[\u2013\u2014]/gi, '-');

  for (const part of normalized.split(/,|&|\band\b/i)) {
    const trimmed = part.trim();
    const range = /^(\d+)\s*-\s*(\d+)$/.exec(trimmed);
    if (range) {
      const low = Math.min(Number(range[1]), Number(range[2]));
      const high = Math.min(Math.max(Number(range[1]), Number(range[2])), low + MAX_LIST_RANGE);
      for (let n = low; n <= high; n++) numbers.push(n);
      continue;
    }
    if (/^\d+$/.test(trimmed)) numbers.push(Number(trimmed));
  }
  return numbers;
}

// ============================================================================
// Tallies
// ============================================================================

export interface TallyMatch {
  readonly tally: Tally;
  readonly status?: VoteOutcome;
  readonly index: number;
  readonly end: number;
}

const STATUS_LINE = new RegExp(
  `Status:\\s*(\\d+)\\s*${DASH}\\s*(\\d+)\\s*${DASH}\\s*(\\d+)\\s*${DASH}\\s*(\\d+)` +
    `(?:\\s*${DASH}\\s*(\\d+))?(?:\\s*${DASH}?\\s*(Pass|Fail|Tie|Continued))?`,
  'i'
);

const RESULT_WORDING = new RegExp(
  `\\b(?:carried|failed|passed|approved)\\b[^.\\d]{0,40}?(\\d{1,2})\\s*${DASH}\\s*(\\d{1,2})` +
    `(?:\\s*${DASH}\\s*(\\d{1,2}))?(?:\\s*${DASH}\\s*(\\d{1,2}))?`,
  'i'
);

const BARE_TALLY = new RegExp(
  `(?<![\\d\\-\\u2013\\u2014])(\\d{1,2})\\s*${DASH}\\s*(\\d{1,2})` +
    `(?:\\s*${DASH}\\s*(\\d{1,2}))?(?:\\s*${DASH}\\s*(\\d{1,2}))?(?![\\d\\-\\u2013\\u2014])`
);

function count(value: string | undefined): number {
  return value === undefined ? 0 : Number(value);
}

export function toOutcome(word: string | undefined): VoteOutcome | undefined {
  if (!word) return undefined;
  const normalized = word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
  return VOTE_OUTCOMES.find((outcome) => outcome === normalized);
}

/**
 * A "Status: a-b-c-d[-e] Word" line anywhere in the text
 */
export function findStatusLine(text: string): TallyMatch | null {
  const match = STATUS_LINE.exec(text);
  if (!match) return null;
  return {
    tally: {
      ayes: count(match[1]),
      noes: count(match[2]),
      abstain: count(match[3]),
      absent: count(match[4]),
      recusal: count(match[5]),
    },
    status: toOutcome(match[6]),
    index: match.index,
    end: match.index + match[0].length,
  };
}

/**
 * First vote result in the text: a status line, then result wording
 * ("carried 7-0"), then a bare "a-b" count.
 */
export function findTally(text: string): TallyMatch | null {
  const status = findStatusLine(text);
  if (status) return status;

  for (const pattern of [RESULT_WORDING, BARE_TALLY]) {
    const match = pattern.exec(text);
    if (!match) continue;
    return {
      tally: {
        ...EMPTY_TALLY,
        ayes: count(match[1]),
        noes: count(match[2]),
        abstain: count(match[3]),
        absent: count(match[4]),
      },
      index: match.index,
      end: match.index + match[0].length,
    };
  }
  return null;
}

export function outcomeFromTally(tally: Tally): VoteOutcome {
  return tally.ayes > tally.noes ? 'Pass' : 'Fail';
}

// ============================================================================
// Motion Participants
// ============================================================================

export interface MotionParticipants {
  readonly mover?: string;
  readonly seconder?: string;
}

const NAME = "[A-Za-z'\\u00C0-\\u024F-]+";

/**
 * Raw mover and seconder phrases ("Councilmember Phan moved", "seconded by
 * Mayor Amezcua"). Names still carry their titles; normalize before use.
 */
export function findMotionParticipants(text: string, titleTokens: readonly string[]): MotionParticipants {
  const titles = titleAlternation(titleTokens);
  const mover = new RegExp(`((?:${titles})\\s+${NAME})\\s*,?\\s+(?:moved|made\\s+(?:a|the)\\s+motion)\\b`, 'i').exec(text);
  const seconder = new RegExp(`(?:seconded\\s+by|second(?:ed)?\\s*:)\\s*((?:(?:${titles})\\s+)?${NAME})`, 'i').exec(text);
  return {
    mover: mover?.[1],
    seconder: seconder?.[1],
  };
}

export interface RecusalMention {
  readonly rawName: string;
  readonly titled: boolean;
  readonly items: number[];
}

/**
 * Narrative recusals ("Councilmember Lopez recused herself from Item No. 9")
 */
export function findRecusals(text: string, titleTokens: readonly string[]): RecusalMention[] {
  const titles = titleAlternation(titleTokens);
  const pattern = new RegExp(
    `((?:(?:${titles})\\s+)?${NAME})\\s+recused\\b(?!\\s*:)[^.\\n]*?(?:Items?\\s+(?:Nos?\\.?\\s*)?(${ITEM_LIST}))?(?=[.\\n]|$)`,
    'gi'
  );
  const titleOnly = new RegExp(`^(?:${titles})\\s+`, 'i');

  const mentions: RecusalMention[] = [];
  for (const match of text.matchAll(pattern)) {
    const rawName = match[1];
    if (!rawName) continue;
    mentions.push({
      rawName,
      titled: titleOnly.test(rawName),
      items: match[2] ? parseItemList(match[2]) : [],
    });
  }
  return mentions;
}
