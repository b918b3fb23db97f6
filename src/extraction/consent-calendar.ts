/**
 * Consent-Calendar Extractor
 *
 * ARCHITECTURE: Ordered chain of pattern strategies
 * Pattern: The first strategy that finds anything wins; all of its matches
 * are used (a meeting may hold more than one consent calendar)
 *
 * A consent motion approves a range of items minus an exception list with a
 * single shared tally:
 *   "moved to approve Consent Calendar Item Nos. 8 through 12 with the
 *    exception of Item No. 10 ... The motion carried, 7-0."
 * yields items 8, 9, 11 and 12, each Pass 7-0.
 */

import type { Tally, VoteOutcome, VoteRecord } from '../types/index.js';
import { EMPTY_TALLY } from '../types/index.js';
import type { MemberNameNormalizer } from '../normalize/member-names.js';
import { createDebugLog } from '../logging.js';
import { squashWhitespace } from './preprocess.js';
import {
  DASH,
  ITEM_LIST,
  findMotionParticipants,
  findRecusals,
  findTally,
  outcomeFromTally,
  parseItemList,
} from './patterns.js';

const log = createDebugLog('consent');

export const MAX_CONSENT_RANGE = 200;
const MOTION_WINDOW = 800;
const MOTION_LOOKBACK = 300;

// ============================================================================
// Strategy Types
// ============================================================================

export interface ConsentRangeMatch {
  readonly start: number;
  readonly end: number;
  /** Offset of the match in the searched text */
  readonly index: number;
  /** Offset just past the matched motion phrase */
  readonly rangeEnd: number;
}

export interface ConsentPatternStrategy {
  readonly name: string;
  find(text: string): ConsentRangeMatch[];
}

export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * Strategy backed by a global regex with named groups `start` and `end`
 */
export class RegexConsentStrategy implements ConsentPatternStrategy {
  private readonly source: string;
  private readonly flags: string;

  constructor(readonly name: string, pattern: RegExp) {
    this.source = pattern.source;
    this.flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  }

  find(text: string): ConsentRangeMatch[] {
    const matches: ConsentRangeMatch[] = [];
    for (const match of text.matchAll(new RegExp(this.source, this.flags))) {
      const start = match.groups?.['start'];
      const end = match.groups?.['end'];
      if (start === undefined || end === undefined) continue;
      matches.push({
        start: Number(start),
        end: Number(end),
        index: match.index ?? 0,
        rangeEnd: (match.index ?? 0) + match[0].length,
      });
    }
    return matches;
  }
}

const ITEM_NOS = 'Items?(?:\\s+Nos?\\.?)?';
const RANGE = `(?<start>\\d+)\\s*(?:through|thru|to|${DASH})\\s*(?<end>\\d+)`;

export const DEFAULT_CONSENT_STRATEGIES: readonly ConsentPatternStrategy[] = [
  new RegexConsentStrategy(
    'moved_to_approve_item_range',
    new RegExp(`moved\\s+to\\s+approve\\b[\\s\\S]{0,120}?Consent\\s+Calendar\\s+${ITEM_NOS}\\s*${RANGE}`, 'gi')
  ),
  new RegexConsentStrategy(
    'calendar_items_then_motion',
    new RegExp(`Consent\\s+Calendar\\s+${ITEM_NOS}\\s*:?\\s*${RANGE}[\\s\\S]{0,400}?moved\\s+to\\s+approve`, 'gi')
  ),
  new RegexConsentStrategy(
    'approve_items_on_consent_calendar',
    new RegExp(`approve\\s+${ITEM_NOS}\\s*${RANGE}\\s+(?:on|of)\\s+the\\s+Consent\\s+Calendar`, 'gi')
  ),
];

// ============================================================================
// Exception Clauses
// ============================================================================

const EXCEPTION_CLAUSES: readonly RegExp[] = [
  new RegExp(
    `(?:with\\s+the\\s+exception\\s+of|except(?:ing)?(?:\\s+for)?|excluding)\\s+(?:Consent\\s+Calendar\\s+)?${ITEM_NOS}\\s*(?<list>${ITEM_LIST})`,
    'gi'
  ),
  new RegExp(
    `(?:removed|pulled)\\s+(?:from\\s+the\\s+Consent\\s+Calendar\\s+)?(?:for\\s+(?:separate\\s+)?discussion\\s+)?${ITEM_NOS}\\s*(?<list>${ITEM_LIST})`,
    'gi'
  ),
  new RegExp(`${ITEM_NOS}\\s*(?<list>${ITEM_LIST})\\s+(?:was|were)\\s+(?:removed|pulled)`, 'gi'),
];

/** ", 7-0" closing an exception list is the motion's count, not a range of items */
const TRAILING_COUNT = new RegExp(`\\s*,\\s*(\\d+)\\s*${DASH}\\s*(\\d+)(?:\\s*${DASH}\\s*\\d+)*$`);

interface ExceptionClauses {
  readonly items: Set<number>;
  readonly spans: TextSpan[];
}

function withoutTrailingCount(list: string, range: ConsentRangeMatch): string {
  const count = TRAILING_COUNT.exec(list);
  if (!count) return list;
  const low = Number(count[1]);
  const high = Number(count[2]);
  return low <= high && low >= range.start && high <= range.end ? list : list.slice(0, count.index);
}

function findExceptions(window: string, range: ConsentRangeMatch): ExceptionClauses {
  const items = new Set<number>();
  const spans: TextSpan[] = [];
  for (const pattern of EXCEPTION_CLAUSES) {
    for (const match of window.matchAll(pattern)) {
      const list = match.groups?.['list'];
      if (!list) continue;
      const start = match.index ?? 0;
      let end = start + match[0].length;
      let kept = list;
      if (match[0].endsWith(list)) {
        kept = withoutTrailingCount(list, range);
        end -= list.length - kept.length;
      }
      for (const n of parseItemList(kept)) items.add(n);
      spans.push({ start, end });
    }
  }
  return { items, spans };
}

/**
 * Text after the motion range with exception clauses blanked, so their item
 * numbers are never read as a count
 */
function tallySearchText(motion: string, from: number, clauses: readonly TextSpan[]): string {
  let text = motion;
  for (const clause of clauses) {
    text = text.slice(0, clause.start) + ' '.repeat(clause.end - clause.start) + text.slice(clause.end);
  }
  return text.slice(from);
}

// ============================================================================
// Extraction
// ============================================================================

export interface ConsentExtraction {
  readonly votes: VoteRecord[];
  readonly notes: string[];
  readonly matchedPattern: string | null;
  /** Strategies tried without a match before the winner (or all of them) */
  readonly missedPatterns: string[];
  readonly spans: TextSpan[];
}

export interface ConsentExtractorOptions {
  readonly normalizer: MemberNameNormalizer;
  readonly titleTokens: readonly string[];
  readonly strategies?: readonly ConsentPatternStrategy[];
}

/**
 * The motion window closes at the next motion label or numbered item heading
 */
function windowEnd(text: string, from: number): number {
  const limit = Math.min(text.length, from + MOTION_WINDOW);
  const next = /\bMOTION:|\n[ \t]*\d+\.[ \t]+\S/g;
  next.lastIndex = from;
  const hit = next.exec(text);
  return hit && hit.index < limit ? hit.index : limit;
}

/**
 * Start of the motion sentence that contains `index`: just past the nearest
 * preceding "MOTION:" label or paragraph break.
 */
function motionStart(text: string, index: number): number {
  const from = Math.max(0, index - MOTION_LOOKBACK);
  let start = from;
  for (const match of text.slice(from, index).matchAll(/MOTION:\s*|\n\s*\n/g)) {
    start = from + (match.index ?? 0) + match[0].length;
  }
  return start;
}

function normalizedName(normalizer: MemberNameNormalizer, raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  return normalizer.normalize(raw)?.name;
}

export function extractConsentCalendar(text: string, options: ConsentExtractorOptions): ConsentExtraction {
  const strategies = options.strategies ?? DEFAULT_CONSENT_STRATEGIES;
  const missedPatterns: string[] = [];

  let matchedPattern: string | null = null;
  let matches: ConsentRangeMatch[] = [];
  for (const strategy of strategies) {
    matches = strategy.find(text);
    if (matches.length > 0) {
      matchedPattern = strategy.name;
      break;
    }
    missedPatterns.push(strategy.name);
  }

  const votes: VoteRecord[] = [];
  const notes: string[] = [];
  const spans: TextSpan[] = [];

  if (!matchedPattern) {
    log('No consent calendar motion found', { tried: missedPatterns.length });
    return { votes, notes, matchedPattern, missedPatterns, spans };
  }

  for (const match of matches) {
    if (match.start > match.end || match.end - match.start + 1 > MAX_CONSENT_RANGE) {
      notes.push(`Consent calendar range ${match.start}-${match.end} rejected as implausible`);
      continue;
    }

    const start = motionStart(text, match.index);
    const end = windowEnd(text, match.rangeEnd);
    spans.push({ start, end });

    const motion = text.slice(start, end);
    const rangeOffset = match.rangeEnd - start;
    const exceptions = findExceptions(motion, match);
    const tallyMatch = findTally(tallySearchText(motion, rangeOffset, exceptions.spans));

    let tally: Tally = EMPTY_TALLY;
    let outcome: VoteOutcome;
    const recordNotes: string[] = [];
    if (tallyMatch) {
      tally = tallyMatch.tally;
      outcome = tallyMatch.status ?? outcomeFromTally(tally);
    } else {
      outcome = /\b(?:failed|denied)\b/i.test(motion) ? 'Fail' : 'Pass';
      recordNotes.push('No tally found for consent calendar motion; outcome taken from motion wording');
    }

    const participants = findMotionParticipants(motion, options.titleTokens);
    const mover = normalizedName(options.normalizer, participants.mover);
    const seconder = normalizedName(options.normalizer, participants.seconder);

    const approved: number[] = [];
    for (let n = match.start; n <= match.end; n++) {
      if (!exceptions.items.has(n)) approved.push(n);
    }

    // Recusals annotate records; the shared tally is left as recorded
    const recusalNotes = new Map<number, string[]>();
    for (const recusal of findRecusals(motion, options.titleTokens)) {
      const name = options.normalizer.normalize(recusal.rawName)?.name ?? recusal.rawName;
      const targets = recusal.items.length > 0 ? recusal.items.filter((n) => approved.includes(n)) : approved;
      for (const n of targets) {
        recusalNotes.set(n, [...(recusalNotes.get(n) ?? []), `${name} recused; shared consent tally left unchanged`]);
      }
    }

    log('Consent motion parsed', {
      pattern: matchedPattern,
      range: `${match.start}-${match.end}`,
      exceptions: [...exceptions.items].sort((a, b) => a - b).join(','),
      tally: `${tally.ayes}-${tally.noes}-${tally.abstain}-${tally.absent}`,
    });

    const motionText = squashWhitespace(motion);
    for (const n of approved) {
      votes.push({
        agenda_item_number: String(n),
        agenda_item_title: `Agenda Item ${n}`,
        outcome,
        tally,
        member_votes: {},
        motion_text: motionText,
        mover,
        seconder,
        source_section: 'consent_calendar',
        validation_notes: [
          `Approved on consent calendar (${matchedPattern})`,
          ...recordNotes,
          ...(recusalNotes.get(n) ?? []),
        ],
      });
    }
  }

  return { votes, notes, matchedPattern, missedPatterns, spans };
}
