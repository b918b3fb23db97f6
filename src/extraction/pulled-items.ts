/**
 * Pulled-Item Extractor
 *
 * Parses the individually recorded roll-call votes on items pulled from the
 * consent calendar (or heard separately). Two block shapes are recognised:
 *
 *   YES: 6 – Penaloza, Phan, ... NO: 0 ABSTAIN: 1 – Lopez Status: 6-0-1-0 Pass
 *
 *   The motion carried, 6-1, by the following roll call vote:
 *   AYES: ... NOES: ... ABSTAIN: ... ABSENT: ... RECUSED: ...
 *
 * Blocks inside a consent motion window belong to the consent calendar and
 * are skipped.
 */

import type { MemberVote, Tally, VoteOutcome, VoteRecord } from '../types/index.js';
import type { MemberNameNormalizer } from '../normalize/member-names.js';
import { createDebugLog } from '../logging.js';
import type { TextSpan } from './consent-calendar.js';
import { squashWhitespace } from './preprocess.js';
import {
  DASH,
  findMotionParticipants,
  findRecusals,
  findStatusLine,
  outcomeFromTally,
} from './patterns.js';

const log = createDebugLog('pulled');

const CONTEXT_LOOKBACK = 1500;
const BLOCK_LOOKBACK = 1200;
const ROLL_CALL_EXTENT = 600;

// ============================================================================
// Block Detection
// ============================================================================

interface RollCallBlock {
  readonly start: number;
  readonly end: number;
  /** Offset where the labelled member lists begin */
  readonly labelsStart: number;
  readonly labelsEnd: number;
  readonly declared?: Partial<Tally>;
  readonly verdict?: VoteOutcome;
}

const LABEL = /\b(AYES|YES|NOES|NAYS|NO|ABSTAIN(?:ED|S)?|ABSENT|RECUSED|RECUSAL)\s*:/gi;

const ROLL_CALL_HEADER = new RegExp(
  `\\bmotion\\s+(carried|failed|passed)\\s*,?\\s*` +
    `(?:(\\d{1,2})\\s*${DASH}\\s*(\\d{1,2})(?:\\s*${DASH}\\s*(\\d{1,2}))?(?:\\s*${DASH}\\s*(\\d{1,2}))?\\s*,?\\s*)?` +
    `by\\s+the\\s+following\\s+roll\\s+call\\s+vote\\s*:?`,
  'gi'
);

const STATUS_START = /Status:\s*\d/gi;

function overlaps(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end;
}

function verdictOf(word: string | undefined): VoteOutcome | undefined {
  if (!word) return undefined;
  return /failed/i.test(word) ? 'Fail' : 'Pass';
}

function findRollCallBlocks(text: string): RollCallBlock[] {
  const blocks: RollCallBlock[] = [];
  for (const match of text.matchAll(ROLL_CALL_HEADER)) {
    const start = match.index ?? 0;
    const labelsStart = start + match[0].length;
    const rest = text.slice(labelsStart, labelsStart + ROLL_CALL_EXTENT);
    const paragraphEnd = /\n\s*\n/.exec(rest);
    const labelsEnd = labelsStart + (paragraphEnd ? paragraphEnd.index : rest.length);
    blocks.push({
      start,
      end: labelsEnd,
      labelsStart,
      labelsEnd,
      declared:
        match[2] !== undefined && match[3] !== undefined
          ? {
              ayes: Number(match[2]),
              noes: Number(match[3]),
              abstain: match[4] === undefined ? undefined : Number(match[4]),
              absent: match[5] === undefined ? undefined : Number(match[5]),
            }
          : undefined,
      verdict: verdictOf(match[1]),
    });
  }
  return blocks;
}

function findStatusBlocks(text: string, taken: readonly TextSpan[]): RollCallBlock[] {
  const blocks: RollCallBlock[] = [];
  let previousEnd = 0;
  for (const match of text.matchAll(STATUS_START)) {
    const statusIndex = match.index ?? 0;
    const status = findStatusLine(text.slice(statusIndex));
    if (!status) continue;
    const end = statusIndex + status.end;

    // The block opens at the last YES/AYES label before the status line
    const from = Math.max(previousEnd, statusIndex - BLOCK_LOOKBACK);
    let labelsStart = statusIndex;
    for (const label of text.slice(from, statusIndex).matchAll(/\b(?:AYES|YES)\s*:/gi)) {
      labelsStart = from + (label.index ?? 0);
    }
    previousEnd = end;

    const block: TextSpan = { start: labelsStart, end };
    if (taken.some((span) => overlaps(span, block))) continue;
    blocks.push({ start: labelsStart, end, labelsStart, labelsEnd: statusIndex });
  }
  return blocks;
}

// ============================================================================
// Member Lists
// ============================================================================

const LABEL_VOTE: Readonly<Record<string, MemberVote>> = {
  AYES: 'Aye',
  YES: 'Aye',
  NOES: 'Nay',
  NAYS: 'Nay',
  NO: 'Nay',
  ABSTAIN: 'Abstain',
  ABSTAINED: 'Abstain',
  ABSTAINS: 'Abstain',
  ABSENT: 'Absent',
  RECUSED: 'Recusal',
  RECUSAL: 'Recusal',
};

const TALLY_KEY: Readonly<Record<MemberVote, keyof Tally>> = {
  Aye: 'ayes',
  Nay: 'noes',
  Abstain: 'abstain',
  Absent: 'absent',
  Recusal: 'recusal',
};

const EMPTY_NAME = /^(?:none|n\/a|[-\u2013\u2014]+)?$/i;

interface LabelSection {
  readonly vote: MemberVote;
  readonly declared?: number;
  readonly names: string[];
}

export function parseLabelSections(segment: string): LabelSection[] {
  const labels = [...segment.matchAll(LABEL)];
  return labels.flatMap((label, i) => {
    const vote = LABEL_VOTE[(label[1] ?? '').toUpperCase()];
    if (!vote) return [];
    const contentStart = (label.index ?? 0) + label[0].length;
    const contentEnd = labels[i + 1]?.index ?? segment.length;
    const content = segment.slice(contentStart, contentEnd).trim();

    const counted = new RegExp(`^(\\d+)\\s*(?:${DASH}|:)?\\s*([\\s\\S]*)$`).exec(content);
    const declared = counted?.[1] === undefined ? undefined : Number(counted[1]);
    const list = counted ? (counted[2] ?? '') : content;
    const names = list
      .split(/,|;|\band\b|\n/)
      .map((name) => name.trim().replace(/[.()]+$/g, '').trim())
      .filter((name) => !EMPTY_NAME.test(name));
    return [{ vote, declared, names }];
  });
}

// ============================================================================
// Item Context
// ============================================================================

interface ItemReference {
  readonly number: string;
  readonly title?: string;
  /** Offset of the reference within the searched context */
  readonly index: number;
}

const ITEM_REFERENCE = /\bItems?\s+(?:Nos?\.?\s*)?(\d+(?:\.\d+)?)\b/gi;
const ITEM_HEADING = /^\s*(\d+)\.\s+(\S[^\n]*)$/gm;

function lastItemReference(context: string): ItemReference | null {
  let best: ItemReference | null = null;
  for (const match of context.matchAll(ITEM_REFERENCE)) {
    const index = match.index ?? 0;
    if (match[1] && (!best || index >= best.index)) best = { number: match[1], index };
  }
  for (const match of context.matchAll(ITEM_HEADING)) {
    const index = match.index ?? 0;
    if (match[1] && (!best || index >= best.index)) {
      best = { number: match[1], title: squashWhitespace(match[2] ?? ''), index };
    }
  }
  return best;
}

function lastMotionText(context: string): string | undefined {
  let text: string | undefined;
  for (const match of context.matchAll(/MOTION:\s*([^\n]+(?:\n(?!\s*\n)[^\n]+)*)/g)) {
    text = squashWhitespace(match[1] ?? '');
  }
  return text;
}

// ============================================================================
// Extraction
// ============================================================================

export interface PulledItemExtraction {
  readonly votes: VoteRecord[];
  readonly notes: string[];
}

export interface PulledItemOptions {
  readonly normalizer: MemberNameNormalizer;
  readonly titleTokens: readonly string[];
  /** Consent motion windows; blocks inside them are skipped */
  readonly consentSpans?: readonly TextSpan[];
}

export function extractPulledItems(text: string, options: PulledItemOptions): PulledItemExtraction {
  const consentSpans = options.consentSpans ?? [];
  const rollCalls = findRollCallBlocks(text).filter(
    (block) => !consentSpans.some((span) => overlaps(span, block))
  );
  const statusBlocks = findStatusBlocks(text, [...consentSpans, ...rollCalls]);
  const blocks = [...rollCalls, ...statusBlocks].sort((a, b) => a.start - b.start);

  const votes: VoteRecord[] = [];
  const notes: string[] = [];
  let previousEnd = 0;

  for (const block of blocks) {
    const context = text.slice(Math.max(previousEnd, block.start - CONTEXT_LOOKBACK), block.start);
    const segment = text.slice(block.labelsStart, block.labelsEnd);
    const status = findStatusLine(text.slice(block.labelsStart, block.end));
    previousEnd = block.end;

    const memberVotes: Record<string, MemberVote> = {};
    const declared: Partial<Record<keyof Tally, number>> = {};
    const named: Record<keyof Tally, number> = { ayes: 0, noes: 0, abstain: 0, absent: 0, recusal: 0 };

    for (const section of parseLabelSections(segment)) {
      const key = TALLY_KEY[section.vote];
      if (section.declared !== undefined) declared[key] = section.declared;
      for (const raw of section.names) {
        const normalized = options.normalizer.normalize(raw);
        if (!normalized || memberVotes[normalized.name] !== undefined) continue;
        memberVotes[normalized.name] = section.vote;
        named[key] += 1;
      }
    }

    const reference = lastItemReference(context);
    // Motion details belong to the text after the item reference
    const itemContext = reference ? context.slice(reference.index) : context;

    for (const recusal of findRecusals(`${itemContext}\n${segment}`, options.titleTokens)) {
      const normalized = options.normalizer.normalize(recusal.rawName);
      if (!normalized || (!recusal.titled && normalized.match === 'unmatched')) continue;
      if (memberVotes[normalized.name] !== undefined) continue;
      memberVotes[normalized.name] = 'Recusal';
      named.recusal += 1;
    }

    const pick = (key: keyof Tally): number =>
      status?.tally[key] ?? declared[key] ?? block.declared?.[key] ?? named[key];
    const tally: Tally = {
      ayes: pick('ayes'),
      noes: pick('noes'),
      abstain: pick('abstain'),
      absent: pick('absent'),
      recusal: status && status.tally.recusal > 0 ? status.tally.recusal : (declared.recusal ?? named.recusal),
    };
    const outcome = status?.status ?? block.verdict ?? outcomeFromTally(tally);

    const recordNotes: string[] = [status ? 'Parsed from roll-call status line' : 'Parsed from roll-call vote'];
    if (!reference) recordNotes.push('No agenda item reference found before roll-call block');

    const participants = findMotionParticipants(itemContext, options.titleTokens);
    const itemNumber = reference?.number ?? 'Unknown';
    votes.push({
      agenda_item_number: itemNumber,
      agenda_item_title: reference?.title ?? `Agenda Item ${itemNumber}`,
      outcome,
      tally,
      member_votes: memberVotes,
      motion_text: lastMotionText(itemContext),
      mover: participants.mover ? options.normalizer.normalize(participants.mover)?.name : undefined,
      seconder: participants.seconder ? options.normalizer.normalize(participants.seconder)?.name : undefined,
      source_section: 'pulled',
      validation_notes: recordNotes,
    });

    log('Roll-call block parsed', {
      item: itemNumber,
      outcome,
      tally: `${tally.ayes}-${tally.noes}-${tally.abstain}-${tally.absent}-${tally.recusal}`,
      members: Object.keys(memberVotes).length,
    });
  }

  if (blocks.length === 0) notes.push('No roll-call blocks found');
  return { votes, notes };
}
