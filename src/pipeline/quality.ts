/**
 * Quality Validator
 *
 * Scores a vote set on internal consistency alone. Each vote earns:
 *   0.3  tally recorded
 *   0.3  purely numeric item number
 *   0.2  recognised outcome
 *   0.2  member votes agree with the tally (fraction of agreeing categories)
 * The set scores the mean; an empty set scores 0.
 *
 * An external baseline count is never treated as ground truth; it only
 * produces an informational note.
 */

import type { MemberVote, Tally, VoteRecord } from '../types/index.js';
import { VOTE_OUTCOMES } from '../types/index.js';

export const DEFAULT_QUALITY_THRESHOLD = 0.7;
export const FALLBACK_VOTE_WEIGHT = 0.85;

const WEIGHTS = {
  tally: 0.3,
  itemNumber: 0.3,
  outcome: 0.2,
  memberAgreement: 0.2,
} as const;

const TALLY_KEYS: readonly (keyof Tally)[] = ['ayes', 'noes', 'abstain', 'absent', 'recusal'];

const VOTE_KEY: Readonly<Record<MemberVote, keyof Tally>> = {
  Aye: 'ayes',
  Nay: 'noes',
  Abstain: 'abstain',
  Absent: 'absent',
  Recusal: 'recusal',
};

export interface QualityOptions {
  /** Active roster size; 0 disables the roster check */
  readonly rosterSize?: number;
  readonly manualBaselineCount?: number;
}

export interface QualityReport {
  readonly score: number;
  readonly notes: string[];
}

export function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function tallyTotal(tally: Tally): number {
  return TALLY_KEYS.reduce((sum, key) => sum + tally[key], 0);
}

function memberAgreement(vote: VoteRecord): { fraction: number; checked: number; agreeing: number } {
  const members = Object.values(vote.member_votes);
  if (members.length === 0) {
    return { fraction: vote.source_section === 'consent_calendar' ? 1 : 0, checked: 0, agreeing: 0 };
  }

  const counted: Record<keyof Tally, number> = { ayes: 0, noes: 0, abstain: 0, absent: 0, recusal: 0 };
  for (const member of members) counted[VOTE_KEY[member]] += 1;

  const checkedKeys = TALLY_KEYS.filter((key) => counted[key] > 0 || vote.tally[key] > 0);
  if (checkedKeys.length === 0) return { fraction: 1, checked: 0, agreeing: 0 };
  const agreeing = checkedKeys.filter((key) => counted[key] === vote.tally[key]).length;
  return { fraction: agreeing / checkedKeys.length, checked: checkedKeys.length, agreeing };
}

function scoreVote(vote: VoteRecord, options: QualityOptions, notes: string[]): number {
  const label = `Item ${vote.agenda_item_number}`;
  let score = 0;

  const total = tallyTotal(vote.tally);
  if (total > 0) score += WEIGHTS.tally;
  else notes.push(`${label}: no tally recorded`);

  if (/^\d+$/.test(vote.agenda_item_number)) score += WEIGHTS.itemNumber;
  else notes.push(`${label}: item number is not numeric`);

  if (VOTE_OUTCOMES.includes(vote.outcome)) score += WEIGHTS.outcome;
  else notes.push(`${label}: unrecognised outcome "${vote.outcome}"`);

  const agreement = memberAgreement(vote);
  score += WEIGHTS.memberAgreement * agreement.fraction;
  if (agreement.fraction < 1) {
    notes.push(
      agreement.checked === 0
        ? `${label}: no member votes recorded`
        : `${label}: member votes agree with tally in ${agreement.agreeing} of ${agreement.checked} categories`
    );
  }

  // Consistency checks that explain, without deducting
  if (total > 0 && vote.outcome === 'Pass' && vote.tally.noes > vote.tally.ayes) {
    notes.push(`${label}: outcome Pass contradicts tally ${vote.tally.ayes}-${vote.tally.noes}`);
  }
  if (total > 0 && vote.outcome === 'Fail' && vote.tally.ayes > vote.tally.noes) {
    notes.push(`${label}: outcome Fail contradicts tally ${vote.tally.ayes}-${vote.tally.noes}`);
  }
  const rosterSize = options.rosterSize ?? 0;
  if (rosterSize > 0 && Object.keys(vote.member_votes).length > rosterSize) {
    notes.push(`${label}: ${Object.keys(vote.member_votes).length} member votes exceed roster size ${rosterSize}`);
  }

  return score;
}

export function assessQuality(votes: readonly VoteRecord[], options: QualityOptions = {}): QualityReport {
  const notes: string[] = [];
  if (votes.length === 0) {
    notes.push('No votes extracted');
  }

  const total = votes.reduce((sum, vote) => sum + scoreVote(vote, options, notes), 0);
  const score = votes.length === 0 ? 0 : round(total / votes.length);

  if (options.manualBaselineCount !== undefined) {
    notes.push(`Manual baseline lists ${options.manualBaselineCount} votes; extracted ${votes.length} (informational)`);
  }

  return { score, notes };
}

export function needsFallback(score: number, threshold: number = DEFAULT_QUALITY_THRESHOLD): boolean {
  return score === 0 || score < threshold;
}

/**
 * Quality scaled by provenance: fallback votes weigh less than pattern matches.
 */
export function confidenceScore(
  qualityScore: number,
  votes: readonly VoteRecord[],
  fallbackItems: ReadonlySet<string>
): number {
  if (votes.length === 0) return 0;
  const weight =
    votes.reduce((sum, vote) => sum + (fallbackItems.has(vote.agenda_item_number) ? FALLBACK_VOTE_WEIGHT : 1), 0) /
    votes.length;
  return round(qualityScore * weight);
}
