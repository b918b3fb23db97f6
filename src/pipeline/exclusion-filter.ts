/**
 * Exclusion Filter
 *
 * Policy step: removes records that are not council votes on numbered agenda
 * items (procedural items, minutes approvals, other legislative bodies).
 * Applies to every record regardless of where it came from.
 */

import type { ExclusionRules, VoteRecord } from '../types/index.js';
import { warn } from '../logging.js';

export const DEFAULT_EXCLUSION_RULES: ExclusionRules = {
  title_phrases: [
    'excused absence',
    'minutes approval',
    'approve minutes',
    'approval of minutes',
    'public comment',
    'written communication',
  ],
  title_prefixes: ['minutes'],
  other_body_number_patterns: ['^\\d{4}-\\d+$'],
};

export interface ExcludedVote {
  readonly vote: VoteRecord;
  readonly reason: string;
}

export interface FilterOutcome {
  readonly kept: VoteRecord[];
  readonly excluded: ExcludedVote[];
}

function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim().toLowerCase();
}

function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.flatMap((pattern) => {
    try {
      return [new RegExp(pattern)];
    } catch (error) {
      warn('filter', 'Ignoring invalid numbering pattern', { pattern, error: String(error) });
      return [];
    }
  });
}

/**
 * Why a record is excluded, or null when it stays
 */
export function exclusionReason(vote: VoteRecord, rules: ExclusionRules, numberPatterns?: readonly RegExp[]): string | null {
  const number = vote.agenda_item_number.trim();
  const patterns = numberPatterns ?? compilePatterns(rules.other_body_number_patterns);

  const otherBody = patterns.find((pattern) => pattern.test(number));
  if (otherBody) return `item number "${number}" matches other-body pattern ${otherBody.source}`;
  if (!/^\d+$/.test(number)) return `item number "${number}" is not numeric`;

  const title = normalizeTitle(vote.agenda_item_title);
  const phrase = rules.title_phrases.find((p) => title.includes(normalizeTitle(p)));
  if (phrase) return `title contains "${phrase}"`;

  const prefix = rules.title_prefixes.find((p) => title.startsWith(normalizeTitle(p)));
  if (prefix) return `title starts with "${prefix}"`;

  return null;
}

export function filterExcludedVotes(votes: readonly VoteRecord[], rules: ExclusionRules = DEFAULT_EXCLUSION_RULES): FilterOutcome {
  const patterns = compilePatterns(rules.other_body_number_patterns);
  const kept: VoteRecord[] = [];
  const excluded: ExcludedVote[] = [];

  for (const vote of votes) {
    const reason = exclusionReason(vote, rules, patterns);
    if (reason) excluded.push({ vote, reason });
    else kept.push(vote);
  }
  return { kept, excluded };
}
