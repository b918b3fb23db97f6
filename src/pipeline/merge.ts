/**
 * Vote Merger
 *
 * Union of regex-phase votes (R) and fallback votes (L). R is authoritative:
 * its records keep their order and content, and an L record only enters the
 * result when R has nothing for that item number.
 */

import type { ExtractionMethod, VoteRecord } from '../types/index.js';

export interface MergeOutcome {
  readonly votes: VoteRecord[];
  /** Fallback records that were new to the regex phase */
  readonly added: number;
  readonly method: ExtractionMethod;
}

export function resolveMethod(regexCount: number, fallbackInvoked: boolean, added: number): ExtractionMethod {
  if (!fallbackInvoked) return 'regex';
  if (regexCount === 0) return added > 0 ? 'ai' : 'regex';
  return added > 0 ? 'hybrid' : 'regex';
}

export function mergeVotes(
  regexVotes: readonly VoteRecord[],
  fallbackVotes: readonly VoteRecord[],
  fallbackInvoked = fallbackVotes.length > 0
): MergeOutcome {
  const votes = [...regexVotes];
  const seen = new Set(regexVotes.map((vote) => vote.agenda_item_number));

  let added = 0;
  for (const vote of fallbackVotes) {
    if (seen.has(vote.agenda_item_number)) continue;
    seen.add(vote.agenda_item_number);
    votes.push(vote);
    added++;
  }

  return { votes, added, method: resolveMethod(regexVotes.length, fallbackInvoked, added) };
}
