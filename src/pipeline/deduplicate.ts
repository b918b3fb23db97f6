import type { VoteRecord } from '../types/index.js';

export interface DedupOutcome {
  readonly votes: VoteRecord[];
  readonly discarded: number;
}

/**
 * First record per agenda item number wins; order is preserved.
 */
export function deduplicateVotes(votes: readonly VoteRecord[]): DedupOutcome {
  const seen = new Set<string>();
  const unique: VoteRecord[] = [];
  for (const vote of votes) {
    if (seen.has(vote.agenda_item_number)) continue;
    seen.add(vote.agenda_item_number);
    unique.push(vote);
  }
  return { votes: unique, discarded: votes.length - unique.length };
}
