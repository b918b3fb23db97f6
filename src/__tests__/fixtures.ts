/**
 * Shared test data: a seven-member council and one meeting's documents.
 */

import type { LlmError, Result, RosterMember, VoteRecord } from '../types/index.js';
import { EMPTY_TALLY, Ok } from '../types/index.js';
import type { LlmProvider } from '../llm/ollama-client.js';

export const ROSTER: RosterMember[] = [
  { name: 'Amezcua' },
  { name: 'Bacerra' },
  { name: 'Hernandez' },
  { name: 'Lopez' },
  { name: 'Penaloza' },
  { name: 'Phan' },
  { name: 'Vazquez' },
];

export const AGENDA = [
  'CITY COUNCIL REGULAR MEETING AGENDA',
  '',
  '8. Purchase of Fleet Vehicles',
  '9. Agreement with Orange County Transit',
  '10. Contract with ABC Paving for Street Repairs',
  '11. Second Reading of Ordinance on Parking',
  '12. Lease Agreement for Library Annex',
].join('\n');

export const CONSENT_MOTION =
  'MOTION: Councilmember Phan moved to approve Consent Calendar Item Nos. 8 through 12 with the exception of ' +
  'Item No. 10, seconded by Councilmember Bacerra.\nThe motion carried, 7-0.';

export const PULLED_BLOCK =
  'YES: 6 – Penaloza, Phan, Bacerra, Hernandez, Amezcua, Vazquez NO: 0 ABSTAIN: 1 – Lopez Status: 6-0-1-0 Pass';

export const MINUTES = [
  CONSENT_MOTION,
  '',
  '10. Contract with ABC Paving for Street Repairs',
  'MOTION: Mayor Pro Tem Hernandez moved to approve the contract, seconded by Councilmember Penaloza.',
  PULLED_BLOCK,
].join('\n');

/**
 * LlmProvider that answers every prompt with the same result and records prompts
 */
export function fakeProvider(response: Result<string, LlmError>): LlmProvider & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    name: 'fake',
    prompts,
    async generate(prompt: string): Promise<Result<string, LlmError>> {
      prompts.push(prompt);
      return response;
    },
  };
}

export function jsonProvider(body: unknown): LlmProvider & { prompts: string[] } {
  return fakeProvider(Ok(JSON.stringify(body)));
}

export function testDirName(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
}

/**
 * A consent-calendar record passed 7-0; override fields as needed
 */
export function voteRecord(item: string, overrides: Partial<VoteRecord> = {}): VoteRecord {
  return {
    agenda_item_number: item,
    agenda_item_title: `Agenda Item ${item}`,
    outcome: 'Pass',
    tally: { ...EMPTY_TALLY, ayes: 7 },
    member_votes: {},
    source_section: 'consent_calendar',
    validation_notes: [],
    ...overrides,
  };
}
