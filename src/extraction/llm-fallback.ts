/**
 * LLM Fallback Extractor
 *
 * ARCHITECTURE: Runs only when the pattern phase is empty or weak
 * Pattern: Never throws - every failure becomes a processing note and zero votes
 *
 * The model is asked for {"votes": [...]}; each entry is validated on its own
 * and either becomes a VoteRecord or a skip with a reason.
 */

import type { LlmError, MemberVote, Result, VoteRecord } from '../types/index.js';
import { Err, errorMessage } from '../types/index.js';
import type { LlmProvider } from '../llm/ollama-client.js';
import type { MemberNameNormalizer } from '../normalize/member-names.js';
import type { FallbackVote } from '../schemas.js';
import { fallbackVoteSchema } from '../schemas.js';
import { createDebugLog, warn } from '../logging.js';

const log = createDebugLog('fallback');

const MAX_MINUTES_CHARS = 12_000;
const MAX_AGENDA_CHARS = 4_000;

// ============================================================================
// Prompt
// ============================================================================

export interface FallbackPromptInput {
  readonly minutesText: string;
  readonly agendaText?: string;
  readonly rosterNames: readonly string[];
  readonly regexVoteCount: number;
}

function bounded(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n[... truncated ...]` : text;
}

export function buildFallbackPrompt(input: FallbackPromptInput): string {
  const roster = input.rosterNames.length > 0 ? input.rosterNames.join(', ') : '(not provided)';
  const sections = [
    'You extract council votes from meeting minutes.',
    '',
    'Return ONLY a JSON object of the form:',
    '{"votes":[{"item_number":"12","item_title":"...","outcome":"Pass|Fail|Tie|Continued",' +
      '"tally":{"ayes":0,"noes":0,"abstain":0,"absent":0,"recusal":0},' +
      '"member_votes":{"Surname":"Aye|Nay|Abstain|Absent|Recusal"},' +
      '"motion_text":"...","mover":"...","seconder":"...","section":"consent calendar|pulled|other"}]}',
    '',
    'Rules:',
    '- One entry per agenda item that was voted on.',
    '- item_number is the agenda item number as written.',
    '- Use member surnames only, without titles.',
    '- For consent calendar votes, emit one entry per approved item.',
    `- Pattern matching already found ${input.regexVoteCount} vote(s); include every vote you find.`,
    '',
    `Council members: ${roster}`,
  ];
  if (input.agendaText) {
    sections.push('', 'AGENDA:', bounded(input.agendaText, MAX_AGENDA_CHARS));
  }
  sections.push('', 'MINUTES:', bounded(input.minutesText, MAX_MINUTES_CHARS));
  return sections.join('\n');
}

// ============================================================================
// Response Parsing
// ============================================================================

export type CandidateResult = { readonly kind: 'ok'; readonly vote: FallbackVote } | { readonly kind: 'skip'; readonly reason: string };

export interface ParsedResponse {
  readonly candidates: CandidateResult[];
  readonly notes: string[];
}

function locateJson(raw: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = (fenced?.[1] ?? raw).trim();

  const starts = [body.indexOf('{'), body.indexOf('[')].filter((i) => i >= 0);
  if (starts.length === 0) return null;
  const start = Math.min(...starts);
  const end = Math.max(body.lastIndexOf('}'), body.lastIndexOf(']'));
  return end > start ? body.slice(start, end + 1) : null;
}

function voteEntries(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (typeof parsed === 'object' && parsed !== null && 'votes' in parsed && Array.isArray(parsed.votes)) {
    return parsed.votes;
  }
  return null;
}

export function parseFallbackResponse(raw: string): ParsedResponse {
  if (raw.trim().length === 0) {
    return { candidates: [], notes: ['Fallback returned an empty response'] };
  }

  const json = locateJson(raw);
  if (!json) {
    return { candidates: [], notes: ['Fallback response contained no JSON'] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    log('Fallback JSON parse failed', { error: String(error) });
    return { candidates: [], notes: ['Fallback response was not valid JSON'] };
  }

  const entries = voteEntries(parsed);
  if (!entries) {
    return { candidates: [], notes: ['Fallback response had no votes array'] };
  }

  const candidates = entries.map((entry, index): CandidateResult => {
    const result = fallbackVoteSchema.safeParse(entry);
    if (result.success) return { kind: 'ok', vote: result.data };
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'entry';
    return { kind: 'skip', reason: `Fallback entry ${index} skipped: ${where}: ${issue?.message ?? 'invalid'}` };
  });
  return { candidates, notes: [] };
}

// ============================================================================
// Conversion
// ============================================================================

function echoesConsentCalendar(vote: FallbackVote): boolean {
  return /consent/i.test(vote.section ?? '') || /consent\s+calendar/i.test(vote.motion_text ?? '');
}

export function toVoteRecord(vote: FallbackVote, normalizer: MemberNameNormalizer): VoteRecord {
  const memberVotes: Record<string, MemberVote> = {};
  for (const [raw, choice] of Object.entries(vote.member_votes)) {
    const normalized = normalizer.normalize(raw);
    if (normalized && memberVotes[normalized.name] === undefined) memberVotes[normalized.name] = choice;
  }

  const name = (raw: string | undefined): string | undefined => (raw ? normalizer.normalize(raw)?.name : undefined);

  return {
    agenda_item_number: vote.item_number,
    agenda_item_title: vote.item_title ?? `Agenda Item ${vote.item_number}`,
    outcome: vote.outcome,
    tally: vote.tally,
    member_votes: memberVotes,
    motion_text: vote.motion_text,
    mover: name(vote.mover),
    seconder: name(vote.seconder),
    source_section: echoesConsentCalendar(vote) ? 'consent_calendar' : 'other',
    validation_notes: ['Extracted by language model fallback'],
  };
}

// ============================================================================
// Runner
// ============================================================================

export interface FallbackRun {
  readonly votes: VoteRecord[];
  readonly notes: string[];
  readonly invoked: boolean;
}

export async function runLlmFallback(
  provider: LlmProvider | undefined,
  prompt: FallbackPromptInput,
  normalizer: MemberNameNormalizer
): Promise<FallbackRun> {
  if (!provider) {
    return { votes: [], notes: ['Fallback needed but no language model is configured'], invoked: false };
  }

  log('Invoking fallback', { provider: provider.name, regex_votes: prompt.regexVoteCount });
  let response: Result<string, LlmError>;
  try {
    response = await provider.generate(buildFallbackPrompt(prompt));
  } catch (error) {
    response = Err({ type: 'unknown', message: errorMessage(error) });
  }

  if (!response.ok) {
    if (response.error.type === 'empty_response') {
      return { votes: [], notes: ['Fallback returned an empty response'], invoked: true };
    }
    warn('fallback', 'Language model call failed', { type: response.error.type, error: response.error.message });
    return {
      votes: [],
      notes: [`Fallback failed (${response.error.type}): ${response.error.message}`],
      invoked: true,
    };
  }

  const parsed = parseFallbackResponse(response.value);
  const votes: VoteRecord[] = [];
  const notes = [...parsed.notes];
  for (const candidate of parsed.candidates) {
    if (candidate.kind === 'ok') votes.push(toVoteRecord(candidate.vote, normalizer));
    else notes.push(candidate.reason);
  }

  log('Fallback parsed', { votes: votes.length, skipped: parsed.candidates.length - votes.length });
  return { votes, notes, invoked: true };
}
