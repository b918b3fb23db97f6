/**
 * Zod schemas for everything read from outside the process:
 * language-model output, the memory file, config and city profiles.
 *
 * Model output is validated one vote at a time so a single malformed entry
 * never discards the rest of a response.
 */

import { z } from 'zod';
import type { MemberVote, VoteOutcome } from './types/index.js';

// --- fallback vote candidates ---

const OUTCOME_WORDS: Readonly<Record<string, VoteOutcome>> = {
  pass: 'Pass',
  passed: 'Pass',
  carried: 'Pass',
  approved: 'Pass',
  adopted: 'Pass',
  fail: 'Fail',
  failed: 'Fail',
  denied: 'Fail',
  rejected: 'Fail',
  tie: 'Tie',
  tied: 'Tie',
  continued: 'Continued',
};

const MEMBER_VOTE_WORDS: Readonly<Record<string, MemberVote>> = {
  aye: 'Aye',
  yes: 'Aye',
  yea: 'Aye',
  nay: 'Nay',
  no: 'Nay',
  abstain: 'Abstain',
  abstained: 'Abstain',
  absent: 'Absent',
  recusal: 'Recusal',
  recused: 'Recusal',
};

function fromWords<T>(words: Readonly<Record<string, T>>) {
  return (value: unknown): unknown =>
    typeof value === 'string' ? (words[value.trim().toLowerCase()] ?? value) : value;
}

const outcomeSchema = z.preprocess(fromWords(OUTCOME_WORDS), z.enum(['Pass', 'Fail', 'Tie', 'Continued']));

const memberVoteSchema = z.preprocess(
  fromWords(MEMBER_VOTE_WORDS),
  z.enum(['Aye', 'Nay', 'Abstain', 'Absent', 'Recusal'])
);

const countSchema = z.number().int().nonnegative().max(99).default(0);

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .nullable()
  .transform((value) => (value ? value : undefined));

export const fallbackVoteSchema = z.object({
  item_number: z
    .union([z.string(), z.number().int().nonnegative()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1)),
  item_title: optionalText,
  outcome: outcomeSchema,
  tally: z
    .object({
      ayes: countSchema,
      noes: countSchema,
      abstain: countSchema,
      absent: countSchema,
      recusal: countSchema,
    })
    .default({}),
  member_votes: z.record(z.string(), memberVoteSchema).default({}),
  motion_text: optionalText,
  mover: optionalText,
  seconder: optionalText,
  section: optionalText,
});

export type FallbackVote = z.infer<typeof fallbackVoteSchema>;

// --- extraction-memory.json ---

export const extractionMemorySchema = z.object({
  successful_patterns: z.record(z.string(), z.number().int().nonnegative()).default({}),
  failed_patterns: z.record(z.string(), z.number().int().nonnegative()).default({}),
  member_name_corrections: z.record(z.string(), z.string()).default({}),
  agenda_item_patterns: z.array(z.string()).default([]),
  quality_history: z.array(z.number().min(0).max(1)).default([]),
  last_updated: z.string().default(''),
});

export const memoryDeltaSchema = z.object({
  pattern_hits: z.record(z.string(), z.number().int().nonnegative()),
  pattern_misses: z.record(z.string(), z.number().int().nonnegative()),
  name_corrections: z.record(z.string(), z.string()),
  agenda_item_patterns: z.array(z.string()),
  quality_scores: z.array(z.number().min(0).max(1)),
});

export const deltaJournalSchema = z.object({
  id: z.string().min(1),
  meeting_id: z.string().optional(),
  written_at: z.string(),
  delta: memoryDeltaSchema,
});

// --- config.json ---

export const globalConfigSchema = z
  .object({
    ollama_host: z.string().url(),
    ollama_model: z.string().min(1),
    llm_timeout_ms: z.number().int().positive(),
    quality_threshold: z.number().min(0).max(1),
    batch_concurrency: z.number().int().min(1).max(64),
  })
  .partial()
  .passthrough();

// --- profiles/*.yaml ---

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd');

const rosterMemberSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).optional(),
  term_start: isoDate.optional(),
  term_end: isoDate.optional(),
});

const consentPatternSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  placement: z.enum(['before', 'after']).default('after'),
});

export const cityProfileSchema = z.object({
  city: z.string().min(1),
  roster: z.array(rosterMemberSchema).default([]),
  title_tokens: z.array(z.string().min(1)).optional(),
  exclusions: z
    .object({
      title_phrases: z.array(z.string().min(1)).optional(),
      title_prefixes: z.array(z.string().min(1)).optional(),
      other_body_number_patterns: z.array(z.string().min(1)).optional(),
    })
    .optional(),
  quality_threshold: z.number().min(0).max(1).optional(),
  consent_patterns: z.array(consentPatternSchema).optional(),
});

export type CityProfile = z.infer<typeof cityProfileSchema>;
