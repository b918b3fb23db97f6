/**
 * Vote Extraction Engine
 *
 * ARCHITECTURE: Hybrid pipeline - patterns first, language model on demand
 * Pattern: Memory is an explicit snapshot passed in at construction; each
 * meeting returns a MemoryDelta instead of mutating it
 *
 * Per meeting:
 *   1. Clean agenda and minutes text
 *   2. Consent calendar, then pulled roll-call blocks (regex phase)
 *   3. Resolve titles, score the regex phase
 *   4. Ask the language model only if the regex phase is empty or weak
 *   5. Merge (regex wins), filter by policy, deduplicate, score again
 */

import type {
  ExtractionConfig,
  ExtractionError,
  ExtractionMemory,
  ExtractionReport,
  ExtractionResult,
  MeetingInput,
  MemoryDelta,
  Result,
  StorageError,
  VoteRecord,
} from './types/index.js';
import { Ok, Err, errorMessage } from './types/index.js';
import { createDebugLog } from './logging.js';
import { DEFAULT_EXTRACTION_CONFIG, consentStrategies } from './config.js';
import type { LlmProvider } from './llm/ollama-client.js';
import { cleanDocumentText } from './extraction/preprocess.js';
import { extractConsentCalendar } from './extraction/consent-calendar.js';
import type { ConsentPatternStrategy } from './extraction/consent-calendar.js';
import { extractPulledItems } from './extraction/pulled-items.js';
import { runLlmFallback } from './extraction/llm-fallback.js';
import { MemberNameNormalizer, activeRoster } from './normalize/member-names.js';
import { resolveTitles } from './normalize/titles.js';
import { mergeVotes } from './pipeline/merge.js';
import { filterExcludedVotes } from './pipeline/exclusion-filter.js';
import { deduplicateVotes } from './pipeline/deduplicate.js';
import { assessQuality, confidenceScore, needsFallback } from './pipeline/quality.js';
import { applyMemoryDelta, emptyMemory, saveExtractionMemory } from './storage/memory-store.js';
import { withWriterLock } from './storage/writer-lock.js';

const log = createDebugLog('engine');

export interface EngineOptions {
  readonly config?: ExtractionConfig;
  readonly memory?: ExtractionMemory;
  readonly llm?: LlmProvider;
  readonly now?: () => Date;
}

export interface RegexPhase {
  readonly votes: VoteRecord[];
  readonly notes: string[];
  readonly matchedPattern: string | null;
  readonly missedPatterns: string[];
}

export interface MeetingExtraction {
  readonly result: ExtractionResult;
  readonly delta: MemoryDelta;
  readonly report: ExtractionReport;
}

interface PreparedMeeting {
  readonly agenda: string;
  readonly minutes: string;
  readonly normalizer: MemberNameNormalizer;
}

function countMap(names: readonly string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const name of names) counts[name] = (counts[name] ?? 0) + 1;
  return counts;
}

export function buildReport(result: ExtractionResult, input: MeetingInput, extractedAt: Date): ExtractionReport {
  return {
    votes: result.votes,
    extraction_metadata: {
      method_used: result.method_used,
      confidence_score: result.confidence_score,
      meeting_id: input.meeting_id,
      meeting_date: input.meeting_date,
      extracted_at: extractedAt.toISOString(),
      llm_invoked: result.llm_invoked,
    },
    validation_results: {
      quality_score: result.quality_score,
      validation_passed: result.validation_passed,
      processing_notes: result.processing_notes,
      manual_baseline_count: input.manual_baseline_count,
    },
  };
}

export class VoteExtractionEngine {
  private readonly config: ExtractionConfig;
  private readonly llm: LlmProvider | undefined;
  private readonly now: () => Date;
  private readonly strategies: readonly ConsentPatternStrategy[];
  private snapshot: ExtractionMemory;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? DEFAULT_EXTRACTION_CONFIG;
    this.snapshot = options.memory ?? emptyMemory();
    this.llm = options.llm;
    this.now = options.now ?? (() => new Date());
    this.strategies = consentStrategies(this.config);
  }

  get memory(): ExtractionMemory {
    return this.snapshot;
  }

  /**
   * Apply a meeting's delta to the engine's snapshot and return the new memory
   */
  absorb(delta: MemoryDelta): ExtractionMemory {
    this.snapshot = applyMemoryDelta(this.snapshot, delta, this.now());
    return this.snapshot;
  }

  private prepare(input: MeetingInput): PreparedMeeting {
    return {
      agenda: cleanDocumentText(input.agenda_text),
      minutes: cleanDocumentText(input.minutes_text),
      normalizer: new MemberNameNormalizer({
        roster: activeRoster(this.config.roster, input.meeting_date),
        corrections: this.snapshot.member_name_corrections,
        titleTokens: this.config.title_tokens,
      }),
    };
  }

  private regexPhase(meeting: PreparedMeeting): RegexPhase {
    const consent = extractConsentCalendar(meeting.minutes, {
      normalizer: meeting.normalizer,
      titleTokens: this.config.title_tokens,
      strategies: this.strategies,
    });
    const pulled = extractPulledItems(meeting.minutes, {
      normalizer: meeting.normalizer,
      titleTokens: this.config.title_tokens,
      consentSpans: consent.spans,
    });
    return {
      votes: [...consent.votes, ...pulled.votes],
      notes: [...consent.notes, ...pulled.notes],
      matchedPattern: consent.matchedPattern,
      missedPatterns: consent.missedPatterns,
    };
  }

  /**
   * Pattern-only extraction; deterministic for identical input and memory
   */
  extractRegexPhase(input: MeetingInput): RegexPhase {
    return this.regexPhase(this.prepare(input));
  }

  async extractMeeting(input: MeetingInput): Promise<Result<MeetingExtraction, ExtractionError>> {
    if (input.minutes_text.trim().length === 0) {
      return Err({ type: 'input_error', message: 'Minutes text is empty' });
    }
    if (input.agenda_text.trim().length === 0) {
      return Err({ type: 'input_error', message: 'Agenda text is empty' });
    }

    try {
      return Ok(await this.runPipeline(input));
    } catch (error) {
      return Err({ type: 'extraction_error', message: `Extraction failed: ${errorMessage(error)}` });
    }
  }

  private async runPipeline(input: MeetingInput): Promise<MeetingExtraction> {
    const meeting = this.prepare(input);
    const threshold = this.config.quality_threshold;
    const rosterSize = meeting.normalizer.rosterSize;
    const learnedTemplates = this.snapshot.agenda_item_patterns;
    const notes: string[] = [];

    const regex = this.regexPhase(meeting);
    notes.push(...regex.notes);

    const regexTitles = resolveTitles(regex.votes, meeting.agenda, learnedTemplates);
    const regexQuality = assessQuality(regexTitles.votes, { rosterSize });
    notes.push(`Regex phase: ${regexTitles.votes.length} votes, quality ${regexQuality.score}`);
    log('Regex phase complete', { meeting: input.meeting_id, votes: regexTitles.votes.length, quality: regexQuality.score });

    let fallbackVotes: VoteRecord[] = [];
    let fallbackInvoked = false;
    const newTemplates = new Set(regexTitles.newTemplates);

    if (needsFallback(regexQuality.score, threshold)) {
      const fallback = await runLlmFallback(
        this.llm,
        {
          minutesText: meeting.minutes,
          agendaText: meeting.agenda,
          rosterNames: activeRoster(this.config.roster, input.meeting_date).map((m) => m.name),
          regexVoteCount: regexTitles.votes.length,
        },
        meeting.normalizer
      );
      const fallbackTitles = resolveTitles(fallback.votes, meeting.agenda, learnedTemplates);
      fallbackVotes = fallbackTitles.votes;
      fallbackInvoked = fallback.invoked;
      for (const template of fallbackTitles.newTemplates) newTemplates.add(template);
      notes.push(...fallback.notes);
    }

    const merged = mergeVotes(regexTitles.votes, fallbackVotes, fallbackInvoked);
    const regexItems = new Set(regexTitles.votes.map((vote) => vote.agenda_item_number));
    const fallbackItems = new Set(
      fallbackVotes.map((vote) => vote.agenda_item_number).filter((item) => !regexItems.has(item))
    );

    const filtered = filterExcludedVotes(merged.votes, this.config.exclusions);
    for (const { vote, reason } of filtered.excluded) {
      notes.push(`Excluded item ${vote.agenda_item_number}: ${reason}`);
    }

    const deduped = deduplicateVotes(filtered.kept);
    if (deduped.discarded > 0) notes.push(`Discarded ${deduped.discarded} duplicate vote(s)`);

    const finalQuality = assessQuality(deduped.votes, {
      rosterSize,
      manualBaselineCount: input.manual_baseline_count,
    });
    notes.push(...finalQuality.notes);

    const unmatched = meeting.normalizer.unmatchedNames();
    if (unmatched.length > 0) notes.push(`Names not on roster: ${unmatched.join(', ')}`);

    const result: ExtractionResult = {
      votes: deduped.votes,
      confidence_score: confidenceScore(finalQuality.score, deduped.votes, fallbackItems),
      quality_score: finalQuality.score,
      method_used: merged.method,
      processing_notes: notes,
      validation_passed: deduped.votes.length > 0 && !needsFallback(finalQuality.score, threshold),
      llm_invoked: fallbackInvoked,
    };

    const delta: MemoryDelta = {
      pattern_hits: regex.matchedPattern ? { [regex.matchedPattern]: 1 } : {},
      pattern_misses: countMap(regex.missedPatterns),
      name_corrections: meeting.normalizer.learnedCorrections(),
      agenda_item_patterns: [...newTemplates],
      quality_scores: [finalQuality.score],
    };

    log('Meeting extracted', {
      meeting: input.meeting_id,
      votes: result.votes.length,
      method: result.method_used,
      confidence: result.confidence_score,
    });

    return { result, delta, report: buildReport(result, input, this.now()) };
  }
}

/**
 * Extract one meeting, fold its delta into the engine and save memory once
 */
export async function runMeeting(
  engine: VoteExtractionEngine,
  input: MeetingInput,
  memoryPath: string
): Promise<Result<MeetingExtraction, ExtractionError | StorageError>> {
  const extracted = await engine.extractMeeting(input);
  if (!extracted.ok) return extracted;
  const meeting = extracted.value;

  return withWriterLock(memoryPath, async (): Promise<Result<MeetingExtraction, StorageError>> => {
    const saved = await saveExtractionMemory(memoryPath, engine.absorb(meeting.delta));
    return saved.ok ? Ok(meeting) : saved;
  });
}
