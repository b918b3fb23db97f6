/**
 * Council vote extraction
 *
 * Library entry point. Typical use:
 *
 *   const profile = await loadCityProfile('profiles/santa-ana-2024.yaml');
 *   if (!profile.ok) throw new Error(profile.error.message);
 *   const engine = new VoteExtractionEngine({
 *     config: profile.value,
 *     memory: await loadExtractionMemory(getMemoryPath()),
 *     llm: createOllamaProvider({ host: 'http://localhost:11434', model: 'llama3.2' }),
 *   });
 *   const result = await runMeeting(engine, { agenda_text, minutes_text }, getMemoryPath());
 */

export * from './types/index.js';

export { VoteExtractionEngine, runMeeting, buildReport } from './engine.js';
export type { EngineOptions, MeetingExtraction, RegexPhase } from './engine.js';

export { processBatch, DEFAULT_BATCH_CONCURRENCY } from './batch.js';
export type { BatchOptions, BatchResult, MeetingOutcome } from './batch.js';

export { DEFAULT_EXTRACTION_CONFIG, loadCityProfile, parseCityProfile, configFromProfile, consentStrategies } from './config.js';
export {
  DEFAULT_GLOBAL_CONFIG,
  getGlobalDir,
  getGlobalConfigPath,
  getJournalDir,
  getMemoryPath,
  readGlobalConfig,
} from './paths.js';

export { cleanDocumentText } from './extraction/preprocess.js';
export {
  DEFAULT_CONSENT_STRATEGIES,
  MAX_CONSENT_RANGE,
  RegexConsentStrategy,
  extractConsentCalendar,
} from './extraction/consent-calendar.js';
export type { ConsentExtraction, ConsentPatternStrategy, ConsentRangeMatch, TextSpan } from './extraction/consent-calendar.js';
export { extractPulledItems } from './extraction/pulled-items.js';
export type { PulledItemExtraction } from './extraction/pulled-items.js';
export { buildFallbackPrompt, parseFallbackResponse, runLlmFallback } from './extraction/llm-fallback.js';
export type { CandidateResult, FallbackRun } from './extraction/llm-fallback.js';

export { createOllamaProvider } from './llm/ollama-client.js';
export type { GenerateClient, LlmProvider, OllamaProviderConfig } from './llm/ollama-client.js';

export { DEFAULT_TITLE_TOKENS, MemberNameNormalizer, activeRoster, stripTitleTokens } from './normalize/member-names.js';
export type { NormalizedName } from './normalize/member-names.js';
export { DEFAULT_TITLE_TEMPLATES, resolveTitles } from './normalize/titles.js';

export { mergeVotes, resolveMethod } from './pipeline/merge.js';
export { DEFAULT_EXCLUSION_RULES, filterExcludedVotes } from './pipeline/exclusion-filter.js';
export { deduplicateVotes } from './pipeline/deduplicate.js';
export { DEFAULT_QUALITY_THRESHOLD, assessQuality, confidenceScore, needsFallback } from './pipeline/quality.js';

export {
  applyMemoryDelta,
  emptyDelta,
  emptyMemory,
  loadExtractionMemory,
  mergeDeltas,
  saveExtractionMemory,
} from './storage/memory-store.js';
export { listJournals, mergeJournalsIntoMemory, writeDeltaJournal } from './storage/journal.js';
