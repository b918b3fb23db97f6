/**
 * Core type definitions for the vote extraction engine
 *
 * ARCHITECTURE: All fallible operations use the Result pattern
 * Pattern: Operations return Result<T, E> instead of throwing
 *
 * Persisted and serialized shapes use snake_case field names so the JSON
 * written to disk matches what downstream importers already consume.
 */

// ============================================================================
// Result Type - Explicit error handling
// ============================================================================

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export const Ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const Err = <E>(error: E): Err<E> => ({ ok: false, error });

// ============================================================================
// Vote Types
// ============================================================================

export type VoteOutcome = 'Pass' | 'Fail' | 'Tie' | 'Continued';

export const VOTE_OUTCOMES: readonly VoteOutcome[] = ['Pass', 'Fail', 'Tie', 'Continued'];

export type MemberVote = 'Aye' | 'Nay' | 'Abstain' | 'Absent' | 'Recusal';

/**
 * Where a vote came from. Drives merge priority:
 * consent_calendar > pulled > other
 */
export type SourceSection = 'consent_calendar' | 'pulled' | 'other';

export interface Tally {
  readonly ayes: number;
  readonly noes: number;
  readonly abstain: number;
  readonly absent: number;
  readonly recusal: number;
}

export const EMPTY_TALLY: Tally = { ayes: 0, noes: 0, abstain: 0, absent: 0, recusal: 0 };

export interface VoteRecord {
  readonly agenda_item_number: string;
  readonly agenda_item_title: string;
  readonly outcome: VoteOutcome;
  readonly tally: Tally;
  readonly member_votes: Readonly<Record<string, MemberVote>>;
  readonly motion_text?: string;
  readonly mover?: string;
  readonly seconder?: string;
  readonly source_section: SourceSection;
  readonly validation_notes: readonly string[];
}

export type ExtractionMethod = 'regex' | 'ai' | 'hybrid';

export interface ExtractionResult {
  readonly votes: readonly VoteRecord[];
  readonly confidence_score: number;
  readonly quality_score: number;
  readonly method_used: ExtractionMethod;
  readonly processing_notes: readonly string[];
  readonly validation_passed: boolean;
  readonly llm_invoked: boolean;
}

// ============================================================================
// Meeting Input / Report Types
// ============================================================================

export interface MeetingInput {
  readonly meeting_id?: string;
  /** ISO date (yyyy-MM-dd); selects the roster period */
  readonly meeting_date?: string;
  readonly agenda_text: string;
  readonly minutes_text: string;
  /** Informational only - never alters extraction */
  readonly manual_baseline_count?: number;
}

/**
 * JSON-serializable per-meeting output
 */
export interface ExtractionReport {
  readonly votes: readonly VoteRecord[];
  readonly extraction_metadata: {
    readonly method_used: ExtractionMethod;
    readonly confidence_score: number;
    readonly meeting_id?: string;
    readonly meeting_date?: string;
    readonly extracted_at: string;
    readonly llm_invoked: boolean;
  };
  readonly validation_results: {
    readonly quality_score: number;
    readonly validation_passed: boolean;
    readonly processing_notes: readonly string[];
    readonly manual_baseline_count?: number;
  };
}

// ============================================================================
// Learning Memory Types
// ============================================================================

/**
 * Cross-run statistics persisted as a single JSON file
 *
 * ARCHITECTURE: Explicit state object, never a module-level singleton
 * Pattern: Loaded once, updated once per meeting by applying a MemoryDelta
 */
export interface ExtractionMemory {
  readonly successful_patterns: Readonly<Record<string, number>>;
  readonly failed_patterns: Readonly<Record<string, number>>;
  readonly member_name_corrections: Readonly<Record<string, string>>;
  readonly agenda_item_patterns: readonly string[];
  readonly quality_history: readonly number[];
  readonly last_updated: string;
}

/**
 * Changes observed while extracting one meeting
 */
export interface MemoryDelta {
  readonly pattern_hits: Readonly<Record<string, number>>;
  readonly pattern_misses: Readonly<Record<string, number>>;
  readonly name_corrections: Readonly<Record<string, string>>;
  readonly agenda_item_patterns: readonly string[];
  readonly quality_scores: readonly number[];
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface RosterMember {
  readonly name: string;
  readonly aliases?: readonly string[];
  /** ISO date; member is active from this day */
  readonly term_start?: string;
  /** ISO date; member is active through this day */
  readonly term_end?: string;
}

export interface ExclusionRules {
  readonly title_phrases: readonly string[];
  readonly title_prefixes: readonly string[];
  readonly other_body_number_patterns: readonly string[];
}

/**
 * Extra consent-calendar pattern; `pattern` needs named groups `start` and `end`
 */
export interface ConsentPatternConfig {
  readonly name: string;
  readonly pattern: string;
  readonly placement: 'before' | 'after';
}

export interface ExtractionConfig {
  readonly city: string;
  readonly roster: readonly RosterMember[];
  readonly title_tokens: readonly string[];
  readonly exclusions: ExclusionRules;
  readonly quality_threshold: number;
  readonly consent_patterns: readonly ConsentPatternConfig[];
}

export interface GlobalConfig {
  readonly ollama_host: string;
  readonly ollama_model: string;
  readonly llm_timeout_ms: number;
  readonly quality_threshold: number;
  readonly batch_concurrency: number;
}

// ============================================================================
// Error Types
// ============================================================================

export type ExtractionError =
  | { readonly type: 'input_error'; readonly message: string }
  | { readonly type: 'extraction_error'; readonly message: string };

export type LlmError =
  | { readonly type: 'timeout'; readonly message: string }
  | { readonly type: 'connection_failed'; readonly message: string }
  | { readonly type: 'server_error'; readonly message: string; readonly status?: number }
  | { readonly type: 'empty_response'; readonly message: string }
  | { readonly type: 'unknown'; readonly message: string };

export type StorageError =
  | { readonly type: 'read_error'; readonly message: string; readonly path: string }
  | { readonly type: 'write_error'; readonly message: string; readonly path: string }
  | { readonly type: 'parse_error'; readonly message: string; readonly path: string };

export type ConfigError =
  | { readonly type: 'read_error'; readonly message: string; readonly path: string }
  | { readonly type: 'parse_error'; readonly message: string; readonly path: string }
  | { readonly type: 'validation_error'; readonly message: string; readonly path: string };

// ============================================================================
// Error Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
