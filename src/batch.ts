/**
 * Batch Processing
 *
 * ARCHITECTURE: Bounded-concurrency batches over one engine snapshot
 * Pattern: Promise.allSettled per batch; a failing meeting never aborts the run
 *
 * Every meeting sees the same memory snapshot. Deltas are merged in input
 * order after all meetings finish, applied once, and saved once under the
 * memory file's writer lock.
 */

import type {
  ExtractionError,
  ExtractionMemory,
  MeetingInput,
  MemoryDelta,
  Result,
  StorageError,
} from './types/index.js';
import { errorMessage } from './types/index.js';
import { createDebugLog, warn } from './logging.js';
import type { MeetingExtraction, VoteExtractionEngine } from './engine.js';
import { mergeDeltas, saveExtractionMemory } from './storage/memory-store.js';
import { withWriterLock } from './storage/writer-lock.js';

const log = createDebugLog('batch');

export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface BatchOptions {
  readonly concurrency?: number;
  /** When set, the updated memory is saved here once at the end */
  readonly memoryPath?: string;
}

export type MeetingOutcome =
  | { readonly meeting_id: string; readonly ok: true; readonly extraction: MeetingExtraction }
  | { readonly meeting_id: string; readonly ok: false; readonly error: ExtractionError };

export interface BatchResult {
  readonly outcomes: MeetingOutcome[];
  readonly succeeded: number;
  readonly failed: number;
  readonly memory: ExtractionMemory;
  readonly saved: Result<void, StorageError> | null;
}

function meetingId(input: MeetingInput, index: number): string {
  return input.meeting_id ?? `meeting-${index + 1}`;
}

export async function processBatch(
  engine: VoteExtractionEngine,
  meetings: readonly MeetingInput[],
  options: BatchOptions = {}
): Promise<BatchResult> {
  const limit = Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  const outcomes: MeetingOutcome[] = [];

  for (let i = 0; i < meetings.length; i += limit) {
    const batch = meetings.slice(i, i + limit);
    const ids = batch.map((meeting, offset) => meetingId(meeting, i + offset));
    const settled = await Promise.allSettled(batch.map((meeting) => engine.extractMeeting(meeting)));

    settled.forEach((result, offset) => {
      const id = ids[offset] ?? `meeting-${i + offset + 1}`;
      if (result.status === 'rejected') {
        outcomes.push({
          meeting_id: id,
          ok: false,
          error: { type: 'extraction_error', message: errorMessage(result.reason) },
        });
        return;
      }
      outcomes.push(
        result.value.ok
          ? { meeting_id: id, ok: true, extraction: result.value.value }
          : { meeting_id: id, ok: false, error: result.value.error }
      );
    });
    log('Batch chunk complete', { done: Math.min(i + limit, meetings.length), total: meetings.length });
  }

  for (const outcome of outcomes) {
    if (!outcome.ok) warn('batch', 'Meeting failed', { meeting: outcome.meeting_id, error: outcome.error.message });
  }

  const deltas: MemoryDelta[] = outcomes.flatMap((outcome) => (outcome.ok ? [outcome.extraction.delta] : []));
  const memory = engine.absorb(mergeDeltas(deltas));

  let saved: Result<void, StorageError> | null = null;
  if (options.memoryPath) {
    const path = options.memoryPath;
    saved = await withWriterLock(path, () => saveExtractionMemory(path, memory));
    if (!saved.ok) warn('batch', 'Failed to save memory', { path, error: saved.error.message });
  }

  const succeeded = deltas.length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded, memory, saved };
}
