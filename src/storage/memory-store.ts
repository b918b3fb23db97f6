/**
 * Extraction Memory Storage
 *
 * ARCHITECTURE: One JSON file, loaded once per engine, saved once per run
 * Pattern: Immutable updates through MemoryDelta, Result types for all I/O
 *
 * A missing or unreadable memory file is never fatal: extraction simply
 * starts from an empty memory.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import type { ExtractionMemory, MemoryDelta, Result, StorageError } from '../types/index.js';
import { Ok, Err, errorMessage, isNotFoundError } from '../types/index.js';
import { extractionMemorySchema } from '../schemas.js';
import { createDebugLog, warn } from '../logging.js';

const log = createDebugLog('memory-store');

export const QUALITY_HISTORY_LIMIT = 500;

export function emptyMemory(): ExtractionMemory {
  return {
    successful_patterns: {},
    failed_patterns: {},
    member_name_corrections: {},
    agenda_item_patterns: [],
    quality_history: [],
    last_updated: '',
  };
}

export function emptyDelta(): MemoryDelta {
  return {
    pattern_hits: {},
    pattern_misses: {},
    name_corrections: {},
    agenda_item_patterns: [],
    quality_scores: [],
  };
}

// ============================================================================
// Pure Updates
// ============================================================================

function addCounts(
  base: Readonly<Record<string, number>>,
  extra: Readonly<Record<string, number>>
): Record<string, number> {
  const result: Record<string, number> = { ...base };
  for (const [key, count] of Object.entries(extra)) {
    result[key] = (result[key] ?? 0) + count;
  }
  return result;
}

function appendUnique(base: readonly string[], extra: readonly string[]): string[] {
  return [...new Set([...base, ...extra])];
}

/**
 * Combine deltas in order. Later name corrections win.
 */
export function mergeDeltas(deltas: readonly MemoryDelta[]): MemoryDelta {
  return deltas.reduce<MemoryDelta>(
    (acc, delta) => ({
      pattern_hits: addCounts(acc.pattern_hits, delta.pattern_hits),
      pattern_misses: addCounts(acc.pattern_misses, delta.pattern_misses),
      name_corrections: { ...acc.name_corrections, ...delta.name_corrections },
      agenda_item_patterns: appendUnique(acc.agenda_item_patterns, delta.agenda_item_patterns),
      quality_scores: [...acc.quality_scores, ...delta.quality_scores],
    }),
    emptyDelta()
  );
}

/**
 * Apply a delta, returning new memory. Identity candidates (a name mapped to
 * itself) never replace a real correction already on file.
 */
export function applyMemoryDelta(memory: ExtractionMemory, delta: MemoryDelta, now: Date = new Date()): ExtractionMemory {
  const corrections: Record<string, string> = { ...memory.member_name_corrections };
  for (const [observed, canonical] of Object.entries(delta.name_corrections)) {
    const existing = corrections[observed];
    if (observed === canonical && existing !== undefined && existing !== observed) continue;
    corrections[observed] = canonical;
  }

  return {
    successful_patterns: addCounts(memory.successful_patterns, delta.pattern_hits),
    failed_patterns: addCounts(memory.failed_patterns, delta.pattern_misses),
    member_name_corrections: corrections,
    agenda_item_patterns: appendUnique(memory.agenda_item_patterns, delta.agenda_item_patterns),
    quality_history: [...memory.quality_history, ...delta.quality_scores].slice(-QUALITY_HISTORY_LIMIT),
    last_updated: now.toISOString(),
  };
}

// ============================================================================
// File I/O
// ============================================================================

/**
 * Load memory from disk. Missing, corrupt or invalid files yield empty memory.
 */
export async function loadExtractionMemory(path: string): Promise<ExtractionMemory> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (!isNotFoundError(error)) {
      warn('memory-store', 'Could not read memory file, starting empty', { path, error: errorMessage(error) });
    }
    return emptyMemory();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    warn('memory-store', 'Memory file is not valid JSON, starting empty', { path, error: errorMessage(error) });
    return emptyMemory();
  }

  const parsed = extractionMemorySchema.safeParse(raw);
  if (!parsed.success) {
    warn('memory-store', 'Memory file failed validation, starting empty', {
      path,
      issue: parsed.error.issues[0]?.message,
    });
    return emptyMemory();
  }

  log('Memory loaded', {
    path,
    patterns: Object.keys(parsed.data.successful_patterns).length,
    history: parsed.data.quality_history.length,
  });
  return parsed.data;
}

/**
 * Save memory atomically (temp file + rename)
 */
export async function saveExtractionMemory(path: string, memory: ExtractionMemory): Promise<Result<void, StorageError>> {
  const tempPath = `${path}.tmp`;
  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(memory, null, 2), 'utf-8');
    await fs.rename(tempPath, path);
    log('Memory saved', { path, history: memory.quality_history.length });
    return Ok(undefined);
  } catch (error) {
    return Err({
      type: 'write_error',
      message: `Failed to save extraction memory: ${errorMessage(error)}`,
      path,
    });
  }
}
