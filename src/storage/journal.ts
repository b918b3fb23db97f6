/**
 * Memory Delta Journal
 *
 * ARCHITECTURE: File-based, append-only journal of per-meeting deltas
 * Pattern: Atomic writes via rename; one writer merges journals into memory
 *
 * Journal structure:
 *   journal/*.json     - Deltas waiting to be merged
 *   journal/applied/   - Deltas already folded into the memory file
 *   journal/failed/    - Entries that could not be read or validated
 *
 * Separate processes each write their own journal entries; a single merge
 * step later applies them to the memory file in filename (time) order.
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { ExtractionMemory, MemoryDelta, Result, StorageError } from '../types/index.js';
import { Ok, Err, errorMessage, isNotFoundError } from '../types/index.js';
import { deltaJournalSchema } from '../schemas.js';
import { createDebugLog, warn } from '../logging.js';
import { applyMemoryDelta, loadExtractionMemory, mergeDeltas, saveExtractionMemory } from './memory-store.js';
import { withWriterLock } from './writer-lock.js';

const log = createDebugLog('journal');

const APPLIED_DIR = 'applied';
const FAILED_DIR = 'failed';

export interface JournalConfig {
  readonly baseDir: string;
}

export interface DeltaJournalEntry {
  readonly id: string;
  readonly meeting_id?: string;
  readonly written_at: string;
  readonly delta: MemoryDelta;
}

/**
 * Write one meeting's delta as a new journal entry
 */
export async function writeDeltaJournal(
  delta: MemoryDelta,
  config: JournalConfig,
  meetingId?: string
): Promise<Result<string, StorageError>> {
  const id = uuidv4();
  const writtenAt = new Date().toISOString();
  const entry: DeltaJournalEntry = { id, meeting_id: meetingId, written_at: writtenAt, delta };

  const filename = `${writtenAt.replace(/[:.]/g, '-')}_${id}.json`;
  const journalPath = join(config.baseDir, filename);
  const tempPath = `${journalPath}.tmp`;

  try {
    await fs.mkdir(config.baseDir, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');
    await fs.rename(tempPath, journalPath);
    log('Delta journaled', { id, meeting_id: meetingId });
    return Ok(id);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    return Err({
      type: 'write_error',
      message: `Failed to write delta journal: ${errorMessage(error)}`,
      path: journalPath,
    });
  }
}

/**
 * Pending journal files, oldest first
 */
export async function listJournals(config: JournalConfig): Promise<Result<string[], StorageError>> {
  try {
    const files = await fs.readdir(config.baseDir, { withFileTypes: true });
    return Ok(
      files
        .filter((f) => f.isFile() && f.name.endsWith('.json'))
        .map((f) => f.name)
        .sort()
    );
  } catch (error) {
    if (isNotFoundError(error)) {
      return Ok([]);
    }
    return Err({
      type: 'read_error',
      message: `Failed to list journals: ${errorMessage(error)}`,
      path: config.baseDir,
    });
  }
}

async function readJournal(path: string): Promise<Result<DeltaJournalEntry, StorageError>> {
  try {
    const parsed = deltaJournalSchema.safeParse(JSON.parse(await fs.readFile(path, 'utf-8')));
    if (!parsed.success) {
      return Err({ type: 'parse_error', message: parsed.error.issues[0]?.message ?? 'invalid journal', path });
    }
    return Ok(parsed.data);
  } catch (error) {
    return Err({ type: 'read_error', message: errorMessage(error), path });
  }
}

async function moveTo(config: JournalConfig, filename: string, dir: string): Promise<void> {
  await fs.mkdir(join(config.baseDir, dir), { recursive: true });
  await fs.rename(join(config.baseDir, filename), join(config.baseDir, dir, filename));
}

export interface JournalMergeResult {
  readonly applied: number;
  readonly failed: number;
  readonly memory: ExtractionMemory;
}

/**
 * Fold every pending journal into the memory file
 *
 * ARCHITECTURE: Runs under the memory file's writer lock. Journals are moved
 * to applied/ only after the memory file has been saved.
 */
export async function mergeJournalsIntoMemory(
  memoryPath: string,
  config: JournalConfig,
  now: Date = new Date()
): Promise<Result<JournalMergeResult, StorageError>> {
  return withWriterLock(memoryPath, async (): Promise<Result<JournalMergeResult, StorageError>> => {
    const listed = await listJournals(config);
    if (!listed.ok) return listed;

    const memory = await loadExtractionMemory(memoryPath);
    const deltas: MemoryDelta[] = [];
    const good: string[] = [];
    let failed = 0;

    for (const filename of listed.value) {
      const entry = await readJournal(join(config.baseDir, filename));
      if (entry.ok) {
        deltas.push(entry.value.delta);
        good.push(filename);
        continue;
      }
      warn('journal', 'Moving unreadable journal to failed/', { filename, error: entry.error.message });
      try {
        await moveTo(config, filename, FAILED_DIR);
        failed++;
      } catch (error) {
        return Err({ type: 'write_error', message: errorMessage(error), path: join(config.baseDir, filename) });
      }
    }

    if (good.length === 0) {
      return Ok({ applied: 0, failed, memory });
    }

    const updated = applyMemoryDelta(memory, mergeDeltas(deltas), now);
    const saved = await saveExtractionMemory(memoryPath, updated);
    if (!saved.ok) return saved;

    try {
      for (const filename of good) await moveTo(config, filename, APPLIED_DIR);
    } catch (error) {
      return Err({ type: 'write_error', message: errorMessage(error), path: config.baseDir });
    }

    log('Journals merged', { applied: good.length, failed });
    return Ok({ applied: good.length, failed, memory: updated });
  });
}
