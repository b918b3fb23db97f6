/**
 * Single-writer lock for the memory file
 *
 * ARCHITECTURE: Promise chain per memory file path, in-process only
 * Pattern: Writers for the same file run one at a time in arrival order;
 * different files run in parallel. A failing writer still releases the file.
 */

import { createDebugLog } from '../logging.js';

const log = createDebugLog('writer-lock');

/** Settled tail of the writer queue for each memory file */
const queueTails = new Map<string, Promise<void>>();

export async function withWriterLock<T>(memoryPath: string, write: () => Promise<T>): Promise<T> {
  const waitFor = queueTails.get(memoryPath);
  if (waitFor) log('Queued behind an earlier writer', { path: memoryPath });

  const run = (waitFor ?? Promise.resolve()).then(write);
  // The caller sees the writer's failure through `run`; the queue only needs settlement
  const tail = run.then(
    () => undefined,
    () => undefined
  );
  queueTails.set(memoryPath, tail);

  try {
    return await run;
  } finally {
    if (queueTails.get(memoryPath) === tail) {
      queueTails.delete(memoryPath);
      log('Writer queue drained', { path: memoryPath });
    }
  }
}

export function activeWriterLocks(): number {
  return queueTails.size;
}
