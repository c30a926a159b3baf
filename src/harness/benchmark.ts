import type { NoteRepository } from '../repositories/note-repository.js';
import type { NoteId } from '../types/index.js';

export type BenchmarkPhase = 'insert' | 'lookup' | 'search';

export interface PhaseResult {
  phase: BenchmarkPhase;
  operations: number;
  elapsedMs: number;
  opsPerSec: number;
}

async function timed(
  phase: BenchmarkPhase,
  operations: number,
  work: () => Promise<void>
): Promise<PhaseResult> {
  const started = performance.now();
  await work();
  const elapsedMs = performance.now() - started;
  return {
    phase,
    operations,
    elapsedMs,
    opsPerSec: elapsedMs > 0 ? (operations * 1000) / elapsedMs : operations * 1000,
  };
}

/**
 * Insert `size` notes, read each back by id, then run one search per ten
 * notes. Phases run sequentially against an empty repository.
 */
export async function runBenchmark(repository: NoteRepository, size: number): Promise<PhaseResult[]> {
  const ids: NoteId[] = [];
  const searches = Math.max(1, Math.floor(size / 10));

  const insert = await timed('insert', size, async () => {
    for (let i = 0; i < size; i++) {
      ids.push(await repository.add(`bench note ${i}`, `benchmark content ${i}`));
    }
  });

  const lookup = await timed('lookup', ids.length, async () => {
    for (const id of ids) {
      await repository.get(id);
    }
  });

  const search = await timed('search', searches, async () => {
    for (let i = 0; i < searches; i++) {
      await repository.search(`note ${i}`, 10);
    }
  });

  return [insert, lookup, search];
}
