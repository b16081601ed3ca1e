import { ConfigurationError } from './errors';
import { roundTime } from './segment';
import type { Chunk } from './types';

// A window shorter than this is folded into the previous one instead of being sent on its own
export const MIN_TAIL_SEC = 0.05;

export interface ChunkOptions {
    chunkSec: number;
    overlapSec?: number;
}

/**
 * Partition `[0, durationSec]` into fixed windows. Windows abut unless an overlap is
 * configured; the last one is truncated at the end of the audio, or stretched to it
 * when less than `MIN_TAIL_SEC` would remain.
 */
export function planChunks(durationSec: number, opts: ChunkOptions): Chunk[] {
    const { chunkSec } = opts;
    const overlapSec = opts.overlapSec ?? 0;
    if (!Number.isFinite(durationSec) || durationSec <= 0) {
        throw new ConfigurationError(`Audio duration must be > 0 (got ${durationSec})`, { durationSec });
    }
    if (!Number.isFinite(chunkSec) || chunkSec <= 0) {
        throw new ConfigurationError(`Chunk size must be > 0 (got ${chunkSec})`, { chunkSec });
    }
    if (!Number.isFinite(overlapSec) || overlapSec < 0 || overlapSec >= chunkSec) {
        throw new ConfigurationError(
            `Chunk overlap must be in [0, chunkSec) (got ${overlapSec} with chunkSec=${chunkSec})`,
            { chunkSec, overlapSec }
        );
    }

    const step = chunkSec - overlapSec;
    const chunks: Chunk[] = [];
    for (let index = 0; ; index++) {
        // Derive from the index so float drift does not accumulate across windows
        const start = roundTime(index * step);
        const fullEnd = roundTime(start + chunkSec);
        const end = durationSec - fullEnd < MIN_TAIL_SEC ? durationSec : fullEnd;
        chunks.push({ index, globalStart: start, globalEnd: end });
        if (end === durationSec) break;
    }
    return chunks;
}

export function chunkDuration(chunk: Chunk): number {
    return chunk.globalEnd - chunk.globalStart;
}
