import { debug } from './log';
import { compareSegments, roundTime } from './segment';
import type { Segment } from './types';

function sourceOrder(s: Segment): number {
    return s.source.kind === 'chunk' ? s.source.chunkIndex : Number.MAX_SAFE_INTEGER;
}

/**
 * Concatenate per-chunk output into one sorted, non-overlapping sequence inside
 * `[0, durationSec]`. Where two segments overlap, the later one keeps the disputed
 * interval and the earlier one's end is cut back to its start; segments cut to
 * nothing are removed.
 */
export function mergeSegments(perChunk: ReadonlyArray<readonly Segment[]>, durationSec: number): Segment[] {
    const all: Segment[] = [];
    for (const list of perChunk) {
        for (const s of list) {
            const start = roundTime(Math.max(0, s.start));
            const end = roundTime(Math.min(durationSec, s.end));
            if (end > start) all.push({ ...s, start, end });
        }
    }
    all.sort((a, b) => compareSegments(a, b) || sourceOrder(a) - sourceOrder(b));

    const out: Segment[] = [];
    let truncated = 0;
    let removed = 0;
    for (const cur of all) {
        let last = out[out.length - 1];
        while (last && last.end > cur.start) {
            last.end = cur.start;
            truncated++;
            if (last.end <= last.start) {
                out.pop();
                removed++;
                last = out[out.length - 1];
            } else {
                break;
            }
        }
        out.push(cur);
    }
    debug('merge.done', { input: all.length, output: out.length, truncated, removed });
    return out;
}
