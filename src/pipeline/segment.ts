import { TimelineInvariantError } from './errors';
import type { ContentType, Segment, SegmentSource } from './types';

// Millisecond resolution; every timestamp is rounded once when a Segment is made
export function roundTime(sec: number): number {
    return Math.round(sec * 1000) / 1000;
}

const DEFAULT_LABEL: Record<ContentType, string> = {
    speech: '',
    music: 'Music',
    sound_effect: 'Sound',
    silence: 'Silence',
};

/**
 * Strip the caption decorations a collaborator may echo back (`[♪ … ♪]`, `[Sound: …]`,
 * `[…]`, inline `<i>`/`<b>`) so Segment text stays content-neutral. Speech is left alone
 * apart from trimming; markers such as "[unintelligible]" are part of what was said.
 */
export function undecorate(text: string, contentType: ContentType): string {
    let t = text.trim();
    if (contentType === 'speech') return t;
    const styled = t.match(/^<([ib])>([\s\S]*)<\/\1>$/);
    if (styled) t = styled[2].trim();
    const music = t.match(/^\[?\s*♪+\s*([\s\S]*?)\s*♪*\s*\]?$/);
    const sound = t.match(/^\[\s*sound\s*:\s*([\s\S]*?)\s*\]$/i);
    const bracketed = t.match(/^\[([\s\S]*)\]$/);
    if (music && t.includes('♪')) {
        t = music[1];
    } else if (sound) {
        t = sound[1];
    } else if (bracketed) {
        t = bracketed[1].trim();
    }
    return t || DEFAULT_LABEL[contentType];
}

export interface SegmentInit {
    start: number;
    end: number;
    text: string;
    contentType: ContentType;
    source: SegmentSource;
}

export function createSegment(init: SegmentInit): Segment {
    const start = roundTime(init.start);
    const end = roundTime(init.end);
    if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
        throw new TimelineInvariantError(`Segment must satisfy end > start (got ${init.start}..${init.end})`, {
            start: init.start,
            end: init.end,
        });
    }
    return {
        start,
        end,
        text: undecorate(init.text, init.contentType),
        contentType: init.contentType,
        source: init.source,
    };
}

export function compareSegments(a: Segment, b: Segment): number {
    return a.start - b.start || a.end - b.end;
}

export function duration(s: Pick<Segment, 'start' | 'end'>): number {
    return s.end - s.start;
}

/**
 * First violation of the timeline contract, or null when the sequence is sorted,
 * pairwise non-overlapping and inside `[0, durationSec]`.
 */
export function findTimelineViolation(segments: readonly Segment[], durationSec: number): string | null {
    for (let i = 0; i < segments.length; i++) {
        const s = segments[i];
        if (!(s.end > s.start)) return `segment ${i} has end <= start (${s.start}..${s.end})`;
        if (s.start < 0 || s.end > durationSec) {
            return `segment ${i} (${s.start}..${s.end}) lies outside [0, ${durationSec}]`;
        }
        if (i > 0) {
            const prev = segments[i - 1];
            if (prev.start > s.start) return `segment ${i} starts before segment ${i - 1}`;
            if (prev.end > s.start) return `segment ${i - 1} overlaps segment ${i}`;
        }
    }
    return null;
}

export function assertTimeline(segments: readonly Segment[], durationSec: number): void {
    const violation = findTimelineViolation(segments, durationSec);
    if (violation) {
        throw new TimelineInvariantError(violation, { durationSec, count: segments.length });
    }
}

/**
 * The ordered Segment sequence of one job. Owned by a single engine run; every
 * mutation goes through `insert` or `replaceAll`, both of which keep the contract.
 */
export class Timeline {
    private segments: Segment[];

    constructor(readonly durationSec: number, initial: readonly Segment[] = []) {
        assertTimeline(initial, durationSec);
        this.segments = [...initial];
    }

    get length(): number {
        return this.segments.length;
    }

    /** Index at which `seg` would be inserted to keep start order */
    private positionOf(seg: Segment): number {
        let lo = 0;
        let hi = this.segments.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (compareSegments(this.segments[mid], seg) <= 0) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }

    insert(seg: Segment): number {
        if (seg.start < 0 || seg.end > this.durationSec || !(seg.end > seg.start)) {
            throw new TimelineInvariantError(`Cannot insert ${seg.start}..${seg.end}: outside [0, ${this.durationSec}]`);
        }
        const pos = this.positionOf(seg);
        const prev = this.segments[pos - 1];
        const next = this.segments[pos];
        if ((prev && prev.end > seg.start) || (next && seg.end > next.start)) {
            throw new TimelineInvariantError(`Cannot insert ${seg.start}..${seg.end}: overlaps a neighbour`, {
                prev: prev ? [prev.start, prev.end] : null,
                next: next ? [next.start, next.end] : null,
            });
        }
        this.segments.splice(pos, 0, seg);
        return pos;
    }

    replaceAll(segments: readonly Segment[]): void {
        assertTimeline(segments, this.durationSec);
        this.segments = [...segments];
    }

    snapshot(): readonly Segment[] {
        return Object.freeze(this.segments.map((s) => Object.freeze({ ...s })));
    }
}
