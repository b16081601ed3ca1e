import { JobCancelledError } from './errors';
import { DEFAULT_GAP_THRESHOLD_SEC, detectGaps } from './gaps';
import { debug, errorMessage, info, startStep, warn } from './log';
import { type ReplySegment, parseSegmentReply } from './parse';
import { optimizePrompt } from './prompts';
import { withRetry } from './retry';
import { createSegment, duration, findTimelineViolation, roundTime } from './segment';
import type { PassContext } from './transcribe';
import type { OptimizerOutcome, Segment, SegmentSource, TimingRules } from './types';

export const DEFAULT_TIMING_RULES: TimingRules = {
    minDisplaySec: 1,
    maxCharsPerSec: 17,
    minGapSec: 0.08,
    joinToleranceSec: 0.25,
    maxMergedSec: 6,
    maxSoundEffectSec: 4,
};

const EPS = 1e-6;
const SENTENCE_END = /[.!?…]["'”’)\]]?$/;

export type OptimizeContext = Pick<PassContext, 'service' | 'retry' | 'usage' | 'audit' | 'signal'>;

export interface OptimizeResult {
    segments: Segment[];
    outcome: OptimizerOutcome;
}

/** Shortest time a caption needs on screen: display floor or reading speed, whichever is longer */
export function readingFloor(s: Segment, rules: TimingRules): number {
    return Math.max(rules.minDisplaySec, s.text.length / rules.maxCharsPerSec);
}

function canJoin(prev: Segment, next: Segment, rules: TimingRules): boolean {
    if (prev.contentType !== 'speech' || next.contentType !== 'speech') return false;
    const blank = next.start - prev.end;
    if (blank < -EPS || blank > rules.joinToleranceSec + EPS) return false;
    if (duration(prev) >= rules.minDisplaySec && duration(next) >= rules.minDisplaySec) return false;
    if (SENTENCE_END.test(prev.text)) return false;
    return next.end - prev.start <= rules.maxMergedSec + EPS;
}

/** Join adjacent short speech fragments of one utterance, text in original order */
export function mergeFragments(segments: readonly Segment[], rules: TimingRules): Segment[] {
    const out: Segment[] = [];
    for (const s of segments) {
        const last = out[out.length - 1];
        if (last && canJoin(last, s, rules)) {
            out[out.length - 1] = { ...last, end: s.end, text: `${last.text} ${s.text}` };
        } else {
            out.push({ ...s });
        }
    }
    return out;
}

/** Extend `end` into free space until the display floor and reading speed are met */
export function extendForReadability(
    segments: readonly Segment[],
    durationSec: number,
    rules: TimingRules
): Segment[] {
    return segments.map((s, i) => {
        const need = readingFloor(s, rules);
        if (duration(s) >= need - EPS) return { ...s };
        const next = segments[i + 1];
        const limit = next ? next.start - rules.minGapSec : durationSec;
        const end = roundTime(Math.min(s.start + need, limit));
        return end > s.end ? { ...s, end } : { ...s };
    });
}

/**
 * Open the minimum blank between neighbours by shortening the earlier caption, or
 * failing that delaying the later one, as long as the shortened caption keeps its
 * reading floor. Neighbours that cannot give way stay touching.
 */
export function enforceSpacing(segments: readonly Segment[], rules: TimingRules): Segment[] {
    const out = segments.map((s) => ({ ...s }));
    for (let i = 0; i + 1 < out.length; i++) {
        const cur = out[i];
        const next = out[i + 1];
        if (next.start - cur.end >= rules.minGapSec - EPS) continue;
        const shortenedEnd = roundTime(next.start - rules.minGapSec);
        if (shortenedEnd - cur.start >= readingFloor(cur, rules) - EPS) {
            cur.end = shortenedEnd;
            continue;
        }
        const delayedStart = roundTime(cur.end + rules.minGapSec);
        if (next.end - delayedStart >= readingFloor(next, rules) - EPS) {
            next.start = delayedStart;
        }
    }
    return out;
}

/** Deterministic readability pass applied on top of an accepted proposal */
export function refineTiming(segments: readonly Segment[], durationSec: number, rules: TimingRules): Segment[] {
    const merged = mergeFragments(segments, rules);
    const extended = extendForReadability(merged, durationSec, rules);
    return enforceSpacing(extended, rules);
}

/** Provenance of the input segment overlapping `item` the most (nearest start if none) */
export function inheritSource(item: Pick<Segment, 'start' | 'end'>, input: readonly Segment[]): SegmentSource {
    let best = input[0];
    let bestOverlap = -Infinity;
    for (const s of input) {
        const overlap = Math.min(s.end, item.end) - Math.max(s.start, item.start);
        const score = overlap > 0 ? overlap : -Math.abs(s.start - item.start);
        if (score > bestOverlap) {
            bestOverlap = score;
            best = s;
        }
    }
    return best.source;
}

const normalizeText = (t: string) => t.replace(/\s+/g, ' ').trim();

/**
 * Every input segment must reappear in order with its content type, either alone or
 * joined with its neighbours (texts concatenated with one space). Returns the first
 * mismatch, or null.
 */
export function findContentChange(output: readonly Segment[], input: readonly Segment[]): string | null {
    let j = 0;
    for (const [i, o] of output.entries()) {
        const want = normalizeText(o.text);
        const first = input[j];
        if (!first) return `segment ${i} has no input counterpart`;
        if (first.contentType !== o.contentType) {
            return `segment ${i} changes ${first.contentType} to ${o.contentType}`;
        }
        let text = normalizeText(first.text);
        j++;
        while (text !== want && j < input.length && input[j].contentType === o.contentType) {
            const joined = `${text} ${normalizeText(input[j].text)}`;
            if (!want.startsWith(joined)) break;
            text = joined;
            j++;
        }
        if (text !== want) return `segment ${i} text differs from the input`;
    }
    return j < input.length ? `${input.length - j} input segment(s) missing` : null;
}

/**
 * First uncovered interval of `output` that exposes more than `thresholdSec` of audio
 * the input covered, or null. Widening a blank the input already had is allowed up to
 * the threshold.
 */
export function findOpenedGap(
    output: readonly Segment[],
    input: readonly Segment[],
    durationSec: number,
    thresholdSec: number
): string | null {
    const before = detectGaps(input, durationSec, 0);
    for (const g of detectGaps(output, durationSec, thresholdSec)) {
        const known = before.reduce(
            (sum, b) => sum + Math.max(0, Math.min(b.end, g.end) - Math.max(b.start, g.start)),
            0
        );
        if (g.end - g.start - known > thresholdSec + EPS) return `${g.start}..${g.end} is left uncovered`;
    }
    return null;
}

/**
 * Turn a proposal into segments, or explain why it cannot be used. Proposals are
 * all-or-nothing: one bad item rejects the whole reply, and so does a reply that
 * drops, rewrites or relabels content or uncovers audio the input covered.
 */
export function acceptProposal(
    items: readonly ReplySegment[],
    input: readonly Segment[],
    durationSec: number,
    gapThresholdSec: number = DEFAULT_GAP_THRESHOLD_SEC
): { ok: true; segments: Segment[] } | { ok: false; reason: string } {
    const segments: Segment[] = [];
    for (const [i, item] of items.entries()) {
        if (item.start < -EPS || item.end > durationSec + EPS) {
            return { ok: false, reason: `item ${i} (${item.start}..${item.end}) outside [0, ${durationSec}]` };
        }
        const start = Math.max(0, item.start);
        const end = Math.min(durationSec, item.end);
        if (roundTime(end) <= roundTime(start)) return { ok: false, reason: `item ${i} has no duration` };
        segments.push(
            createSegment({
                start,
                end,
                text: item.text,
                contentType: item.contentType,
                source: inheritSource({ start, end }, input),
            })
        );
    }
    const reason =
        findTimelineViolation(segments, durationSec) ??
        findContentChange(segments, input) ??
        findOpenedGap(segments, input, durationSec, gapThresholdSec);
    return reason ? { ok: false, reason } : { ok: true, segments };
}

/**
 * Holistic timing pass. Best effort: any failure returns the input unchanged.
 */
export async function optimizeTiming(
    input: readonly Segment[],
    durationSec: number,
    ctx: OptimizeContext,
    rules: TimingRules = DEFAULT_TIMING_RULES,
    gapThresholdSec: number = DEFAULT_GAP_THRESHOLD_SEC
): Promise<OptimizeResult> {
    const unchanged = (): Segment[] => input.map((s) => ({ ...s }));
    if (!input.length) return { segments: [], outcome: 'skipped' };

    const timer = startStep('optimize', { segments: input.length });
    const fallback = (reason: string, meta: Record<string, unknown> = {}): OptimizeResult => {
        warn('optimize.fallback', { reason, ...meta });
        timer.end({ outcome: 'fallback' });
        return { segments: unchanged(), outcome: 'fallback' };
    };

    let text: string;
    try {
        const reply = await withRetry(
            (signal) => ctx.service.analyze({ prompt: optimizePrompt(input, durationSec, rules), signal }),
            ctx.retry,
            { label: 'optimize', meta: { segments: input.length }, signal: ctx.signal }
        );
        ctx.usage.record('timingOptimization', reply.usage);
        text = reply.text;
    } catch (e) {
        if (e instanceof JobCancelledError) throw e;
        await ctx.audit?.saveError('optimize', errorMessage(e));
        return fallback('collaborator failed', { error: errorMessage(e) });
    }
    await ctx.audit?.saveReply('optimize', text);

    const parsed = parseSegmentReply(text);
    if (parsed.kind === 'empty') return fallback('empty reply');
    if (parsed.kind === 'unparsable') return fallback('unparsable reply', { detail: parsed.reason });
    if (parsed.dropped > 0) return fallback('invalid items in reply', { dropped: parsed.dropped });

    const accepted = acceptProposal(parsed.value, input, durationSec, gapThresholdSec);
    if (!accepted.ok) return fallback('inconsistent proposal', { detail: accepted.reason });

    const refined = refineTiming(accepted.segments, durationSec, rules);
    const violation =
        findTimelineViolation(refined, durationSec) ?? findOpenedGap(refined, input, durationSec, gapThresholdSec);
    if (violation) return fallback('refinement broke the timeline', { detail: violation });

    debug('optimize.counts', { before: input.length, proposed: accepted.segments.length, after: refined.length });
    info('optimize.applied', { segments: refined.length });
    timer.end({ outcome: 'applied' });
    return { segments: refined, outcome: 'applied' };
}
