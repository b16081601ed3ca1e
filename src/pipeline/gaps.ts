import { JobCancelledError } from './errors';
import { debug, errorMessage, info, startStep, warn } from './log';
import { parseGapReply } from './parse';
import { runPool } from './pool';
import { gapPrompt } from './prompts';
import { withRetry } from './retry';
import { Timeline, createSegment, roundTime } from './segment';
import type { PassContext } from './transcribe';
import type { Gap, Segment } from './types';

export const DEFAULT_GAP_THRESHOLD_SEC = 1;

/**
 * Uncovered intervals strictly longer than `thresholdSec`, including the head
 * (before the first segment) and the tail (up to `durationSec`). Gaps are disjoint.
 */
export function detectGaps(
    segments: readonly Segment[],
    durationSec: number,
    thresholdSec: number = DEFAULT_GAP_THRESHOLD_SEC
): Gap[] {
    const gaps: Gap[] = [];
    let cursor = 0;
    const push = (start: number, end: number) => {
        if (end - start > thresholdSec) {
            gaps.push({ index: gaps.length, start: roundTime(start), end: roundTime(end) });
        }
    };
    for (const s of segments) {
        push(cursor, s.start);
        cursor = Math.max(cursor, s.end);
    }
    push(cursor, durationSec);
    return gaps;
}

export function gapLabel(gap: Gap): string {
    return `gap_${String(gap.index).padStart(4, '0')}`;
}

export function silenceFor(gap: Gap): Segment {
    return createSegment({
        start: gap.start,
        end: gap.end,
        text: 'Silence',
        contentType: 'silence',
        source: { kind: 'gap', gapIndex: gap.index },
    });
}

export interface GapFill {
    segment: Segment;
    synthesized: boolean;
}

/**
 * Classify one gap. The result always spans the whole gap; anything short of a usable
 * classification yields a synthesized Silence segment.
 */
export async function classifyGap(gap: Gap, ctx: PassContext): Promise<GapFill> {
    const meta = { gapIdx: gap.index, start: gap.start, end: gap.end };
    const name = gapLabel(gap);
    try {
        const audio = await ctx.extractor.extractRange(ctx.sourcePath, gap.start, gap.end);
        const reply = await withRetry(
            (signal) => ctx.service.analyze({ prompt: gapPrompt(gap), audio, signal }),
            ctx.retry,
            { label: 'gaps.classify', meta, signal: ctx.signal }
        );
        ctx.usage.record('gapAnalysis', reply.usage);
        await ctx.audit?.saveReply(name, reply.text);

        const parsed = parseGapReply(reply.text);
        if (parsed.kind === 'parsed') {
            const segment = createSegment({
                start: gap.start,
                end: gap.end,
                text: parsed.value.text,
                contentType: parsed.value.contentType,
                source: { kind: 'gap', gapIndex: gap.index },
            });
            if (segment.text) return { segment, synthesized: false };
            debug('gaps.classify.blank', meta);
        } else if (parsed.kind === 'unparsable') {
            warn('gaps.classify.unparsable', { ...meta, reason: parsed.reason });
        } else {
            debug('gaps.classify.empty', meta);
        }
    } catch (e) {
        if (e instanceof JobCancelledError || ctx.signal?.aborted) throw new JobCancelledError();
        warn('gaps.classify.fail', { ...meta, error: errorMessage(e) });
        await ctx.audit?.saveError(name, errorMessage(e));
    }
    info('gaps.fill.synth', meta);
    return { segment: silenceFor(gap), synthesized: true };
}

/**
 * Classify gaps in parallel and splice one segment per gap into the timeline.
 * Insertion happens on completion, one at a time, through `Timeline.insert`.
 */
export async function fillGaps(
    timeline: Timeline,
    gaps: readonly Gap[],
    ctx: PassContext,
    concurrency: number
): Promise<{ synthesized: number }> {
    if (!gaps.length) return { synthesized: 0 };
    const timer = startStep('gaps.fill', { gaps: gaps.length, concurrency });
    let synthesized = 0;
    await runPool(
        gaps,
        concurrency,
        async (gap) => {
            const fill = await classifyGap(gap, ctx);
            timeline.insert(fill.segment);
            if (fill.synthesized) synthesized++;
        },
        { signal: ctx.signal, onSettled: (done, total) => timer.eta(done, total) }
    );
    timer.end({ synthesized });
    return { synthesized };
}
