import type { AuditSink } from './audit';
import { chunkDuration } from './chunk';
import { JobCancelledError } from './errors';
import { debug, errorMessage, info, startStep, warn } from './log';
import type { MediaExtractor } from './media';
import { type ReplySegment, parseSegmentReply } from './parse';
import { runPool } from './pool';
import { chunkPrompt } from './prompts';
import { type RetryPolicy, withRetry } from './retry';
import { createSegment, roundTime } from './segment';
import type { AudioUnderstandingService } from './service';
import type { AudioPayload, Chunk, Segment } from './types';
import { UsageTracker } from './usage';

// Slack when deciding whether reported times are chunk-relative or absolute
const EPS = 0.05;
const MIN_SEGMENT_SEC = 0.001;

/** Everything a collaborator call site needs for one job */
export interface PassContext {
    service: AudioUnderstandingService;
    extractor: MediaExtractor;
    sourcePath: string;
    retry: RetryPolicy;
    usage: UsageTracker;
    audit?: AuditSink;
    signal?: AbortSignal;
}

export type ChunkStatus = 'ok' | 'empty' | 'unparsable' | 'failed';

export interface ChunkOutcome {
    chunk: Chunk;
    status: ChunkStatus;
    segments: Segment[];
    /** Reply items rejected by validation or collapsed by clamping */
    dropped: number;
}

export function chunkLabel(chunk: Chunk): string {
    return `chunk_${String(chunk.index).padStart(4, '0')}`;
}

/**
 * A reply whose times all fall inside the chunk's global window, with some past the
 * chunk's own length, was given in absolute time and must not be offset again.
 */
export function looksAbsolute(items: readonly ReplySegment[], chunk: Chunk): boolean {
    if (chunk.globalStart <= 0 || items.length === 0) return false;
    const dur = chunkDuration(chunk);
    const inWindow = items.every(
        (i) => i.start >= chunk.globalStart - EPS && i.end <= chunk.globalEnd + EPS
    );
    return inWindow && items.some((i) => i.end > dur + EPS);
}

function clamp(v: number, lo: number, hi: number): number {
    return Math.min(hi, Math.max(lo, v));
}

/**
 * Translate reply items to global time and clamp them to the chunk window.
 * Overlaps inside one chunk are kept; merge resolves them later.
 */
export function toGlobalSegments(
    items: readonly ReplySegment[],
    chunk: Chunk
): { segments: Segment[]; clamped: number; dropped: number } {
    const offset = looksAbsolute(items, chunk) ? 0 : chunk.globalStart;
    const segments: Segment[] = [];
    let clamped = 0;
    let dropped = 0;
    for (const item of items) {
        const rawStart = roundTime(item.start + offset);
        const rawEnd = roundTime(item.end + offset);
        const start = clamp(rawStart, chunk.globalStart, chunk.globalEnd);
        const end = clamp(rawEnd, chunk.globalStart, chunk.globalEnd);
        if (start !== rawStart || end !== rawEnd) clamped++;
        if (end - start < MIN_SEGMENT_SEC) {
            dropped++;
            continue;
        }
        segments.push(
            createSegment({
                start,
                end,
                text: item.text,
                contentType: item.contentType,
                source: { kind: 'chunk', chunkIndex: chunk.index },
            })
        );
    }
    return { segments, clamped, dropped };
}

/**
 * Transcribe one chunk. Never throws for collaborator or parse trouble: the chunk then
 * contributes nothing and its span is left for the gap pass. Only cancellation escapes.
 */
export async function transcribeChunk(chunk: Chunk, ctx: PassContext): Promise<ChunkOutcome> {
    const meta = { idx: chunk.index, start: chunk.globalStart, end: chunk.globalEnd };
    const name = chunkLabel(chunk);
    const failed = (): ChunkOutcome => ({ chunk, status: 'failed', segments: [], dropped: 0 });

    let audio: AudioPayload;
    try {
        audio = await ctx.extractor.extractRange(ctx.sourcePath, chunk.globalStart, chunk.globalEnd);
    } catch (e) {
        if (ctx.signal?.aborted) throw new JobCancelledError();
        warn('transcribe.chunk.extract.fail', { ...meta, error: errorMessage(e) });
        await ctx.audit?.saveError(name, errorMessage(e));
        return failed();
    }
    await ctx.audit?.saveAudio(name, audio);

    info('transcribe.chunk.start', meta);
    let text: string;
    try {
        const reply = await withRetry(
            (signal) => ctx.service.analyze({ prompt: chunkPrompt(chunk), audio, signal }),
            ctx.retry,
            { label: 'transcribe.chunk', meta, signal: ctx.signal }
        );
        ctx.usage.record('chunkTranscription', reply.usage);
        text = reply.text;
    } catch (e) {
        if (e instanceof JobCancelledError) throw e;
        warn('transcribe.chunk.giveup', { ...meta, error: errorMessage(e) });
        await ctx.audit?.saveError(name, `Error at ${chunk.globalStart.toFixed(2)}s: ${errorMessage(e)}`);
        return failed();
    }
    await ctx.audit?.saveReply(name, text);

    const parsed = parseSegmentReply(text);
    switch (parsed.kind) {
        case 'empty':
            info('transcribe.chunk.empty', meta);
            return { chunk, status: 'empty', segments: [], dropped: 0 };
        case 'unparsable':
            warn('transcribe.chunk.unparsable', { ...meta, reason: parsed.reason, snippet: text.slice(0, 200) });
            return { chunk, status: 'unparsable', segments: [], dropped: 0 };
        case 'parsed': {
            const { segments, clamped, dropped } = toGlobalSegments(parsed.value, chunk);
            if (clamped) debug('transcribe.chunk.clamped', { ...meta, clamped });
            info('transcribe.chunk.done', { ...meta, segments: segments.length, dropped: parsed.dropped + dropped });
            return { chunk, status: 'ok', segments, dropped: parsed.dropped + dropped };
        }
    }
}

export interface TranscribeOptions {
    concurrency: number;
    /** Receives each outcome as soon as it arrives, e.g. to keep partial results */
    onOutcome?: (outcome: ChunkOutcome) => void;
}

export async function transcribeChunks(
    chunks: readonly Chunk[],
    ctx: PassContext,
    opts: TranscribeOptions
): Promise<ChunkOutcome[]> {
    const timer = startStep('transcribe.chunks', { total: chunks.length, concurrency: opts.concurrency });
    const outcomes = await runPool(
        chunks,
        opts.concurrency,
        async (chunk) => {
            const outcome = await transcribeChunk(chunk, ctx);
            opts.onOutcome?.(outcome);
            return outcome;
        },
        { signal: ctx.signal, onSettled: (done, total) => timer.eta(done, total) }
    );
    timer.end({ failed: outcomes.filter((o) => o.status !== 'ok').length });
    return outcomes;
}
