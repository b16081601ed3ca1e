import type { AuditSink } from './audit';
import { planChunks } from './chunk';
import { type CaptionConfig, validateCaptionConfig } from './config';
import { JobCancelledError } from './errors';
import { detectGaps, fillGaps } from './gaps';
import { info, startStep, warn } from './log';
import type { MediaExtractor } from './media';
import { mergeSegments } from './merge';
import { optimizeTiming } from './optimize';
import { renderCaptions } from './render';
import { Timeline, roundTime } from './segment';
import type { AudioUnderstandingService } from './service';
import { type ChunkOutcome, type PassContext, transcribeChunks } from './transcribe';
import type { CaptionFormat, JobDiagnostics, OptimizerOutcome, Segment, UsageReport } from './types';
import { UsageTracker } from './usage';

export interface CaptionEngineDeps {
    service: AudioUnderstandingService;
    extractor: MediaExtractor;
    config: CaptionConfig;
    audit?: AuditSink;
}

export interface CaptionJob {
    /** Audio (or any media ffmpeg can read) the ranges are cut from */
    sourcePath: string;
    /** Probed through the extractor when omitted */
    durationSec?: number;
    format: CaptionFormat;
    signal?: AbortSignal;
    /** On cancellation, merge and render what the chunk pass already returned */
    partial?: boolean;
}

export interface CaptionJobResult {
    segments: readonly Segment[];
    document: string;
    format: CaptionFormat;
    usage: UsageReport;
    partial: boolean;
    diagnostics: JobDiagnostics;
}

/**
 * Caption Assembly Engine. Stateless across jobs: each `run` owns exactly one
 * Timeline, which is never handed to worker tasks; they return segments and the
 * engine applies them.
 */
export class CaptionEngine {
    private readonly config: CaptionConfig;

    constructor(private readonly deps: CaptionEngineDeps) {
        this.config = validateCaptionConfig(deps.config);
    }

    async run(job: CaptionJob): Promise<CaptionJobResult> {
        const { config } = this;
        // Segment times are kept at millisecond resolution, so the bound they are clamped to must be too
        const durationSec = roundTime(job.durationSec ?? (await this.deps.extractor.probeDuration(job.sourcePath)));
        const chunks = planChunks(durationSec, { chunkSec: config.chunkSec, overlapSec: config.overlapSec });

        const usage = new UsageTracker();
        const ctx: PassContext = {
            service: this.deps.service,
            extractor: this.deps.extractor,
            sourcePath: job.sourcePath,
            retry: config.retry,
            usage,
            audit: this.deps.audit,
            signal: job.signal,
        };
        const diagnostics: JobDiagnostics = {
            durationSec,
            chunks: chunks.length,
            failedChunks: [],
            gapsDetected: 0,
            gapsSynthesized: 0,
            optimizer: 'skipped',
        };
        const timer = startStep('engine.run', { sourcePath: job.sourcePath, durationSec, chunks: chunks.length });

        const received: ChunkOutcome[] = [];
        let outcomes: ChunkOutcome[];
        try {
            outcomes = await transcribeChunks(chunks, ctx, {
                concurrency: config.chunkConcurrency,
                onOutcome: (o) => received.push(o),
            });
        } catch (e) {
            if (e instanceof JobCancelledError && job.partial) {
                warn('engine.cancelled.partial', { received: received.length, chunks: chunks.length });
                return this.partialResult(received, durationSec, job.format, usage, diagnostics);
            }
            throw e;
        }
        diagnostics.failedChunks = outcomes.filter((o) => o.status !== 'ok').map((o) => o.chunk.index);

        const timeline = new Timeline(
            durationSec,
            mergeSegments(
                outcomes.map((o) => o.segments),
                durationSec
            )
        );

        const gaps = detectGaps(timeline.snapshot(), durationSec, config.gapThresholdSec);
        diagnostics.gapsDetected = gaps.length;
        try {
            const filled = await fillGaps(timeline, gaps, ctx, config.gapConcurrency);
            diagnostics.gapsSynthesized = filled.synthesized;
        } catch (e) {
            if (e instanceof JobCancelledError && job.partial) {
                warn('engine.cancelled.partial', { phase: 'gaps', segments: timeline.length });
                return this.finish(timeline, job.format, usage, diagnostics, true);
            }
            throw e;
        }

        let outcome: OptimizerOutcome = 'skipped';
        if (config.optimize) {
            try {
                const optimized = await optimizeTiming(
                    timeline.snapshot(),
                    durationSec,
                    ctx,
                    config.timing,
                    config.gapThresholdSec
                );
                timeline.replaceAll(optimized.segments);
                outcome = optimized.outcome;
            } catch (e) {
                if (e instanceof JobCancelledError && job.partial) {
                    return this.finish(timeline, job.format, usage, diagnostics, true);
                }
                throw e;
            }
        }
        diagnostics.optimizer = outcome;

        const result = this.finish(timeline, job.format, usage, diagnostics, false);
        timer.end({
            segments: result.segments.length,
            failedChunks: diagnostics.failedChunks.length,
            gaps: diagnostics.gapsDetected,
            optimizer: outcome,
            tokens: result.usage.total.promptTokens + result.usage.total.completionTokens,
        });
        return result;
    }

    private partialResult(
        received: readonly ChunkOutcome[],
        durationSec: number,
        format: CaptionFormat,
        usage: UsageTracker,
        diagnostics: JobDiagnostics
    ): CaptionJobResult {
        const ordered = [...received].sort((a, b) => a.chunk.index - b.chunk.index);
        const timeline = new Timeline(
            durationSec,
            mergeSegments(
                ordered.map((o) => o.segments),
                durationSec
            )
        );
        diagnostics.failedChunks = ordered.filter((o) => o.status !== 'ok').map((o) => o.chunk.index);
        return this.finish(timeline, format, usage, diagnostics, true);
    }

    private finish(
        timeline: Timeline,
        format: CaptionFormat,
        usage: UsageTracker,
        diagnostics: JobDiagnostics,
        partial: boolean
    ): CaptionJobResult {
        const segments = timeline.snapshot();
        const document = renderCaptions(segments, format);
        info('engine.rendered', { format, segments: segments.length, partial });
        return { segments, document, format, usage: usage.report(), partial, diagnostics };
    }
}
