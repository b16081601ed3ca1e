export type ContentType = 'speech' | 'music' | 'sound_effect' | 'silence';

export type SegmentSource =
    | { kind: 'chunk'; chunkIndex: number }
    | { kind: 'gap'; gapIndex: number };

export interface Segment {
    start: number;
    end: number;
    text: string;
    contentType: ContentType;
    source: SegmentSource;
}

export interface Chunk {
    index: number;
    globalStart: number;
    globalEnd: number;
}

export interface Gap {
    index: number;
    start: number;
    end: number;
}

export type CaptionFormat = 'srt' | 'vtt';

export const CAPTION_FORMATS: readonly CaptionFormat[] = ['srt', 'vtt'];

export function isCaptionFormat(v: unknown): v is CaptionFormat {
    return v === 'srt' || v === 'vtt';
}

export interface TimingRules {
    minDisplaySec: number;
    maxCharsPerSec: number;
    minGapSec: number;
    // Fragments closer than this are candidates for merging
    joinToleranceSec: number;
    maxMergedSec: number;
    maxSoundEffectSec: number;
}

export interface AudioPayload {
    data: Buffer;
    mimeType: string;
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
}

export type UsagePhase = 'chunkTranscription' | 'gapAnalysis' | 'timingOptimization';

export interface PhaseUsage extends TokenUsage {
    calls: number;
}

export interface UsageReport {
    phases: Record<UsagePhase, PhaseUsage>;
    total: PhaseUsage;
}

export type OptimizerOutcome = 'applied' | 'fallback' | 'skipped';

export interface JobDiagnostics {
    durationSec: number;
    chunks: number;
    failedChunks: number[];
    gapsDetected: number;
    gapsSynthesized: number;
    optimizer: OptimizerOutcome;
}

/** A caption cue read back from a rendered document */
export interface CaptionCue {
    start: number;
    end: number;
    contentType: ContentType;
    text: string;
}
