import { DEFAULT_GAP_THRESHOLD_SEC } from './gaps';
import { ConfigurationError } from './errors';
import { DEFAULT_TIMING_RULES } from './optimize';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';
import type { Env } from './env';
import { type CaptionFormat, type TimingRules, isCaptionFormat } from './types';

export interface CaptionConfig {
    chunkSec: number;
    overlapSec: number;
    gapThresholdSec: number;
    chunkConcurrency: number;
    gapConcurrency: number;
    optimize: boolean;
    retry: RetryPolicy;
    timing: TimingRules;
}

export const DEFAULT_CAPTION_CONFIG: CaptionConfig = {
    chunkSec: 30,
    overlapSec: 0,
    gapThresholdSec: DEFAULT_GAP_THRESHOLD_SEC,
    chunkConcurrency: 4,
    gapConcurrency: 4,
    optimize: true,
    retry: DEFAULT_RETRY_POLICY,
    timing: DEFAULT_TIMING_RULES,
};

function positive(name: string, v: number) {
    if (!Number.isFinite(v) || v <= 0) throw new ConfigurationError(`${name} must be > 0 (got ${v})`, { [name]: v });
}

function nonNegative(name: string, v: number) {
    if (!Number.isFinite(v) || v < 0) throw new ConfigurationError(`${name} must be >= 0 (got ${v})`, { [name]: v });
}

export function validateCaptionConfig(cfg: CaptionConfig): CaptionConfig {
    positive('chunkSec', cfg.chunkSec);
    nonNegative('overlapSec', cfg.overlapSec);
    if (cfg.overlapSec >= cfg.chunkSec) {
        throw new ConfigurationError(`overlapSec must be smaller than chunkSec`, {
            overlapSec: cfg.overlapSec,
            chunkSec: cfg.chunkSec,
        });
    }
    nonNegative('gapThresholdSec', cfg.gapThresholdSec);
    positive('chunkConcurrency', cfg.chunkConcurrency);
    positive('gapConcurrency', cfg.gapConcurrency);
    positive('retry.maxAttempts', cfg.retry.maxAttempts);
    nonNegative('retry.initialDelayMs', cfg.retry.initialDelayMs);
    nonNegative('retry.timeoutMs', cfg.retry.timeoutMs);
    positive('timing.minDisplaySec', cfg.timing.minDisplaySec);
    positive('timing.maxCharsPerSec', cfg.timing.maxCharsPerSec);
    nonNegative('timing.minGapSec', cfg.timing.minGapSec);
    return cfg;
}

export function captionConfigFromEnv(env: Env): CaptionConfig {
    return validateCaptionConfig({
        ...DEFAULT_CAPTION_CONFIG,
        chunkSec: env.chunkSec,
        overlapSec: env.overlapSec,
        gapThresholdSec: env.gapThresholdSec,
        chunkConcurrency: env.chunkConcurrency,
        gapConcurrency: env.gapConcurrency,
        optimize: env.optimize,
        retry: {
            ...DEFAULT_RETRY_POLICY,
            maxAttempts: Math.max(0, env.collabRetries) + 1,
            initialDelayMs: env.collabRetryBaseMs,
            timeoutMs: env.collabTimeoutSec * 1000,
        },
        timing: {
            ...DEFAULT_TIMING_RULES,
            minDisplaySec: env.minDisplaySec,
            maxCharsPerSec: env.maxCharsPerSec,
            minGapSec: env.minGapSec,
        },
    });
}

export function captionFormatFrom(value: string): CaptionFormat {
    const v = value.toLowerCase();
    if (!isCaptionFormat(v)) {
        throw new ConfigurationError(`Unsupported caption format: ${value}. Use srt or vtt`, { format: value });
    }
    return v;
}
