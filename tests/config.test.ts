import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CAPTION_CONFIG,
  captionConfigFromEnv,
  captionFormatFrom,
  validateCaptionConfig,
} from '../src/pipeline/config';
import { ENV } from '../src/pipeline/env';
import { ConfigurationError } from '../src/pipeline/errors';

describe('validateCaptionConfig', () => {
  it('accepts the defaults', () => {
    expect(validateCaptionConfig(DEFAULT_CAPTION_CONFIG)).toBe(DEFAULT_CAPTION_CONFIG);
  });

  it.each([
    { chunkSec: 0 },
    { overlapSec: -1 },
    { overlapSec: 30 },
    { gapThresholdSec: -0.5 },
    { chunkConcurrency: 0 },
  ])('rejects %o', (override) => {
    expect(() => validateCaptionConfig({ ...DEFAULT_CAPTION_CONFIG, ...override })).toThrow(ConfigurationError);
  });
});

describe('captionConfigFromEnv', () => {
  it('derives retry attempts and timeouts from the environment', () => {
    const cfg = captionConfigFromEnv({ ...ENV, collabRetries: 4, collabTimeoutSec: 15, chunkSec: 20, optimize: false });
    expect(cfg.retry.maxAttempts).toBe(5);
    expect(cfg.retry.timeoutMs).toBe(15000);
    expect(cfg.chunkSec).toBe(20);
    expect(cfg.optimize).toBe(false);
  });

  it('rejects an invalid environment', () => {
    expect(() => captionConfigFromEnv({ ...ENV, chunkSec: Number('abc') })).toThrow(ConfigurationError);
  });
});

describe('captionFormatFrom', () => {
  it('accepts srt and vtt in any case', () => {
    expect(captionFormatFrom('SRT')).toBe('srt');
    expect(captionFormatFrom('vtt')).toBe('vtt');
  });

  it('rejects other formats', () => {
    expect(() => captionFormatFrom('ass')).toThrow('Unsupported caption format: ass. Use srt or vtt');
  });
});
