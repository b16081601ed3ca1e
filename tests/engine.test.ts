import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ArtifactAudit } from '../src/pipeline/audit';
import { DEFAULT_CAPTION_CONFIG, type CaptionConfig } from '../src/pipeline/config';
import { CaptionEngine } from '../src/pipeline/engine';
import { CollaboratorUnavailableError, ConfigurationError, JobCancelledError } from '../src/pipeline/errors';
import { findTimelineViolation } from '../src/pipeline/segment';
import type { AnalysisRequest } from '../src/pipeline/service';
import type { Segment } from '../src/pipeline/types';
import { FAST_RETRY, FakeExtractor, FakeService, chunkStartOf, echoProposal, type RequestKind } from './fakes';

const USAGE = { promptTokens: 10, completionTokens: 2 };

const config = (overrides: Partial<CaptionConfig> = {}): CaptionConfig => ({
  ...DEFAULT_CAPTION_CONFIG,
  retry: FAST_RETRY,
  ...overrides,
});

const spans = (segments: readonly Segment[]) => segments.map((s) => [s.start, s.end, s.contentType, s.text]);

/** 90s of audio; the middle chunk comes back as prose */
function scriptedReply(req: AnalysisRequest, kind: RequestKind): string {
  if (kind === 'gap') return '{"type": "music", "text": "Soft piano"}';
  if (kind === 'optimize') return 'The timing already looks good.';
  const start = chunkStartOf(req);
  if (start === 30) return 'I cannot transcribe this.';
  return `[{"start": 0, "end": 30, "type": "speech", "text": "${start === 0 ? 'First part' : 'Last part'}"}]`;
}

describe('CaptionEngine', () => {
  it('captions a job whose middle chunk is unparsable by filling the gap', async () => {
    const service = new FakeService(scriptedReply, USAGE);
    const engine = new CaptionEngine({ service, extractor: new FakeExtractor(90), config: config() });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });

    expect(spans(result.segments)).toEqual([
      [0, 30, 'speech', 'First part'],
      [30, 60, 'music', 'Soft piano'],
      [60, 90, 'speech', 'Last part'],
    ]);
    expect(result.segments[1].source).toEqual({ kind: 'gap', gapIndex: 0 });
    expect(result.document).toBe(
      [
        '1',
        '00:00:00,000 --> 00:00:30,000',
        'First part',
        '',
        '2',
        '00:00:30,000 --> 00:01:00,000',
        '[♪ Soft piano ♪]',
        '',
        '3',
        '00:01:00,000 --> 00:01:30,000',
        'Last part',
        '',
      ].join('\n')
    );
    expect(result.partial).toBe(false);
    expect(result.diagnostics).toEqual({
      durationSec: 90,
      chunks: 3,
      failedChunks: [1],
      gapsDetected: 1,
      gapsSynthesized: 0,
      optimizer: 'fallback',
    });
  });

  it('reports token usage per phase', async () => {
    const service = new FakeService(scriptedReply, USAGE);
    const engine = new CaptionEngine({ service, extractor: new FakeExtractor(90), config: config() });
    const { usage } = await engine.run({ sourcePath: 'audio.wav', format: 'vtt' });
    expect(usage.phases).toEqual({
      chunkTranscription: { promptTokens: 30, completionTokens: 6, calls: 3 },
      gapAnalysis: { promptTokens: 10, completionTokens: 2, calls: 1 },
      timingOptimization: { promptTokens: 10, completionTokens: 2, calls: 1 },
    });
    expect(usage.total).toEqual({ promptTokens: 50, completionTokens: 10, calls: 5 });
  });

  it('applies the timing pass when the proposal is consistent', async () => {
    const service = new FakeService(
      (req, kind) => (kind === 'optimize' ? echoProposal(req) : scriptedReply(req, kind)),
      USAGE
    );
    const engine = new CaptionEngine({ service, extractor: new FakeExtractor(90), config: config() });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(result.diagnostics.optimizer).toBe('applied');
    expect(spans(result.segments)).toEqual([
      [0, 29.92, 'speech', 'First part'],
      [30, 59.92, 'music', 'Soft piano'],
      [60, 90, 'speech', 'Last part'],
    ]);
  });

  it('skips the timing pass when disabled', async () => {
    const service = new FakeService(scriptedReply, USAGE);
    const engine = new CaptionEngine({
      service,
      extractor: new FakeExtractor(90),
      config: config({ optimize: false }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(result.diagnostics.optimizer).toBe('skipped');
    expect(service.count('optimize')).toBe(0);
  });

  it('still produces a full-coverage track when every chunk fails', async () => {
    const service = new FakeService((_req, kind) =>
      kind === 'chunk' ? new CollaboratorUnavailableError('bad key', { retryable: false }) : ''
    );
    const engine = new CaptionEngine({
      service,
      extractor: new FakeExtractor(90),
      config: config({ optimize: false }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'vtt' });
    expect(spans(result.segments)).toEqual([[0, 90, 'silence', 'Silence']]);
    expect(result.document).toBe('WEBVTT\n\ncue-1\n00:00:00.000 --> 00:01:30.000\n[Silence]\n');
    expect(result.diagnostics.failedChunks).toEqual([0, 1, 2]);
    expect(result.diagnostics.gapsSynthesized).toBe(1);
  });

  it('keeps the timeline valid for uneven, overlapping chunk replies', async () => {
    const service = new FakeService((req, kind) => {
      if (kind !== 'chunk') return '';
      const start = chunkStartOf(req);
      return JSON.stringify([
        { start: 0.5, end: 12, type: 'speech', text: `a${start}` },
        { start: 10, end: 20, type: 'speech', text: `b${start}` },
        { start: 25, end: 34, type: 'sound', text: 'Thud' },
      ]);
    });
    const engine = new CaptionEngine({
      service,
      extractor: new FakeExtractor(75),
      config: config({ optimize: false }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(findTimelineViolation(result.segments, 75)).toBeNull();
    // the 0.5s head is under the gap threshold; the 5s holes at 20s and 50s are filled
    expect(result.segments.map((s) => [s.start, s.end])).toEqual([
      [0.5, 10],
      [10, 20],
      [20, 25],
      [25, 30],
      [30.5, 40],
      [40, 50],
      [50, 55],
      [55, 60],
      [60.5, 70],
      [70, 75],
    ]);
  });

  it('keeps a sub-millisecond probed duration from breaking the timeline', async () => {
    const extractor = new FakeExtractor(90.0237);
    const engine = new CaptionEngine({
      service: new FakeService(() => '[]'),
      extractor,
      config: config({ optimize: false, chunkConcurrency: 1 }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(result.diagnostics.durationSec).toBe(90.024);
    expect(result.diagnostics.chunks).toBe(3);
    expect(extractor.ranges.slice(0, 3)).toEqual([
      [0, 30],
      [30, 60],
      [60, 90.024],
    ]);
    expect(spans(result.segments)).toEqual([[0, 90.024, 'silence', 'Silence']]);
  });

  it('clamps chunk replies to a sub-millisecond audio end', async () => {
    const service = new FakeService((req, kind) =>
      kind === 'chunk' ? `[{"start": 0, "end": 31, "type": "speech", "text": "c${chunkStartOf(req)}"}]` : ''
    );
    const engine = new CaptionEngine({
      service,
      extractor: new FakeExtractor(90.0237),
      config: config({ optimize: false }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(spans(result.segments)).toEqual([
      [0, 30, 'speech', 'c0'],
      [30, 60, 'speech', 'c30'],
      [60, 90.024, 'speech', 'c60'],
    ]);
  });

  it('keeps the gap-filled timeline when the timing reply loses content', async () => {
    const service = new FakeService(
      (req, kind) =>
        kind === 'optimize'
          ? JSON.stringify([
              { start: 0, end: 30, type: 'speech', text: 'First part' },
              { start: 60, end: 90, type: 'speech', text: 'Totally different' },
            ])
          : scriptedReply(req, kind),
      USAGE
    );
    const engine = new CaptionEngine({ service, extractor: new FakeExtractor(90), config: config() });
    const result = await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
    expect(result.diagnostics.optimizer).toBe('fallback');
    expect(spans(result.segments)).toEqual([
      [0, 30, 'speech', 'First part'],
      [30, 60, 'music', 'Soft piano'],
      [60, 90, 'speech', 'Last part'],
    ]);
  });

  it('uses a supplied duration without probing', async () => {
    const extractor = new FakeExtractor(999);
    const engine = new CaptionEngine({
      service: new FakeService(() => '[]'),
      extractor,
      config: config({ optimize: false }),
    });
    const result = await engine.run({ sourcePath: 'audio.wav', durationSec: 20, format: 'srt' });
    expect(result.diagnostics.chunks).toBe(1);
    expect(extractor.ranges[0]).toEqual([0, 20]);
  });

  it('rejects an invalid configuration up front', () => {
    expect(
      () =>
        new CaptionEngine({
          service: new FakeService(() => '[]'),
          extractor: new FakeExtractor(10),
          config: config({ chunkSec: 0 }),
        })
    ).toThrow(ConfigurationError);
  });

  describe('cancellation', () => {
    function cancellingService(controller: AbortController) {
      return new FakeService((req, kind) => {
        if (kind === 'chunk' && chunkStartOf(req) === 0) controller.abort();
        return scriptedReply(req, kind);
      });
    }

    it('fails with JobCancelledError by default', async () => {
      const controller = new AbortController();
      const engine = new CaptionEngine({
        service: cancellingService(controller),
        extractor: new FakeExtractor(90),
        config: config({ chunkConcurrency: 1 }),
      });
      await expect(
        engine.run({ sourcePath: 'audio.wav', format: 'srt', signal: controller.signal })
      ).rejects.toBeInstanceOf(JobCancelledError);
    });

    it('renders what already arrived when partial results are requested', async () => {
      const controller = new AbortController();
      const service = cancellingService(controller);
      const engine = new CaptionEngine({
        service,
        extractor: new FakeExtractor(90),
        config: config({ chunkConcurrency: 1 }),
      });
      const result = await engine.run({
        sourcePath: 'audio.wav',
        format: 'srt',
        signal: controller.signal,
        partial: true,
      });
      expect(result.partial).toBe(true);
      expect(spans(result.segments)).toEqual([[0, 30, 'speech', 'First part']]);
      expect(result.document).toBe('1\n00:00:00,000 --> 00:00:30,000\nFirst part\n');
      expect(service.count('chunk')).toBe(1);
    });
  });

  describe('auditing', () => {
    it('writes chunk audio, raw replies and errors into the job directory', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'captions-audit-'));
      try {
        const engine = new CaptionEngine({
          service: new FakeService(scriptedReply, USAGE),
          extractor: new FakeExtractor(90),
          config: config({ optimize: false }),
          audit: new ArtifactAudit(dir, { audio: true }),
        });
        await engine.run({ sourcePath: 'audio.wav', format: 'srt' });
        const files = (await fs.readdir(dir)).sort();
        expect(files).toEqual([
          'chunk_0000.wav',
          'chunk_0000_response.json',
          'chunk_0001.wav',
          'chunk_0001_response.json',
          'chunk_0002.wav',
          'chunk_0002_response.json',
          'gap_0000_response.json',
        ]);
        expect(await fs.readJson(path.join(dir, 'chunk_0001_response.json'))).toEqual({
          text: 'I cannot transcribe this.',
        });
        expect(await fs.readFile(path.join(dir, 'chunk_0002.wav'), 'utf8')).toBe('60-90');
      } finally {
        await fs.remove(dir);
      }
    });
  });
});
