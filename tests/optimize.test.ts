import { describe, it, expect } from 'vitest';
import { CollaboratorUnavailableError } from '../src/pipeline/errors';
import {
  DEFAULT_TIMING_RULES,
  acceptProposal,
  enforceSpacing,
  extendForReadability,
  mergeFragments,
  optimizeTiming,
  type OptimizeContext,
} from '../src/pipeline/optimize';
import { parseSegmentReply } from '../src/pipeline/parse';
import { createSegment } from '../src/pipeline/segment';
import type { ContentType, Segment } from '../src/pipeline/types';
import { UsageTracker } from '../src/pipeline/usage';
import { FAST_RETRY, FakeService } from './fakes';

function seg(start: number, end: number, text: string, contentType: ContentType = 'speech', chunkIndex = 0): Segment {
  return createSegment({ start, end, text, contentType, source: { kind: 'chunk', chunkIndex } });
}

function toReply(segments: readonly Segment[]): string {
  return JSON.stringify(segments.map((s) => ({ start: s.start, end: s.end, type: s.contentType, text: s.text })));
}

function context(service: FakeService): OptimizeContext {
  return { service, retry: FAST_RETRY, usage: new UsageTracker() };
}

const spans = (segments: readonly Segment[]) => segments.map((s) => [s.start, s.end, s.contentType, s.text]);

const rules = DEFAULT_TIMING_RULES;

describe('mergeFragments', () => {
  it('joins touching short speech fragments of one sentence', () => {
    const out = mergeFragments([seg(2, 2.4, 'Hello'), seg(2.4, 2.6, 'there')], rules);
    expect(spans(out)).toEqual([[2, 2.6, 'speech', 'Hello there']]);
  });

  it('does not join across a sentence end, a wide blank or non-speech', () => {
    expect(mergeFragments([seg(0, 0.5, 'Stop.'), seg(0.5, 0.9, 'Go')], rules)).toHaveLength(2);
    expect(mergeFragments([seg(0, 0.5, 'Wait'), seg(1, 1.4, 'here')], rules)).toHaveLength(2);
    expect(mergeFragments([seg(0, 0.5, 'Wait'), seg(0.5, 0.9, 'Drums', 'music')], rules)).toHaveLength(2);
  });

  it('does not join two segments that are each long enough', () => {
    expect(mergeFragments([seg(0, 1.5, 'one'), seg(1.5, 3, 'two')], rules)).toHaveLength(2);
  });
});

describe('extendForReadability', () => {
  it('extends a short caption into free space up to the reading floor', () => {
    // 34 chars at 17 cps needs 2s
    const out = extendForReadability([seg(0, 1, 'This caption has thirty-four chars'), seg(5, 6, 'Next')], 10, rules);
    expect(out[0].end).toBe(2);
  });

  it('stops short of the next caption by the minimum gap', () => {
    const out = extendForReadability([seg(0, 0.5, 'Hi'), seg(0.7, 2, 'Next')], 10, rules);
    expect(out[0].end).toBe(0.62);
  });

  it('never extends past the audio end', () => {
    const out = extendForReadability([seg(9.5, 9.8, 'Bye')], 10, rules);
    expect(out[0].end).toBe(10);
  });
});

describe('enforceSpacing', () => {
  it('shortens the earlier caption when it can spare the time', () => {
    const out = enforceSpacing([seg(0, 3, 'Long enough'), seg(3, 5, 'Next')], rules);
    expect(out.map((s) => [s.start, s.end])).toEqual([
      [0, 2.92],
      [3, 5],
    ]);
  });

  it('delays the later caption when the earlier one is at its floor', () => {
    const out = enforceSpacing([seg(0, 1, 'Short'), seg(1, 4, 'Next one')], rules);
    expect(out.map((s) => [s.start, s.end])).toEqual([
      [0, 1],
      [1.08, 4],
    ]);
  });
});

describe('acceptProposal', () => {
  const input = [seg(0, 2, 'a', 'speech', 0), seg(2, 4, 'b', 'speech', 1)];

  it('builds segments and inherits provenance from the overlapping input', () => {
    const parsed = parseSegmentReply(toReply(input));
    if (parsed.kind !== 'parsed') throw new Error('reply should parse');
    const accepted = acceptProposal(parsed.value, input, 4);
    expect(accepted.ok).toBe(true);
    if (accepted.ok) expect(accepted.segments.map((s) => s.source)).toEqual(input.map((s) => s.source));
  });

  it('rejects overlapping or out-of-range proposals', () => {
    const overlapping = [
      { start: 0, end: 3, contentType: 'speech' as const, text: 'a' },
      { start: 2, end: 4, contentType: 'speech' as const, text: 'b' },
    ];
    expect(acceptProposal(overlapping, input, 4)).toEqual({ ok: false, reason: 'segment 0 overlaps segment 1' });
    expect(acceptProposal([{ start: 0, end: 9, contentType: 'speech', text: 'a' }], input, 4).ok).toBe(false);
  });

  it('accepts adjacent segments joined in order', () => {
    const accepted = acceptProposal([{ start: 0, end: 4, contentType: 'speech', text: 'a b' }], input, 4);
    expect(accepted.ok).toBe(true);
    if (accepted.ok) expect(spans(accepted.segments)).toEqual([[0, 4, 'speech', 'a b']]);
  });

  it('rejects a proposal that drops a segment', () => {
    expect(acceptProposal([{ start: 0, end: 4, contentType: 'speech', text: 'a' }], input, 4)).toEqual({
      ok: false,
      reason: '1 input segment(s) missing',
    });
  });

  it('rejects a proposal that rewrites text', () => {
    const rewritten = [
      { start: 0, end: 2, contentType: 'speech' as const, text: 'a' },
      { start: 2, end: 4, contentType: 'speech' as const, text: 'z' },
    ];
    expect(acceptProposal(rewritten, input, 4)).toEqual({ ok: false, reason: 'segment 1 text differs from the input' });
  });

  it('rejects a proposal that changes a content type', () => {
    const relabelled = [
      { start: 0, end: 2, contentType: 'speech' as const, text: 'a' },
      { start: 2, end: 4, contentType: 'music' as const, text: 'b' },
    ];
    expect(acceptProposal(relabelled, input, 4)).toEqual({ ok: false, reason: 'segment 1 changes speech to music' });
  });

  it('rejects a proposal that uncovers audio the input covered', () => {
    const shrunk = [
      { start: 0, end: 1, contentType: 'speech' as const, text: 'a' },
      { start: 2.5, end: 4, contentType: 'speech' as const, text: 'b' },
    ];
    expect(acceptProposal(shrunk, input, 4)).toEqual({ ok: false, reason: '1..2.5 is left uncovered' });
  });

  it('allows widening an existing blank by less than the gap threshold', () => {
    const spaced = [seg(0, 2, 'a'), seg(5, 7, 'b')];
    const proposal = [
      { start: 0, end: 1.5, contentType: 'speech' as const, text: 'a' },
      { start: 5, end: 7, contentType: 'speech' as const, text: 'b' },
    ];
    expect(acceptProposal(proposal, spaced, 7).ok).toBe(true);
  });
});

describe('optimizeTiming', () => {
  const input = [
    seg(0, 2, 'Welcome back.'),
    seg(2, 2.4, 'Hello'),
    seg(2.4, 2.6, 'there'),
    seg(2.6, 10, 'Silence', 'silence'),
  ];

  it('applies an echoed proposal and the readability pass', async () => {
    const service = new FakeService(() => toReply(input), { promptTokens: 50, completionTokens: 40 });
    const ctx = context(service);
    const result = await optimizeTiming(input, 10, ctx, rules);
    expect(result.outcome).toBe('applied');
    expect(spans(result.segments)).toEqual([
      [0, 1.92, 'speech', 'Welcome back.'],
      [2, 2.6, 'speech', 'Hello there'],
      [2.68, 10, 'silence', 'Silence'],
    ]);
    expect(service.calls[0].req.audio).toBeUndefined();
    expect(ctx.usage.report().phases.timingOptimization.calls).toBe(1);
  });

  it('returns the input unchanged for an unparsable reply', async () => {
    const result = await optimizeTiming(input, 10, context(new FakeService(() => 'Looks fine to me!')), rules);
    expect(result.outcome).toBe('fallback');
    expect(result.segments).toEqual(input);
  });

  it('returns the input unchanged for an overlapping proposal', async () => {
    const reply = JSON.stringify([
      { start: 0, end: 2.2, type: 'speech', text: 'Welcome back.' },
      { start: 2, end: 10, type: 'speech', text: 'Hello there' },
    ]);
    const result = await optimizeTiming(input, 10, context(new FakeService(() => reply)), rules);
    expect(result.outcome).toBe('fallback');
    expect(result.segments).toEqual(input);
  });

  it('returns the input unchanged when the proposal loses content', async () => {
    const reply = JSON.stringify([
      { start: 0, end: 2, type: 'speech', text: 'Welcome back.' },
      { start: 2, end: 10, type: 'speech', text: 'Something else entirely' },
    ]);
    const result = await optimizeTiming(input, 10, context(new FakeService(() => reply)), rules);
    expect(result.outcome).toBe('fallback');
    expect(result.segments).toEqual(input);
  });

  it('returns the input unchanged when any item is invalid', async () => {
    const reply = JSON.stringify([
      { start: 0, end: 2, type: 'speech', text: 'Welcome back.' },
      { start: 5, end: 4, type: 'speech', text: 'broken' },
    ]);
    const result = await optimizeTiming(input, 10, context(new FakeService(() => reply)), rules);
    expect(result.outcome).toBe('fallback');
  });

  it('returns the input unchanged when the collaborator fails', async () => {
    const service = new FakeService(() => new CollaboratorUnavailableError('down'));
    const result = await optimizeTiming(input, 10, context(service), rules);
    expect(result.outcome).toBe('fallback');
    expect(result.segments).toEqual(input);
    expect(service.calls).toHaveLength(3);
  });

  it('skips an empty timeline without calling the collaborator', async () => {
    const service = new FakeService(() => '[]');
    expect(await optimizeTiming([], 10, context(service), rules)).toEqual({ segments: [], outcome: 'skipped' });
    expect(service.calls).toHaveLength(0);
  });
});
