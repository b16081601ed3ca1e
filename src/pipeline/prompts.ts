import { chunkDuration } from './chunk';
import type { Chunk, Gap, Segment, TimingRules } from './types';

export function chunkPrompt(chunk: Chunk): string {
    const dur = chunkDuration(chunk);
    return `Transcribe this audio for closed captions, with accurate timestamps.
This audio chunk starts at ${chunk.globalStart.toFixed(2)} seconds in the original video and is ${dur.toFixed(2)} seconds long.

In addition to speech, identify:
- Music: describe the style or mood (e.g. "Upbeat jazz")
- Sound effects: describe important sounds (e.g. "Door slamming")
- Silence: only when it is contextually meaningful (e.g. "Tense silence")

Keep each caption self-contained and split long sentences at natural breaks.

Return ONLY a JSON array. Each element has:
- "start": start time in seconds, relative to the start of this chunk
- "end": end time in seconds, relative to the start of this chunk
- "type": "speech", "music", "sound" or "silence"
- "text": the spoken words, or a short description for non-speech

Example:
[
  {"start": 0.0, "end": 2.5, "type": "speech", "text": "This is the first caption"},
  {"start": 2.5, "end": 5.0, "type": "music", "text": "Upbeat music"},
  {"start": 5.0, "end": 5.5, "type": "sound", "text": "Door slamming"}
]

Mark speech you cannot understand as "[unintelligible]". If the chunk is empty, return [].`;
}

export function gapPrompt(gap: Gap): string {
    return `Classify this audio, taken from ${gap.start.toFixed(2)}s to ${gap.end.toFixed(2)}s of a video where no speech was detected.

Decide whether it contains music, sound effects or meaningful silence. Do not transcribe.

Return ONLY a JSON object:
{"type": "music" | "sound" | "silence", "text": "<short description>"}

Examples:
{"type": "music", "text": "Suspenseful music"}
{"type": "sound", "text": "Footsteps approaching"}
{"type": "silence", "text": "Tense silence"}

If there is nothing meaningful, return {"type": "silence", "text": "Silence"}.`;
}

export function optimizePrompt(segments: readonly Segment[], durationSec: number, rules: TimingRules): string {
    const list = JSON.stringify(
        segments.map((s) => ({ start: s.start, end: s.end, type: s.contentType, text: s.text })),
        null,
        2
    );
    return `These caption segments cover a ${durationSec.toFixed(2)}s video. Optimize their timing for readability.

Segments:
${list}

Rules:
1. Each caption stays on screen at least ${rules.minDisplaySec}s and reads at no more than ${rules.maxCharsPerSec} characters per second, extending or shortening "end" only where it does not collide with a neighbour.
2. Leave at least ${rules.minGapSec}s between consecutive captions by nudging boundaries. Never drop a caption.
3. Merge adjacent very short speech segments that are fragments of one sentence; concatenate their text in order.
4. Music, sound and silence segments get plausible durations; a sound effect lasts at most ${rules.maxSoundEffectSec}s.
5. Keep the order. Do not change any text except when merging. Keep every time inside [0, ${durationSec.toFixed(3)}].
6. Segments must not overlap.

Return ONLY a JSON array of objects with "start", "end", "type" and "text".`;
}
