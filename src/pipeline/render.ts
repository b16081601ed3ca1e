import { MalformedResponseError } from './errors';
import type { CaptionCue, CaptionFormat, ContentType, Segment } from './types';

type Renderable = Pick<Segment, 'start' | 'end' | 'text' | 'contentType'>;

/**
 * Seconds as `HH:MM:SS<sep>mmm`. Rounds to the nearest millisecond.
 */
export function formatTimestamp(sec: number, sep: ',' | '.'): string {
    const ms = Math.max(0, Math.round(sec * 1000));
    const h = Math.floor(ms / 3600000);
    const m = Math.floor((ms % 3600000) / 60000);
    const s = Math.floor((ms % 60000) / 1000);
    const mm = ms % 1000;
    const pad = (n: number, w = 2) => String(n).padStart(w, '0');
    return `${pad(h)}:${pad(m)}:${pad(s)}${sep}${pad(mm, 3)}`;
}

export function parseTimestamp(ts: string): number {
    const m = ts.trim().match(/^(?:(\d+):)?(\d{2}):(\d{2})[,.](\d{3})$/);
    if (!m) throw new MalformedResponseError(`Invalid caption timestamp: ${ts}`);
    const ms = Number(m[1] ?? 0) * 3600000 + Number(m[2]) * 60000 + Number(m[3]) * 1000 + Number(m[4]);
    return ms / 1000;
}

// A blank line would end the cue early in both formats
function cueText(text: string): string {
    return text
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter(Boolean)
        .join('\n');
}

function escapeVtt(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function unescapeVtt(text: string): string {
    return text.replace(/&lt;/g, '<').replace(/&gt;/g, '>').replace(/&amp;/g, '&');
}

export function decorate(seg: Pick<Segment, 'text' | 'contentType'>, format: CaptionFormat): string {
    const raw = cueText(seg.text);
    const text = format === 'vtt' ? escapeVtt(raw) : raw;
    switch (seg.contentType) {
        case 'speech':
            return text;
        case 'music':
            return format === 'vtt' ? `<i>[♪ ${text} ♪]</i>` : `[♪ ${text} ♪]`;
        case 'sound_effect':
            return format === 'vtt' ? `<b>[Sound: ${text}]</b>` : `[Sound: ${text}]`;
        case 'silence':
            return `[${text}]`;
    }
}

export function renderSrt(segments: readonly Renderable[]): string {
    const blocks = segments.map((s, i) =>
        [String(i + 1), `${formatTimestamp(s.start, ',')} --> ${formatTimestamp(s.end, ',')}`, decorate(s, 'srt')].join(
            '\n'
        )
    );
    return blocks.length ? blocks.join('\n\n') + '\n' : '';
}

export function renderVtt(segments: readonly Renderable[]): string {
    const blocks = segments.map((s, i) =>
        [
            `cue-${i + 1}`,
            `${formatTimestamp(s.start, '.')} --> ${formatTimestamp(s.end, '.')}`,
            decorate(s, 'vtt'),
        ].join('\n')
    );
    return ['WEBVTT', ...blocks].join('\n\n') + '\n';
}

/**
 * Serialize a finalized timeline. Pure: the same segments and format always give the
 * same bytes.
 */
export function renderCaptions(segments: readonly Renderable[], format: CaptionFormat): string {
    return format === 'vtt' ? renderVtt(segments) : renderSrt(segments);
}

function classify(body: string, format: CaptionFormat): { contentType: ContentType; text: string } {
    let t = body.trim();
    if (format === 'vtt') {
        const styled = t.match(/^<([ib])>([\s\S]*)<\/\1>$/);
        if (styled) t = styled[2];
    }
    const music = t.match(/^\[♪ ([\s\S]*) ♪\]$/);
    const sound = t.match(/^\[Sound: ([\s\S]*)\]$/);
    const bracket = t.match(/^\[([\s\S]*)\]$/);
    const unescape = (s: string) => (format === 'vtt' ? unescapeVtt(s) : s);
    if (music) return { contentType: 'music', text: unescape(music[1]) };
    if (sound) return { contentType: 'sound_effect', text: unescape(sound[1]) };
    if (bracket) return { contentType: 'silence', text: unescape(bracket[1]) };
    return { contentType: 'speech', text: unescape(t) };
}

const TIMING = /^(\S+)\s+-->\s+(\S+)/;

/**
 * Read a caption document back into cues, recovering content types from the
 * decorations `renderCaptions` applies. Speech that itself starts and ends with
 * brackets reads back as silence.
 */
export function parseCaptions(doc: string, format: CaptionFormat): CaptionCue[] {
    const blocks = doc.replace(/^\uFEFF/, '').split(/\r?\n(?:[ \t]*\r?\n)+/);
    const cues: CaptionCue[] = [];
    for (const block of blocks) {
        const lines = block.split(/\r?\n/).filter((l) => l.trim() !== '');
        if (!lines.length) continue;
        if (format === 'vtt' && /^WEBVTT/.test(lines[0])) continue;
        if (format === 'vtt' && /^(NOTE|STYLE|REGION)\b/.test(lines[0])) continue;
        const timingIdx = lines.findIndex((l) => TIMING.test(l));
        if (timingIdx < 0) {
            throw new MalformedResponseError(`Caption block has no timing line: ${lines[0]}`);
        }
        const m = lines[timingIdx].match(TIMING);
        if (!m) continue;
        const { contentType, text } = classify(lines.slice(timingIdx + 1).join('\n'), format);
        cues.push({ start: parseTimestamp(m[1]), end: parseTimestamp(m[2]), contentType, text });
    }
    return cues;
}

export function detectFormat(filePath: string): CaptionFormat | null {
    const lower = filePath.toLowerCase();
    if (lower.endsWith('.srt')) return 'srt';
    if (lower.endsWith('.vtt')) return 'vtt';
    return null;
}
