import { z } from 'zod';
import type { ContentType } from './types';

/**
 * Outcome of interpreting one collaborator reply. Every consumer branches on `kind`
 * instead of assuming a shape.
 */
export type ParseResult<T> =
    | { kind: 'parsed'; value: T; dropped: number }
    | { kind: 'empty' }
    | { kind: 'unparsable'; reason: string };

export interface ReplySegment {
    start: number;
    end: number;
    contentType: ContentType;
    text: string;
}

export interface GapClassification {
    contentType: ContentType;
    text: string;
}

/** Seconds from `12.5`, `"12.5"`, `"00:01:02.500"`, `"01:02,5"`; NaN otherwise */
export function parseTime(v: number | string): number {
    if (typeof v === 'number') return v;
    const s = v.trim().replace(',', '.').replace(/s$/i, '');
    if (/^\d+(\.\d+)?$/.test(s)) return Number(s);
    const m = s.match(/^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
    if (!m) return NaN;
    return Number(m[1] ?? 0) * 3600 + Number(m[2]) * 60 + Number(m[3]);
}

const TimeValue = z
    .union([z.number(), z.string()])
    .transform(parseTime)
    .pipe(z.number().finite());

const ReplySegmentSchema = z
    .object({
        start: TimeValue,
        end: TimeValue,
        type: z.string().optional(),
        contentType: z.string().optional(),
        text: z.string().optional(),
    })
    .transform((o) => {
        const contentType = normalizeContentType(o.type ?? o.contentType);
        return { start: o.start, end: o.end, contentType, text: (o.text ?? '').trim() };
    })
    .refine((s) => s.end > s.start, { message: 'end must be after start' })
    .refine((s) => s.contentType !== 'speech' || s.text.length > 0, { message: 'speech needs text' });

const GapClassificationSchema = z
    .object({
        type: z.string().optional(),
        contentType: z.string().optional(),
        text: z.string().optional(),
        description: z.string().optional(),
    })
    .refine((o) => Boolean(o.type ?? o.contentType), { message: 'missing type' })
    .transform((o) => ({
        contentType: normalizeContentType(o.type ?? o.contentType, 'silence'),
        text: (o.text ?? o.description ?? '').trim(),
    }));

const CONTENT_TYPE_ALIASES: Record<string, ContentType> = {
    speech: 'speech',
    dialogue: 'speech',
    dialog: 'speech',
    voice: 'speech',
    narration: 'speech',
    music: 'music',
    song: 'music',
    singing: 'music',
    sound: 'sound_effect',
    sounds: 'sound_effect',
    sound_effect: 'sound_effect',
    sound_effects: 'sound_effect',
    sfx: 'sound_effect',
    effect: 'sound_effect',
    noise: 'sound_effect',
    ambient: 'sound_effect',
    ambience: 'sound_effect',
    silence: 'silence',
    quiet: 'silence',
};

export function normalizeContentType(label: string | undefined, fallback: ContentType = 'speech'): ContentType {
    if (!label) return fallback;
    const key = label.trim().toLowerCase().replace(/[\s-]+/g, '_');
    return CONTENT_TYPE_ALIASES[key] ?? fallback;
}

type JsonExtraction = { ok: true; value: unknown } | { ok: false; reason: string };

function tryJson(s: string): JsonExtraction {
    try {
        return { ok: true, value: JSON.parse(s) };
    } catch (e) {
        return { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
}

/**
 * Locate JSON in a model reply: bare, inside a Markdown fence, or embedded in prose.
 */
export function extractJson(text: string): JsonExtraction {
    const trimmed = text.trim();
    const whole = tryJson(trimmed);
    if (whole.ok) return whole;

    const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
    if (fenced) {
        const inner = tryJson(fenced[1].trim());
        if (inner.ok) return inner;
    }

    const firstArr = trimmed.indexOf('[');
    const firstObj = trimmed.indexOf('{');
    const candidates: Array<[number, string]> = [];
    if (firstArr >= 0) candidates.push([firstArr, ']']);
    if (firstObj >= 0) candidates.push([firstObj, '}']);
    candidates.sort((a, b) => a[0] - b[0]);
    for (const [open, closer] of candidates) {
        const close = trimmed.lastIndexOf(closer);
        if (close > open) {
            const inner = tryJson(trimmed.slice(open, close + 1));
            if (inner.ok) return inner;
        }
    }
    return { ok: false, reason: whole.reason };
}

function asItemList(value: unknown): unknown[] | null {
    if (Array.isArray(value)) return value;
    if (value && typeof value === 'object') {
        if ('segments' in value && Array.isArray(value.segments)) return value.segments;
        if ('start' in value && 'end' in value) return [value];
    }
    return null;
}

/**
 * Parse a reply expected to list timed spans. Individually invalid items are dropped
 * and counted; a reply with nothing valid is unparsable.
 */
export function parseSegmentReply(text: string): ParseResult<ReplySegment[]> {
    if (!text.trim()) return { kind: 'empty' };
    const json = extractJson(text);
    if (!json.ok) return { kind: 'unparsable', reason: `no JSON found: ${json.reason}` };
    const items = asItemList(json.value);
    if (!items) return { kind: 'unparsable', reason: 'JSON is not a list of segments' };
    if (items.length === 0) return { kind: 'empty' };

    const value: ReplySegment[] = [];
    let dropped = 0;
    for (const item of items) {
        const parsed = ReplySegmentSchema.safeParse(item);
        if (parsed.success) value.push(parsed.data);
        else dropped++;
    }
    if (value.length === 0) {
        return { kind: 'unparsable', reason: `all ${items.length} items were invalid` };
    }
    return { kind: 'parsed', value, dropped };
}

export function parseGapReply(text: string): ParseResult<GapClassification> {
    if (!text.trim()) return { kind: 'empty' };
    const json = extractJson(text);
    if (!json.ok) return { kind: 'unparsable', reason: `no JSON found: ${json.reason}` };
    const candidate = Array.isArray(json.value) ? json.value[0] : json.value;
    if (candidate === undefined) return { kind: 'empty' };
    const parsed = GapClassificationSchema.safeParse(candidate);
    if (!parsed.success) {
        return { kind: 'unparsable', reason: parsed.error.issues.map((i) => i.message).join('; ') };
    }
    return { kind: 'parsed', value: parsed.data, dropped: 0 };
}
