import OpenAI from 'openai';
import { CollaboratorUnavailableError, ConfigurationError } from './errors';
import { debug } from './log';
import type { AnalysisReply, AnalysisRequest, AudioUnderstandingService } from './service';

type AudioFormat = 'wav' | 'mp3';

const MIME_FORMATS: Record<string, AudioFormat> = {
    'audio/wav': 'wav',
    'audio/x-wav': 'wav',
    'audio/wave': 'wav',
    'audio/mpeg': 'mp3',
    'audio/mp3': 'mp3',
};

export interface OpenAIServiceOptions {
    apiKey: string;
    baseURL?: string;
    /** Model used when the request carries audio */
    audioModel: string;
    /** Model used for text-only requests */
    textModel: string;
}

/**
 * Maps SDK failures onto the pipeline taxonomy. Connection problems, timeouts,
 * 408/409/429 and 5xx are retryable; other 4xx (bad key, bad request) are not.
 */
export function toCollaboratorError(e: unknown): unknown {
    if (e instanceof OpenAI.APIUserAbortError) return e;
    if (e instanceof OpenAI.APIConnectionError) {
        return new CollaboratorUnavailableError(`Audio service unreachable: ${e.message}`, { retryable: true });
    }
    if (e instanceof OpenAI.APIError) {
        const status = e.status;
        const retryable = status === undefined || [408, 409, 429].includes(status) || status >= 500;
        return new CollaboratorUnavailableError(`Audio service error: ${e.message}`, {
            retryable,
            statusCode: status,
        });
    }
    return e;
}

export class OpenAIAudioService implements AudioUnderstandingService {
    private readonly client: OpenAI;

    constructor(private readonly opts: OpenAIServiceOptions) {
        if (!opts.apiKey) {
            throw new ConfigurationError('OPENAI_API_KEY is not set');
        }
        // Retries are owned by the pipeline's RetryPolicy
        this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL || undefined, maxRetries: 0 });
    }

    async analyze(req: AnalysisRequest): Promise<AnalysisReply> {
        const parts: OpenAI.Chat.Completions.ChatCompletionContentPart[] = [];
        if (req.audio) {
            const format = MIME_FORMATS[req.audio.mimeType];
            if (!format) {
                throw new CollaboratorUnavailableError(`Unsupported audio mime type ${req.audio.mimeType}`, {
                    retryable: false,
                });
            }
            parts.push({
                type: 'input_audio',
                input_audio: { data: req.audio.data.toString('base64'), format },
            });
        }
        parts.push({ type: 'text', text: req.prompt });
        const model = req.audio ? this.opts.audioModel : this.opts.textModel;

        try {
            const res = await this.client.chat.completions.create(
                {
                    model,
                    temperature: 0,
                    messages: [{ role: 'user', content: parts }],
                },
                { signal: req.signal }
            );
            const text = res.choices[0]?.message?.content ?? '';
            debug('service.reply', { model, chars: text.length, finish: res.choices[0]?.finish_reason });
            return {
                text,
                usage: {
                    promptTokens: res.usage?.prompt_tokens ?? 0,
                    completionTokens: res.usage?.completion_tokens ?? 0,
                },
            };
        } catch (e) {
            throw toCollaboratorError(e);
        }
    }
}
