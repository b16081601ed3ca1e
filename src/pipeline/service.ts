import type { AudioPayload, TokenUsage } from './types';

export interface AnalysisRequest {
    prompt: string;
    /** Omitted for text-only requests such as the timing pass */
    audio?: AudioPayload;
    signal?: AbortSignal;
}

export interface AnalysisReply {
    /** Raw model output; may be JSON, JSON inside prose, or nothing usable */
    text: string;
    usage: TokenUsage;
}

/**
 * Audio Understanding Service collaborator. Implementations throw
 * `CollaboratorUnavailableError` for transport and auth failures and otherwise return
 * whatever text came back; interpreting it is the engine's job.
 */
export interface AudioUnderstandingService {
    analyze(req: AnalysisRequest): Promise<AnalysisReply>;
}

export const NO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0 };
