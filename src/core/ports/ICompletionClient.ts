import type { ChatMessage } from '../../features/session/domain/Session.js';

export interface CompletionOptions {
    temperature?: number;
    maxTokens?: number;
    /** Aborts the request; the client rejects when it fires */
    signal?: AbortSignal;
}

/**
 * Port to an OpenAI-compatible chat completion endpoint.
 */
export interface ICompletionClient {
    /**
     * @returns the assistant message content of the first choice
     */
    complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}
