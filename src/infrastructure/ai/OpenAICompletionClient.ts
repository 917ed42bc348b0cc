import fetch from 'node-fetch';
import { logger } from '../../platform/logger.js';
import { CompletionRequestError } from '../../core/errors.js';
import type { CompletionOptions, ICompletionClient } from '../../core/ports/ICompletionClient.js';
import type { ChatMessage } from '../../features/session/domain/Session.js';

const COMPONENT = 'OpenAICompletionClient';

export interface OpenAICompletionClientOptions {
    apiKey: string;
    /** Full chat completions URL, e.g. https://api.openai.com/v1/chat/completions */
    apiUrl: string;
    model: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/** choices[0].message.content, or null when the body has another shape */
export function extractCompletionContent(body: unknown): string | null {
    if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
        return null;
    }
    const first: unknown = body.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) {
        return null;
    }
    return typeof first.message.content === 'string' ? first.message.content : null;
}

/**
 * Chat completion over any OpenAI-compatible endpoint.
 */
export class OpenAICompletionClient implements ICompletionClient {
    private readonly apiKey: string;
    private readonly apiUrl: string;
    private readonly model: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: OpenAICompletionClientOptions) {
        if (!options.apiKey) {
            throw new Error('OpenAICompletionClient requires an API key (OPENAI_API_KEY)');
        }
        this.apiKey = options.apiKey;
        this.apiUrl = options.apiUrl;
        this.model = options.model;
        this.timeoutMs = options.timeoutMs ?? 60_000;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        const payload: Record<string, unknown> = {
            model: this.model,
            messages,
        };
        if (options.temperature !== undefined) payload.temperature = options.temperature;
        if (options.maxTokens !== undefined) payload.max_tokens = options.maxTokens;

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
        const onCallerAbort = () => controller.abort();
        if (options.signal?.aborted) {
            controller.abort();
        } else {
            options.signal?.addEventListener('abort', onCallerAbort, { once: true });
        }

        const startedAt = Date.now();
        try {
            const response = await this.fetchImpl(this.apiUrl, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(payload),
                signal: controller.signal,
            });

            if (!response.ok) {
                const errText = await response.text();
                throw new CompletionRequestError(
                    `Completion request failed with status ${response.status}: ${errText}`,
                    response.status
                );
            }

            const content = extractCompletionContent(await response.json());
            if (content === null) {
                throw new CompletionRequestError('Completion response has no message content', response.status);
            }

            logger.debug({
                kind: 'sys',
                component: COMPONENT,
                message: 'Completion received',
                meta: { model: this.model, messages: messages.length, durationMs: Date.now() - startedAt },
            });
            return content;
        } catch (error) {
            if (error instanceof CompletionRequestError) {
                throw error;
            }
            if (controller.signal.aborted) {
                const reason = options.signal?.aborted ? 'aborted by caller' : `timed out after ${this.timeoutMs}ms`;
                throw new CompletionRequestError(`Completion request ${reason}`, undefined, { cause: error });
            }
            throw new CompletionRequestError('Completion request failed', undefined, { cause: error });
        } finally {
            clearTimeout(timeoutId);
            options.signal?.removeEventListener('abort', onCallerAbort);
        }
    }
}
