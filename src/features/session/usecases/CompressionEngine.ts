import { logger } from '../../../platform/logger.js';
import { CompressionFailedError } from '../../../core/errors.js';
import type { ICompletionClient } from '../../../core/ports/ICompletionClient.js';
import type { SessionMessage } from '../domain/Session.js';

const COMPONENT = 'CompressionEngine';

export const COMPRESSION_PLACEHOLDER = 'Previous conversation context available.';

export type CompressionOutcome =
    | { ok: true; summary: string }
    | { ok: false; summary: string; error: CompressionFailedError };

export interface CompressionEngineOptions {
    client: ICompletionClient;
    /** Upper bound for one summarization call */
    timeoutMs: number;
    maxWords?: number;
    maxTokens?: number;
    temperature?: number;
}

const ROLE_LABELS = {
    system: 'System',
    user: 'User',
    assistant: 'Assistant',
} as const;

export function formatTranscript(messages: readonly SessionMessage[]): string {
    return messages.map((message) => `${ROLE_LABELS[message.role]}: ${message.content}`).join('\n');
}

export function buildCompressionPrompt(params: {
    messages: readonly SessionMessage[];
    subject: string;
    maxWords: number;
    previousSummary?: string;
}): string {
    const earlier = params.previousSummary
        ? `Summary of the conversation before this excerpt (merge it into your summary):\n${params.previousSummary}\n\n`
        : '';

    return `Please create a concise summary of this educational conversation between a student and an AI tutor in ${params.subject}.

Focus on:
1. Key concepts discussed
2. Problems solved
3. The student's understanding progress
4. Important context for future questions

Keep the summary under ${params.maxWords} words but preserve all important educational context.

${earlier}Conversation to summarize:
${formatTranscript(params.messages)}

Summary:`;
}

/**
 * Collapses older turns into one digest through the completion client.
 *
 * Never throws. Error, timeout and empty output come back as `ok: false` with the
 * placeholder summary; the caller decides whether to apply it.
 */
export class CompressionEngine {
    private readonly client: ICompletionClient;
    private readonly timeoutMs: number;
    private readonly maxWords: number;
    private readonly maxTokens: number;
    private readonly temperature: number;

    constructor(options: CompressionEngineOptions) {
        this.client = options.client;
        this.timeoutMs = options.timeoutMs;
        this.maxWords = options.maxWords ?? 200;
        this.maxTokens = options.maxTokens ?? 300;
        this.temperature = options.temperature ?? 0.1;
    }

    async summarize(
        messages: readonly SessionMessage[],
        subject: string,
        previousSummary?: string
    ): Promise<CompressionOutcome> {
        const prompt = buildCompressionPrompt({ messages, subject, maxWords: this.maxWords, previousSummary });
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new CompressionFailedError(`Summarization timed out after ${this.timeoutMs}ms`));
            }, this.timeoutMs);
        });

        try {
            const completion = this.client.complete([{ role: 'user', content: prompt }], {
                temperature: this.temperature,
                maxTokens: this.maxTokens,
                signal: controller.signal,
            });
            // The client may settle after the timeout; its late rejection is expected
            completion.catch(() => undefined);

            const summary = (await Promise.race([completion, timeout])).trim();
            if (!summary) {
                throw new CompressionFailedError('Summarization returned empty text');
            }

            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Conversation compressed',
                meta: { subject, compressedMessages: messages.length, summaryLength: summary.length },
            });
            return { ok: true, summary };
        } catch (error) {
            const failure =
                error instanceof CompressionFailedError
                    ? error
                    : new CompressionFailedError('Summarization request failed', { cause: error });
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Compression failed, using placeholder summary',
                error: failure,
                meta: { subject, messages: messages.length },
            });
            return { ok: false, summary: COMPRESSION_PLACEHOLDER, error: failure };
        } finally {
            clearTimeout(timer);
        }
    }
}
