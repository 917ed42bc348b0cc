import defaultConfig, { type Config } from './platform/config.js';
import { logger } from './platform/logger.js';
import type { ICompletionClient } from './core/ports/ICompletionClient.js';
import { TokenCounter } from './features/session/domain/TokenCounter.js';
import { CompressionEngine } from './features/session/usecases/CompressionEngine.js';
import { SessionManager } from './features/session/usecases/SessionManager.js';
import { OpenAICompletionClient } from './infrastructure/ai/OpenAICompletionClient.js';
import { createSessionBackend, type SessionBackend } from './infrastructure/session_backend/createSessionBackend.js';
import type { UpstashFetch } from './infrastructure/redis/UpstashRestClient.js';

const COMPONENT = 'Bootstrap';

export interface SessionServices {
    manager: SessionManager;
    backend: SessionBackend;
    completionClient: ICompletionClient;
    /** Stops the expiry sweep */
    shutdown: () => void;
}

export interface CreateSessionManagerOptions {
    config?: Config;
    completionClient?: ICompletionClient;
    redisFetch?: UpstashFetch;
}

/**
 * Wire a SessionManager from configuration: backend selection, tokenizer,
 * summarizer and the periodic expiry sweep.
 */
export async function createSessionManager(options: CreateSessionManagerOptions = {}): Promise<SessionServices> {
    const config = options.config ?? defaultConfig;

    const backend = await createSessionBackend({ redis: config.redis, fetchImpl: options.redisFetch });
    const completionClient =
        options.completionClient ??
        new OpenAICompletionClient({
            apiKey: config.openai.apiKey,
            apiUrl: config.openai.apiUrl,
            model: config.openai.model,
            timeoutMs: config.openai.timeoutMs,
        });

    const manager = new SessionManager({
        store: backend.store,
        lock: backend.lock,
        tokenCounter: new TokenCounter(),
        compressionEngine: new CompressionEngine({
            client: completionClient,
            timeoutMs: config.compression.timeoutMs,
            maxWords: config.compression.maxWords,
            maxTokens: config.compression.maxTokens,
            temperature: config.compression.temperature,
        }),
        policy: {
            compressionThreshold: config.session.compressionThreshold,
            maxContextTokens: config.session.maxContextTokens,
            keepRecentMessages: config.session.keepRecentMessages,
            ttlSeconds: Math.round(config.session.ttlHours * 60 * 60),
            tokenizerModel: config.session.tokenizerModel,
            summaryMode: config.session.summaryMode,
        },
    });

    const stopSweep = manager.startExpirySweep(config.session.sweepIntervalMinutes * 60 * 1000);

    logger.info({
        kind: 'sys',
        component: COMPONENT,
        message: 'Session services ready',
        meta: { backend: backend.kind, policy: manager.policy },
    });

    return { manager, backend, completionClient, shutdown: stopSweep };
}
