export { createSessionManager, type CreateSessionManagerOptions, type SessionServices } from './bootstrap.js';

export * from './core/errors.js';
export type { SessionStore } from './core/ports/SessionStore.js';
export type { SessionLock } from './core/ports/SessionLock.js';
export type { CompletionOptions, ICompletionClient } from './core/ports/ICompletionClient.js';

export {
    MESSAGE_ROLES,
    fromSessionRecord,
    isMessageRole,
    toSessionRecord,
    type ChatMessage,
    type MessageRole,
    type Session,
    type SessionMessage,
    type SessionRecord,
} from './features/session/domain/Session.js';
export { TokenCounter, approximateTokens, encodingForModel, type TokenCount } from './features/session/domain/TokenCounter.js';
export {
    COMPRESSION_PLACEHOLDER,
    CompressionEngine,
    type CompressionOutcome,
} from './features/session/usecases/CompressionEngine.js';
export { SUMMARY_PREFIX, assembleContext } from './features/session/usecases/contextAssembly.js';
export {
    DEFAULT_SESSION_POLICY,
    SessionManager,
    type SessionInfo,
    type SessionPolicy,
} from './features/session/usecases/SessionManager.js';

export { OpenAICompletionClient } from './infrastructure/ai/OpenAICompletionClient.js';
export { InMemorySessionStore } from './infrastructure/memory/InMemorySessionStore.js';
export { KeyedMutex } from './infrastructure/memory/KeyedMutex.js';
export { UpstashRestClient, type UpstashFetch } from './infrastructure/redis/UpstashRestClient.js';
export { UpstashSessionLock } from './infrastructure/redis/UpstashSessionLock.js';
export { UpstashSessionStore } from './infrastructure/redis/UpstashSessionStore.js';
export { FailoverSessionStore } from './infrastructure/session_backend/FailoverSessionStore.js';
export { createSessionBackend, type SessionBackend } from './infrastructure/session_backend/createSessionBackend.js';
export { runWithTrace } from './platform/tracing.js';
