import { nanoid } from 'nanoid';
import { logger } from '../../../platform/logger.js';
import { setTraceSession } from '../../../platform/tracing.js';
import type { SummaryMode } from '../../../platform/config.js';
import { SessionNotFoundError } from '../../../core/errors.js';
import type { SessionLock } from '../../../core/ports/SessionLock.js';
import type { SessionStore } from '../../../core/ports/SessionStore.js';
import {
    appendMessage,
    applyCompression,
    createMessage,
    createSession,
    splitForCompression,
    type ChatMessage,
    type MessageRole,
    type Session,
} from '../domain/Session.js';
import type { TokenCounter } from '../domain/TokenCounter.js';
import type { CompressionEngine } from './CompressionEngine.js';
import { assembleContext } from './contextAssembly.js';

const COMPONENT = 'SessionManager';

export interface SessionPolicy {
    /** Compression runs once totalTokens goes above this */
    compressionThreshold: number;
    /** Ceiling for one request context; must be above the threshold */
    maxContextTokens: number;
    /** Size of the retained tail that compression never touches */
    keepRecentMessages: number;
    /** Idle time before a session expires; refreshed on every write */
    ttlSeconds: number;
    /** Model whose tokenizer prices messages */
    tokenizerModel: string;
    summaryMode: SummaryMode;
}

export const DEFAULT_SESSION_POLICY: SessionPolicy = {
    compressionThreshold: 3000,
    maxContextTokens: 4000,
    keepRecentMessages: 6,
    ttlSeconds: 24 * 60 * 60,
    tokenizerModel: 'gpt-4o-mini',
    summaryMode: 'over-threshold',
};

export interface SessionManagerDeps {
    store: SessionStore;
    lock: SessionLock;
    tokenCounter: TokenCounter;
    compressionEngine: CompressionEngine;
    policy?: Partial<SessionPolicy>;
    /** Injected for tests */
    now?: () => Date;
    generateId?: () => string;
}

export interface SessionInfo {
    sessionId: string;
    studentId: string;
    subject: string;
    messageCount: number;
    totalTokens: number;
    compressed: boolean;
    createdAt: string;
    lastActivity: string;
}

export function validatePolicy(policy: SessionPolicy): void {
    const positive: Array<keyof SessionPolicy> = ['compressionThreshold', 'maxContextTokens', 'ttlSeconds'];
    for (const key of positive) {
        const value = policy[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            throw new Error(`SessionPolicy.${key} must be a positive number`);
        }
    }
    if (!Number.isInteger(policy.keepRecentMessages) || policy.keepRecentMessages < 1) {
        throw new Error('SessionPolicy.keepRecentMessages must be an integer >= 1');
    }
    if (policy.compressionThreshold >= policy.maxContextTokens) {
        throw new Error('SessionPolicy.compressionThreshold must be below maxContextTokens');
    }
}

/**
 * Session lifecycle for the tutoring conversation.
 *
 * Every mutation is one locked read-modify-write against the store, and always
 * writes the whole session. Only SessionNotFoundError (and InvalidMessageError
 * for bad input) reach the caller; store, tokenizer and summarizer failures are
 * absorbed below this class.
 */
export class SessionManager {
    private readonly store: SessionStore;
    private readonly lock: SessionLock;
    private readonly tokenCounter: TokenCounter;
    private readonly compressionEngine: CompressionEngine;
    private readonly now: () => Date;
    private readonly generateId: () => string;
    readonly policy: Readonly<SessionPolicy>;

    constructor(deps: SessionManagerDeps) {
        const policy: SessionPolicy = { ...DEFAULT_SESSION_POLICY, ...deps.policy };
        validatePolicy(policy);
        this.policy = policy;
        this.store = deps.store;
        this.lock = deps.lock;
        this.tokenCounter = deps.tokenCounter;
        this.compressionEngine = deps.compressionEngine;
        this.now = deps.now ?? (() => new Date());
        this.generateId = deps.generateId ?? (() => `sess_${nanoid()}`);
    }

    async createSession(studentId: string, subject: string): Promise<Session> {
        const session = createSession({
            sessionId: this.generateId(),
            studentId,
            subject,
            now: this.now(),
        });
        await this.store.put(session, this.policy.ttlSeconds);
        setTraceSession(session.sessionId, studentId);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Session created',
            meta: { sessionId: session.sessionId, studentId, subject },
        });
        return session;
    }

    async getSession(sessionId: string): Promise<Session> {
        return this.load(sessionId);
    }

    /**
     * Append one turn, then compress if the session went over the threshold.
     * A failed compression leaves the session as it was after the append.
     */
    async addMessage(sessionId: string, role: MessageRole, content: string): Promise<Session> {
        return this.lock.runExclusive(sessionId, async () => {
            const current = await this.load(sessionId);

            const count = this.tokenCounter.count(content, this.policy.tokenizerModel);
            if (count.method === 'approximate') {
                logger.debug({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'Approximate token count used',
                    meta: { sessionId, reason: count.reason },
                });
            }

            const message = createMessage(role, content, count.tokens, this.now());
            const session = appendMessage(current, message);
            await this.store.put(session, this.policy.ttlSeconds);

            if (!this.shouldCompress(session)) {
                return session;
            }

            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Compression threshold exceeded',
                meta: {
                    sessionId,
                    totalTokens: session.totalTokens,
                    threshold: this.policy.compressionThreshold,
                    hasSummary: session.compressedContext !== undefined,
                },
            });
            return this.compressLocked(session);
        });
    }

    /**
     * Replace everything older than the retained tail with one summary.
     * No-op when nothing is older than the tail.
     *
     * Works on the stored session, not on `session`, which may be stale by the
     * time the lock is held.
     */
    async compress(session: Session): Promise<Session> {
        return this.lock.runExclusive(session.sessionId, async () =>
            this.compressLocked(await this.load(session.sessionId))
        );
    }

    /**
     * Read-only; see assembleContext for the selection rules.
     */
    getContextForApi(session: Session, systemPrompt: string): ChatMessage[] {
        return assembleContext(session, systemPrompt, {
            compressionThreshold: this.policy.compressionThreshold,
            keepRecentMessages: this.policy.keepRecentMessages,
            maxContextTokens: this.policy.maxContextTokens,
            summaryMode: this.policy.summaryMode,
            countTokens: (text) => this.tokenCounter.count(text, this.policy.tokenizerModel).tokens,
        });
    }

    /** Deleting an unknown id is not an error */
    async deleteSession(sessionId: string): Promise<void> {
        await this.lock.runExclusive(sessionId, () => this.store.delete(sessionId));
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Session deleted', meta: { sessionId } });
    }

    async getSessionInfo(sessionId: string): Promise<SessionInfo> {
        const session = await this.load(sessionId);
        return {
            sessionId: session.sessionId,
            studentId: session.studentId,
            subject: session.subject,
            messageCount: session.messages.length,
            totalTokens: session.totalTokens,
            compressed: session.compressedContext !== undefined,
            createdAt: session.createdAt,
            lastActivity: session.lastActivity,
        };
    }

    /** Removes idle sessions from stores without server-side expiry */
    async cleanupExpiredSessions(): Promise<number> {
        const removed = await this.store.sweepExpired(this.now(), this.policy.ttlSeconds);
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Expired sessions cleaned up',
            meta: { removed },
        });
        return removed;
    }

    /**
     * Run cleanupExpiredSessions every `intervalMs`. The timer does not keep the
     * process alive.
     *
     * @returns stops the sweep
     */
    startExpirySweep(intervalMs: number): () => void {
        const timer = setInterval(() => {
            this.cleanupExpiredSessions().catch((error: unknown) => {
                logger.error({ kind: 'biz', component: COMPONENT, message: 'Expiry sweep failed', error });
            });
        }, intervalMs);
        timer.unref();
        return () => clearInterval(timer);
    }

    private async load(sessionId: string): Promise<Session> {
        const session = await this.store.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        setTraceSession(session.sessionId, session.studentId);
        return session;
    }

    /**
     * Over the threshold, a session compresses the first time as soon as anything
     * is older than the tail. Once it has a summary it waits for a full tail of
     * new messages, so a tail that is over the threshold on its own does not
     * cost one summarization per turn.
     */
    private shouldCompress(session: Session): boolean {
        if (session.totalTokens <= this.policy.compressionThreshold) {
            return false;
        }
        const eligible = session.messages.length - this.policy.keepRecentMessages;
        const minimum = session.compressedContext === undefined ? 1 : this.policy.keepRecentMessages;
        return eligible >= minimum;
    }

    private async compressLocked(session: Session): Promise<Session> {
        const { toCompress, toKeep } = splitForCompression(session, this.policy.keepRecentMessages);
        if (toCompress.length === 0) {
            return session;
        }

        const outcome = await this.compressionEngine.summarize(toCompress, session.subject, session.compressedContext);
        if (!outcome.ok) {
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Compression skipped, session kept uncompressed',
                error: outcome.error,
                meta: { sessionId: session.sessionId, totalTokens: session.totalTokens },
            });
            return session;
        }

        const compressed = applyCompression(session, outcome.summary, toKeep);
        await this.store.put(compressed, this.policy.ttlSeconds);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Session compressed',
            meta: {
                sessionId: session.sessionId,
                removedMessages: toCompress.length,
                keptMessages: toKeep.length,
                tokensBefore: session.totalTokens,
                tokensAfter: compressed.totalTokens,
            },
        });
        return compressed;
    }
}
