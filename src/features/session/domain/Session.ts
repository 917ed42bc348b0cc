/**
 * Session domain: entities, pure transitions and the persisted record.
 * Nothing in here does IO.
 */

import { InvalidMessageError, InvalidSessionRecordError } from '../../../core/errors.js';

export const MESSAGE_ROLES = ['system', 'user', 'assistant'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Role/content pair as sent to a chat-completion endpoint */
export type ChatMessage = {
    role: MessageRole;
    content: string;
};

export interface SessionMessage {
    readonly role: MessageRole;
    readonly content: string;
    /** ISO-8601 */
    readonly timestamp: string;
    /** Computed once when the message is created */
    readonly tokenCount: number;
}

export interface Session {
    readonly sessionId: string;
    readonly studentId: string;
    readonly subject: string;
    readonly messages: readonly SessionMessage[];
    readonly createdAt: string;
    readonly lastActivity: string;
    /** Digest of every message removed by compression so far */
    readonly compressedContext?: string;
    /** Sum of tokenCount over `messages` */
    readonly totalTokens: number;
}

export function isMessageRole(value: unknown): value is MessageRole {
    return MESSAGE_ROLES.some((role) => role === value);
}

export function createSession(params: {
    sessionId: string;
    studentId: string;
    subject: string;
    now: Date;
}): Session {
    const at = params.now.toISOString();
    return {
        sessionId: params.sessionId,
        studentId: params.studentId,
        subject: params.subject,
        messages: [],
        createdAt: at,
        lastActivity: at,
        totalTokens: 0,
    };
}

export function createMessage(role: MessageRole, content: string, tokenCount: number, now: Date): SessionMessage {
    if (!isMessageRole(role)) {
        throw new InvalidMessageError(`Unsupported message role: ${String(role)}`);
    }
    if (!Number.isInteger(tokenCount) || tokenCount < 0) {
        throw new InvalidMessageError(`Token count must be a non-negative integer, got ${tokenCount}`);
    }
    return { role, content, timestamp: now.toISOString(), tokenCount };
}

export function sumTokens(messages: readonly SessionMessage[]): number {
    return messages.reduce((total, message) => total + message.tokenCount, 0);
}

/**
 * Append a message. lastActivity never moves backwards even if the clock does.
 */
export function appendMessage(session: Session, message: SessionMessage): Session {
    const lastActivity = message.timestamp > session.lastActivity ? message.timestamp : session.lastActivity;
    return {
        ...session,
        messages: [...session.messages, message],
        lastActivity,
        totalTokens: session.totalTokens + message.tokenCount,
    };
}

export type CompressionSplit = {
    toCompress: SessionMessage[];
    toKeep: SessionMessage[];
};

/**
 * The retained tail (`keepRecent` newest messages) is never eligible.
 */
export function splitForCompression(session: Session, keepRecent: number): CompressionSplit {
    const cut = Math.max(0, session.messages.length - keepRecent);
    return {
        toCompress: session.messages.slice(0, cut),
        toKeep: session.messages.slice(cut),
    };
}

export function applyCompression(session: Session, summary: string, toKeep: readonly SessionMessage[]): Session {
    return {
        ...session,
        compressedContext: summary,
        messages: [...toKeep],
        totalTokens: sumTokens(toKeep),
    };
}

// ============ Persisted record ============

export type SessionMessageRecord = {
    role: MessageRole;
    content: string;
    timestamp: string;
    token_count: number;
};

export type SessionRecord = {
    session_id: string;
    student_id: string;
    subject: string;
    created_at: string;
    last_activity: string;
    total_tokens: number;
    compressed_context?: string;
    messages: SessionMessageRecord[];
};

export function toSessionRecord(session: Session): SessionRecord {
    const record: SessionRecord = {
        session_id: session.sessionId,
        student_id: session.studentId,
        subject: session.subject,
        created_at: session.createdAt,
        last_activity: session.lastActivity,
        total_tokens: session.totalTokens,
        messages: session.messages.map((message) => ({
            role: message.role,
            content: message.content,
            timestamp: message.timestamp,
            token_count: message.tokenCount,
        })),
    };
    if (session.compressedContext !== undefined) {
        record.compressed_context = session.compressedContext;
    }
    return record;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const requireString = (field: string, value: unknown): string => {
    if (typeof value !== 'string') {
        throw new InvalidSessionRecordError(`SessionRecord: ${field} must be string`);
    }
    return value;
};

const requireTimestamp = (field: string, value: unknown): string => {
    const text = requireString(field, value);
    if (Number.isNaN(Date.parse(text))) {
        throw new InvalidSessionRecordError(`SessionRecord: ${field} must be an ISO-8601 timestamp`);
    }
    return text;
};

const requireCount = (field: string, value: unknown): number => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new InvalidSessionRecordError(`SessionRecord: ${field} must be a non-negative integer`);
    }
    return value;
};

/**
 * Rebuild a Session from its stored form. `total_tokens` is checked against the
 * messages so a corrupted record never re-enters the manager.
 */
export function fromSessionRecord(input: unknown): Session {
    if (!isRecord(input)) {
        throw new InvalidSessionRecordError('SessionRecord must be an object');
    }
    if (!Array.isArray(input.messages)) {
        throw new InvalidSessionRecordError('SessionRecord: messages must be array');
    }

    const messages: SessionMessage[] = input.messages.map((raw: unknown, idx: number) => {
        if (!isRecord(raw)) {
            throw new InvalidSessionRecordError(`SessionRecord: messages[${idx}] must be object`);
        }
        if (!isMessageRole(raw.role)) {
            throw new InvalidSessionRecordError(`SessionRecord: messages[${idx}].role is invalid`);
        }
        return {
            role: raw.role,
            content: requireString(`messages[${idx}].content`, raw.content),
            timestamp: requireTimestamp(`messages[${idx}].timestamp`, raw.timestamp),
            tokenCount: requireCount(`messages[${idx}].token_count`, raw.token_count),
        };
    });

    const totalTokens = requireCount('total_tokens', input.total_tokens);
    if (totalTokens !== sumTokens(messages)) {
        throw new InvalidSessionRecordError(
            `SessionRecord: total_tokens ${totalTokens} does not match messages (${sumTokens(messages)})`
        );
    }

    const session: Session = {
        sessionId: requireString('session_id', input.session_id),
        studentId: requireString('student_id', input.student_id),
        subject: requireString('subject', input.subject),
        messages,
        createdAt: requireTimestamp('created_at', input.created_at),
        lastActivity: requireTimestamp('last_activity', input.last_activity),
        totalTokens,
    };

    const compressed = input.compressed_context;
    if (compressed === undefined || compressed === null) {
        return session;
    }
    return { ...session, compressedContext: requireString('compressed_context', compressed) };
}
