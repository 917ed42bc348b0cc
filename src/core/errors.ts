/**
 * Error taxonomy of the session engine.
 *
 * Only SessionNotFoundError and InvalidMessageError reach callers. The others are
 * raised by adapters and absorbed one layer up (failover store, compression
 * placeholder, approximate token count), but keep a class so logs can tell them apart.
 */

export type SessionErrorCode =
    | 'SESSION_NOT_FOUND'
    | 'INVALID_MESSAGE'
    | 'INVALID_SESSION_RECORD'
    | 'PERSISTENCE_UNAVAILABLE'
    | 'COMPRESSION_FAILED'
    | 'TOKEN_COUNT_UNAVAILABLE'
    | 'COMPLETION_REQUEST_FAILED';

export abstract class SessionEngineError extends Error {
    abstract readonly code: SessionErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class SessionNotFoundError extends SessionEngineError {
    readonly code = 'SESSION_NOT_FOUND';

    constructor(readonly sessionId: string) {
        super(`Session not found: ${sessionId}`);
    }
}

export class InvalidMessageError extends SessionEngineError {
    readonly code = 'INVALID_MESSAGE';
}

export class InvalidSessionRecordError extends SessionEngineError {
    readonly code = 'INVALID_SESSION_RECORD';
}

export class PersistenceUnavailableError extends SessionEngineError {
    readonly code = 'PERSISTENCE_UNAVAILABLE';
}

export class CompressionFailedError extends SessionEngineError {
    readonly code = 'COMPRESSION_FAILED';
}

export class TokenCountUnavailableError extends SessionEngineError {
    readonly code = 'TOKEN_COUNT_UNAVAILABLE';
}

export class CompletionRequestError extends SessionEngineError {
    readonly code = 'COMPLETION_REQUEST_FAILED';

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}
