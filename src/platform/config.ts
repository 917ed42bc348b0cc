import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * When the prior-conversation summary is put into the model context.
 * - over-threshold: only while the session is above the compression threshold
 * - always: whenever a summary exists
 */
export type SummaryMode = 'over-threshold' | 'always';

export interface Config {
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
    };
    redis: {
        restUrl: string;
        token: string;
        namespace: string;
        lockTtlMs: number;
    };
    openai: {
        apiKey: string;
        apiUrl: string;
        model: string;
        timeoutMs: number;
    };
    session: {
        compressionThreshold: number;
        maxContextTokens: number;
        keepRecentMessages: number;
        ttlHours: number;
        tokenizerModel: string;
        summaryMode: SummaryMode;
        sweepIntervalMinutes: number;
    };
    compression: {
        timeoutMs: number;
        maxWords: number;
        maxTokens: number;
        temperature: number;
    };
}

function numberFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function logLevelFromEnv(): LogLevel {
    const raw = process.env.LOG_LEVEL;
    if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
        return raw;
    }
    return 'info';
}

function summaryModeFromEnv(): SummaryMode {
    return process.env.SESSION_SUMMARY_MODE === 'always' ? 'always' : 'over-threshold';
}

const config: Config = {
    logging: {
        level: logLevelFromEnv(),
        dir: process.env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
        // Vitest sets NODE_ENV=test; tests never write log files
        toFile: process.env.LOG_TO_FILE !== 'false' && process.env.NODE_ENV !== 'test',
    },
    redis: {
        restUrl: process.env.UPSTASH_REDIS_REST_URL || '',
        token: process.env.UPSTASH_REDIS_REST_TOKEN || '',
        namespace: process.env.REDIS_SESSION_NAMESPACE || 'session',
        lockTtlMs: numberFromEnv('REDIS_LOCK_TTL_MS', 10_000),
    },
    openai: {
        apiKey: process.env.OPENAI_API_KEY || '',
        apiUrl: process.env.OPENAI_API_URL || 'https://api.openai.com/v1/chat/completions',
        model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
        timeoutMs: numberFromEnv('OPENAI_TIMEOUT_MS', 60_000),
    },
    session: {
        compressionThreshold: numberFromEnv('SESSION_COMPRESSION_THRESHOLD', 3000),
        maxContextTokens: numberFromEnv('SESSION_MAX_CONTEXT_TOKENS', 4000),
        keepRecentMessages: numberFromEnv('SESSION_KEEP_RECENT_MESSAGES', 6),
        ttlHours: numberFromEnv('SESSION_TTL_HOURS', 24),
        tokenizerModel: process.env.SESSION_TOKENIZER_MODEL || 'gpt-4o-mini',
        summaryMode: summaryModeFromEnv(),
        sweepIntervalMinutes: numberFromEnv('SESSION_SWEEP_INTERVAL_MINUTES', 30),
    },
    compression: {
        timeoutMs: numberFromEnv('COMPRESSION_TIMEOUT_MS', 20_000),
        maxWords: numberFromEnv('COMPRESSION_MAX_WORDS', 200),
        maxTokens: numberFromEnv('COMPRESSION_MAX_TOKENS', 300),
        temperature: numberFromEnv('COMPRESSION_TEMPERATURE', 0.1),
    },
};

export default config;
