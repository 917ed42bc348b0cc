import { get_encoding, type TiktokenEncoding } from 'tiktoken';
import { TokenCountUnavailableError } from '../../../core/errors.js';

/** ~1.3 tokens per whitespace-separated word */
export const APPROXIMATE_TOKENS_PER_WORD = 1.3;

export type TokenCount =
    | { method: 'exact'; tokens: number; encoding: TiktokenEncoding }
    | { method: 'approximate'; tokens: number; reason: string };

/** The part of a tiktoken encoder the counter needs */
export interface TokenEncoder {
    encode(text: string): ArrayLike<number>;
}

export interface TokenCounterOptions {
    /** `approximate` skips tiktoken entirely */
    mode?: 'auto' | 'approximate';
    loadEncoder?: (encoding: TiktokenEncoding) => TokenEncoder;
}

// Longest prefix first: "gpt-4o" must win over "gpt-4"
const MODEL_ENCODINGS: ReadonlyArray<[prefix: string, encoding: TiktokenEncoding]> = [
    ['gpt-4o', 'o200k_base'],
    ['gpt-4.1', 'o200k_base'],
    ['o1', 'o200k_base'],
    ['o3', 'o200k_base'],
    ['o4', 'o200k_base'],
    ['gpt-4', 'cl100k_base'],
    ['gpt-3.5', 'cl100k_base'],
    ['text-embedding-', 'cl100k_base'],
];

export function encodingForModel(model: string): TiktokenEncoding | null {
    const normalized = model.trim().toLowerCase();
    const match = MODEL_ENCODINGS.find(([prefix]) => normalized.startsWith(prefix));
    return match ? match[1] : null;
}

export function approximateTokens(text: string): number {
    const words = text.split(/\s+/).filter((word) => word.length > 0).length;
    return Math.floor(words * APPROXIMATE_TOKENS_PER_WORD);
}

/**
 * Token cost of a text for a target model.
 *
 * Exact when tiktoken knows the model, otherwise `floor(words * 1.3)`. Never throws:
 * an encoder failure is reported as the `approximate` variant with its reason.
 */
export class TokenCounter {
    private readonly mode: 'auto' | 'approximate';
    private readonly loadEncoder: (encoding: TiktokenEncoding) => TokenEncoder;
    private readonly encoders = new Map<TiktokenEncoding, TokenEncoder>();

    constructor(options: TokenCounterOptions = {}) {
        this.mode = options.mode ?? 'auto';
        this.loadEncoder = options.loadEncoder ?? ((encoding) => get_encoding(encoding));
    }

    count(text: string, model: string): TokenCount {
        if (this.mode === 'approximate') {
            return { method: 'approximate', tokens: approximateTokens(text), reason: 'approximate mode' };
        }

        const encoding = encodingForModel(model);
        if (!encoding) {
            return { method: 'approximate', tokens: approximateTokens(text), reason: `no tokenizer for model ${model}` };
        }

        try {
            return { method: 'exact', tokens: this.encode(encoding, text), encoding };
        } catch (error) {
            const reason = error instanceof TokenCountUnavailableError ? error.message : String(error);
            return { method: 'approximate', tokens: approximateTokens(text), reason };
        }
    }

    private encode(encoding: TiktokenEncoding, text: string): number {
        try {
            let encoder = this.encoders.get(encoding);
            if (!encoder) {
                encoder = this.loadEncoder(encoding);
                this.encoders.set(encoding, encoder);
            }
            return encoder.encode(text).length;
        } catch (error) {
            throw new TokenCountUnavailableError(`Tokenizer ${encoding} failed`, { cause: error });
        }
    }
}
