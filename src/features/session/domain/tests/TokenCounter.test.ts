import { describe, expect, it } from 'vitest';
import type { TiktokenEncoding } from 'tiktoken';
import { approximateTokens, encodingForModel, TokenCounter, type TokenEncoder } from '../TokenCounter.js';

const EIGHT_WORDS = 'one two three four five six seven eight';

describe('approximateTokens', () => {
    it('prices words at 1.3 tokens, rounded down', () => {
        expect(approximateTokens(EIGHT_WORDS)).toBe(10);
        expect(approximateTokens('a b c')).toBe(3);
        expect(approximateTokens('  spaced\tout\nwords  ')).toBe(3);
    });

    it('counts nothing in empty or blank text', () => {
        expect(approximateTokens('')).toBe(0);
        expect(approximateTokens('   \n ')).toBe(0);
    });
});

describe('encodingForModel', () => {
    it('maps model families to their tiktoken encoding', () => {
        expect(encodingForModel('gpt-4o-mini')).toBe('o200k_base');
        expect(encodingForModel('gpt-4-turbo')).toBe('cl100k_base');
        expect(encodingForModel('GPT-3.5-turbo')).toBe('cl100k_base');
    });

    it('returns null for models tiktoken does not know', () => {
        expect(encodingForModel('llama-3-70b')).toBeNull();
    });
});

describe('TokenCounter', () => {
    it('counts exactly with tiktoken for a known model', () => {
        const counter = new TokenCounter();
        const result = counter.count('Explain the quadratic formula, please.', 'gpt-4o-mini');

        expect(result.method).toBe('exact');
        expect(result.tokens).toBeGreaterThan(0);
        expect(counter.count('', 'gpt-4o-mini').tokens).toBe(0);
    });

    it('loads each encoder once', () => {
        const loaded: TiktokenEncoding[] = [];
        const counter = new TokenCounter({
            loadEncoder: (encoding): TokenEncoder => {
                loaded.push(encoding);
                return { encode: (text) => new Uint32Array(text.length) };
            },
        });

        expect(counter.count('abcd', 'gpt-4o')).toEqual({ method: 'exact', tokens: 4, encoding: 'o200k_base' });
        expect(counter.count('ab', 'gpt-4o-mini').tokens).toBe(2);
        expect(loaded).toEqual(['o200k_base']);
    });

    it('falls back to the word estimate for unknown models', () => {
        const counter = new TokenCounter();

        expect(counter.count(EIGHT_WORDS, 'mistral-small')).toEqual({
            method: 'approximate',
            tokens: 10,
            reason: 'no tokenizer for model mistral-small',
        });
    });

    it('falls back when the encoder cannot be loaded', () => {
        const counter = new TokenCounter({
            loadEncoder: () => {
                throw new Error('wasm unavailable');
            },
        });

        expect(counter.count(EIGHT_WORDS, 'gpt-4o-mini')).toEqual({
            method: 'approximate',
            tokens: 10,
            reason: 'Tokenizer o200k_base failed',
        });
    });

    it('never touches tiktoken in approximate mode', () => {
        const counter = new TokenCounter({
            mode: 'approximate',
            loadEncoder: () => {
                throw new Error('should not load');
            },
        });

        expect(counter.count(EIGHT_WORDS, 'gpt-4o-mini')).toEqual({
            method: 'approximate',
            tokens: 10,
            reason: 'approximate mode',
        });
    });
});
