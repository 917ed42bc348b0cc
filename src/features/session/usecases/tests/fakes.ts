import type { CompletionOptions, ICompletionClient } from '../../../../core/ports/ICompletionClient.js';
import type { ChatMessage } from '../../domain/Session.js';

export type CompletionCall = {
    messages: ChatMessage[];
    options?: CompletionOptions;
};

/**
 * Completion client whose answers come from a test-supplied function.
 */
export class ScriptedCompletionClient implements ICompletionClient {
    readonly calls: CompletionCall[] = [];

    constructor(private readonly respond: (prompt: string, callNumber: number) => Promise<string>) {}

    async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
        this.calls.push({ messages, options });
        return this.respond(messages.map((message) => message.content).join('\n'), this.calls.length);
    }

    get prompts(): string[] {
        return this.calls.map((call) => call.messages.map((message) => message.content).join('\n'));
    }
}

/** Answers digest-1, digest-2, ... */
export function numberedDigests(): ScriptedCompletionClient {
    return new ScriptedCompletionClient(async (_prompt, callNumber) => `digest-${callNumber}`);
}

export function failingClient(message = 'model unavailable'): ScriptedCompletionClient {
    return new ScriptedCompletionClient(async () => {
        throw new Error(message);
    });
}

/** Eight words, which the approximate counter prices at floor(8 * 1.3) = 10 tokens */
export const TEN_TOKEN_TEXT = 'one two three four five six seven eight';
