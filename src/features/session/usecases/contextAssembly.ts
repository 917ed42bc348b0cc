import type { SummaryMode } from '../../../platform/config.js';
import type { ChatMessage, Session } from '../domain/Session.js';

export const SUMMARY_PREFIX = 'Previous conversation summary: ';

export interface ContextAssemblyOptions {
    compressionThreshold: number;
    keepRecentMessages: number;
    /** Hard ceiling for the whole request context */
    maxContextTokens: number;
    summaryMode: SummaryMode;
    /** Used for the system entries; messages carry their own counts */
    countTokens: (text: string) => number;
}

/**
 * Ordered context for one model request. Pure: reads the session, changes nothing.
 *
 * 1. system prompt, always first
 * 2. above the compression threshold: the summary (if any) and the retained tail
 * 3. otherwise every message, preceded by the summary only in `always` mode
 * 4. oldest conversation entries are dropped while the estimate exceeds
 *    maxContextTokens; system entries and the newest message always stay
 */
export function assembleContext(
    session: Session,
    systemPrompt: string,
    options: ContextAssemblyOptions
): ChatMessage[] {
    const system: ChatMessage[] = [{ role: 'system', content: systemPrompt }];
    const overThreshold = session.totalTokens > options.compressionThreshold;

    const includeSummary =
        session.compressedContext !== undefined && (overThreshold || options.summaryMode === 'always');
    if (includeSummary) {
        system.push({ role: 'system', content: `${SUMMARY_PREFIX}${session.compressedContext}` });
    }

    const selected = overThreshold ? session.messages.slice(-options.keepRecentMessages) : session.messages;

    const budget = options.maxContextTokens - system.reduce((sum, entry) => sum + options.countTokens(entry.content), 0);
    let start = 0;
    let conversationTokens = selected.reduce((sum, message) => sum + message.tokenCount, 0);
    while (conversationTokens > budget && selected.length - start > 1) {
        conversationTokens -= selected[start].tokenCount;
        start++;
    }

    return [
        ...system,
        ...selected.slice(start).map((message) => ({ role: message.role, content: message.content })),
    ];
}
