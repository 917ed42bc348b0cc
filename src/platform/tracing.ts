/**
 * Request-scoped trace context on top of AsyncLocalStorage.
 *
 * Everything awaited inside `runWithTrace` sees the same context, so log lines
 * from interleaved turns can be told apart by trace id.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    /** Correlates every log line of one turn */
    traceId: string;
    studentId?: string;
    sessionId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/** 12 characters is enough to separate concurrent turns */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * Run `fn` inside a fresh trace context.
 *
 * @example
 * await runWithTrace(async () => {
 *     await manager.addMessage(sessionId, 'user', text); // logs carry the trace id
 * }, { studentId });
 */
export async function runWithTrace<T>(
    fn: () => Promise<T>,
    context: Partial<TraceContext> = {}
): Promise<T> {
    const store: TraceContext = { ...context, traceId: context.traceId ?? generateTraceId() };
    return asyncLocalStorage.run(store, fn);
}

export function getTraceContext(): TraceContext | undefined {
    return asyncLocalStorage.getStore();
}

export function getStudentId(): string | undefined {
    return asyncLocalStorage.getStore()?.studentId;
}

/** No-op outside `runWithTrace` */
export function setTraceSession(sessionId: string, studentId?: string): void {
    const store = asyncLocalStorage.getStore();
    if (!store) return;
    store.sessionId = sessionId;
    if (studentId) {
        store.studentId = studentId;
    }
}
