/**
 * Per-session mutual exclusion around read-modify-write cycles.
 */
export interface SessionLock {
    runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T>;
}
