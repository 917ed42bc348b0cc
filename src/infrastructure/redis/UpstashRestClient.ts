import { PersistenceUnavailableError } from '../../core/errors.js';

/** The slice of a fetch Response the client reads */
export interface UpstashHttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
    json(): Promise<unknown>;
}

/** `globalThis.fetch` satisfies this; tests pass an in-process fake */
export type UpstashFetch = (
    url: string,
    init: {
        method: 'POST';
        headers: Record<string, string>;
        body: string;
        signal?: AbortSignal;
    }
) => Promise<UpstashHttpResponse>;

export interface UpstashRestClientParams {
    restUrl: string;
    token: string;
    /** Per-command timeout */
    timeoutMs?: number;
    fetchImpl?: UpstashFetch;
}

/**
 * Minimal Upstash Redis REST client: one command per request, sent as a JSON
 * array in the POST body (`["SET", key, value, "EX", "60"]`).
 *
 * Every failure (network, HTTP status, Redis error reply) surfaces as
 * PersistenceUnavailableError.
 */
export class UpstashRestClient {
    private readonly baseUrl: string;
    private readonly headers: Record<string, string>;
    private readonly timeoutMs: number;
    private readonly fetchImpl: UpstashFetch;

    constructor(params: UpstashRestClientParams) {
        const { restUrl, token } = params;
        if (!restUrl || !token) {
            throw new Error('UpstashRestClient requires non-empty restUrl and token');
        }
        this.baseUrl = restUrl.replace(/\/+$/, '');
        this.headers = {
            Authorization: `Bearer ${token}`,
            'Content-Type': 'application/json',
        };
        this.timeoutMs = params.timeoutMs ?? 5000;
        this.fetchImpl = params.fetchImpl ?? ((url, init) => fetch(url, init));
    }

    get endpoint(): string {
        return this.baseUrl;
    }

    async command(...args: string[]): Promise<unknown> {
        if (args.length === 0) {
            throw new Error('Upstash command requires at least one argument');
        }
        const name = args[0].toUpperCase();

        let response: UpstashHttpResponse;
        try {
            response = await this.fetchImpl(this.baseUrl, {
                method: 'POST',
                headers: this.headers,
                body: JSON.stringify(args),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new PersistenceUnavailableError(`Redis ${name} request failed`, { cause: error });
        }

        if (!response.ok) {
            const text = await response.text().catch(() => '');
            throw new PersistenceUnavailableError(`Redis ${name} ${response.status}: ${text}`);
        }

        let data: unknown;
        try {
            data = await response.json();
        } catch (error) {
            throw new PersistenceUnavailableError(`Redis ${name} returned a non-JSON body`, { cause: error });
        }

        if (!data || typeof data !== 'object') {
            throw new PersistenceUnavailableError(`Redis ${name} returned an unexpected body`);
        }
        // Upstash replies { result } on success and { error } on a Redis error
        if ('error' in data && data.error) {
            throw new PersistenceUnavailableError(`Redis ${name} error: ${String(data.error)}`);
        }
        return 'result' in data ? data.result ?? null : null;
    }
}
