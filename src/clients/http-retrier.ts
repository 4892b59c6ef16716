/**
 * HTTP client with bounded retries for the statistics API
 *
 * The upstream occasionally answers 200 with an empty body, so success means
 * status 200 AND a body with non-whitespace content. Everything else is
 * retried after a constant pause.
 */

import axios from 'axios';
import { FetchExhaustedError, getErrorMessage } from '../errors';

/**
 * Anything that can turn a URL into a response body.
 * EndpointChain depends on this rather than on HttpRetrier so tests can inject fixtures.
 */
export interface ResponseFetcher {
    fetch(url: string, headers: Readonly<Record<string, string>>): Promise<string>;
}

const BODY_PREVIEW_LENGTH = 180;

export class HttpRetrier implements ResponseFetcher {
    private readonly maxTries: number;
    private readonly pauseSeconds: number;
    private readonly timeoutMs: number;

    constructor(
        maxTries: number = 3,
        pauseSeconds: number = 1.0,
        timeoutMs: number = 45000
    ) {
        this.maxTries = maxTries;
        this.pauseSeconds = pauseSeconds;
        this.timeoutMs = timeoutMs;
    }

    /**
     * GET a URL and return its body as text
     * @param url Fully expanded request URL
     * @param headers Request headers (Accept, User-Agent)
     * @param maxTries Attempts before giving up (defaults to the constructor value)
     * @param pauseSeconds Constant pause between attempts (defaults to the constructor value)
     * @throws FetchExhaustedError carrying the last failure reason
     */
    async fetch(
        url: string,
        headers: Readonly<Record<string, string>>,
        maxTries: number = this.maxTries,
        pauseSeconds: number = this.pauseSeconds
    ): Promise<string> {
        let lastFailure: string | null = null;

        for (let attempt = 1; attempt <= maxTries; attempt++) {
            try {
                const response = await axios.get<string>(url, {
                    headers: { ...headers },
                    timeout: this.timeoutMs,
                    responseType: 'text',
                    // The retrier judges the status itself
                    validateStatus: () => true
                });

                const body = typeof response.data === 'string' ? response.data : '';

                if (response.status === 200 && body.trim() !== '') {
                    return body;
                }

                lastFailure = `HTTP ${response.status}: ${body.slice(0, BODY_PREVIEW_LENGTH)}`;
            } catch (error) {
                lastFailure = getErrorMessage(error);
            }

            console.warn(`Attempt ${attempt}/${maxTries} failed for ${url}: ${lastFailure}`);

            if (attempt < maxTries) {
                await this.sleep(pauseSeconds * 1000);
            }
        }

        throw new FetchExhaustedError(url, maxTries, lastFailure ?? 'empty response');
    }

    /**
     * Sleep for specified milliseconds
     */
    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
