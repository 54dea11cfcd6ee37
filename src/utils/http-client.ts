import { DEFAULT_CONFIG, type HttpConfig, type RateLimit } from '../types/index.js';
import { getLogger, type Logger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);
const FALLBACK_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export type HttpMethod = 'GET' | 'POST' | 'HEAD';

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: HttpMethod;
    headers?: Record<string, string>;
    /** Objects are sent as JSON. */
    body?: string | Record<string, unknown>;
    /** Sent as application/x-www-form-urlencoded. */
    form?: Record<string, string>;
    timeout?: number;
    /** Rate-limit group, usually the resource name. */
    source?: string;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * Response whose body has not been read yet. The caller owns the body
 * and must consume or cancel it.
 */
export interface HttpStreamResponse {
    status: number;
    headers: Record<string, string>;
    body: ReadableStream<Uint8Array> | null;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions extends Partial<HttpConfig> {
    rateLimits?: Record<string, RateLimit>;
    logger?: Logger;
}

/**
 * HTTP client with per-source rate limiting and bounded retries.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly config: HttpConfig;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly logger: Logger;

    constructor(options: HttpClientOptions = {}) {
        const { rateLimits, logger, ...http } = options;
        this.config = { ...DEFAULT_CONFIG.http, ...http };
        this.rateLimits = { ...DEFAULT_CONFIG.rateLimits, ...rateLimits };
        this.logger = logger ?? getLogger();
    }

    /**
     * Fetch a text body.
     */
    async getText(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<string> {
        const { response } = await this.send(url, { ...options, method: 'GET' });
        return response.text();
    }

    /**
     * Issue a HEAD request and return the response headers.
     */
    async head(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body' | 'form'>): Promise<HttpResponse<null>> {
        const { response } = await this.send(url, { ...options, method: 'HEAD' });
        await response.body?.cancel();
        return { status: response.status, headers: headersToRecord(response.headers), data: null, ok: true };
    }

    /**
     * Start a request and hand back the unread body stream. Each chunk
     * must arrive within the request timeout; a stalled body errors with
     * a retryable HttpError.
     */
    async stream(url: string, options: HttpRequestOptions = {}): Promise<HttpStreamResponse> {
        const timeout = options.timeout ?? this.config.timeoutMs;
        const { response, controller } = await this.send(url, options);
        return {
            status: response.status,
            headers: headersToRecord(response.headers),
            body: response.body ? guardBody(response.body, controller, timeout, url) : null,
        };
    }

    /**
     * Retry budget, for callers that retry a whole transfer.
     */
    get maxRetries(): number {
        return this.config.maxRetries;
    }

    /**
     * Sleep for the backoff of the given attempt and return its length.
     */
    async backoff(attempt: number): Promise<number> {
        const ms = calculateBackoff(attempt, this.config.initialBackoffMs, this.config.maxBackoffMs);
        await sleep(ms);
        return ms;
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    resetCounts(): void {
        this.requestCounts.clear();
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Rate limit, send, and retry until a successful response arrives.
     * Non-success responses are drained before retrying or throwing.
     */
    private async send(url: string, options: HttpRequestOptions): Promise<{ response: Response; controller: AbortController }> {
        const { method = 'GET', headers = {}, body, form, timeout = this.config.timeoutMs, source = 'default' } = options;
        const { maxRetries, initialBackoffMs, maxBackoffMs } = this.config;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.config.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (form) {
            requestBody = new URLSearchParams(form).toString();
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/x-www-form-urlencoded';
        } else if (typeof body === 'object') {
            requestBody = JSON.stringify(body);
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
        } else {
            requestBody = body;
        }

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            let response: Response;
            try {
                response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });
            } catch (error) {
                const code = errorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);

                if (retryable && attempt < maxRetries) {
                    const backoff = calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);
                    this.logger.warn({ errorCode: code, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable network error, backing off');
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }
                throw new HttpError(`Network error: ${error instanceof Error ? error.message : String(error)}`, 0, retryable);
            } finally {
                clearTimeout(timeoutId);
            }

            if (response.ok) return { response, controller };

            await response.body?.cancel();
            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && attempt < maxRetries) {
                const backoff = parseRetryAfter(response.headers.get('retry-after'), maxBackoffMs)
                    ?? calculateBackoff(attempt, initialBackoffMs, maxBackoffMs);
                this.logger.warn({ status: response.status, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable HTTP error, backing off');
                await sleep(backoff);
                continue;
            }

            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable);
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const limit = this.rateLimits[source] ?? this.rateLimits['default'] ?? FALLBACK_RATE_LIMIT;
            bucket = new TokenBucket(limit.tokensPerSecond, limit.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Retry-After header in milliseconds, capped at `max`.
 */
export function parseRetryAfter(header: string | null, max: number): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.min(max, seconds * 1000);

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.min(max, Math.max(0, date.getTime() - Date.now()));
    }

    return null;
}

/**
 * Exponential backoff with jitter.
 */
function calculateBackoff(attempt: number, initial: number, max: number): number {
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}

/**
 * Wrap a response body so that each read must complete within `idleMs`.
 * On a stall the request is aborted and the body errors with a
 * retryable HttpError; network resets become retryable HttpErrors too.
 */
function guardBody(
    body: ReadableStream<Uint8Array>,
    controller: AbortController,
    idleMs: number,
    url: string
): ReadableStream<Uint8Array> {
    const reader = body.getReader();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const arm = (): void => {
        clearTimeout(timer);
        timer = setTimeout(() => controller.abort(), idleMs);
    };

    return new ReadableStream<Uint8Array>({
        start() {
            arm();
        },
        async pull(out) {
            const chunk = await reader.read().catch((error: unknown) => {
                clearTimeout(timer);
                throw bodyError(error, controller.signal.aborted, idleMs, url);
            });
            if (chunk.done) {
                clearTimeout(timer);
                out.close();
                return;
            }
            arm();
            out.enqueue(chunk.value);
        },
        async cancel(reason) {
            clearTimeout(timer);
            await reader.cancel(reason);
        },
    });
}

function bodyError(error: unknown, timedOut: boolean, idleMs: number, url: string): unknown {
    if (timedOut) {
        return new HttpError(`Body stalled for ${idleMs}ms: ${url}`, 0, true);
    }
    const code = errorCode(error);
    if (code !== undefined && RETRYABLE_ERROR_CODES.has(code)) {
        return new HttpError(`Network error while reading body: ${error instanceof Error ? error.message : String(error)}`, 0, true, { code });
    }
    return error;
}

/**
 * Whether a failed transfer is worth starting again.
 */
export function isRetryableError(error: unknown): boolean {
    if (error instanceof HttpError) return error.retryable;
    const code = errorCode(error);
    return code !== undefined && RETRYABLE_ERROR_CODES.has(code);
}

function errorCode(error: unknown): string | undefined {
    const candidates: unknown[] = [error, error instanceof Error ? error.cause : undefined];
    for (const candidate of candidates) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

function headersToRecord(headers: Headers): Record<string, string> {
    const out: Record<string, string> = {};
    headers.forEach((value, key) => {
        out[key] = value;
    });
    return out;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
