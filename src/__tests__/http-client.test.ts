import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, parseRetryAfter } from '../utils/http-client.js';
import { silentLogger } from '../utils/logger.js';

function fetchReturning(...responses: Array<() => Response>) {
    let call = 0;
    return vi.fn(async (_url: string, _init?: RequestInit) => {
        const next = responses[Math.min(call, responses.length - 1)];
        call++;
        if (!next) throw new Error('no response configured');
        return next();
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ maxRetries: 2, initialBackoffMs: 1, maxBackoffMs: 5, logger: silentLogger() });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('uniprot')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should count every attempt under its source', async () => {
            vi.stubGlobal('fetch', fetchReturning(() => new Response('ok')));

            await client.getText('https://example.org/a', { source: 'uniprot' });
            await client.getText('https://example.org/b', { source: 'uniprot' });
            await client.getText('https://example.org/c');

            expect(client.getAllRequestCounts()).toEqual({ uniprot: 2, default: 1 });
        });

        it('should reset counts', async () => {
            vi.stubGlobal('fetch', fetchReturning(() => new Response('ok')));
            await client.getText('https://example.org/a');

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const error = new HttpError('Bad Request', 400, false, { error: 'bad request' });
            expect(error.response).toEqual({ error: 'bad request' });
        });
    });

    describe('retries', () => {
        it('should retry a 503 and return the later success', async () => {
            const fetchMock = fetchReturning(
                () => new Response('busy', { status: 503 }),
                () => new Response('payload', { status: 200 })
            );
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.getText('https://example.org/file')).resolves.toBe('payload');
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should not retry a 404', async () => {
            const fetchMock = fetchReturning(() => new Response('missing', { status: 404 }));
            vi.stubGlobal('fetch', fetchMock);

            const error = await client.getText('https://example.org/file').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should give up after maxRetries attempts', async () => {
            const fetchMock = fetchReturning(() => new Response('down', { status: 500 }));
            vi.stubGlobal('fetch', fetchMock);

            const error = await client.getText('https://example.org/file').catch((e: unknown) => e);
            expect(error).toMatchObject({ status: 500, retryable: true });
            expect(fetchMock).toHaveBeenCalledTimes(3);
        });
    });

    describe('requests', () => {
        it('should send HEAD and return lowercased headers', async () => {
            const fetchMock = fetchReturning(() => new Response(null, { status: 200, headers: { ETag: '"v1"' } }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.head('https://example.org/file');

            expect(response.headers['etag']).toBe('"v1"');
            expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('HEAD');
        });

        it('should encode form fields for POST', async () => {
            const fetchMock = fetchReturning(() => new Response('a;b\n1;2\n'));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.stream('https://example.org/download.php', {
                method: 'POST',
                form: { submit: 'Download complex data' },
            });
            await response.body?.cancel();

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.method).toBe('POST');
            expect(init?.body).toBe('submit=Download+complex+data');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/x-www-form-urlencoded' });
        });

        it('should send object bodies as JSON', async () => {
            const fetchMock = fetchReturning(() => new Response('ok'));
            vi.stubGlobal('fetch', fetchMock);

            await client.getText('https://example.org/q', { body: { query: 'kinase' } });

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.body).toBe('{"query":"kinase"}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
        });
    });

    describe('body timeout', () => {
        it('should fail a stalled body with a retryable error', async () => {
            const stalling = new HttpClient({ timeoutMs: 20, maxRetries: 0, logger: silentLogger() });
            vi.stubGlobal(
                'fetch',
                vi.fn(async (_url: string, init?: RequestInit) => {
                    const body = new ReadableStream<Uint8Array>({
                        start(controller) {
                            controller.enqueue(new TextEncoder().encode('Entry\n'));
                            init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
                        },
                    });
                    return new Response(body);
                })
            );

            const response = await stalling.stream('https://example.org/slow.tsv');
            const reader = response.body?.getReader();
            if (!reader) throw new Error('expected a body');

            const first = await reader.read();
            expect(first.done).toBe(false);

            const error = await reader.read().catch((e: unknown) => e);
            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 0, retryable: true, message: 'Body stalled for 20ms: https://example.org/slow.tsv' });
        });

        it('should pass a complete body through unchanged', async () => {
            vi.stubGlobal('fetch', fetchReturning(() => new Response('Entry\nP04637\n')));

            const response = await client.stream('https://example.org/p.tsv');

            expect(await new Response(response.body).text()).toBe('Entry\nP04637\n');
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            const limited = new HttpClient({
                rateLimits: { slow: { tokensPerSecond: 2, maxBurst: 1 } },
                logger: silentLogger(),
            });
            vi.stubGlobal('fetch', fetchReturning(() => new Response('ok')));

            const start = Date.now();
            await limited.getText('https://example.org/1', { source: 'slow' });
            await limited.getText('https://example.org/2', { source: 'slow' });
            await limited.getText('https://example.org/3', { source: 'slow' });
            const elapsed = Date.now() - start;

            // One token up front, then one every 500ms.
            expect(elapsed).toBeGreaterThanOrEqual(900);
            expect(limited.getRequestCount('slow')).toBe(3);
        });
    });
});

describe('parseRetryAfter', () => {
    it('should read seconds', () => {
        expect(parseRetryAfter('2', 30000)).toBe(2000);
    });

    it('should cap at the maximum', () => {
        expect(parseRetryAfter('120', 5000)).toBe(5000);
    });

    it('should ignore missing or unparseable values', () => {
        expect(parseRetryAfter(null, 5000)).toBeNull();
        expect(parseRetryAfter('soon', 5000)).toBeNull();
    });
});
