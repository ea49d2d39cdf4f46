/**
 * Shared HTTP plumbing for the model and search clients
 */

import { abortReason, createTimeoutSignal, sleep } from '../utils/abort.js';
import { isAbortError, toError } from '../errors.js';
import { createModuleLogger } from '../logger.js';

const log = createModuleLogger('http');

export const MAX_RETRIES = 3;
export const INITIAL_RETRY_DELAY_MS = 1000;

export interface RetryOptions {
    retries?: number;
    timeoutMs: number;
    /** Base backoff; doubled per attempt, doubled again for 429 */
    retryDelayMs?: number;
}

/**
 * Fetch with retry logic and exponential backoff.
 * Client errors other than 429 come back as-is without a retry; the
 * caller decides what a non-ok response means.
 * A returned response stays tied to `init.signal`, so aborting it later
 * also stops the body.
 */
export async function fetchWithRetry(
    url: string,
    init: RequestInit,
    options: RetryOptions
): Promise<Response> {
    const retries = Math.max(1, options.retries ?? MAX_RETRIES);
    const baseDelay = options.retryDelayMs ?? INITIAL_RETRY_DELAY_MS;
    const parentSignal = init.signal ?? undefined;
    let lastError: Error | null = null;
    let lastResponse: Response | null = null;

    for (let attempt = 0; attempt < retries; attempt++) {
        const timeout = createTimeoutSignal(options.timeoutMs, parentSignal);
        let delay = baseDelay * Math.pow(2, attempt);
        let handedBack = false;
        try {
            const response = await fetch(url, { ...init, signal: timeout.signal });
            lastResponse = response;

            if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
                handedBack = true;
                return response;
            }
            if (response.status === 429) delay *= 2;
            log.debug(`HTTP ${response.status} from ${url} (attempt ${attempt + 1}/${retries})`);
        } catch (error) {
            const err = toError(error);
            // A caller-side abort ends the request for good
            if (parentSignal?.aborted) throw err;
            lastError = isAbortError(err) && timeout.timedOut()
                ? new Error(`Request timed out after ${options.timeoutMs}ms`)
                : err;
            log.debug(`Request to ${url} failed (attempt ${attempt + 1}/${retries}): ${lastError.message}`);
        } finally {
            if (handedBack) timeout.disarm();
            else timeout.cleanup();
        }

        if (attempt < retries - 1) {
            await sleep(delay, parentSignal);
        }
    }

    if (lastResponse) return lastResponse;
    throw lastError ?? new Error('Max retries exceeded');
}

/**
 * Pull a readable message out of an API error response
 */
export async function parseErrorBody(response: Response): Promise<string> {
    let text: string;
    try {
        text = await response.text();
    } catch {
        return `HTTP ${response.status}`;
    }

    try {
        const json: unknown = JSON.parse(text);
        if (json && typeof json === 'object') {
            const record: Record<string, unknown> = { ...json };
            const nested = record.error;
            if (nested && typeof nested === 'object') {
                const inner: Record<string, unknown> = { ...nested };
                if (typeof inner.message === 'string') return inner.message;
            }
            if (typeof record.message === 'string') return record.message;
            if (typeof nested === 'string') return nested;
            if (typeof record.detail === 'string') return record.detail;
        }
    } catch {
        // not JSON, fall through to the raw text
    }
    return text || `HTTP ${response.status}`;
}

/**
 * Read a server-sent-events body line by line, yielding each `data:` payload.
 * Stops at `[DONE]` or end of stream. The body is cancelled when `signal`
 * aborts or the reader stops before the end.
 */
export async function* readSseData(
    body: ReadableStream<Uint8Array>,
    signal?: AbortSignal
): AsyncGenerator<string, void, unknown> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let drained = false;

    const cancel = (reason?: unknown) =>
        reader.cancel(reason).catch((error: unknown) => {
            log.debug(`Cancelling response body failed: ${toError(error).message}`);
        });
    // Cancelling settles a pending read, so the loop below wakes up
    const onAbort = () => {
        void cancel(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
        if (signal?.aborted) throw abortReason(signal);
        while (true) {
            const { done, value } = await reader.read();
            if (signal?.aborted) throw abortReason(signal);
            if (done) {
                drained = true;
                break;
            }

            buffer += decoder.decode(value, { stream: true });
            const lines = buffer.split('\n');
            buffer = lines.pop() ?? '';

            for (const rawLine of lines) {
                const line = rawLine.replace(/\r$/, '');
                if (!line.startsWith('data:')) continue;
                const data = line.slice(5).trimStart();
                if (data === '[DONE]') return;
                if (data) yield data;
            }
        }

        const tail = buffer.trim();
        if (tail.startsWith('data:')) {
            const data = tail.slice(5).trimStart();
            if (data && data !== '[DONE]') yield data;
        }
    } finally {
        signal?.removeEventListener('abort', onAbort);
        if (!drained) await cancel(signal?.aborted ? signal.reason : undefined);
        reader.releaseLock();
    }
}
