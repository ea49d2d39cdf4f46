/**
 * Abort and timeout helpers shared by the HTTP clients, the tool servers
 * and the stage executor.
 */

export interface TimeoutSignal {
    signal: AbortSignal;
    /** True when this signal fired because its own timer ran out */
    timedOut: () => boolean;
    /** Stop the timer but keep following the parent signal */
    disarm: () => void;
    cleanup: () => void;
}

export function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): TimeoutSignal {
    const controller = new AbortController();
    let expired = false;
    const onAbort = () => controller.abort(parentSignal?.reason);

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort(parentSignal.reason);
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => {
            expired = true;
            controller.abort(createAbortError(`Timed out after ${timeoutMs}ms`, 'TimeoutError'));
        }, timeoutMs)
        : undefined;

    const disarm = () => {
        if (timeoutId) clearTimeout(timeoutId);
    };

    return {
        signal: controller.signal,
        timedOut: () => expired,
        disarm,
        cleanup: () => {
            disarm();
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

export function createAbortError(message = 'Aborted', name: 'AbortError' | 'TimeoutError' = 'AbortError'): Error {
    const error = new Error(message);
    error.name = name;
    return error;
}

export function abortReason(signal: AbortSignal): Error {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) return reason;
    return createAbortError(typeof reason === 'string' ? reason : 'Aborted');
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 * The underlying work is not stopped; callers pass the same signal to it.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) {
        // Attach a handler so a late rejection is not reported as unhandled
        promise.catch(() => undefined);
        return Promise.reject(abortReason(signal));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return signal?.aborted ? Promise.reject(abortReason(signal)) : Promise.resolve();
    return abortable(new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => clearTimeout(timer), { once: true });
    }), signal);
}
