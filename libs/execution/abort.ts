import { OrchestrationError } from '../errors/sanitizer.js';

function cancelled(contextLabel: string, signal: AbortSignal): OrchestrationError {
    return new OrchestrationError('Cancelled', { reason: String(signal.reason) }, { contextLabel });
}

export function throwIfCancelled(signal: AbortSignal | undefined, contextLabel: string): void {
    if (signal?.aborted) {
        throw cancelled(contextLabel, signal);
    }
}

/**
 * Waits for `promise` unless `signal` aborts first, in which case the wait
 * rejects with Cancelled. The underlying promise is left running; its owner
 * remains responsible for observing its rejection.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, contextLabel: string): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) {
        return Promise.reject(cancelled(contextLabel, signal));
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(cancelled(contextLabel, signal));
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            error => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

/**
 * setTimeout as a promise that rejects with Cancelled when `signal` aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(cancelled('Sleep', signal));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            if (signal) reject(cancelled('Sleep', signal));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
