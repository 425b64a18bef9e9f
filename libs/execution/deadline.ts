/**
 * Deadline and cancellation helpers for remote calls.
 *
 * Every secret-store and directory call runs under an explicit deadline so
 * an unresponsive collaborator fails the step instead of hanging the
 * invocation.
 */

export class DeadlineExceededError extends Error {
    readonly code = 'DEADLINE_EXCEEDED';

    constructor(public readonly operation: string, public readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'DeadlineExceededError';
    }
}

export class CancelledError extends Error {
    readonly code = 'CANCELLED';

    constructor(operation: string) {
        super(`${operation} cancelled by caller`);
        this.name = 'CancelledError';
    }
}

/**
 * Runs `fn` with an AbortSignal that fires when either the deadline passes
 * or the caller's signal aborts. The returned promise settles with whichever
 * happens first; the underlying call is asked to stop through the signal.
 */
export async function withDeadline<T>(
    operation: string,
    timeoutMs: number,
    fn: (signal: AbortSignal) => Promise<T>,
    callerSignal?: AbortSignal
): Promise<T> {
    if (callerSignal?.aborted) {
        throw new CancelledError(operation);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const err = new DeadlineExceededError(operation, timeoutMs);
            controller.abort(err);
            reject(err);
        }, timeoutMs);

        if (callerSignal) {
            onCallerAbort = () => {
                const err = new CancelledError(operation);
                controller.abort(err);
                reject(err);
            };
            callerSignal.addEventListener('abort', onCallerAbort, { once: true });
        }
    });

    try {
        return await Promise.race([fn(controller.signal), guard]);
    } finally {
        clearTimeout(timer);
        if (callerSignal && onCallerAbort) {
            callerSignal.removeEventListener('abort', onCallerAbort);
        }
    }
}

export function delay(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
}
