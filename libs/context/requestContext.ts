import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Correlation data for one provisioning invocation.
 */
export interface InvocationContext {
    readonly requestId: string;
    /** Filled in once the payload has been parsed. */
    readonly accountName?: string;
    /** 'webhook' for HTTP deliveries, 'cli' for operator runs. */
    readonly source: 'webhook' | 'cli';
}

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the invocation boundary (gateway or CLI) should call run().
 * Downstream code reads with get() / current().
 */

const storage = new AsyncLocalStorage<InvocationContext>();

export class RequestContext {
    /**
     * Establish correlation scope for one invocation.
     * Supports both sync and async functions.
     */
    public static run<T>(
        context: InvocationContext,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze({ ...context }), fn);
    }

    /**
     * Get current invocation context.
     * Throws if called outside run() scope.
     */
    public static get(): InvocationContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_REQUEST_CONTEXT: No invocation scope established");
        }
        return ctx;
    }

    public static current(): InvocationContext | undefined {
        return storage.getStore();
    }

    /**
     * Runs fn in a nested scope that carries the parsed account name.
     */
    public static withAccount<T>(accountName: string, fn: () => Promise<T>): Promise<T> {
        const ctx = storage.getStore();
        if (!ctx) {
            return fn();
        }
        return storage.run(Object.freeze({ ...ctx, accountName }), fn);
    }
}
