import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (HTTP handler, background promotion) calls run().
 * Downstream code calls get() / tryGet().
 */

export interface RequestScope {
    readonly requestId: string;
    readonly subject?: string;
    readonly priority?: 'interactive' | 'batch';
}

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    /**
     * Establish request scope for the lifetime of fn.
     */
    public static run<T>(scope: RequestScope, fn: () => T): T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Current request scope. Throws outside run().
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error("MISSING_REQUEST_CONTEXT: No request scope established");
        }
        return scope;
    }

    public static tryGet(): RequestScope | undefined {
        return storage.getStore();
    }
}
