/**
 * A single query could not be dispatched (transport failure, service error).
 * Fatal for that query only; the batch runner records it and moves on.
 */
export class DispatchError extends Error {
    readonly query: string;

    constructor(message: string, query: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'DispatchError';
        this.query = query;
    }
}

export class DispatchTimeoutError extends DispatchError {
    readonly timeoutMs: number;

    constructor(query: string, timeoutMs: number) {
        super(`Dispatch timed out after ${timeoutMs}ms`, query);
        this.name = 'DispatchTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}
