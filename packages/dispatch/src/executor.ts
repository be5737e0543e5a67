/**
 * Dispatch Executor
 * 
 * Drives one request through a delegation tree via the completion service
 * and records which nodes produced output, in order.
 *
 * The executor sees only author-tagged events; the routing decision itself
 * happens inside the service.
 */

import type {
    AgentEvent,
    CompletionService,
    DispatchNode,
    DispatchTrace,
    SessionRef,
} from '@routebench/types';
import { DispatchError, DispatchTimeoutError } from './errors.js';
import { createSessionId } from './session.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export interface ExecutorOptions {
    /** App name passed to the completion service (default 'routebench') */
    appName?: string;
    /** User id for every session; events authored by it are not nodes */
    userId?: string;
    /** Bound on one whole dispatch in ms (default 60000) */
    timeoutMs?: number;
    /** Prefix for generated session ids */
    sessionPrefix?: string;
}

export interface ExecuteOptions {
    /** Reuse a session id instead of generating one */
    sessionId?: string;
    timeoutMs?: number;
}

export class DispatchExecutor {
    private service: CompletionService;
    private appName: string;
    private userId: string;
    private timeoutMs: number;
    private sessionPrefix: string;

    constructor(service: CompletionService, options: ExecutorOptions = {}) {
        this.service = service;
        this.appName = options.appName || 'routebench';
        this.userId = options.userId || 'test_user';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.sessionPrefix = options.sessionPrefix || this.appName;
    }

    get serviceName(): string {
        return this.service.name;
    }

    /**
     * Execute a single query against a tree.
     * Rejects with DispatchTimeoutError or DispatchError; never retries.
     */
    async execute(root: DispatchNode, queryText: string, options: ExecuteOptions = {}): Promise<DispatchTrace> {
        const session: SessionRef = {
            appName: this.appName,
            userId: this.userId,
            sessionId: options.sessionId || createSessionId(this.sessionPrefix),
        };
        // Generated sessions are single-use; caller-supplied ones may continue
        const ownsSession = !options.sessionId;
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;
        const deadline = Date.now() + timeoutMs;

        const authors: string[] = [];
        const texts: string[] = [];
        let iterator: AsyncIterator<AgentEvent> | undefined;

        try {
            iterator = this.service.run({ root, text: queryText, session })[Symbol.asyncIterator]();

            while (true) {
                const next = await this.nextBefore(iterator, deadline, queryText, timeoutMs);
                if (next.done) break;

                const event = next.value;
                if (!this.isNodeAuthor(event.author)) continue;

                authors.push(event.author);
                for (const text of event.texts) {
                    if (text) texts.push(text);
                }
            }
        } catch (error) {
            if (iterator) closeIterator(iterator);
            if (error instanceof DispatchError) throw error;

            const reason = error instanceof Error ? error.message : String(error);
            throw new DispatchError(`Dispatch failed: ${reason}`, queryText, { cause: error });
        } finally {
            if (ownsSession) this.service.endSession?.(session);
        }

        return {
            authors,
            responseText: texts.join('\n'),
            sessionId: session.sessionId,
        };
    }

    private isNodeAuthor(author: string): boolean {
        return author.length > 0 && author !== 'user' && author !== this.userId;
    }

    /**
     * Next event, or DispatchTimeoutError once the deadline passes
     */
    private async nextBefore(
        iterator: AsyncIterator<AgentEvent>,
        deadline: number,
        queryText: string,
        timeoutMs: number
    ): Promise<IteratorResult<AgentEvent>> {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
            throw new DispatchTimeoutError(queryText, timeoutMs);
        }

        const next = iterator.next();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new DispatchTimeoutError(queryText, timeoutMs)), remaining);
        });

        try {
            return await Promise.race([next, timeout]);
        } catch (error) {
            if (error instanceof DispatchTimeoutError) {
                // The abandoned call may still settle; report instead of leaving it unhandled
                void next.catch(late => {
                    console.warn(`[Executor] Late failure after timeout: ${late instanceof Error ? late.message : String(late)}`);
                });
            }
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }
}

/**
 * Ask the stream to stop without waiting on it; a hung call must not
 * hold up the caller.
 */
function closeIterator(iterator: AsyncIterator<AgentEvent>): void {
    const closing = iterator.return?.();
    if (closing) {
        void closing.catch(error => {
            console.warn(`[Executor] Failed to close event stream: ${error instanceof Error ? error.message : String(error)}`);
        });
    }
}
