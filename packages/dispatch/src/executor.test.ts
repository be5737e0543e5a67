import { afterEach, describe, expect, it, vi } from 'vitest';
import type { AgentEvent, CompletionRequest, CompletionService, DispatchNode, SessionRef } from '@routebench/types';
import { DispatchError, DispatchTimeoutError } from './errors.js';
import { DispatchExecutor } from './executor.js';

const LEAF: DispatchNode = {
    identifier: 'finance_agent',
    role: 'leaf',
    description: 'Money matters',
    instruction: 'You are the Finance agent.',
    domain: 'finance',
    children: [],
};

const ROOT: DispatchNode = {
    identifier: 'central_coordinator',
    role: 'dispatcher',
    description: 'Routes requests',
    instruction: 'Route the request.',
    children: [LEAF],
};

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Replays fixed events per request, optionally pausing before each one
 */
class ScriptedService implements CompletionService {
    readonly name = 'scripted';
    readonly requests: CompletionRequest[] = [];
    readonly ended: string[] = [];

    constructor(
        private readonly events: AgentEvent[],
        private readonly delayMs = 0
    ) {}

    async *run(request: CompletionRequest): AsyncGenerator<AgentEvent> {
        this.requests.push(request);
        for (const event of this.events) {
            if (this.delayMs > 0) await sleep(this.delayMs);
            yield event;
        }
    }

    endSession(session: SessionRef): void {
        this.ended.push(session.sessionId);
    }
}

class FailingService implements CompletionService {
    readonly name = 'failing';

    async *run(): AsyncGenerator<AgentEvent> {
        yield { author: 'central_coordinator', texts: [] };
        throw new Error('socket hang up');
    }
}

describe('DispatchExecutor', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('records node authors in order and joins their text', async () => {
        const service = new ScriptedService([
            { author: 'test_user', texts: ['Check my bank balance'] },
            { author: 'central_coordinator', texts: [] },
            { author: 'finance_agent', texts: ['[ROUTED_TO: finance_agent]', 'Happy to help.'] },
        ]);
        const executor = new DispatchExecutor(service);

        const trace = await executor.execute(ROOT, 'Check my bank balance');

        expect(trace.authors).toEqual(['central_coordinator', 'finance_agent']);
        expect(trace.responseText).toBe('[ROUTED_TO: finance_agent]\nHappy to help.');
    });

    it('passes the query and root to the service', async () => {
        const service = new ScriptedService([]);
        await new DispatchExecutor(service, { appName: 'routing_flat', userId: 'eval_user' })
            .execute(ROOT, 'Reset my password');

        expect(service.requests).toHaveLength(1);
        expect(service.requests[0].root).toBe(ROOT);
        expect(service.requests[0].text).toBe('Reset my password');
        expect(service.requests[0].session.appName).toBe('routing_flat');
        expect(service.requests[0].session.userId).toBe('eval_user');
    });

    it('returns an empty trace when no node responds', async () => {
        const trace = await new DispatchExecutor(new ScriptedService([])).execute(ROOT, 'Hello');

        expect(trace.authors).toEqual([]);
        expect(trace.responseText).toBe('');
    });

    it('uses a distinct session per execution', async () => {
        const service = new ScriptedService([]);
        const executor = new DispatchExecutor(service, { sessionPrefix: 'run1' });

        const [first, second] = await Promise.all([
            executor.execute(ROOT, 'a'),
            executor.execute(ROOT, 'b'),
        ]);

        expect(first.sessionId).not.toBe(second.sessionId);
        expect(first.sessionId.startsWith('run1-')).toBe(true);
        expect(service.requests.map(r => r.session.sessionId)).toEqual([first.sessionId, second.sessionId]);
    });

    it('keeps an explicit session id open', async () => {
        const service = new ScriptedService([]);
        const trace = await new DispatchExecutor(service).execute(ROOT, 'a', { sessionId: 'fixed' });
        expect(trace.sessionId).toBe('fixed');
        expect(service.ended).toEqual([]);
    });

    it('ends the sessions it generates', async () => {
        const service = new ScriptedService([{ author: 'central_coordinator', texts: [] }]);
        const executor = new DispatchExecutor(service);

        const trace = await executor.execute(ROOT, 'a');

        expect(service.ended).toEqual([trace.sessionId]);
    });

    it('ends a generated session when the dispatch fails', async () => {
        const service = new ScriptedService([{ author: 'central_coordinator', texts: [] }], 200);
        const executor = new DispatchExecutor(service, { timeoutMs: 20 });

        await executor.execute(ROOT, 'Slow query').catch(() => undefined);

        expect(service.ended).toHaveLength(1);
        expect(service.ended[0]).toBe(service.requests[0].session.sessionId);
    });

    it('fails with a timeout error when the service is too slow', async () => {
        const service = new ScriptedService([{ author: 'central_coordinator', texts: [] }], 200);
        const executor = new DispatchExecutor(service, { timeoutMs: 20 });

        const error = await executor.execute(ROOT, 'Slow query').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DispatchTimeoutError);
        if (!(error instanceof DispatchTimeoutError)) return;
        expect(error.query).toBe('Slow query');
        expect(error.timeoutMs).toBe(20);
        expect(error.message).toBe('Dispatch timed out after 20ms');
    });

    it('wraps transport failures in a dispatch error', async () => {
        const error = await new DispatchExecutor(new FailingService())
            .execute(ROOT, 'Check my bank balance')
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DispatchError);
        if (!(error instanceof DispatchError)) return;
        expect(error.message).toBe('Dispatch failed: socket hang up');
        expect(error.query).toBe('Check my bank balance');
        expect(error.cause).toBeInstanceOf(Error);
    });
});
