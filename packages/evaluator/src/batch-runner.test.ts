import { afterEach, describe, expect, it, vi } from 'vitest';
import { DispatchExecutor } from '@routebench/dispatch';
import type { AgentEvent, CompletionRequest, CompletionService, DispatchNode, RoutingResult } from '@routebench/types';
import { runBatch } from './batch-runner.js';

interface Route {
    authors: string[];
    text?: string;
    delayMs?: number;
}

/**
 * Answers each query from a fixed table; an Error entry makes the query fail
 */
class TableService implements CompletionService {
    readonly name = 'table';

    constructor(private routes: Record<string, Route | Error>) {}

    async *run(request: CompletionRequest): AsyncGenerator<AgentEvent> {
        yield { author: request.session.userId, texts: [request.text] };

        const route = this.routes[request.text];
        if (route instanceof Error) throw route;
        if (!route) return;

        if (route.delayMs) {
            await new Promise(resolve => setTimeout(resolve, route.delayMs));
        }
        for (const author of route.authors) {
            yield { author, texts: [] };
        }
        if (route.text) {
            yield { author: route.authors[route.authors.length - 1], texts: [route.text] };
        }
    }
}

const root: DispatchNode = {
    identifier: 'central_coordinator',
    role: 'dispatcher',
    description: 'root',
    instruction: 'route',
    children: [],
};

describe('runBatch', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('scores each query from its trace and markers', async () => {
        const executor = new DispatchExecutor(new TableService({
            'Check my bank balance': { authors: ['central_coordinator', 'finance_agent'] },
            'File an expense report': {
                authors: ['distributed_coordinator', 'finance_domain', 'finance_domain', 'finance_expenses'],
                text: '[ROUTED_TO: finance_expenses]',
            },
            'Request leave': { authors: ['central_coordinator', 'finance_agent'] },
        }));

        const results = await runBatch(root, [
            { text: 'Check my bank balance', expectedDomain: 'finance' },
            { text: 'File an expense report', expectedDomain: 'finance' },
            { text: 'Request leave', expectedDomain: 'hr' },
        ], executor);

        expect(results.map(r => [r.routedTo, r.correct, r.hopCount, r.status])).toEqual([
            ['finance_agent', true, 2, 'ok'],
            ['finance_expenses', true, 3, 'ok'],
            ['finance_agent', false, 2, 'ok'],
        ]);
        expect(results[1].trace).toEqual(['distributed_coordinator', 'finance_domain', 'finance_domain', 'finance_expenses']);
        expect(results[1].responseText).toBe('[ROUTED_TO: finance_expenses]');
        for (const r of results) {
            expect(r.latency).toBeGreaterThanOrEqual(0);
        }
    });

    it('records a failing query and keeps going', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const executor = new DispatchExecutor(new TableService({
            'Broken query': new Error('boom'),
            'Check my bank balance': { authors: ['central_coordinator', 'finance_agent'] },
        }));

        const results = await runBatch(root, [
            { text: 'Broken query', expectedDomain: 'finance' },
            { text: 'Check my bank balance', expectedDomain: 'finance' },
        ], executor);

        expect(results[0]).toMatchObject({
            query: 'Broken query',
            routedTo: 'unknown',
            trace: [],
            responseText: '',
            hopCount: 0,
            correct: false,
            status: 'failed',
            error: 'Dispatch failed: boom',
        });
        expect(results[1].status).toBe('ok');
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('keeps input order under concurrency', async () => {
        const executor = new DispatchExecutor(new TableService({
            slow: { authors: ['central_coordinator', 'finance_agent'], delayMs: 60 },
            medium: { authors: ['central_coordinator', 'hr_agent'], delayMs: 30 },
            fast: { authors: ['central_coordinator', 'legal_agent'] },
        }));
        const landed: number[] = [];

        const results = await runBatch(root, [
            { text: 'slow', expectedDomain: 'finance' },
            { text: 'medium', expectedDomain: 'hr' },
            { text: 'fast', expectedDomain: 'legal' },
        ], executor, {
            concurrency: 3,
            onResult: (_result: RoutingResult, index: number) => landed.push(index),
        });

        expect(results.map(r => r.routedTo)).toEqual(['finance_agent', 'hr_agent', 'legal_agent']);
        expect(landed).toEqual([2, 1, 0]);
    });

    it('keeps going when the result callback throws', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const executor = new DispatchExecutor(new TableService({
            'Check my bank balance': { authors: ['central_coordinator', 'finance_agent'] },
            'Request leave': { authors: ['central_coordinator', 'hr_agent'] },
        }));

        const results = await runBatch(root, [
            { text: 'Check my bank balance', expectedDomain: 'finance' },
            { text: 'Request leave', expectedDomain: 'hr' },
        ], executor, {
            onResult: () => {
                throw new Error('display closed');
            },
        });

        expect(results.map(r => r.routedTo)).toEqual(['finance_agent', 'hr_agent']);
        expect(warn).toHaveBeenCalledWith('[BatchRunner] Result callback failed: display closed');
        expect(warn).toHaveBeenCalledTimes(2);
    });

    it('returns an empty list for an empty batch', async () => {
        const executor = new DispatchExecutor(new TableService({}));
        expect(await runBatch(root, [], executor, { concurrency: 4 })).toEqual([]);
    });
});
