/**
 * Batch Runner
 *
 * Runs every query case through one tree and scores it. A failing query
 * is recorded as a failed result; the batch itself never rejects.
 */

import { UNKNOWN_ROUTE, parseRoutedTo, type DispatchExecutor } from '@routebench/dispatch';
import type { DispatchNode, QueryCase, RoutingResult } from '@routebench/types';
import { isCorrectRouting } from './scoring.js';

export interface BatchOptions {
    /** Queries in flight at once (default 1) */
    concurrency?: number;
    /** Called as each result lands, with its input index */
    onResult?: (result: RoutingResult, index: number) => void;
}

/**
 * Run a batch. Results are returned in input order regardless of concurrency.
 */
export async function runBatch(
    root: DispatchNode,
    cases: readonly QueryCase[],
    executor: DispatchExecutor,
    options: BatchOptions = {}
): Promise<RoutingResult[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const results: RoutingResult[] = new Array(cases.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
        while (cursor < cases.length) {
            const index = cursor++;
            const result = await runQuery(root, cases[index], executor);
            results[index] = result;
            notify(options.onResult, result, index);
        }
    };

    const workers = Array.from({ length: Math.min(concurrency, cases.length) }, () => worker());
    await Promise.all(workers);

    return results;
}

/**
 * Execute and score one query
 */
export async function runQuery(
    root: DispatchNode,
    queryCase: QueryCase,
    executor: DispatchExecutor
): Promise<RoutingResult> {
    const startTime = performance.now();

    try {
        const trace = await executor.execute(root, queryCase.text);
        const latency = secondsSince(startTime);
        const routedTo = parseRoutedTo(trace.responseText, trace.authors);

        return {
            query: queryCase.text,
            expectedDomain: queryCase.expectedDomain,
            routedTo,
            trace: trace.authors,
            responseText: trace.responseText,
            hopCount: new Set(trace.authors).size,
            latency,
            correct: isCorrectRouting(routedTo, queryCase.expectedDomain),
            status: 'ok',
        };
    } catch (error) {
        const latency = secondsSince(startTime);
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[BatchRunner] Query failed after ${latency.toFixed(2)}s: "${queryCase.text}" - ${message}`);

        return {
            query: queryCase.text,
            expectedDomain: queryCase.expectedDomain,
            routedTo: UNKNOWN_ROUTE,
            trace: [],
            responseText: '',
            hopCount: 0,
            latency,
            correct: false,
            status: 'failed',
            error: message,
        };
    }
}

function notify(onResult: BatchOptions['onResult'], result: RoutingResult, index: number): void {
    if (!onResult) return;
    try {
        onResult(result, index);
    } catch (error) {
        console.warn(`[BatchRunner] Result callback failed: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function secondsSince(startTime: number): number {
    return (performance.now() - startTime) / 1000;
}
