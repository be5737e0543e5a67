/**
 * Run Scoring
 *
 * Correctness of a single routing decision, and the summary of one batch.
 */

import type { RoutingResult, RunMetrics } from '@routebench/types';

/**
 * A route is correct when it names the expected domain, or any
 * node namespaced under it ({domain}_agent, {domain}_domain, {domain}_{leaf}).
 */
export function isCorrectRouting(routedTo: string, expectedDomain: string): boolean {
    return routedTo === expectedDomain || routedTo.startsWith(`${expectedDomain}_`);
}

/**
 * Summarize one batch. Failed queries count toward the total only;
 * an empty batch yields zeros.
 */
export function summarize(results: readonly RoutingResult[]): RunMetrics {
    const totalCount = results.length;
    if (totalCount === 0) {
        return { accuracy: 0, avgLatency: 0, avgHops: 0, correctCount: 0, totalCount: 0, failedCount: 0 };
    }

    const correctCount = results.filter(r => r.correct).length;
    const failedCount = results.filter(r => r.status === 'failed').length;

    return {
        accuracy: (correctCount / totalCount) * 100,
        avgLatency: mean(results.map(r => r.latency)),
        avgHops: mean(results.map(r => r.hopCount)),
        correctCount,
        totalCount,
        failedCount,
    };
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}
