/**
 * Number formatting shared by the console tables and the CSV export
 */

import type { RunMetrics } from '@routebench/types';

export function formatAccuracy(accuracy: number): string {
    return `${accuracy.toFixed(1)}%`;
}

export function formatLatency(seconds: number): string {
    return `${seconds.toFixed(2)}s`;
}

export function formatHops(hops: number): string {
    return hops.toFixed(1);
}

export function formatMetrics(metrics: RunMetrics): string {
    const failed = metrics.failedCount > 0 ? `, ${metrics.failedCount} failed` : '';
    return `${formatAccuracy(metrics.accuracy)} (${metrics.correctCount}/${metrics.totalCount}${failed}), `
        + `${formatLatency(metrics.avgLatency)} avg, ${formatHops(metrics.avgHops)} hops`;
}
