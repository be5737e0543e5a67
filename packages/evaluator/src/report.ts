/**
 * Console Report
 *
 * cli-table3 renderings of per-run metrics and the cross-run comparison.
 */

import Table from 'cli-table3';
import type { ComparisonReport, MetricStats, RoutingResult, RunRecord } from '@routebench/types';
import { formatAccuracy, formatHops, formatLatency } from './format.js';

// No colour codes, so output is the same on a TTY, in a pipe and in a log file
const PLAIN_STYLE = { head: [], border: [] };

export function renderRunTable(records: readonly RunRecord[]): string {
    const table = new Table({
        head: ['Run', 'Topology', 'Accuracy', 'Avg Latency', 'Avg Hops', 'Failed'],
        style: PLAIN_STYLE,
    });

    for (const { run, kind, metrics } of records) {
        table.push([
            run,
            kind,
            `${formatAccuracy(metrics.accuracy)} (${metrics.correctCount}/${metrics.totalCount})`,
            formatLatency(metrics.avgLatency),
            formatHops(metrics.avgHops),
            metrics.failedCount,
        ]);
    }

    return table.toString();
}

export function renderComparisonTable(report: ComparisonReport): string {
    const table = new Table({
        head: ['Metric', ...report.stats.map(s => s.kind), 'Winner'],
        style: PLAIN_STYLE,
    });

    table.push(
        ['Accuracy', ...report.stats.map(s => statsCell(s.accuracy, s.runs, formatAccuracy)), report.winners.accuracy],
        ['Latency', ...report.stats.map(s => statsCell(s.latency, s.runs, formatLatency)), report.winners.latency],
        ['Hops', ...report.stats.map(s => statsCell(s.hops, s.runs, formatHops)), report.winners.hops],
    );

    return table.toString();
}

export function renderMisrouteTable(report: ComparisonReport): string {
    const table = new Table({
        head: ['Run', 'Topology', 'Query', 'Routed To', 'Expected', 'Error'],
        style: PLAIN_STYLE,
    });

    for (const m of report.misroutes) {
        table.push([m.run, m.kind, m.query, m.routedTo, m.expectedDomain, m.error ?? '']);
    }

    return table.toString();
}

/**
 * Mean, with the min-max range underneath when there was more than one run
 */
function statsCell(stats: MetricStats, runs: number, format: (value: number) => string): string {
    if (runs < 2) return format(stats.mean);
    return `${format(stats.mean)}\n${format(stats.min)} - ${format(stats.max)}`;
}

// ============================================================================
// Per-query lines (--verbose)
// ============================================================================

export function renderResultLine(result: RoutingResult, index: number): string {
    const prefix = `[${index + 1}] "${result.query}"`;

    if (result.status === 'failed') {
        return `✗ ${prefix} → FAILED (${result.error ?? 'unknown error'})`;
    }

    const mark = result.correct ? '✓' : '✗';
    return `${mark} ${prefix} → ${result.routedTo} (expected ${result.expectedDomain}), `
        + `${formatLatency(result.latency)}, ${result.hopCount} hops`;
}

export function renderResultLines(results: readonly RoutingResult[]): string[] {
    return results.map((result, index) => renderResultLine(result, index));
}
