/**
 * CSV Export
 *
 * Writes the comparison as a sectioned CSV: metadata, one row per run and
 * topology, per-metric statistics, winners, misrouted queries, then the
 * queries used.
 */

import { writeFile } from 'fs/promises';
import type { ComparisonReport, QueryCase } from '@routebench/types';

type Row = ReadonlyArray<string | number>;

export function buildComparisonCsv(
    report: ComparisonReport,
    cases: readonly QueryCase[],
    generatedAt: Date
): string {
    const runs = report.records.reduce((max, r) => Math.max(max, r.run), 0);
    const rows: Row[] = [
        ['Routing Experiment Results'],
        ['Generated', generatedAt.toISOString()],
        ['Topologies', report.stats.map(s => s.kind).join(' vs ')],
        ['Runs', runs],
        ['Queries', cases.length],
        [],
        ['RUN SUMMARY'],
        ['Run', 'Topology', 'Accuracy (%)', 'Correct', 'Total', 'Failed', 'Avg Latency (s)', 'Avg Hops'],
    ];

    for (const { run, kind, metrics } of report.records) {
        rows.push([
            run,
            kind,
            metrics.accuracy.toFixed(1),
            metrics.correctCount,
            metrics.totalCount,
            metrics.failedCount,
            metrics.avgLatency.toFixed(2),
            metrics.avgHops.toFixed(1),
        ]);
    }

    rows.push([], ['STATISTICS'], ['Metric', 'Topology', 'Average', 'Min', 'Max']);
    for (const s of report.stats) {
        rows.push(['Accuracy (%)', s.kind, s.accuracy.mean.toFixed(1), s.accuracy.min.toFixed(1), s.accuracy.max.toFixed(1)]);
    }
    for (const s of report.stats) {
        rows.push(['Latency (s)', s.kind, s.latency.mean.toFixed(2), s.latency.min.toFixed(2), s.latency.max.toFixed(2)]);
    }
    for (const s of report.stats) {
        rows.push(['Hops', s.kind, s.hops.mean.toFixed(1), s.hops.min.toFixed(1), s.hops.max.toFixed(1)]);
    }

    rows.push(
        [],
        ['WINNERS'],
        ['Accuracy', report.winners.accuracy],
        ['Latency', report.winners.latency],
        ['Hops', report.winners.hops],
        [],
        ['MISROUTED'],
        ['Run', 'Topology', 'Query', 'Routed To', 'Expected Domain', 'Error'],
    );
    for (const m of report.misroutes) {
        rows.push([m.run, m.kind, m.query, m.routedTo, m.expectedDomain, m.error ?? '']);
    }

    rows.push([], ['TEST QUERIES'], ['#', 'Query', 'Expected Domain']);
    cases.forEach((c, i) => rows.push([i + 1, c.text, c.expectedDomain]));

    return rows.map(row => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

export async function writeComparisonCsv(
    path: string,
    report: ComparisonReport,
    cases: readonly QueryCase[],
    generatedAt: Date = new Date()
): Promise<void> {
    await writeFile(path, buildComparisonCsv(report, cases, generatedAt), 'utf-8');
    console.log(`[Report] Results saved to ${path}`);
}

export function escapeCsvField(value: string | number): string {
    const text = String(value);
    if (/[",\n\r]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}
