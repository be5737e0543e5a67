/**
 * Multi-Run Aggregator
 *
 * Folds per-run metrics into min/mean/max per topology and picks a
 * winner per metric. Works for any number of topologies.
 */

import type {
    ComparisonReport,
    MetricStats,
    Misroute,
    RunRecord,
    TopologyKind,
    TopologyStats,
    Winner,
} from '@routebench/types';
import { mean } from './scoring.js';

/** Accuracy means closer than this many percentage points are a tie */
export const ACCURACY_TIE_THRESHOLD = 5;

export function aggregate(records: readonly RunRecord[]): ComparisonReport {
    const byKind = new Map<TopologyKind, RunRecord[]>();
    for (const record of records) {
        const group = byKind.get(record.kind);
        if (group) {
            group.push(record);
        } else {
            byKind.set(record.kind, [record]);
        }
    }

    const stats: TopologyStats[] = [...byKind.entries()].map(([kind, group]) => ({
        kind,
        runs: group.length,
        accuracy: computeStats(group.map(r => r.metrics.accuracy)),
        latency: computeStats(group.map(r => r.metrics.avgLatency)),
        hops: computeStats(group.map(r => r.metrics.avgHops)),
    }));

    return {
        records: [...records],
        stats,
        misroutes: collectMisroutes(records),
        winners: {
            accuracy: accuracyWinner(stats),
            latency: lowestMean(stats, s => s.latency.mean),
            hops: lowestMean(stats, s => s.hops.mean),
        },
    };
}

/**
 * Every incorrect or failed query, in run order
 */
export function collectMisroutes(records: readonly RunRecord[]): Misroute[] {
    return records.flatMap(({ run, kind, results }) =>
        results
            .filter(r => !r.correct)
            .map((r): Misroute => ({
                run,
                kind,
                query: r.query,
                routedTo: r.routedTo,
                expectedDomain: r.expectedDomain,
                error: r.error,
            }))
    );
}

export function computeStats(values: readonly number[]): MetricStats {
    if (values.length === 0) {
        return { mean: 0, min: 0, max: 0 };
    }
    return {
        mean: mean(values),
        min: Math.min(...values),
        max: Math.max(...values),
    };
}

// ============================================================================
// Winners
// ============================================================================

/**
 * Highest mean accuracy, unless the runner-up is within the tie threshold
 */
export function accuracyWinner(stats: readonly TopologyStats[]): Winner {
    const ranked = [...stats].sort((a, b) => b.accuracy.mean - a.accuracy.mean);
    const [best, second] = ranked;
    if (!best) return 'Tie';
    if (!second) return best.kind;

    return best.accuracy.mean - second.accuracy.mean < ACCURACY_TIE_THRESHOLD ? 'Tie' : best.kind;
}

/**
 * Lowest mean wins; an exact tie for lowest is a tie
 */
export function lowestMean(stats: readonly TopologyStats[], pick: (s: TopologyStats) => number): Winner {
    const ranked = [...stats].sort((a, b) => pick(a) - pick(b));
    const [best, second] = ranked;
    if (!best) return 'Tie';
    if (!second) return best.kind;

    return pick(best) === pick(second) ? 'Tie' : best.kind;
}
