/**
 * Evaluation Types
 */

import type { TopologyKind } from './topology.js';

// ============================================================================
// Inputs
// ============================================================================

export interface QueryCase {
    text: string;
    expectedDomain: string;
}

// ============================================================================
// Per-query Results
// ============================================================================

export type ResultStatus = 'ok' | 'failed';

export interface RoutingResult {
    query: string;
    expectedDomain: string;
    /** Resolved identifier or 'unknown', never empty */
    routedTo: string;
    trace: string[];
    responseText: string;
    /** Distinct node identifiers in the trace */
    hopCount: number;
    /** Wall-clock seconds for the full dispatch */
    latency: number;
    correct: boolean;
    status: ResultStatus;
    error?: string;
}

// ============================================================================
// Run and Comparison Metrics
// ============================================================================

export interface RunMetrics {
    /** Percentage, 0-100 */
    accuracy: number;
    avgLatency: number;
    avgHops: number;
    correctCount: number;
    totalCount: number;
    failedCount: number;
}

export interface RunRecord {
    /** 1-based run index */
    run: number;
    kind: TopologyKind;
    metrics: RunMetrics;
    /** Scored queries in fixture order */
    results: RoutingResult[];
}

/**
 * A query that did not reach its expected domain, or failed outright
 */
export interface Misroute {
    run: number;
    kind: TopologyKind;
    query: string;
    routedTo: string;
    expectedDomain: string;
    error?: string;
}

export interface MetricStats {
    mean: number;
    min: number;
    max: number;
}

export interface TopologyStats {
    kind: TopologyKind;
    runs: number;
    accuracy: MetricStats;
    latency: MetricStats;
    hops: MetricStats;
}

export type Winner = TopologyKind | 'Tie';

export interface ComparisonReport {
    records: RunRecord[];
    stats: TopologyStats[];
    misroutes: Misroute[];
    winners: {
        accuracy: Winner;
        latency: Winner;
        hops: Winner;
    };
}
