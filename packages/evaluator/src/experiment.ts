/**
 * Experiment Runner
 *
 * Repeats the batch for every topology kind, N times. Each (run, kind)
 * gets a freshly built tree so nothing carries over between runs.
 */

import type { DispatchExecutor } from '@routebench/dispatch';
import type { DomainRegistry } from '@routebench/domain-registry';
import { buildTopology } from '@routebench/topology';
import type { QueryCase, RoutingResult, RunRecord, TopologyKind } from '@routebench/types';
import { runBatch } from './batch-runner.js';
import { formatMetrics } from './format.js';
import { summarize } from './scoring.js';

export interface ExperimentOptions {
    registry: DomainRegistry;
    kinds: readonly TopologyKind[];
    cases: readonly QueryCase[];
    runs: number;
    executor: DispatchExecutor;
    concurrency?: number;
    /** Called for every scored query */
    onResult?: (result: RoutingResult, context: { run: number; kind: TopologyKind; index: number }) => void;
}

export async function runExperiment(options: ExperimentOptions): Promise<RunRecord[]> {
    const { registry, kinds, cases, runs, executor } = options;
    if (!Number.isInteger(runs) || runs < 1) {
        throw new RangeError(`runs must be a positive integer, got ${runs}`);
    }
    if (kinds.length === 0) {
        throw new RangeError('At least one topology kind is required');
    }

    console.log(
        `[Experiment] ${runs} run(s) x ${kinds.length} topologies x ${cases.length} queries via ${executor.serviceName}`
    );

    const records: RunRecord[] = [];

    for (let run = 1; run <= runs; run++) {
        for (const kind of kinds) {
            const root = buildTopology(registry, kind);

            const results = await runBatch(root, cases, executor, {
                concurrency: options.concurrency,
                onResult: (result, index) => options.onResult?.(result, { run, kind, index }),
            });

            const metrics = summarize(results);
            records.push({ run, kind, metrics, results });

            console.log(`[Experiment] Run ${run}/${runs} ${kind}: ${formatMetrics(metrics)}`);
        }
    }

    return records;
}
