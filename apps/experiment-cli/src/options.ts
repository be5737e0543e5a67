/**
 * Run Options
 *
 * Validates the raw commander values for `routebench run`.
 */

import { z } from 'zod';
import { formatIssues } from '@routebench/domain-registry';
import { TopologyError, parseTopologyKind } from '@routebench/topology';
import type { TopologyKind } from '@routebench/types';
import { ConfigError } from './errors.js';

export const DEFAULT_TOPOLOGIES = 'flat-domain,two-level';

const RunOptionsSchema = z.object({
    topologies: z.string().default(DEFAULT_TOPOLOGIES),
    queries: z.coerce.number().int().positive().default(10),
    runs: z.coerce.number().int().positive().default(1),
    concurrency: z.coerce.number().int().positive().default(1),
    timeout: z.coerce.number().int().positive().optional(),
    output: z.string().min(1).optional(),
    offline: z.boolean().default(false),
    verbose: z.boolean().default(false),
});

export interface RunOptions {
    kinds: TopologyKind[];
    queries: number;
    runs: number;
    concurrency: number;
    timeoutMs?: number;
    output: string;
    offline: boolean;
    verbose: boolean;
}

export function parseRunOptions(raw: unknown, now: Date = new Date()): RunOptions {
    const parsed = RunOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError('Invalid run options', formatIssues(parsed.error));
    }

    const options = parsed.data;
    return {
        kinds: parseKindList(options.topologies),
        queries: options.queries,
        runs: options.runs,
        concurrency: options.concurrency,
        timeoutMs: options.timeout,
        output: options.output ?? defaultOutputPath(now),
        offline: options.offline,
        verbose: options.verbose,
    };
}

/**
 * Comma-separated kinds or aliases, duplicates dropped
 */
export function parseKindList(value: string): TopologyKind[] {
    const names = value.split(',').map(s => s.trim()).filter(Boolean);
    if (names.length === 0) {
        throw new ConfigError('At least one topology is required');
    }

    try {
        return [...new Set(names.map(parseTopologyKind))];
    } catch (error) {
        if (error instanceof TopologyError) {
            throw new ConfigError(error.message);
        }
        throw error;
    }
}

/** experiment_results_YYYYMMDD_HHMMSS.csv in local time */
export function defaultOutputPath(now: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `experiment_results_${date}_${time}.csv`;
}
