/**
 * `routebench run`
 *
 * Runs the query fixtures through each requested topology, prints the
 * per-run and comparison tables, and saves the CSV.
 */

import {
    DispatchExecutor,
    GeminiCompletionService,
    KeywordCompletionService,
} from '@routebench/dispatch';
import {
    loadQueryCases,
    loadRegistry,
    selectQueryCases,
    type DomainRegistry,
} from '@routebench/domain-registry';
import {
    aggregate,
    renderComparisonTable,
    renderMisrouteTable,
    renderResultLine,
    renderRunTable,
    runExperiment,
    writeComparisonCsv,
} from '@routebench/evaluator';
import type { CompletionService, ComparisonReport } from '@routebench/types';
import type { RouteBenchConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import type { RunOptions } from '../options.js';

export interface RunSources {
    /** Registry JSON (defaults to the bundled registry) */
    registryPath?: string;
    /** Query fixture JSON (defaults to the bundled fixtures) */
    queriesPath?: string;
}

export async function runCommand(
    options: RunOptions,
    config: RouteBenchConfig,
    sources: RunSources = {}
): Promise<ComparisonReport> {
    const registry = loadRegistry(sources.registryPath);
    const cases = selectQueryCases(loadQueryCases(registry, sources.queriesPath), options.queries);
    const timeoutMs = options.timeoutMs ?? config.timeoutMs;
    const service = createService(options, config, registry, timeoutMs);
    const executor = new DispatchExecutor(service, { timeoutMs });

    console.log('='.repeat(60));
    console.log(`ROUTING EXPERIMENT: ${options.kinds.join(' vs ')}`);
    console.log(`Service: ${service.name}${options.offline ? '' : ` (${config.model})`}`);
    console.log(`Queries: ${cases.length}, runs: ${options.runs}, concurrency: ${options.concurrency}`);
    console.log('='.repeat(60));

    const records = await runExperiment({
        registry,
        kinds: options.kinds,
        cases,
        runs: options.runs,
        executor,
        concurrency: options.concurrency,
        onResult: options.verbose
            ? (result, { run, kind, index }) => console.log(`  [run ${run} ${kind}] ${renderResultLine(result, index)}`)
            : undefined,
    });

    const report = aggregate(records);

    console.log('\nRUN SUMMARY');
    console.log(renderRunTable(report.records));
    console.log('\nCOMPARISON');
    console.log(renderComparisonTable(report));
    if (report.misroutes.length > 0) {
        console.log(`\nMISROUTED (${report.misroutes.length})`);
        console.log(renderMisrouteTable(report));
    }

    await writeComparisonCsv(options.output, report, cases);
    return report;
}

export function createService(
    options: RunOptions,
    config: RouteBenchConfig,
    registry: DomainRegistry,
    timeoutMs: number
): CompletionService {
    if (options.offline) {
        return new KeywordCompletionService(registry);
    }
    if (!config.apiKey) {
        throw new ConfigError('GEMINI_API_KEY is required unless --offline is set');
    }
    return new GeminiCompletionService({
        apiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
        requestTimeoutMs: timeoutMs,
    });
}
