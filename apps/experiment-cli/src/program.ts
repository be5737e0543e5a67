/**
 * CLI program definition
 */

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { topologiesCommand } from './commands/topologies.js';
import { loadConfig } from './config.js';
import { DEFAULT_TOPOLOGIES, parseRunOptions } from './options.js';

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
    const program = new Command();

    program
        .name('routebench')
        .description('Compare routing accuracy, latency and hop count across dispatch topologies')
        .version('0.1.0');

    program
        .command('run')
        .description('Run the query fixtures through each topology and save a CSV report')
        .option('-t, --topologies <list>', 'Comma-separated topologies (flat-domain, two-level, flat-leaf)', DEFAULT_TOPOLOGIES)
        .option('-q, --queries <n>', 'Number of fixture queries to use', '10')
        .option('-r, --runs <n>', 'Runs per topology', '1')
        .option('-c, --concurrency <n>', 'Queries in flight at once', '1')
        .option('--timeout <ms>', 'Bound on one dispatch in ms (overrides ROUTEBENCH_TIMEOUT_MS)')
        .option('-o, --output <file>', 'CSV output path (default experiment_results_<timestamp>.csv)')
        .option('--offline', 'Route with the keyword service; no API key needed', false)
        .option('-v, --verbose', 'Print one line per query', false)
        .action(async (raw: unknown) => {
            const config = loadConfig(env);
            await runCommand(parseRunOptions(raw), config);
        });

    program
        .command('topologies')
        .description('Show the shape of each topology for the registry')
        .option('--registry <file>', 'Registry JSON (defaults to the bundled registry)')
        .action((options: { registry?: string }) => {
            topologiesCommand(options.registry);
        });

    return program;
}
