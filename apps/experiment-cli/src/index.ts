/**
 * RouteBench CLI
 *
 * Usage:
 *   npm run routebench -- run --offline --queries 20 --runs 3
 *   npm run routebench -- topologies
 */

import 'dotenv/config';
import { createProgram } from './program.js';

try {
    await createProgram().parseAsync(process.argv);
} catch (error) {
    console.error(`[CLI] ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
}
