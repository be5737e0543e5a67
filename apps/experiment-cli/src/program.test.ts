import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram } from './program.js';

describe('routebench CLI', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = mkdtempSync(join(tmpdir(), 'routebench-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        rmSync(workDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('runs an offline experiment and writes the CSV', async () => {
        const output = join(workDir, 'results.csv');

        await createProgram({}).parseAsync([
            'node', 'routebench', 'run',
            '--offline',
            '--topologies', 'flat-domain,flat-leaf',
            '--queries', '4',
            '--runs', '2',
            '--output', output,
        ]);

        const lines = readFileSync(output, 'utf-8').split('\n');
        expect(lines[0]).toBe('Routing Experiment Results');
        expect(lines).toContain('Topologies,flat-domain vs flat-leaf');
        expect(lines).toContain('Runs,2');
        expect(lines).toContain('Queries,4');
        expect(lines).toContain('MISROUTED');
        expect(lines).toContain('1,I need to book a flight to Tokyo,travel');
        expect(lines.filter(line => /^[12],flat-(domain|leaf),/.test(line))).toHaveLength(4);
        expect(console.log).toHaveBeenCalledWith(`[Report] Results saved to ${output}`);
    });

    it('requires an API key for online runs', async () => {
        await expect(createProgram({}).parseAsync([
            'node', 'routebench', 'run', '--output', join(workDir, 'never.csv'),
        ])).rejects.toThrow('GEMINI_API_KEY is required unless --offline is set');
    });

    it('prints the shape of every topology', async () => {
        await createProgram({}).parseAsync(['node', 'routebench', 'topologies']);

        const printed = vi.mocked(console.log).mock.calls.map(args => String(args[0])).join('\n');
        expect(printed).toContain('central_coordinator');
        expect(printed).toContain('distributed_coordinator');
        expect(printed).toContain('leaf_coordinator');
    });
});
