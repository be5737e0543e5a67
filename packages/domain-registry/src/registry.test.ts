import { afterEach, describe, expect, it, vi } from 'vitest';
import { RegistryError } from './errors.js';
import { createRegistry, loadRegistry } from './registry.js';
import { loadQueryCases, parseQueryCases, selectQueryCases } from './queries.js';

const SMALL_REGISTRY = {
    version: '1.0.0',
    domains: [
        {
            name: 'finance',
            description: 'Money matters',
            keywords: ['bank', 'invoice'],
            leafHandlers: ['banking', 'expenses'],
        },
        {
            name: 'hr',
            description: 'People matters',
            keywords: ['leave', 'payroll'],
        },
    ],
    leafDescriptions: {
        finance: { banking: 'Bank accounts and transfers' },
    },
};

describe('domain registry', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('loads the bundled registry', () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const registry = loadRegistry();

        expect(registry.size).toBe(37);
        expect(registry.leafCount).toBe(148);
        expect(registry.listDomains()[0].name).toBe('travel');
        expect(registry.getLeafDescription('finance', 'banking'))
            .toBe('Handles bank accounts, transfers, and banking services');
    });

    it('keeps leaf descriptions scoped to their domain', () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const registry = loadRegistry();

        expect(registry.getLeafDescription('legal', 'compliance'))
            .toBe('Handles compliance and regulatory matters');
        expect(registry.getLeafDescription('tax', 'compliance'))
            .toBe('Ensures tax compliance');
    });

    it('substitutes a placeholder for a missing leaf description and warns once', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const registry = createRegistry(SMALL_REGISTRY);

        expect(registry.getLeafDescription('finance', 'expenses')).toBe('Handles expenses tasks');
        expect(registry.getLeafDescription('finance', 'expenses')).toBe('Handles expenses tasks');
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('applies defaults for omitted optional fields', () => {
        const registry = createRegistry(SMALL_REGISTRY);
        const hr = registry.getDomain('hr');

        expect(hr?.leafHandlers).toEqual([]);
        expect(hr?.sampleQueries).toEqual([]);
        expect(registry.getLeafHandlers('hr')).toEqual([]);
        expect(registry.getLeafHandlers('missing')).toEqual([]);
    });

    it('resolves leaf handlers in declaration order', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        const registry = createRegistry(SMALL_REGISTRY);

        expect(registry.getLeafHandlers('finance')).toEqual([
            { domain: 'finance', name: 'banking', description: 'Bank accounts and transfers' },
            { domain: 'finance', name: 'expenses', description: 'Handles expenses tasks' },
        ]);
    });

    it('rejects an empty registry', () => {
        expect(() => createRegistry({ domains: [] })).toThrow(RegistryError);
    });

    it('rejects duplicate domain names', () => {
        const input = { domains: [SMALL_REGISTRY.domains[1], SMALL_REGISTRY.domains[1]] };
        expect(() => createRegistry(input)).toThrow('Duplicate domain name: hr');
    });

    it('rejects names that are not lowercase snake identifiers', () => {
        const input = { domains: [{ name: 'Finance', description: 'Money' }] };
        expect(() => createRegistry(input)).toThrow('domains.0.name: Must be a lowercase snake identifier');
    });

    it('detects a domain by keyword', () => {
        const registry = createRegistry(SMALL_REGISTRY);

        expect(registry.detectDomain('Where is my invoice?')).toBe('finance');
        expect(registry.detectDomain('Payroll question')).toBe('hr');
        expect(registry.detectDomain('Hello there')).toBe('unknown');
    });

    it('matches keywords on word boundaries only', () => {
        const registry = createRegistry(SMALL_REGISTRY);
        expect(registry.detectDomain('riverbanks are nice')).toBe('unknown');
    });
});

describe('query fixtures', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('loads and validates the bundled fixtures', () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const cases = loadQueryCases(loadRegistry());

        expect(cases).toHaveLength(59);
        expect(cases[0]).toEqual({ text: 'I need to book a flight to Tokyo', expectedDomain: 'travel' });
    });

    it('rejects cases that expect an unknown domain', () => {
        const registry = createRegistry(SMALL_REGISTRY);
        const input = { queries: [{ text: 'Book a flight', expectedDomain: 'travel' }] };

        expect(() => parseQueryCases(input, registry)).toThrow(RegistryError);
    });

    it('selects the first n cases', () => {
        const cases = [
            { text: 'a', expectedDomain: 'finance' },
            { text: 'b', expectedDomain: 'hr' },
            { text: 'c', expectedDomain: 'hr' },
        ];

        expect(selectQueryCases(cases, 2).map(c => c.text)).toEqual(['a', 'b']);
        expect(selectQueryCases(cases, 10)).toHaveLength(3);
        expect(selectQueryCases(cases)).toHaveLength(3);
    });
});
