/**
 * Query Fixtures
 *
 * (query, expected-domain) pairs used by every experiment run.
 */

import { fileURLToPath } from 'url';
import type { QueryCase } from '@routebench/types';
import { RegistryError } from './errors.js';
import { readJsonFile, type DomainRegistry } from './registry.js';
import { QueryFixtureSchema, formatIssues } from './schema.js';

export const DEFAULT_QUERIES_PATH = fileURLToPath(new URL('../data/queries.json', import.meta.url));

/**
 * Validate fixture data against the registry.
 * Every expected domain must exist, otherwise the case could never be scored correct.
 */
export function parseQueryCases(input: unknown, registry: DomainRegistry): QueryCase[] {
    const parsed = QueryFixtureSchema.safeParse(input);
    if (!parsed.success) {
        throw new RegistryError('Invalid query fixtures', formatIssues(parsed.error));
    }

    const unknownDomains = parsed.data.queries
        .filter(q => !registry.isKnownDomain(q.expectedDomain))
        .map(q => `"${q.text}" expects unknown domain: ${q.expectedDomain}`);

    if (unknownDomains.length > 0) {
        throw new RegistryError('Query fixtures reference unknown domains', unknownDomains);
    }

    return parsed.data.queries;
}

export function loadQueryCases(registry: DomainRegistry, path: string = DEFAULT_QUERIES_PATH): QueryCase[] {
    return parseQueryCases(readJsonFile(path), registry);
}

/** First `limit` cases in fixture order */
export function selectQueryCases(cases: readonly QueryCase[], limit?: number): QueryCase[] {
    if (limit === undefined || limit >= cases.length) {
        return [...cases];
    }
    return cases.slice(0, Math.max(0, limit));
}
