/**
 * Domain Registry
 * 
 * Read-only registry of routing domains and their leaf handlers.
 * Shared across concurrent executions without locking.
 *
 * Leaf descriptions are keyed by (domain, leaf) so that names reused
 * across domains (compliance, reporting, planning, ...) keep their own text.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { RegistryError } from './errors.js';
import { RegistryDataSchema, formatIssues, type RegistryInput } from './schema.js';
import type { DomainRecord, LeafHandlerRecord, RegistryData } from './types.js';

export const DEFAULT_REGISTRY_PATH = fileURLToPath(new URL('../data/domains.json', import.meta.url));

/** Returned by detectDomain when no keyword matches */
export const UNKNOWN_DOMAIN = 'unknown';

export class DomainRegistry {
    readonly version: string;
    private readonly domains: readonly DomainRecord[];
    private readonly byName: Map<string, DomainRecord>;
    private readonly leafDescriptions: Map<string, string>;
    private readonly warnedLeaves = new Set<string>();

    constructor(data: RegistryData) {
        this.version = data.version;
        this.domains = Object.freeze(data.domains.map(d => Object.freeze({ ...d })));
        this.byName = new Map(this.domains.map(d => [d.name, d] as const));
        this.leafDescriptions = new Map();

        for (const [domain, leaves] of Object.entries(data.leafDescriptions)) {
            for (const [leaf, description] of Object.entries(leaves)) {
                this.leafDescriptions.set(leafKey(domain, leaf), description);
            }
        }
    }

    /** Domains in registry order */
    listDomains(): readonly DomainRecord[] {
        return this.domains;
    }

    get size(): number {
        return this.domains.length;
    }

    /** Total leaf handlers across all domains */
    get leafCount(): number {
        return this.domains.reduce((sum, d) => sum + d.leafHandlers.length, 0);
    }

    getDomain(name: string): DomainRecord | undefined {
        return this.byName.get(name);
    }

    isKnownDomain(name: string): boolean {
        return this.byName.has(name);
    }

    /**
     * Description of a leaf within its domain.
     * Missing entries get a placeholder instead of failing construction.
     */
    getLeafDescription(domain: string, leaf: string): string {
        const key = leafKey(domain, leaf);
        const description = this.leafDescriptions.get(key);
        if (description !== undefined) {
            return description;
        }

        if (!this.warnedLeaves.has(key)) {
            this.warnedLeaves.add(key);
            console.warn(`[Registry] No description for leaf "${key}", using placeholder`);
        }
        return `Handles ${leaf} tasks`;
    }

    /** Resolved leaf handlers for a domain, in declaration order */
    getLeafHandlers(domain: string): LeafHandlerRecord[] {
        const record = this.byName.get(domain);
        if (!record) return [];

        return record.leafHandlers.map(name => ({
            domain,
            name,
            description: this.getLeafDescription(domain, name),
        }));
    }

    /**
     * Detect domain from query text (lightweight keyword matching).
     * Returns 'unknown' if no domain matches; ties go to the earlier domain.
     */
    detectDomain(query: string): string {
        let bestDomain = UNKNOWN_DOMAIN;
        let bestScore = 0;

        for (const domain of this.domains) {
            let score = 0;
            for (const kw of domain.keywords) {
                // Word boundary matching for better precision
                const regex = new RegExp(`\\b${escapeRegex(kw)}\\b`, 'i');
                if (regex.test(query)) {
                    score++;
                }
            }

            if (score > bestScore) {
                bestScore = score;
                bestDomain = domain.name;
            }
        }

        return bestDomain;
    }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validate raw registry input and build a registry from it.
 * Accepts parsed JSON as-is; see RegistryInput for the expected shape.
 */
export function createRegistry(input: RegistryInput | unknown): DomainRegistry {
    const parsed = RegistryDataSchema.safeParse(input);
    if (!parsed.success) {
        throw new RegistryError('Invalid domain registry', formatIssues(parsed.error));
    }

    const data: RegistryData = parsed.data;
    const issues: string[] = [];
    const seen = new Set<string>();

    for (const domain of data.domains) {
        if (seen.has(domain.name)) {
            issues.push(`Duplicate domain name: ${domain.name}`);
        }
        seen.add(domain.name);

        const leaves = new Set<string>();
        for (const leaf of domain.leafHandlers) {
            if (leaves.has(leaf)) {
                issues.push(`Duplicate leaf handler "${leaf}" in domain ${domain.name}`);
            }
            leaves.add(leaf);
        }
    }

    if (issues.length > 0) {
        throw new RegistryError('Invalid domain registry', issues);
    }

    return new DomainRegistry(data);
}

/**
 * Load the registry from a JSON file (defaults to the bundled registry).
 */
export function loadRegistry(path: string = DEFAULT_REGISTRY_PATH): DomainRegistry {
    const raw = readJsonFile(path);
    const registry = createRegistry(raw);
    console.log(
        `[Registry] Loaded ${registry.size} domains, ${registry.leafCount} leaf handlers (v${registry.version})`
    );
    return registry;
}

// ============================================================================
// Helpers
// ============================================================================

export function readJsonFile(path: string): unknown {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (error) {
        throw new RegistryError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
        return JSON.parse(text);
    } catch (error) {
        throw new RegistryError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function leafKey(domain: string, leaf: string): string {
    return `${domain}/${leaf}`;
}

/** Escape special regex characters */
function escapeRegex(str: string): string {
    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
