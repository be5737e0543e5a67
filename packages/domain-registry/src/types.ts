/**
 * Domain Registry Types
 * 
 * Type definitions for domain configuration.
 */

/**
 * Complete definition of a routing domain.
 */
export interface DomainRecord {
    /** Canonical name: travel, finance, it_support, etc. */
    name: string;

    /** Free-text description shown to dispatchers */
    description: string;

    /** Keywords for domain detection and instruction text */
    keywords: string[];

    /** Leaf handler names under this domain, possibly empty */
    leafHandlers: string[];

    /** Example requests, used only to enrich instructions */
    sampleQueries: string[];
}

/**
 * A leaf handler resolved within its owning domain.
 */
export interface LeafHandlerRecord {
    domain: string;
    name: string;
    description: string;
}

/**
 * The registry file structure.
 * Leaf descriptions are scoped by domain, then by leaf name.
 */
export interface RegistryData {
    version: string;
    domains: DomainRecord[];
    leafDescriptions: Record<string, Record<string, string>>;
}
