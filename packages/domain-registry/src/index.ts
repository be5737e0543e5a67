/**
 * @routebench/domain-registry
 * 
 * Domain definitions for the routing experiments.
 * Use this package to:
 * - Load and validate the domain registry
 * - Resolve leaf handlers within their domain
 * - Load the (query, expected-domain) fixtures
 * - Detect a domain from query text (offline routing)
 * 
 * Adding a new domain:
 * 1. Add a record to data/domains.json
 * 2. Add its leaf descriptions under leafDescriptions.<domain>
 * 3. Every topology picks it up on the next build
 */

export * from './types.js';
export { RegistryError } from './errors.js';
export { formatIssues, type RegistryInput } from './schema.js';
export {
    DomainRegistry,
    DEFAULT_REGISTRY_PATH,
    UNKNOWN_DOMAIN,
    createRegistry,
    loadRegistry,
    readJsonFile,
} from './registry.js';
export {
    DEFAULT_QUERIES_PATH,
    loadQueryCases,
    parseQueryCases,
    selectQueryCases,
} from './queries.js';
