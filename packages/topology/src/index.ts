/**
 * @routebench/topology
 *
 * Builds the delegation trees under comparison:
 * flat-domain, two-level and flat-leaf.
 */

export { buildTopology, parseTopologyKind, ROOT_IDENTIFIERS } from './builder.js';
export { TopologyError } from './errors.js';
export { describeTopology, findNode, leafIdentifiers, walkTopology } from './inspect.js';
export {
    FLAT_DOMAIN_DESCRIPTION_LIMIT,
    MAX_SAMPLE_QUERIES,
    buildDispatcherInstruction,
    formatHints,
    titleCase,
    truncate,
    type ChildEntry,
} from './instructions.js';
export { ROUTING_HINTS, type RoutingHint } from './routing-hints.js';
