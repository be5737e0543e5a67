/**
 * Topology Builder
 *
 * Builds a delegation tree for one topology kind from the domain registry.
 * Trees are frozen after construction and rebuilt for every run so no
 * state can leak from one run into the next.
 */

import type { DomainRecord, DomainRegistry } from '@routebench/domain-registry';
import { TOPOLOGY_KINDS, type DispatchNode, type NodeRole, type TopologyKind } from '@routebench/types';
import { TopologyError } from './errors.js';
import { walkTopology } from './inspect.js';
import {
    FLAT_DOMAIN_DESCRIPTION_LIMIT,
    buildDispatcherInstruction,
    buildDomainDispatcherInstruction,
    buildDomainLeafInstruction,
    buildLeafHandlerInstruction,
    truncate,
    type ChildEntry,
} from './instructions.js';
import { ROUTING_HINTS } from './routing-hints.js';

export const ROOT_IDENTIFIERS: Record<TopologyKind, string> = {
    'flat-domain': 'central_coordinator',
    'two-level': 'distributed_coordinator',
    'flat-leaf': 'leaf_coordinator',
};

/** Names accepted on the command line, mapped to topology kinds */
const KIND_ALIASES: Record<string, TopologyKind> = {
    centralized: 'flat-domain',
    distributed: 'two-level',
};

/**
 * Build the delegation tree for a topology kind.
 */
export function buildTopology(registry: DomainRegistry, kind: TopologyKind): DispatchNode {
    const domains = registry.listDomains();
    if (domains.length === 0) {
        throw new TopologyError(`Cannot build ${kind} topology from an empty registry`);
    }

    const root = buildShape(registry, domains, kind);
    assertUniqueIdentifiers([...walkTopology(root)]);
    return root;
}

/**
 * Parse a topology kind or alias (centralized, distributed).
 */
export function parseTopologyKind(value: string): TopologyKind {
    const normalized = value.trim().toLowerCase();
    const alias = KIND_ALIASES[normalized];
    if (alias) return alias;

    const kind = TOPOLOGY_KINDS.find(k => k === normalized);
    if (!kind) {
        throw new TopologyError(
            `Unknown topology "${value}". Expected one of: ${[...TOPOLOGY_KINDS, ...Object.keys(KIND_ALIASES)].join(', ')}`
        );
    }
    return kind;
}

// ============================================================================
// Shapes
// ============================================================================

function buildShape(registry: DomainRegistry, domains: readonly DomainRecord[], kind: TopologyKind): DispatchNode {
    switch (kind) {
        case 'flat-domain':
            return buildFlatDomain(domains);
        case 'two-level':
            return buildTwoLevel(registry, domains);
        case 'flat-leaf':
            return buildFlatLeaf(registry, domains);
    }
}

/**
 * Root → one leaf per domain
 */
function buildFlatDomain(domains: readonly DomainRecord[]): DispatchNode {
    const leaves = domains.map(domain => domainLeaf(domain, `${domain.name}_agent`));

    const instruction = buildDispatcherInstruction({
        persona: 'You are the central routing coordinator.',
        childHeading: 'Available Domain Agents',
        children: leaves.map(leaf => ({
            identifier: leaf.identifier,
            description: truncate(leaf.description, FLAT_DOMAIN_DESCRIPTION_LIMIT),
        })),
        hints: ROUTING_HINTS['flat-domain'],
    });

    return makeNode({
        identifier: ROOT_IDENTIFIERS['flat-domain'],
        role: 'dispatcher',
        description: `Routes requests directly to ${leaves.length} domain agents`,
        instruction,
        children: leaves,
    });
}

/**
 * Root → one dispatcher per domain → that domain's leaf handlers.
 * A domain without leaf handlers becomes a leaf itself.
 */
function buildTwoLevel(registry: DomainRegistry, domains: readonly DomainRecord[]): DispatchNode {
    const domainNodes = domains.map(domain => {
        const identifier = `${domain.name}_domain`;
        const handlers = registry.getLeafHandlers(domain.name);

        if (handlers.length === 0) {
            return domainLeaf(domain, identifier);
        }

        const leaves = handlers.map(handler => {
            const leafId = `${domain.name}_${handler.name}`;
            return makeNode({
                identifier: leafId,
                role: 'leaf',
                description: handler.description,
                instruction: buildLeafHandlerInstruction(handler, leafId),
                domain: domain.name,
                children: [],
            });
        });

        return makeNode({
            identifier,
            role: 'dispatcher',
            description: domain.description,
            instruction: buildDomainDispatcherInstruction(domain, toEntries(leaves)),
            domain: domain.name,
            children: leaves,
        });
    });

    const instruction = buildDispatcherInstruction({
        persona: 'You are the root coordinator for distributed routing.',
        childHeading: 'Available Domain Agents',
        children: toEntries(domainNodes),
        hints: ROUTING_HINTS['two-level'],
    });

    return makeNode({
        identifier: ROOT_IDENTIFIERS['two-level'],
        role: 'dispatcher',
        description: `Routes requests to ${domainNodes.length} domain agents, each routing to its own handlers`,
        instruction,
        children: domainNodes,
    });
}

/**
 * Root → one leaf per leaf handler across all domains.
 * Identifiers are namespaced {domain}_{leaf}; a domain without handlers
 * contributes a single {domain}_agent leaf.
 */
function buildFlatLeaf(registry: DomainRegistry, domains: readonly DomainRecord[]): DispatchNode {
    const leaves: DispatchNode[] = [];

    for (const domain of domains) {
        const handlers = registry.getLeafHandlers(domain.name);

        if (handlers.length === 0) {
            leaves.push(domainLeaf(domain, `${domain.name}_agent`));
            continue;
        }

        for (const handler of handlers) {
            const leafId = `${domain.name}_${handler.name}`;
            leaves.push(makeNode({
                identifier: leafId,
                role: 'leaf',
                description: `(${domain.name}) ${handler.description}`,
                instruction: buildLeafHandlerInstruction(handler, leafId),
                domain: domain.name,
                children: [],
            }));
        }
    }

    const instruction = buildDispatcherInstruction({
        persona: 'You are the leaf routing coordinator.',
        childHeading: 'Available Handlers',
        children: toEntries(leaves),
        hints: ROUTING_HINTS['flat-leaf'],
    });

    return makeNode({
        identifier: ROOT_IDENTIFIERS['flat-leaf'],
        role: 'dispatcher',
        description: `Routes requests directly to ${leaves.length} specialized handlers`,
        instruction,
        children: leaves,
    });
}

// ============================================================================
// Helpers
// ============================================================================

function domainLeaf(domain: DomainRecord, identifier: string): DispatchNode {
    return makeNode({
        identifier,
        role: 'leaf',
        description: domain.description,
        instruction: buildDomainLeafInstruction(domain, identifier),
        domain: domain.name,
        children: [],
    });
}

interface NodeInput {
    identifier: string;
    role: NodeRole;
    description: string;
    instruction: string;
    domain?: string;
    children: DispatchNode[];
}

function makeNode(input: NodeInput): DispatchNode {
    const node: DispatchNode = {
        identifier: input.identifier,
        role: input.role,
        description: input.description,
        instruction: input.instruction,
        children: Object.freeze([...input.children]),
        ...(input.domain !== undefined ? { domain: input.domain } : {}),
    };
    return Object.freeze(node);
}

function toEntries(nodes: readonly DispatchNode[]): ChildEntry[] {
    return nodes.map(node => ({ identifier: node.identifier, description: node.description }));
}

/**
 * Identifiers must be unique per tree. {domain}_{leaf} collides for
 * a_b + c vs a + b_c, and for a leaf literally named "domain" or "agent".
 */
function assertUniqueIdentifiers(nodes: readonly DispatchNode[]): void {
    const seen = new Set<string>();
    for (const node of nodes) {
        if (seen.has(node.identifier)) {
            throw new TopologyError(`Duplicate node identifier: ${node.identifier}`);
        }
        seen.add(node.identifier);
    }
}
