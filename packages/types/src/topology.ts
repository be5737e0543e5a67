/**
 * Topology Types
 */

// ============================================================================
// Topology Kinds
// ============================================================================

/**
 * The delegation-tree shapes under comparison.
 * - flat-domain: one dispatcher, one leaf per domain
 * - two-level:   dispatcher → domain dispatchers → leaf handlers
 * - flat-leaf:   one dispatcher, one leaf per leaf handler across all domains
 */
export const TOPOLOGY_KINDS = ['flat-domain', 'two-level', 'flat-leaf'] as const;

export type TopologyKind = typeof TOPOLOGY_KINDS[number];

export type NodeRole = 'dispatcher' | 'leaf';

// ============================================================================
// Dispatch Tree
// ============================================================================

/**
 * A node in a delegation tree. Built once per topology per run and
 * never mutated afterwards.
 */
export interface DispatchNode {
    /** Unique within one tree, e.g. finance_agent, finance_banking */
    readonly identifier: string;
    readonly role: NodeRole;
    /** One-line summary a parent lists when choosing between children */
    readonly description: string;
    /** Text the completion service is conditioned on at this node */
    readonly instruction: string;
    /** Owning domain name; absent on the root dispatcher */
    readonly domain?: string;
    /** Empty for leaves */
    readonly children: readonly DispatchNode[];
}

export interface TopologyShape {
    kind: TopologyKind;
    rootId: string;
    nodeCount: number;
    leafCount: number;
    /** Largest number of children under a single dispatcher */
    maxFanOut: number;
    /** Root alone is depth 1 */
    depth: number;
}
