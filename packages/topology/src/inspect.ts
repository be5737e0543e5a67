/**
 * Tree inspection helpers
 */

import type { DispatchNode, TopologyKind, TopologyShape } from '@routebench/types';

/** Pre-order traversal, root first */
export function* walkTopology(root: DispatchNode): Generator<DispatchNode> {
    yield root;
    for (const child of root.children) {
        yield* walkTopology(child);
    }
}

export function findNode(root: DispatchNode, identifier: string): DispatchNode | undefined {
    for (const node of walkTopology(root)) {
        if (node.identifier === identifier) return node;
    }
    return undefined;
}

/** Identifiers of every leaf, in tree order */
export function leafIdentifiers(root: DispatchNode): string[] {
    return [...walkTopology(root)]
        .filter(node => node.role === 'leaf')
        .map(node => node.identifier);
}

function depthOf(node: DispatchNode): number {
    if (node.children.length === 0) return 1;
    return 1 + Math.max(...node.children.map(depthOf));
}

/**
 * Structural summary used by the CLI and the idempotence checks
 */
export function describeTopology(kind: TopologyKind, root: DispatchNode): TopologyShape {
    const nodes = [...walkTopology(root)];

    return {
        kind,
        rootId: root.identifier,
        nodeCount: nodes.length,
        leafCount: nodes.filter(n => n.role === 'leaf').length,
        maxFanOut: Math.max(...nodes.map(n => n.children.length)),
        depth: depthOf(root),
    };
}
