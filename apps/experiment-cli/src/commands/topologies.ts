/**
 * `routebench topologies`
 *
 * Prints the shape of every topology kind built from the registry.
 */

import Table from 'cli-table3';
import { loadRegistry } from '@routebench/domain-registry';
import { buildTopology, describeTopology } from '@routebench/topology';
import { TOPOLOGY_KINDS, type TopologyShape } from '@routebench/types';

export function topologiesCommand(registryPath?: string): TopologyShape[] {
    const registry = loadRegistry(registryPath);
    const shapes = TOPOLOGY_KINDS.map(kind => describeTopology(kind, buildTopology(registry, kind)));

    const table = new Table({
        head: ['Topology', 'Root', 'Nodes', 'Leaves', 'Max Fan-out', 'Depth'],
        style: { head: [], border: [] },
    });
    for (const shape of shapes) {
        table.push([shape.kind, shape.rootId, shape.nodeCount, shape.leafCount, shape.maxFanOut, shape.depth]);
    }

    console.log(table.toString());
    return shapes;
}
