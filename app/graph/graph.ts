import { OUTPUT_NODE_ID } from "./types";
import type { Connection, GraphNode, NodeId, PatchGraph } from "./types";

export function createGraph(): PatchGraph {
  return {
    nodes: [],
    connections: [],
    outputId: OUTPUT_NODE_ID,
    nextNodeId: OUTPUT_NODE_ID + 1
  };
}

export function stereoLinks(from: NodeId, to: NodeId): Connection[] {
  return [
    { from: { node: from, channel: "left" }, to: { node: to, channel: "left" } },
    { from: { node: from, channel: "right" }, to: { node: to, channel: "right" } }
  ];
}

export function midiLink(from: NodeId, to: NodeId): Connection {
  return { from: { node: from, channel: "midi" }, to: { node: to, channel: "midi" } };
}

export function sameConnection(a: Connection, b: Connection): boolean {
  return (
    a.from.node === b.from.node &&
    a.from.channel === b.from.channel &&
    a.to.node === b.to.node &&
    a.to.channel === b.to.channel
  );
}

/**
 * Merges a batch of nodes and connections in one copy. Used by the compiler,
 * which builds a whole notation before committing it.
 */
export function extendGraph(
  graph: PatchGraph,
  nodes: readonly GraphNode[],
  connections: readonly Connection[]
): PatchGraph {
  const ids = new Set<NodeId>([graph.outputId, ...graph.nodes.map((node) => node.id)]);
  for (const node of nodes) {
    if (ids.has(node.id)) {
      throw new Error(`Duplicate node id: ${node.id}`);
    }
    ids.add(node.id);
  }

  const merged = [...graph.connections];
  for (const connection of connections) {
    if (merged.some((existing) => sameConnection(existing, connection))) {
      throw new Error(
        `Duplicate connection: ${connection.from.node}.${connection.from.channel} -> ${connection.to.node}.${connection.to.channel}`
      );
    }
    merged.push(connection);
  }

  const nextNodeId = nodes.reduce(
    (next, node) => Math.max(next, node.id + 1),
    graph.nextNodeId
  );
  return {
    ...graph,
    nodes: [...graph.nodes, ...nodes],
    connections: merged,
    nextNodeId
  };
}
