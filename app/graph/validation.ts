import { sameConnection } from "./graph";
import { GraphNode, NodeId, PatchGraph } from "./types";

export type GraphValidationCode =
  | "NODE_MISSING"
  | "MIDI_INVALID"
  | "STEREO_UNPAIRED"
  | "CYCLE_DETECTED";

export interface GraphValidationIssue {
  code: GraphValidationCode;
  message: string;
  nodes?: NodeId[];
}

export interface GraphValidationResult {
  issues: GraphValidationIssue[];
  isValid: boolean;
  order: GraphNode[];
}

export interface TopologyResult<T> {
  order: T[];
  hasCycle: boolean;
}

export function validateGraph(graph: PatchGraph): GraphValidationResult {
  const issues: GraphValidationIssue[] = [];
  const nodesById = new Map(graph.nodes.map((node) => [node.id, node]));
  const isOutput = (id: NodeId) => id === graph.outputId;

  for (const connection of graph.connections) {
    const fromNode = nodesById.get(connection.from.node);
    const toNode = nodesById.get(connection.to.node);

    if (!fromNode) {
      issues.push({
        code: "NODE_MISSING",
        message: `Connection references missing source node: ${connection.from.node}`,
        nodes: [connection.from.node]
      });
      continue;
    }

    if (!toNode && !isOutput(connection.to.node)) {
      issues.push({
        code: "NODE_MISSING",
        message: `Connection references missing target node: ${connection.to.node}`,
        nodes: [connection.to.node]
      });
      continue;
    }

    const midiEnds = [connection.from.channel, connection.to.channel].filter(
      (channel) => channel === "midi"
    ).length;
    if (midiEnds === 0) {
      if (connection.from.channel !== connection.to.channel || fromNode.kind === "pulse") {
        issues.push({
          code: "STEREO_UNPAIRED",
          message: `Audio connection ${fromNode.id}.${connection.from.channel} -> ${connection.to.node}.${connection.to.channel} is not a left/right pair.`,
          nodes: [fromNode.id, connection.to.node]
        });
        continue;
      }
      const partner: typeof connection = {
        from: {
          node: connection.from.node,
          channel: connection.from.channel === "left" ? "right" : "left"
        },
        to: {
          node: connection.to.node,
          channel: connection.to.channel === "left" ? "right" : "left"
        }
      };
      if (!graph.connections.some((candidate) => sameConnection(candidate, partner))) {
        issues.push({
          code: "STEREO_UNPAIRED",
          message: `Audio connection ${fromNode.id} -> ${connection.to.node} has no ${partner.from.channel} channel.`,
          nodes: [fromNode.id, connection.to.node]
        });
      }
      continue;
    }

    if (
      midiEnds !== 2 ||
      !toNode ||
      !fromNode.unit.producesMidi ||
      !toNode.unit.acceptsMidi
    ) {
      issues.push({
        code: "MIDI_INVALID",
        message: `MIDI connection ${fromNode.id} (${fromNode.typeName}) -> ${connection.to.node} is not allowed.`,
        nodes: [fromNode.id, connection.to.node]
      });
    }
  }

  const { order, hasCycle } = topologicalSort(
    graph.nodes,
    (node) => node.id,
    graph.connections.map((connection) => [connection.from.node, connection.to.node] as const)
  );
  if (hasCycle) {
    issues.push({
      code: "CYCLE_DETECTED",
      message: "Graph contains a feedback loop."
    });
  }

  return {
    issues,
    isValid: issues.length === 0,
    order
  };
}

/**
 * Kahn's algorithm. Edges naming an unknown key are ignored, so the output
 * sink never takes part in the ordering.
 */
export function topologicalSort<T, K>(
  items: readonly T[],
  keyOf: (item: T) => K,
  edges: Iterable<readonly [K, K]>
): TopologyResult<T> {
  const inDegree = new Map<K, number>();
  const adjacency = new Map<K, Set<K>>();
  const itemsByKey = new Map<K, T>();

  for (const item of items) {
    const key = keyOf(item);
    itemsByKey.set(key, item);
    inDegree.set(key, 0);
    adjacency.set(key, new Set());
  }

  for (const [from, to] of edges) {
    if (!itemsByKey.has(from) || !itemsByKey.has(to)) {
      continue;
    }

    const neighbors = adjacency.get(from);
    if (neighbors && !neighbors.has(to)) {
      neighbors.add(to);
      inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
    }
  }

  const queue: K[] = [];
  for (const [key, degree] of inDegree) {
    if (degree === 0) {
      queue.push(key);
    }
  }

  const order: T[] = [];
  for (let head = 0; head < queue.length; head++) {
    const key = queue[head];
    const item = itemsByKey.get(key);
    if (item === undefined) continue;

    order.push(item);

    const neighbors = adjacency.get(key);
    if (!neighbors) continue;

    for (const neighbor of neighbors) {
      const nextDegree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, nextDegree);
      if (nextDegree === 0) {
        queue.push(neighbor);
      }
    }
  }

  const hasCycle = order.length !== items.length;
  return { order, hasCycle };
}
