import type { TaggedUnit } from "@units/types";

export type NodeId = number;

/** The audio-output sink. It is never stored in `PatchGraph.nodes`. */
export const OUTPUT_NODE_ID: NodeId = 0;

export type AudioChannel = "left" | "right";

export type Channel = AudioChannel | "midi";

export type GraphNode = {
  id: NodeId;
  letter: string;
  typeName: string;
  label: string;
} & TaggedUnit;

export interface Connection {
  from: {
    node: NodeId;
    channel: Channel;
  };
  to: {
    node: NodeId;
    channel: Channel;
  };
}

export interface PatchGraph {
  readonly nodes: readonly GraphNode[];
  readonly connections: readonly Connection[];
  readonly outputId: NodeId;
  readonly nextNodeId: NodeId;
}
