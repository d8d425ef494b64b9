import { silentLogger } from "@config/logger";
import type { Logger } from "@config/logger";
import { validateGraph, topologicalSort } from "@graph/validation";
import type { Channel, NodeId, PatchGraph } from "@graph/types";
import type { AudioBlock, Unit, UnitKind } from "@units/types";
import { MidiBuffer } from "./midi";
import type { TimedMidiEvent } from "./midi";

export type NodeHandle = number;

/** What the compiler's output is played on. */
export interface AudioEngine {
  addNode(unit: Unit, kind: UnitKind, label?: string): NodeHandle;
  /** Returns false when the engine refuses the connection. */
  addConnection(
    source: NodeHandle,
    sourceChannel: Channel,
    destination: NodeHandle,
    destinationChannel: Channel
  ): boolean;
  clear(): void;
  prepare(sampleRate: number, blockSize: number): void;
  outputNode(): NodeHandle;
}

export interface MidiActivity {
  handle: NodeHandle;
  label: string;
  events: TimedMidiEvent[];
}

export type MidiListener = (activity: MidiActivity) => void;

interface EngineNode {
  handle: NodeHandle;
  unit: Unit;
  kind: UnitKind;
  label: string;
  block: AudioBlock;
  midi: MidiBuffer;
}

interface EngineEdge {
  source: NodeHandle;
  sourceChannel: Channel;
  destination: NodeHandle;
  destinationChannel: Channel;
}

const OUTPUT_HANDLE: NodeHandle = 0;

function createBlock(length: number): AudioBlock {
  return { left: new Float64Array(length), right: new Float64Array(length), length };
}

/**
 * In-process engine that renders one block per `render()` call into memory.
 * The output sink always has handle 0 and survives `clear()`.
 */
export class OfflineEngine implements AudioEngine {
  private readonly nodes = new Map<NodeHandle, EngineNode>();
  private edges: EngineEdge[] = [];
  private nextHandle = OUTPUT_HANDLE + 1;
  private sampleRate = 0;
  private blockSize = 0;
  private prepared = false;
  private order: EngineNode[] | null = null;
  private output: AudioBlock = createBlock(0);
  private readonly listeners = new Set<MidiListener>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  get isPrepared(): boolean {
    return this.prepared;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get connectionCount(): number {
    return this.edges.length;
  }

  get currentSampleRate(): number {
    return this.sampleRate;
  }

  outputNode(): NodeHandle {
    return OUTPUT_HANDLE;
  }

  addNode(unit: Unit, kind: UnitKind, label: string = unit.label): NodeHandle {
    const handle = this.nextHandle++;
    this.nodes.set(handle, {
      handle,
      unit,
      kind,
      label,
      block: createBlock(this.blockSize),
      midi: new MidiBuffer()
    });
    if (this.prepared) {
      unit.prepare(this.sampleRate, this.blockSize);
    }
    this.order = null;
    return handle;
  }

  addConnection(
    source: NodeHandle,
    sourceChannel: Channel,
    destination: NodeHandle,
    destinationChannel: Channel
  ): boolean {
    const from = this.nodes.get(source);
    const to = destination === OUTPUT_HANDLE ? null : this.nodes.get(destination);
    if (!from || to === undefined) {
      return false;
    }

    if (sourceChannel === "midi" || destinationChannel === "midi") {
      if (sourceChannel !== destinationChannel || to === null) {
        return false;
      }
      if (!from.unit.producesMidi || !to.unit.acceptsMidi) {
        return false;
      }
    } else if (sourceChannel !== destinationChannel) {
      return false;
    }

    const duplicate = this.edges.some(
      (edge) =>
        edge.source === source &&
        edge.sourceChannel === sourceChannel &&
        edge.destination === destination &&
        edge.destinationChannel === destinationChannel
    );
    if (duplicate) {
      return false;
    }

    this.edges.push({ source, sourceChannel, destination, destinationChannel });
    this.order = null;
    return true;
  }

  clear(): void {
    this.nodes.clear();
    this.edges = [];
    this.order = null;
    this.output.left.fill(0);
    this.output.right.fill(0);
  }

  prepare(sampleRate: number, blockSize: number): void {
    this.sampleRate = sampleRate;
    this.blockSize = blockSize;
    this.output = createBlock(blockSize);
    for (const node of this.nodes.values()) {
      node.block = createBlock(blockSize);
      node.unit.prepare(sampleRate, blockSize);
    }
    this.prepared = true;
    this.logger.info("Prepared", { sampleRate, blockSize });
  }

  onMidi(listener: MidiListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Processes every node once and returns the output sink's block. */
  render(): AudioBlock {
    if (!this.prepared) {
      throw new Error("Engine must be prepared before rendering.");
    }

    const output = this.output;
    output.left.fill(0);
    output.right.fill(0);

    for (const node of this.processingOrder()) {
      const { block, midi } = node;
      block.left.fill(0);
      block.right.fill(0);
      midi.clear();

      for (const edge of this.edges) {
        if (edge.destination !== node.handle) continue;
        const source = this.nodes.get(edge.source);
        if (!source) continue;
        if (edge.sourceChannel === "midi" || edge.destinationChannel === "midi") {
          midi.addAll(source.midi);
        } else {
          accumulate(block[edge.destinationChannel], source.block[edge.sourceChannel]);
        }
      }

      node.unit.process(block, midi);

      if (node.unit.producesMidi && !midi.isEmpty() && this.listeners.size > 0) {
        const activity: MidiActivity = {
          handle: node.handle,
          label: node.label,
          events: midi.toArray()
        };
        for (const listener of this.listeners) {
          listener(activity);
        }
      }
    }

    for (const edge of this.edges) {
      if (edge.destination !== OUTPUT_HANDLE || edge.destinationChannel === "midi") continue;
      const source = this.nodes.get(edge.source);
      if (source && edge.sourceChannel !== "midi") {
        accumulate(output[edge.destinationChannel], source.block[edge.sourceChannel]);
      }
    }

    return output;
  }

  private processingOrder(): EngineNode[] {
    if (this.order) {
      return this.order;
    }
    const { order, hasCycle } = topologicalSort(
      [...this.nodes.values()],
      (node) => node.handle,
      this.edges.map((edge) => [edge.source, edge.destination] as const)
    );
    if (hasCycle) {
      throw new Error("Engine graph contains a feedback loop.");
    }
    this.order = order;
    return order;
  }
}

function accumulate(target: Float64Array, source: Float64Array): void {
  const length = Math.min(target.length, source.length);
  for (let index = 0; index < length; index++) {
    target[index] += source[index];
  }
}

/**
 * Replaces whatever the engine is running with `graph`. The graph is
 * validated first; an invalid graph leaves the engine untouched.
 */
export function applyGraph(engine: AudioEngine, graph: PatchGraph): Map<NodeId, NodeHandle> {
  const validation = validateGraph(graph);
  if (!validation.isValid) {
    throw new Error(
      `Refusing invalid graph: ${validation.issues.map((issue) => issue.message).join("; ")}`
    );
  }

  engine.clear();
  const handles = new Map<NodeId, NodeHandle>([[graph.outputId, engine.outputNode()]]);
  for (const node of graph.nodes) {
    handles.set(node.id, engine.addNode(node.unit, node.kind, node.label));
  }

  for (const connection of graph.connections) {
    const source = handles.get(connection.from.node);
    const destination = handles.get(connection.to.node);
    if (
      source === undefined ||
      destination === undefined ||
      !engine.addConnection(source, connection.from.channel, destination, connection.to.channel)
    ) {
      throw new Error(
        `Engine refused connection ${connection.from.node}.${connection.from.channel} -> ${connection.to.node}.${connection.to.channel}`
      );
    }
  }
  return handles;
}
