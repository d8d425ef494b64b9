import type { LetterRegistry } from "@bindings/registry";
import { createGraph, extendGraph, midiLink, stereoLinks } from "@graph/graph";
import type { Connection, GraphNode, NodeId, PatchGraph } from "@graph/types";
import type { MidiGate, OscillatorUnit, PulseUnit } from "@units/types";
import { NotationError } from "./errors";

type PulseNode = Extract<GraphNode, { kind: "pulse" }>;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function midiTarget(node: GraphNode): OscillatorUnit | PulseUnit | null {
  switch (node.kind) {
    case "oscillator":
    case "pulse":
      return node.unit.acceptsMidi ? node.unit : null;
    case "effect":
      return null;
  }
}

/**
 * Turns notation text into graph nodes and connections.
 *
 * Each whitespace-separated word is scanned once, left to right:
 *
 * - an oscillator waits as an orphan until an effect takes it in;
 * - an effect swallows every orphan and extends the word's effects chain;
 * - a pulse generator drives the letter right after it, listening to every
 *   velocity, and drives each MIDI-capable letter of a `( ... )` group that
 *   follows it, giving every member its own voice (1, 2, ...);
 * - at the end of the word the chain tail and any orphans go to the output.
 *
 * The base graph is never modified. A failing text throws before anything is
 * returned, and the units it created are simply dropped.
 */
export class NotationCompiler {
  constructor(private readonly registry: LetterRegistry) {}

  compile(text: string, base: PatchGraph = createGraph()): PatchGraph {
    const nodes: GraphNode[] = [];
    const connections: Connection[] = [];
    let nextId = base.nextNodeId;

    const wireMidi = (source: PulseNode, destination: GraphNode, gate: MidiGate) => {
      const target = midiTarget(destination);
      if (!target) {
        return;
      }
      connections.push(midiLink(source.id, destination.id));
      target.setMidiGate(gate);
    };

    for (const word of splitWords(text)) {
      let depth = 0;
      // pulses[d] is the generator opened at depth d.
      const pulses: (PulseNode | undefined)[] = [];
      let orphans: GraphNode[] = [];
      let effectsTail: GraphNode | null = null;
      let previousPulse: PulseNode | null = null;

      for (const symbol of word) {
        if (symbol === "(") {
          depth++;
          previousPulse = null;
          continue;
        }

        if (symbol === ")") {
          if (depth === 0) {
            throw new NotationError(
              "UNBALANCED_PARENTHESES",
              `Unexpected ")" in "${word}".`
            );
          }
          depth--;
          pulses.length = Math.min(pulses.length, depth);
          previousPulse = null;
          continue;
        }

        const node = this.instantiate(symbol, nextId++);
        nodes.push(node);

        if (previousPulse) {
          wireMidi(previousPulse, node, { mode: "all" });
        }

        const groupPulse = depth > 0 ? pulses[depth - 1] : undefined;
        if (groupPulse && midiTarget(node)) {
          const voice = groupPulse.unit.addVoice();
          wireMidi(groupPulse, node, { mode: "voice", voice });
        }

        switch (node.kind) {
          case "oscillator":
            orphans.push(node);
            previousPulse = null;
            break;
          case "effect":
            for (const orphan of orphans) {
              connections.push(...stereoLinks(orphan.id, node.id));
            }
            orphans = [];
            if (effectsTail) {
              connections.push(...stereoLinks(effectsTail.id, node.id));
            }
            effectsTail = node;
            previousPulse = null;
            break;
          case "pulse":
            pulses[depth] = node;
            pulses.length = depth + 1;
            previousPulse = node;
            break;
        }
      }

      if (depth !== 0) {
        throw new NotationError(
          "UNBALANCED_PARENTHESES",
          `"${word}" leaves ${depth} parenthesis group(s) open.`
        );
      }

      if (effectsTail) {
        connections.push(...stereoLinks(effectsTail.id, base.outputId));
      }
      for (const orphan of orphans) {
        connections.push(...stereoLinks(orphan.id, base.outputId));
      }
    }

    return extendGraph(base, nodes, connections);
  }

  private instantiate(letter: string, id: NodeId): GraphNode {
    const bound = this.registry.instantiate(letter);
    return { ...bound, id, letter, label: bound.unit.label };
  }
}
