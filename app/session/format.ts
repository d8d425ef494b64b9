import type { LetterRegistry } from "@bindings/registry";
import { formatValue } from "@bindings/values";
import type { Connection, NodeId, PatchGraph } from "@graph/types";

const RULE = "-".repeat(24);

export function formatBindings(registry: LetterRegistry, verbose = false): string[] {
  const letters = registry.boundLetters();
  if (letters.length === 0) {
    return ["No letters are currently bound."];
  }

  const lines = ["Current letter bindings:", RULE];
  for (const letter of letters) {
    const description = registry.describe(letter);
    if (!verbose) {
      lines.push(`  '${letter}' -> ${description.typeName}`);
      continue;
    }
    lines.push(`Letter '${letter}': ${description.typeName}`);
    for (const param of description.params) {
      lines.push(
        `    - ${param.name} = ${formatValue(param.value)} (default: ${formatValue(param.defaultValue)})`
      );
    }
  }
  lines.push(RULE);
  return lines;
}

export function formatGraph(graph: PatchGraph): string[] {
  const names = new Map<NodeId, string>([[graph.outputId, "output"]]);
  const lines = ["=== Nodes ==="];

  for (const node of graph.nodes) {
    names.set(node.id, `${node.letter}#${node.id}`);
    lines.push(`  ${node.letter}#${node.id} ${node.typeName} (${node.kind})`);
  }
  if (graph.nodes.length === 0) {
    lines.push("  (none)");
  }

  lines.push("=== Connections ===");
  const describe = (connection: Connection) =>
    `  ${names.get(connection.from.node) ?? connection.from.node}.${connection.from.channel}` +
    ` -> ${names.get(connection.to.node) ?? connection.to.node}.${connection.to.channel}`;
  for (const connection of graph.connections) {
    lines.push(describe(connection));
  }
  if (graph.connections.length === 0) {
    lines.push("  (none)");
  }
  return lines;
}
