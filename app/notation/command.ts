import { assertLetter } from "@bindings/registry";
import type { LetterRegistry, NamedValue } from "@bindings/registry";
import { parseToken } from "@bindings/values";
import type { UnitCatalog } from "@units/catalog";
import { NotationError } from "./errors";

export interface BindCommandOutcome {
  action: "bind" | "update";
  letter: string;
  typeName: string;
  overrides: NamedValue[];
}

function toPairs(tokens: readonly string[]): NamedValue[] {
  if (tokens.length % 2 !== 0) {
    throw new NotationError(
      "MALFORMED_COMMAND",
      `Expected <name> <value> pairs, got ${tokens.length} token(s): ${tokens.join(" ")}`
    );
  }
  const pairs: NamedValue[] = [];
  for (let index = 0; index < tokens.length; index += 2) {
    pairs.push([tokens[index], parseToken(tokens[index + 1])]);
  }
  return pairs;
}

/**
 * Runs `SET <letter> [<type>] {<name> <value>}*`.
 *
 * A known type name after the letter, or any token after an unbound letter,
 * rebinds the letter with defaults and applies the pairs as overrides.
 * Otherwise the pairs update the letter's existing binding. Either way the
 * registry changes only if every pair applies.
 */
export function executeBindCommand(
  registry: LetterRegistry,
  catalog: UnitCatalog,
  line: string
): BindCommandOutcome {
  const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
  const [verb, letter, ...rest] = tokens;

  if (verb === undefined || verb.toUpperCase() !== "SET") {
    throw new NotationError("MALFORMED_COMMAND", `Unknown command: ${verb ?? "(empty)"}`);
  }
  if (letter === undefined) {
    throw new NotationError("MALFORMED_COMMAND", "SET needs a letter.");
  }
  assertLetter(letter);
  if (rest.length === 0) {
    throw new NotationError("MALFORMED_COMMAND", `SET ${letter} needs a type or parameters.`);
  }

  const [head, ...tail] = rest;
  if (catalog.isKnown(head) || !registry.isBound(letter)) {
    const { typeName } = catalog.lookup(head);
    const overrides = toPairs(tail);
    registry.bindWithOverrides(letter, typeName, overrides);
    return { action: "bind", letter, typeName, overrides };
  }

  const overrides = toPairs(rest);
  registry.setParamsByName(letter, overrides);
  return {
    action: "update",
    letter,
    typeName: registry.describe(letter).typeName,
    overrides
  };
}
