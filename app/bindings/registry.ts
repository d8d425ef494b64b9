import { NotationError } from "@notation/errors";
import type { UnitCatalog } from "@units/catalog";
import { createTaggedUnit } from "@units/types";
import type { ParamType, TaggedUnit, UnitKind, UnitManifest, Value } from "@units/types";
import { convertValue } from "./values";

interface Binding {
  manifest: UnitManifest;
  values: Value[];
}

export type BoundUnit = TaggedUnit & { typeName: string };

export interface ParameterDescription {
  name: string;
  type: ParamType;
  value: Value;
  defaultValue: Value;
}

export interface BindingDescription {
  letter: string;
  typeName: string;
  kind: UnitKind;
  params: ParameterDescription[];
}

export type NamedValue = readonly [name: string, value: Value];

const RESERVED_LETTERS = new Set(["(", ")", '"']);

export function assertLetter(letter: string): void {
  if (letter.length !== 1 || /\s/.test(letter) || RESERVED_LETTERS.has(letter)) {
    throw new NotationError("MALFORMED_COMMAND", `"${letter}" is not a bindable letter.`);
  }
}

/**
 * Letter → (unit manifest, current values). Every operation validates fully
 * before it writes, so a failed call leaves the table as it was.
 */
export class LetterRegistry {
  private readonly bindings = new Map<string, Binding>();

  constructor(private readonly catalog: UnitCatalog) {}

  /** Binds with positional values; trailing slots take their defaults. */
  bind(letter: string, typeName: string, positional: readonly Value[] = []): void {
    assertLetter(letter);
    const manifest = this.catalog.lookup(typeName);
    const values = this.positionalValues(
      manifest,
      manifest.params.map((param) => param.defaultValue),
      positional
    );
    this.bindings.set(letter, { manifest, values });
  }

  /** Binds with defaults, then applies named overrides as one step. */
  bindWithOverrides(letter: string, typeName: string, overrides: readonly NamedValue[]): void {
    assertLetter(letter);
    const manifest = this.catalog.lookup(typeName);
    const values = this.namedValues(
      manifest,
      manifest.params.map((param) => param.defaultValue),
      overrides
    );
    this.bindings.set(letter, { manifest, values });
  }

  setParams(letter: string, positional: readonly Value[]): void {
    const binding = this.require(letter);
    binding.values = this.positionalValues(binding.manifest, binding.values, positional);
  }

  setParam(letter: string, name: string, value: Value): void {
    this.setParamsByName(letter, [[name, value]]);
  }

  setParamsByName(letter: string, entries: readonly NamedValue[]): void {
    const binding = this.require(letter);
    binding.values = this.namedValues(binding.manifest, binding.values, entries);
  }

  /** A fresh unit on every call; later rebinding never reaches it. */
  instantiate(letter: string): BoundUnit {
    const binding = this.require(letter);
    return {
      ...createTaggedUnit(binding.manifest, [...binding.values]),
      typeName: binding.manifest.typeName
    };
  }

  isBound(letter: string): boolean {
    return this.bindings.has(letter);
  }

  boundLetters(): string[] {
    return [...this.bindings.keys()].sort();
  }

  describe(letter: string): BindingDescription {
    const { manifest, values } = this.require(letter);
    return {
      letter,
      typeName: manifest.typeName,
      kind: manifest.kind,
      params: manifest.params.map((param, index) => ({
        name: param.name,
        type: param.type,
        value: values[index] ?? param.defaultValue,
        defaultValue: param.defaultValue
      }))
    };
  }

  private require(letter: string): Binding {
    const binding = this.bindings.get(letter);
    if (!binding) {
      throw new NotationError("UNBOUND_LETTER", `Letter '${letter}' is not bound.`);
    }
    return binding;
  }

  private positionalValues(
    manifest: UnitManifest,
    current: readonly Value[],
    positional: readonly Value[]
  ): Value[] {
    if (positional.length > manifest.params.length) {
      throw new NotationError(
        "MALFORMED_COMMAND",
        `${manifest.typeName} takes ${manifest.params.length} parameter(s), got ${positional.length}.`
      );
    }
    const next = [...current];
    positional.forEach((value, index) => {
      next[index] = convertValue(manifest.params[index], value);
    });
    return next;
  }

  private namedValues(
    manifest: UnitManifest,
    current: readonly Value[],
    entries: readonly NamedValue[]
  ): Value[] {
    const next = [...current];
    for (const [name, value] of entries) {
      const index = manifest.params.findIndex((param) => param.name === name);
      if (index < 0) {
        throw new NotationError(
          "UNKNOWN_PARAMETER",
          `${manifest.typeName} has no parameter "${name}".`
        );
      }
      next[index] = convertValue(manifest.params[index], value);
    }
    return next;
  }
}
