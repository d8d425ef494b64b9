import { describe, expect, it } from "vitest";
import { UnitCatalog } from "@units/catalog";
import { createDefaultCatalog } from "@units/library";
import { filterUnit } from "@units/filter/manifest";
import { Oscillator } from "@units/oscillator/oscillator";
import type { UnitManifest } from "@units/types";
import { expectNotationError } from "./helpers";

describe("unit catalog", () => {
  it("registers the built-in types in a fixed order", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.typeNames()).toEqual([
      "sin",
      "square",
      "saw",
      "triangle",
      "noise",
      "filter",
      "delay",
      "reverb",
      "midi"
    ]);
    expect(catalog.size).toBe(9);
  });

  it("reports known and unknown type names", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.isKnown("delay")).toBe(true);
    expect(catalog.isKnown("chorus")).toBe(false);
    expectNotationError(() => catalog.lookup("chorus"), "UNKNOWN_TYPE");
  });

  it("describes parameters with their defaults", () => {
    const catalog = createDefaultCatalog();
    const defaults = (typeName: string) =>
      catalog.lookup(typeName).params.map((param) => [param.name, param.type, param.defaultValue]);

    expect(defaults("sin")).toEqual([["note", "integer", 66]]);
    expect(defaults("filter")).toEqual([["cutoff", "real", 2000]]);
    expect(defaults("delay")).toEqual([
      ["time", "real", 0.5],
      ["feedback", "real", 0.5],
      ["wet", "real", 0.5],
      ["dry", "real", 0.5]
    ]);
    expect(defaults("reverb")).toEqual([
      ["size", "real", 0.5],
      ["damp", "real", 0.4],
      ["wet", "real", 0.5],
      ["dry", "real", 0.5],
      ["width", "real", 0.2]
    ]);
    expect(defaults("midi")).toEqual([
      ["bpm", "real", 120],
      ["on", "integer", 1],
      ["off", "integer", 1]
    ]);
  });

  it("accepts new entries and overwrites existing ones", () => {
    const catalog = new UnitCatalog();
    catalog.register(filterUnit);
    const buzz: UnitManifest = {
      typeName: "filter",
      kind: "oscillator",
      label: "Buzz",
      params: [],
      create: () =>
        new Oscillator({ label: "Buzz", waveform: () => 1, gain: 1, note: 60 })
    };
    catalog.register(buzz);

    expect(catalog.size).toBe(1);
    expect(catalog.lookup("filter").label).toBe("Buzz");
    expect(catalog.lookup("filter").kind).toBe("oscillator");
  });

  it("freezes registered descriptors", () => {
    const catalog = createDefaultCatalog();
    const manifest = catalog.lookup("midi");
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.params)).toBe(true);
    expect(Object.isFrozen(manifest.params[0])).toBe(true);
  });

  it("rejects an empty type name", () => {
    const catalog = new UnitCatalog();
    expect(() => catalog.register({ ...filterUnit, typeName: "" })).toThrow(
      "Cannot register a unit with an empty type name."
    );
    expect(catalog.size).toBe(0);
  });
});
