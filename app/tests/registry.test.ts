import { beforeEach, describe, expect, it } from "vitest";
import { hashSeed, lcg, seedLetters } from "@bindings/random";
import { LetterRegistry } from "@bindings/registry";
import { convertValue, parseToken } from "@bindings/values";
import type { UnitCatalog } from "@units/catalog";
import { createDefaultCatalog } from "@units/library";
import { integerParam, realParam } from "@units/common";
import { Oscillator } from "@units/oscillator/oscillator";
import { FeedbackDelay } from "@units/delay/delay";
import { expectNotationError } from "./helpers";

describe("value conversion", () => {
  it("reads tokens with a numeric lead as numbers", () => {
    expect(parseToken("60")).toBe(60);
    expect(parseToken("-1.5")).toBe(-1.5);
    expect(parseToken("+3")).toBe(3);
    expect(parseToken("1e3")).toBe(1000);
  });

  it("keeps everything else as strings", () => {
    expect(parseToken("abc")).toBe("abc");
    expect(parseToken("1abc")).toBe("1abc");
    expect(parseToken(".5")).toBe(".5");
  });

  it("converts into integer and real slots", () => {
    const note = integerParam("note", 66);
    const cutoff = realParam("cutoff", 2000);
    expect(convertValue(note, 61.9)).toBe(61);
    expect(convertValue(note, "-2.9")).toBe(-2);
    expect(convertValue(cutoff, "0.25")).toBe(0.25);
    expect(convertValue(cutoff, 440)).toBe(440);
  });

  it("rejects values that cannot be converted", () => {
    expectNotationError(() => convertValue(integerParam("note", 66), "loud"), "TYPE_MISMATCH");
    expectNotationError(() => convertValue(realParam("cutoff", 1), ""), "TYPE_MISMATCH");
    expectNotationError(
      () => convertValue({ name: "mode", type: "string", defaultValue: "x" }, 5),
      "TYPE_MISMATCH"
    );
    expect(convertValue({ name: "mode", type: "string", defaultValue: "x" }, "soft")).toBe("soft");
  });
});

describe("letter registry", () => {
  let catalog: UnitCatalog;
  let registry: LetterRegistry;

  beforeEach(() => {
    catalog = createDefaultCatalog();
    registry = new LetterRegistry(catalog);
  });

  it("binds with defaults for unspecified trailing slots", () => {
    registry.bind("d", "delay", [1.25, "0.1"]);
    expect(registry.describe("d")).toEqual({
      letter: "d",
      typeName: "delay",
      kind: "effect",
      params: [
        { name: "time", type: "real", value: 1.25, defaultValue: 0.5 },
        { name: "feedback", type: "real", value: 0.1, defaultValue: 0.5 },
        { name: "wet", type: "real", value: 0.5, defaultValue: 0.5 },
        { name: "dry", type: "real", value: 0.5, defaultValue: 0.5 }
      ]
    });
  });

  it("rejects more positional values than the type has", () => {
    expectNotationError(() => registry.bind("a", "sin", [60, 61]), "MALFORMED_COMMAND");
    expect(registry.isBound("a")).toBe(false);
  });

  it("leaves an existing binding alone when rebinding to an unknown type", () => {
    registry.bind("a", "sin", [70]);
    expectNotationError(() => registry.bind("a", "chorus"), "UNKNOWN_TYPE");
    expect(registry.describe("a").typeName).toBe("sin");
    expect(registry.describe("a").params[0].value).toBe(70);
  });

  it("rebinding discards earlier values", () => {
    registry.bind("a", "sin", [70]);
    registry.bind("a", "square");
    expect(registry.describe("a").params[0].value).toBe(66);
  });

  it("fails to set parameters on unbound letters", () => {
    expectNotationError(() => registry.setParam("q", "note", 60), "UNBOUND_LETTER");
    expectNotationError(() => registry.setParams("q", [60]), "UNBOUND_LETTER");
    expectNotationError(() => registry.instantiate("q"), "UNBOUND_LETTER");
    expect(registry.isBound("q")).toBe(false);
    expect(registry.boundLetters()).toEqual([]);
  });

  it("sets single parameters by name with conversion", () => {
    registry.bind("m", "midi");
    registry.setParam("m", "on", "3.7");
    registry.setParam("m", "bpm", 90);
    expect(registry.describe("m").params.map((param) => param.value)).toEqual([90, 3, 1]);
  });

  it("reports unknown parameter names and mismatched values without changes", () => {
    registry.bind("f", "filter", [800]);
    expectNotationError(() => registry.setParam("f", "resonance", 2), "UNKNOWN_PARAMETER");
    expectNotationError(() => registry.setParam("f", "cutoff", "bright"), "TYPE_MISMATCH");
    expect(registry.describe("f").params[0].value).toBe(800);
  });

  it("applies named values all at once or not at all", () => {
    registry.bind("d", "delay");
    expectNotationError(
      () => registry.setParamsByName("d", [["time", 1], ["bogus", 2]]),
      "UNKNOWN_PARAMETER"
    );
    expect(registry.describe("d").params[0].value).toBe(0.5);

    registry.setParamsByName("d", [["time", 1], ["wet", 0.2]]);
    expect(registry.describe("d").params.map((param) => param.value)).toEqual([1, 0.5, 0.2, 0.5]);
  });

  it("updates positional values in bulk", () => {
    registry.bind("r", "reverb");
    registry.setParams("r", [0.9, 0.1]);
    expect(registry.describe("r").params.map((param) => param.value)).toEqual([
      0.9, 0.1, 0.5, 0.5, 0.2
    ]);
  });

  it("creates an independent unit on every instantiation", () => {
    registry.bind("a", "sin", [69]);
    const first = registry.instantiate("a");
    const second = registry.instantiate("a");
    expect(first.unit).not.toBe(second.unit);
    expect(first.typeName).toBe("sin");
    expect(first.kind).toBe("oscillator");

    registry.bind("a", "delay", [2]);
    const third = registry.instantiate("a");

    expect(first.unit).toBeInstanceOf(Oscillator);
    if (first.unit instanceof Oscillator) {
      expect(first.unit.note).toBe(69);
      expect(first.unit.frequency).toBeCloseTo(440, 10);
    }
    expect(third.unit).toBeInstanceOf(FeedbackDelay);
  });

  it("lists bound letters in sorted order", () => {
    registry.bind("z", "sin");
    registry.bind("b", "midi");
    registry.bind("m", "filter");
    expect(registry.boundLetters()).toEqual(["b", "m", "z"]);
  });

  it("refuses characters that cannot appear as letters in a notation", () => {
    expectNotationError(() => registry.bind("ab", "sin"), "MALFORMED_COMMAND");
    expectNotationError(() => registry.bind("(", "sin"), "MALFORMED_COMMAND");
    expectNotationError(() => registry.bind(" ", "sin"), "MALFORMED_COMMAND");
    expectNotationError(() => registry.bind("", "sin"), "MALFORMED_COMMAND");
  });
});

describe("seeded letters", () => {
  it("steps a 31-bit linear congruential generator", () => {
    expect(lcg(0)).toBe(12345);
    expect(lcg(1)).toBe(1103527590);
  });

  it("hashes string seeds", () => {
    expect(hashSeed("abc")).toBe(193485963);
    expect(hashSeed(42.9)).toBe(42);
  });

  it("binds every letter from the seed", () => {
    const catalog = createDefaultCatalog();
    const registry = new LetterRegistry(catalog);
    seedLetters(registry, catalog, { seed: 0, randomizeParams: true });

    expect(registry.boundLetters()).toHaveLength(26);
    expect(registry.describe("b").typeName).toBe("filter");
    expect(registry.describe("b").params[0].value).toBe(2593);
    expect(registry.describe("d").typeName).toBe("triangle");
    expect(registry.describe("d").params[0].value).toBe(69);
    expect(registry.describe("z").typeName).toBe("midi");
    expect(registry.describe("z").params.map((param) => param.value)).toEqual([141, 7, 4]);

    const reverb = registry.describe("a");
    expect(reverb.typeName).toBe("reverb");
    const values = reverb.params.map((param) => param.value);
    [0.141, 0.386, 0.983, 0.228, 0.825].forEach((expected, index) => {
      expect(values[index]).toBeCloseTo(expected, 10);
    });
  });

  it("gives the same table for the same seed", () => {
    const catalog = createDefaultCatalog();
    const first = new LetterRegistry(catalog);
    const second = new LetterRegistry(catalog);
    seedLetters(first, catalog, { seed: 7, randomizeParams: true });
    seedLetters(second, catalog, { seed: 7, randomizeParams: true });

    for (const letter of first.boundLetters()) {
      expect(second.describe(letter)).toEqual(first.describe(letter));
    }
    expect(first.describe("a").typeName).toBe("midi");
    expect(first.describe("a").params.map((param) => param.value)).toEqual([92, 6, 3]);
  });

  it("hashes string seeds before picking types", () => {
    const catalog = createDefaultCatalog();
    const registry = new LetterRegistry(catalog);
    seedLetters(registry, catalog, { seed: "abc", randomizeParams: true });
    expect(registry.describe("a").typeName).toBe("noise");
    expect(registry.describe("a").params[0].value).toBe(56);
  });

  it("uses defaults when parameters are not randomized", () => {
    const catalog = createDefaultCatalog();
    const registry = new LetterRegistry(catalog);
    seedLetters(registry, catalog, { seed: 0, randomizeParams: false });
    expect(registry.describe("b").typeName).toBe("filter");
    expect(registry.describe("b").params[0].value).toBe(2000);
    expect(registry.describe("z").params.map((param) => param.value)).toEqual([120, 1, 1]);
  });
});
