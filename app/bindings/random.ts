import type { UnitCatalog } from "@units/catalog";
import type { ParamSpec, Value } from "@units/types";
import type { LetterRegistry } from "./registry";

export type Seed = number | string;

export interface SeedOptions {
  seed: Seed;
  randomizeParams: boolean;
}

export const SEEDED_LETTERS = "abcdefghijklmnopqrstuvwxyz";

/** 31-bit linear congruential step. */
export function lcg(value: number): number {
  return (Math.imul(1103515245, value) + 12345) & 0x7fffffff;
}

export function hashSeed(seed: Seed): number {
  if (typeof seed === "number") {
    return Math.trunc(seed) >>> 0;
  }
  let hash = 5381;
  for (let index = 0; index < seed.length; index++) {
    hash = (Math.imul(hash, 33) + seed.charCodeAt(index)) >>> 0;
  }
  return hash;
}

function randomValue(param: ParamSpec, random: number): Value {
  if (param.randomize) {
    return param.randomize(random);
  }
  switch (param.type) {
    case "integer":
      return random % 128;
    case "real":
      return (random % 1000) / 1000;
    case "string":
      return param.defaultValue;
  }
}

/**
 * Binds every letter a-z to a type picked from the catalog (in registration
 * order) by hashing the seed with the letter. The same seed always gives the
 * same table.
 */
export function seedLetters(
  registry: LetterRegistry,
  catalog: UnitCatalog,
  options: SeedOptions
): void {
  const typeNames = catalog.typeNames();
  if (typeNames.length === 0) {
    return;
  }
  const seed = hashSeed(options.seed);

  for (const letter of SEEDED_LETTERS) {
    const code = letter.charCodeAt(0);
    const typeName = typeNames[lcg((seed + code) >>> 0) % typeNames.length];
    const manifest = catalog.lookup(typeName);
    const values = options.randomizeParams
      ? manifest.params.map((param, index) =>
          randomValue(param, lcg((seed + 1000 + code * 100 + index) >>> 0))
        )
      : [];
    registry.bind(letter, typeName, values);
  }
}
