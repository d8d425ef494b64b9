import type { ParamSpec, Value } from "./types";

export const integerParam = (
  name: string,
  defaultValue: number,
  randomize?: (random: number) => number
): ParamSpec => ({
  name,
  type: "integer",
  defaultValue,
  randomize
});

export const realParam = (
  name: string,
  defaultValue: number,
  randomize?: (random: number) => number
): ParamSpec => ({
  name,
  type: "real",
  defaultValue,
  randomize
});

/**
 * Reads a positional value for a constructor. Values reaching a constructor
 * have already been converted by the registry, so anything else is a bug in
 * the manifest.
 */
export function readNumber(values: readonly Value[], index: number, fallback: number): number {
  const value = values[index];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number") {
    throw new Error(`Expected a number at parameter ${index}, got "${value}".`);
  }
  return value;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function midiNoteToHz(note: number): number {
  return 440 * Math.pow(2, (note - 69) / 12);
}
