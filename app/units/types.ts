import type { MidiBuffer } from "@audio/midi";

export type UnitKind = "oscillator" | "effect" | "pulse";

export type ParamType = "integer" | "real" | "string";

export type Value = number | string;

export interface ParamSpec {
  name: string;
  type: ParamType;
  defaultValue: Value;
  /**
   * Maps a 31-bit pseudo-random integer to a value for this slot. Used when
   * letters are seeded at startup; slots without a rule fall back to a
   * type-wide range.
   */
  randomize?: (random: number) => Value;
}

export interface AudioBlock {
  readonly left: Float64Array;
  readonly right: Float64Array;
  readonly length: number;
}

export interface Unit {
  readonly label: string;
  readonly acceptsMidi: boolean;
  readonly producesMidi: boolean;
  prepare(sampleRate: number, blockSize: number): void;
  process(block: AudioBlock, midi: MidiBuffer): void;
}

/**
 * How a unit reacts to MIDI arriving from a pulse generator. `all` follows
 * every note; `voice` follows only notes whose velocity equals the voice.
 */
export type MidiGate = { mode: "all" } | { mode: "voice"; voice: number };

export interface OscillatorUnit extends Unit {
  setMidiGate(gate: MidiGate): void;
}

export type EffectUnit = Unit;

export interface PulseUnit extends Unit {
  setMidiGate(gate: MidiGate): void;
  /** Registers one more downstream voice and returns the new count. */
  addVoice(): number;
  readonly voiceCount: number;
}

export interface UnitKindMap {
  oscillator: OscillatorUnit;
  effect: EffectUnit;
  pulse: PulseUnit;
}

export type TaggedUnit = {
  [K in UnitKind]: { kind: K; unit: UnitKindMap[K] };
}[UnitKind];

interface BaseManifest {
  typeName: string;
  label: string;
  params: readonly ParamSpec[];
}

export type UnitManifest = {
  [K in UnitKind]: BaseManifest & {
    kind: K;
    create(values: readonly Value[]): UnitKindMap[K];
  };
}[UnitKind];

export function createTaggedUnit(
  manifest: UnitManifest,
  values: readonly Value[]
): TaggedUnit {
  switch (manifest.kind) {
    case "oscillator":
      return { kind: "oscillator", unit: manifest.create(values) };
    case "effect":
      return { kind: "effect", unit: manifest.create(values) };
    case "pulse":
      return { kind: "pulse", unit: manifest.create(values) };
  }
}
