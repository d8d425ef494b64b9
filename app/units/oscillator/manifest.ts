import { integerParam, readNumber } from "@units/common";
import type { ParamSpec, UnitManifest } from "@units/types";
import {
  NoiseOscillator,
  Oscillator,
  sawWave,
  sineWave,
  squareWave,
  triangleWave,
  type Waveform
} from "./oscillator";

const DEFAULT_NOTE = 66;

// C2..B5
const noteParam: ParamSpec = integerParam("note", DEFAULT_NOTE, (random) => 36 + (random % 48));

function waveOscillator(
  typeName: string,
  label: string,
  waveform: Waveform,
  gain: number
): UnitManifest {
  return {
    typeName,
    kind: "oscillator",
    label,
    params: [noteParam],
    create(values) {
      return new Oscillator({
        label,
        waveform,
        gain,
        note: readNumber(values, 0, DEFAULT_NOTE)
      });
    }
  };
}

export const sineOscUnit = waveOscillator("sin", "Sine Oscillator", sineWave, 0.5);

export const squareOscUnit = waveOscillator("square", "Square Oscillator", squareWave, 0.05);

export const sawOscUnit = waveOscillator("saw", "Sawtooth Oscillator", sawWave, 0.15);

export const triangleOscUnit = waveOscillator("triangle", "Triangle Oscillator", triangleWave, 0.5);

export const noiseOscUnit: UnitManifest = {
  typeName: "noise",
  kind: "oscillator",
  label: "Noise Oscillator",
  params: [noteParam],
  create(values) {
    return new NoiseOscillator(readNumber(values, 0, DEFAULT_NOTE));
  }
};
