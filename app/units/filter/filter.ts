import type { MidiBuffer } from "@audio/midi";
import { clamp } from "@units/common";
import type { AudioBlock, EffectUnit } from "@units/types";

const BUTTERWORTH_Q = Math.SQRT1_2;

interface BiquadState {
  z1: number;
  z2: number;
}

/** Second-order low-pass (RBJ cookbook), one state per channel. */
export class LowPassFilter implements EffectUnit {
  readonly label = "Low-pass Filter";
  readonly acceptsMidi = false;
  readonly producesMidi = false;

  private b0 = 1;
  private b1 = 0;
  private b2 = 0;
  private a1 = 0;
  private a2 = 0;
  private readonly left: BiquadState = { z1: 0, z2: 0 };
  private readonly right: BiquadState = { z1: 0, z2: 0 };

  constructor(readonly cutoff: number) {}

  prepare(sampleRate: number, _blockSize: number): void {
    const frequency = clamp(this.cutoff, 10, sampleRate * 0.49);
    const omega = (2 * Math.PI * frequency) / sampleRate;
    const cos = Math.cos(omega);
    const alpha = Math.sin(omega) / (2 * BUTTERWORTH_Q);
    const a0 = 1 + alpha;

    this.b0 = (1 - cos) / 2 / a0;
    this.b1 = (1 - cos) / a0;
    this.b2 = this.b0;
    this.a1 = (-2 * cos) / a0;
    this.a2 = (1 - alpha) / a0;
    this.left.z1 = this.left.z2 = 0;
    this.right.z1 = this.right.z2 = 0;
  }

  process(block: AudioBlock, _midi: MidiBuffer): void {
    this.run(block.left, this.left, block.length);
    this.run(block.right, this.right, block.length);
  }

  private run(samples: Float64Array, state: BiquadState, length: number): void {
    for (let index = 0; index < length; index++) {
      const input = samples[index];
      const output = this.b0 * input + state.z1;
      state.z1 = this.b1 * input - this.a1 * output + state.z2;
      state.z2 = this.b2 * input - this.a2 * output;
      samples[index] = output;
    }
  }
}
