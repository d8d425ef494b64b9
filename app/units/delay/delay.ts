import type { MidiBuffer } from "@audio/midi";
import { clamp } from "@units/common";
import type { AudioBlock, EffectUnit } from "@units/types";

const MAX_DELAY_SECONDS = 4;
const MAX_FEEDBACK = 0.99;

export interface DelaySettings {
  time: number;
  feedback: number;
  wet: number;
  dry: number;
}

/** Stereo feedback delay with independent wet and dry levels. */
export class FeedbackDelay implements EffectUnit {
  readonly label = "Delay";
  readonly acceptsMidi = false;
  readonly producesMidi = false;

  private readonly time: number;
  private readonly feedback: number;
  private readonly wet: number;
  private readonly dry: number;
  private lineLeft = new Float64Array(1);
  private lineRight = new Float64Array(1);
  private cursor = 0;

  constructor(settings: DelaySettings) {
    this.time = clamp(settings.time, 0, MAX_DELAY_SECONDS);
    this.feedback = clamp(settings.feedback, 0, MAX_FEEDBACK);
    this.wet = clamp(settings.wet, 0, 1);
    this.dry = clamp(settings.dry, 0, 1);
  }

  get delaySamples(): number {
    return this.lineLeft.length;
  }

  prepare(sampleRate: number, _blockSize: number): void {
    const length = Math.max(1, Math.round(this.time * sampleRate));
    this.lineLeft = new Float64Array(length);
    this.lineRight = new Float64Array(length);
    this.cursor = 0;
  }

  process(block: AudioBlock, _midi: MidiBuffer): void {
    const length = this.lineLeft.length;
    for (let index = 0; index < block.length; index++) {
      const delayedLeft = this.lineLeft[this.cursor];
      const delayedRight = this.lineRight[this.cursor];
      const inputLeft = block.left[index];
      const inputRight = block.right[index];

      this.lineLeft[this.cursor] = inputLeft + delayedLeft * this.feedback;
      this.lineRight[this.cursor] = inputRight + delayedRight * this.feedback;
      block.left[index] = inputLeft * this.dry + delayedLeft * this.wet;
      block.right[index] = inputRight * this.dry + delayedRight * this.wet;

      this.cursor = this.cursor + 1 === length ? 0 : this.cursor + 1;
    }
  }
}
