import type { MidiBuffer } from "@audio/midi";
import { clamp } from "@units/common";
import type { AudioBlock, EffectUnit } from "@units/types";

// Schroeder/Moorer tunings at 44.1 kHz; the right channel is offset for width.
const COMB_TUNINGS = [1116, 1188, 1277, 1356, 1422, 1491, 1557, 1617];
const ALLPASS_TUNINGS = [556, 441, 341, 225];
const STEREO_SPREAD = 23;
const REFERENCE_RATE = 44_100;
const INPUT_GAIN = 0.015;
const ROOM_SCALE = 0.28;
const ROOM_OFFSET = 0.7;
const DAMP_SCALE = 0.4;
const WET_SCALE = 3;

export interface ReverbSettings {
  size: number;
  damp: number;
  wet: number;
  dry: number;
  width: number;
}

class CombFilter {
  private readonly buffer: Float64Array;
  private index = 0;
  private store = 0;

  constructor(length: number, private readonly feedback: number, private readonly damp: number) {
    this.buffer = new Float64Array(Math.max(1, length));
  }

  step(input: number): number {
    const output = this.buffer[this.index];
    this.store = output * (1 - this.damp) + this.store * this.damp;
    this.buffer[this.index] = input + this.store * this.feedback;
    this.index = (this.index + 1) % this.buffer.length;
    return output;
  }
}

class AllpassFilter {
  private readonly buffer: Float64Array;
  private index = 0;

  constructor(length: number) {
    this.buffer = new Float64Array(Math.max(1, length));
  }

  step(input: number): number {
    const buffered = this.buffer[this.index];
    this.buffer[this.index] = input + buffered * 0.5;
    this.index = (this.index + 1) % this.buffer.length;
    return buffered - input;
  }
}

interface ReverbChannel {
  combs: CombFilter[];
  allpasses: AllpassFilter[];
}

export class Reverb implements EffectUnit {
  readonly label = "Reverb";
  readonly acceptsMidi = false;
  readonly producesMidi = false;

  private readonly settings: ReverbSettings;
  private channels: [ReverbChannel, ReverbChannel] | null = null;

  constructor(settings: ReverbSettings) {
    this.settings = {
      size: clamp(settings.size, 0, 1),
      damp: clamp(settings.damp, 0, 1),
      wet: clamp(settings.wet, 0, 1),
      dry: clamp(settings.dry, 0, 1),
      width: clamp(settings.width, 0, 1)
    };
  }

  prepare(sampleRate: number, _blockSize: number): void {
    const scale = sampleRate / REFERENCE_RATE;
    const feedback = this.settings.size * ROOM_SCALE + ROOM_OFFSET;
    const damp = this.settings.damp * DAMP_SCALE;
    const build = (spread: number): ReverbChannel => ({
      combs: COMB_TUNINGS.map(
        (tuning) => new CombFilter(Math.round((tuning + spread) * scale), feedback, damp)
      ),
      allpasses: ALLPASS_TUNINGS.map(
        (tuning) => new AllpassFilter(Math.round((tuning + spread) * scale))
      )
    });
    this.channels = [build(0), build(STEREO_SPREAD)];
  }

  process(block: AudioBlock, _midi: MidiBuffer): void {
    if (!this.channels) {
      return;
    }
    const [left, right] = this.channels;
    const wet = this.settings.wet * WET_SCALE;
    const wet1 = wet * (this.settings.width / 2 + 0.5);
    const wet2 = wet * ((1 - this.settings.width) / 2);

    for (let index = 0; index < block.length; index++) {
      const dryLeft = block.left[index];
      const dryRight = block.right[index];
      const input = (dryLeft + dryRight) * INPUT_GAIN;
      const outLeft = runChannel(left, input);
      const outRight = runChannel(right, input);

      block.left[index] = outLeft * wet1 + outRight * wet2 + dryLeft * this.settings.dry;
      block.right[index] = outRight * wet1 + outLeft * wet2 + dryRight * this.settings.dry;
    }
  }
}

function runChannel(channel: ReverbChannel, input: number): number {
  let sum = 0;
  for (const comb of channel.combs) {
    sum += comb.step(input);
  }
  for (const allpass of channel.allpasses) {
    sum = allpass.step(sum);
  }
  return sum;
}
