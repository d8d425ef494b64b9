import type { MidiBuffer, MidiMessage } from "@audio/midi";
import { velocityOf } from "@audio/midi";
import { clamp, midiNoteToHz } from "@units/common";
import type { AudioBlock, MidiGate, OscillatorUnit } from "@units/types";

/** Waveform over a phase in [-PI, PI). */
export type Waveform = (phase: number) => number;

const TWO_PI = Math.PI * 2;

export interface OscillatorOptions {
  label: string;
  waveform: Waveform;
  gain: number;
  note: number;
}

/**
 * Fixed-pitch oscillator. It drones until a pulse generator is wired to it,
 * after which it sounds only between the note-on and note-off it listens to.
 */
export class Oscillator implements OscillatorUnit {
  readonly label: string;
  readonly acceptsMidi = true;
  readonly producesMidi = false;
  readonly note: number;
  readonly frequency: number;

  protected readonly gain: number;
  private readonly waveform: Waveform;
  private phase = -Math.PI;
  private phaseIncrement = 0;

  private midiTriggered = false;
  private openOnAllVelocities = false;
  private listeningVelocity = 1;
  private playing = true;

  constructor(options: OscillatorOptions) {
    this.label = options.label;
    this.waveform = options.waveform;
    this.gain = options.gain;
    this.note = clamp(Math.trunc(options.note), 0, 127);
    this.frequency = midiNoteToHz(this.note);
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  get gate(): MidiGate | null {
    if (!this.midiTriggered) {
      return null;
    }
    return this.openOnAllVelocities
      ? { mode: "all" }
      : { mode: "voice", voice: this.listeningVelocity };
  }

  setMidiGate(gate: MidiGate): void {
    this.midiTriggered = true;
    this.playing = false;
    if (gate.mode === "all") {
      this.openOnAllVelocities = true;
    } else {
      this.openOnAllVelocities = false;
      this.listeningVelocity = gate.voice;
    }
  }

  prepare(sampleRate: number, _blockSize: number): void {
    this.phase = -Math.PI;
    this.phaseIncrement = sampleRate > 0 ? (TWO_PI * this.frequency) / sampleRate : 0;
    this.playing = !this.midiTriggered;
  }

  process(block: AudioBlock, midi: MidiBuffer): void {
    let cursor = 0;
    for (const event of midi) {
      const position = clamp(event.samplePosition, 0, block.length - 1);
      if (position > cursor) {
        this.render(block, cursor, position);
        cursor = position;
      }
      this.handleMidi(event.message);
    }
    this.render(block, cursor, block.length);
  }

  protected nextSample(): number {
    const sample = this.waveform(this.phase);
    this.phase += this.phaseIncrement;
    if (this.phase >= Math.PI) {
      this.phase -= TWO_PI;
    }
    return sample;
  }

  private handleMidi(message: MidiMessage): void {
    if (!this.midiTriggered) {
      return;
    }
    if (!this.openOnAllVelocities && velocityOf(message) !== this.listeningVelocity) {
      return;
    }
    this.playing = message.type === "noteOn";
  }

  private render(block: AudioBlock, start: number, end: number): void {
    for (let index = start; index < end; index++) {
      const sample = this.playing ? this.nextSample() * this.gain : 0;
      block.left[index] = sample;
      block.right[index] = sample;
    }
  }
}

export class NoiseOscillator extends Oscillator {
  constructor(note: number, private readonly random: () => number = Math.random) {
    super({ label: "Noise Oscillator", waveform: () => 0, gain: 0.02, note });
  }

  protected override nextSample(): number {
    return this.random() * 2 - 1;
  }
}

export const sineWave: Waveform = (phase) => Math.sin(phase);

export const squareWave: Waveform = (phase) => (phase < 0 ? 1 : -1);

export const sawWave: Waveform = (phase) => phase / Math.PI;

export const triangleWave: Waveform = (phase) => (2 / Math.PI) * Math.asin(Math.sin(phase));
