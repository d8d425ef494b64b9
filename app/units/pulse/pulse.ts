import { MidiBuffer, noteOff, noteOn, velocityOf } from "@audio/midi";
import type { MidiMessage } from "@audio/midi";
import type { AudioBlock, MidiGate, PulseUnit } from "@units/types";

export type CycleState = "AWAITING_NOTE_ON" | "NOTE_IS_ON";

export const PULSE_NOTE = 60;
export const PULSE_CHANNEL = 1;
/** Velocities, and so voices, run 1..127. */
export const MAX_VOICES = 127;

export interface PulseSettings {
  bpm: number;
  /** Beats the note stays on. */
  on: number;
  /** Beats of silence after each note. */
  off: number;
}

/**
 * Rhythmic MIDI source driving the parenthesis groups of a notation.
 *
 * Time is a per-instance sample counter that advances by one block per
 * `process` call. Whenever the counter reaches the scheduled transition the
 * machine flips between AWAITING_NOTE_ON and NOTE_IS_ON, emitting a note-on
 * (gate permitting) or the matching note-off at that exact sample.
 *
 * Each cycle carries a velocity of `loop % voiceCount + 1`, so downstream
 * units that listen for a single voice take turns round-robin. Past 127
 * members the voices wrap, and later members share a voice with earlier ones.
 *
 * With upstream gating enabled the machine follows the MIDI it receives:
 * a note-on opens the gate, a note-off (or all-notes/all-sound-off) closes
 * it, and when it listens for a voice any message of another velocity
 * closes it too. Closing the gate silences a sounding note at once.
 *
 * A pulse with zero on and zero off beats schedules nothing and passes
 * incoming MIDI straight through.
 */
export class PulseGenerator implements PulseUnit {
  readonly label = "Midi Pulse";
  readonly acceptsMidi = true;
  readonly producesMidi = true;
  readonly bpm: number;
  readonly beatsOn: number;
  readonly beatsOff: number;

  private samplesPerBeat = 0;
  private samplesOn = 0;
  private samplesOff = 0;
  private sampleCounter = 0;
  private nextTransition = 0;
  private state: CycleState = "AWAITING_NOTE_ON";
  private noteSounding = false;
  private loopCount = 0;
  private initialCycle = true;
  private velocity = 1;

  private gatingEnabled = false;
  private externalGateOpen = false;
  private listeningVelocity: number | null = null;
  private voices = 0;

  private readonly scratch = new MidiBuffer();

  constructor(settings: PulseSettings) {
    this.bpm = settings.bpm;
    this.beatsOn = Math.max(0, Math.trunc(settings.on));
    this.beatsOff = Math.max(0, Math.trunc(settings.off));
  }

  get voiceCount(): number {
    return this.voices;
  }

  get cycleState(): CycleState {
    return this.state;
  }

  get loops(): number {
    return this.loopCount;
  }

  get isNoteOn(): boolean {
    return this.noteSounding;
  }

  get isGateOpen(): boolean {
    return this.externalGateOpen;
  }

  get gate(): MidiGate | null {
    if (!this.gatingEnabled) {
      return null;
    }
    return this.listeningVelocity === null
      ? { mode: "all" }
      : { mode: "voice", voice: this.listeningVelocity };
  }

  get beatLength(): number {
    return this.samplesPerBeat;
  }

  get samplePosition(): number {
    return this.sampleCounter;
  }

  get isPassThrough(): boolean {
    return this.samplesOn === 0 && this.samplesOff === 0;
  }

  addVoice(): number {
    this.voices += 1;
    return ((this.voices - 1) % MAX_VOICES) + 1;
  }

  setMidiGate(gate: MidiGate): void {
    this.gatingEnabled = true;
    this.listeningVelocity = gate.mode === "voice" ? gate.voice : null;
  }

  prepare(sampleRate: number, _blockSize: number): void {
    this.samplesPerBeat =
      this.bpm > 0 && sampleRate > 0 ? Math.round((sampleRate * 60) / this.bpm) : 0;
    this.samplesOn = this.beatsOn * this.samplesPerBeat;
    this.samplesOff = this.beatsOff * this.samplesPerBeat;

    this.sampleCounter = 0;
    this.nextTransition = 0;
    this.state = "AWAITING_NOTE_ON";
    this.noteSounding = false;
    this.loopCount = 0;
    this.initialCycle = true;
    this.externalGateOpen = false;
  }

  process(block: AudioBlock, midi: MidiBuffer): void {
    const blockSize = block.length;

    if (this.isPassThrough) {
      this.sampleCounter += blockSize;
      return;
    }

    const output = this.scratch;
    output.clear();

    let incoming = 0;
    for (let position = 0; position < blockSize; position++) {
      for (
        let event = midi.at(incoming);
        event !== undefined && event.samplePosition <= position;
        event = midi.at(incoming)
      ) {
        this.observe(event.message);
        incoming++;
      }

      if (this.gatingEnabled && this.noteSounding && !this.externalGateOpen) {
        output.add(noteOff(PULSE_CHANNEL, PULSE_NOTE, this.velocity), position);
        this.noteSounding = false;
      }

      while (this.sampleCounter + position === this.nextTransition) {
        this.transition(output, position);
      }
    }

    // Anything stamped past the end of the block is forwarded untouched.
    for (let event = midi.at(incoming); event !== undefined; event = midi.at(++incoming)) {
      output.add(event.message, event.samplePosition);
    }

    midi.swapWith(output);
    this.sampleCounter += blockSize;
  }

  private transition(output: MidiBuffer, position: number): void {
    if (this.state === "AWAITING_NOTE_ON") {
      if (!this.initialCycle) {
        this.loopCount++;
      }
      this.initialCycle = false;
      const voices = Math.min(this.voices, MAX_VOICES);
      this.velocity = voices > 0 ? (this.loopCount % voices) + 1 : 1;

      const permitted = !this.gatingEnabled || this.externalGateOpen;
      if (this.beatsOn > 0 && permitted && !this.noteSounding) {
        output.add(noteOn(PULSE_CHANNEL, PULSE_NOTE, this.velocity), position);
        this.noteSounding = true;
      }
      this.state = "NOTE_IS_ON";
      this.nextTransition += this.samplesOn;
      return;
    }

    if (this.noteSounding) {
      output.add(noteOff(PULSE_CHANNEL, PULSE_NOTE, this.velocity), position);
      this.noteSounding = false;
    }
    this.state = "AWAITING_NOTE_ON";
    this.nextTransition += this.samplesOff;
  }

  private observe(message: MidiMessage): void {
    if (!this.gatingEnabled) {
      return;
    }
    if (message.type === "noteOn") {
      this.externalGateOpen = true;
    } else {
      this.externalGateOpen = false;
    }
    if (this.listeningVelocity !== null && this.listeningVelocity !== velocityOf(message)) {
      this.externalGateOpen = false;
    }
  }
}
