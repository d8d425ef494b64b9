export type MidiMessage =
  | {
      type: "noteOn";
      channel: number;
      note: number;
      velocity: number;
    }
  | {
      type: "noteOff";
      channel: number;
      note: number;
      velocity: number;
    }
  | {
      type: "allNotesOff";
      channel: number;
    }
  | {
      type: "allSoundOff";
      channel: number;
    };

export interface TimedMidiEvent {
  message: MidiMessage;
  samplePosition: number;
}

export function noteOn(channel: number, note: number, velocity: number): MidiMessage {
  return { type: "noteOn", channel, note, velocity };
}

export function noteOff(channel: number, note: number, velocity: number): MidiMessage {
  return { type: "noteOff", channel, note, velocity };
}

export function allNotesOff(channel: number): MidiMessage {
  return { type: "allNotesOff", channel };
}

/** Channel-mode messages carry no velocity; they read as zero. */
export function velocityOf(message: MidiMessage): number {
  switch (message.type) {
    case "noteOn":
    case "noteOff":
      return message.velocity;
    default:
      return 0;
  }
}

/**
 * Block-relative MIDI events kept sorted by sample position. Events that
 * share a position stay in insertion order.
 */
export class MidiBuffer implements Iterable<TimedMidiEvent> {
  private events: TimedMidiEvent[] = [];

  get size(): number {
    return this.events.length;
  }

  isEmpty(): boolean {
    return this.events.length === 0;
  }

  add(message: MidiMessage, samplePosition: number): void {
    const event: TimedMidiEvent = { message, samplePosition };
    let index = this.events.length;
    while (index > 0 && this.events[index - 1].samplePosition > samplePosition) {
      index--;
    }
    if (index === this.events.length) {
      this.events.push(event);
    } else {
      this.events.splice(index, 0, event);
    }
  }

  addAll(other: MidiBuffer): void {
    for (const event of other.events) {
      this.add(event.message, event.samplePosition);
    }
  }

  at(index: number): TimedMidiEvent | undefined {
    return this.events[index];
  }

  clear(): void {
    this.events.length = 0;
  }

  swapWith(other: MidiBuffer): void {
    const mine = this.events;
    this.events = other.events;
    other.events = mine;
  }

  toArray(): TimedMidiEvent[] {
    return this.events.map((event) => ({ ...event }));
  }

  [Symbol.iterator](): Iterator<TimedMidiEvent> {
    return this.events[Symbol.iterator]();
  }
}
