import { integerParam, readNumber, realParam } from "@units/common";
import type { UnitManifest } from "@units/types";
import { PulseGenerator } from "./pulse";

export const pulseUnit: UnitManifest = {
  typeName: "midi",
  kind: "pulse",
  label: "Midi Pulse",
  params: [
    realParam("bpm", 120, (random) => 60 + (random % 120)),
    integerParam("on", 1, (random) => 1 + (random % 8)),
    integerParam("off", 1, (random) => 1 + (random % 8))
  ],
  create(values) {
    return new PulseGenerator({
      bpm: readNumber(values, 0, 120),
      on: readNumber(values, 1, 1),
      off: readNumber(values, 2, 1)
    });
  }
};
