import { readNumber, realParam } from "@units/common";
import type { UnitManifest } from "@units/types";
import { Reverb } from "./reverb";

export const reverbUnit: UnitManifest = {
  typeName: "reverb",
  kind: "effect",
  label: "Reverb",
  params: [
    realParam("size", 0.5),
    realParam("damp", 0.4),
    realParam("wet", 0.5),
    realParam("dry", 0.5),
    realParam("width", 0.2)
  ],
  create(values) {
    return new Reverb({
      size: readNumber(values, 0, 0.5),
      damp: readNumber(values, 1, 0.4),
      wet: readNumber(values, 2, 0.5),
      dry: readNumber(values, 3, 0.5),
      width: readNumber(values, 4, 0.2)
    });
  }
};
