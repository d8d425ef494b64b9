import { readNumber, realParam } from "@units/common";
import type { UnitManifest } from "@units/types";
import { FeedbackDelay } from "./delay";

export const delayUnit: UnitManifest = {
  typeName: "delay",
  kind: "effect",
  label: "Delay",
  params: [
    // 0.1 s .. 2.0 s
    realParam("time", 0.5, (random) => 0.1 + (random % 1900) / 1000),
    realParam("feedback", 0.5),
    realParam("wet", 0.5),
    realParam("dry", 0.5)
  ],
  create(values) {
    return new FeedbackDelay({
      time: readNumber(values, 0, 0.5),
      feedback: readNumber(values, 1, 0.5),
      wet: readNumber(values, 2, 0.5),
      dry: readNumber(values, 3, 0.5)
    });
  }
};
