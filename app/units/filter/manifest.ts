import { readNumber, realParam } from "@units/common";
import type { UnitManifest } from "@units/types";
import { LowPassFilter } from "./filter";

const DEFAULT_CUTOFF = 2000;

export const filterUnit: UnitManifest = {
  typeName: "filter",
  kind: "effect",
  label: "Low-pass Filter",
  params: [realParam("cutoff", DEFAULT_CUTOFF, (random) => 200 + (random % 7800))],
  create(values) {
    return new LowPassFilter(readNumber(values, 0, DEFAULT_CUTOFF));
  }
};
