import { UnitCatalog } from "./catalog";
import type { UnitManifest } from "./types";
import {
  noiseOscUnit,
  sawOscUnit,
  sineOscUnit,
  squareOscUnit,
  triangleOscUnit
} from "@units/oscillator/manifest";
import { filterUnit } from "@units/filter/manifest";
import { delayUnit } from "@units/delay/manifest";
import { reverbUnit } from "@units/reverb/manifest";
import { pulseUnit } from "@units/pulse/manifest";

// Order matters: seeded letters pick their type by index into this list.
const manifests: UnitManifest[] = [
  sineOscUnit,
  squareOscUnit,
  sawOscUnit,
  triangleOscUnit,
  noiseOscUnit,
  filterUnit,
  delayUnit,
  reverbUnit,
  pulseUnit
];

export function createDefaultCatalog(): UnitCatalog {
  const catalog = new UnitCatalog();
  for (const manifest of manifests) {
    catalog.register(manifest);
  }
  return catalog;
}
