import { NotationError } from "@notation/errors";
import type { UnitManifest } from "./types";

function freezeManifest(manifest: UnitManifest): UnitManifest {
  return Object.freeze({
    ...manifest,
    params: Object.freeze(manifest.params.map((param) => Object.freeze({ ...param })))
  });
}

/**
 * Type name → unit manifest. Registration order is kept: seeded startup
 * binding indexes into it.
 */
export class UnitCatalog {
  private readonly manifests = new Map<string, UnitManifest>();

  register(manifest: UnitManifest): void {
    if (manifest.typeName.trim().length === 0) {
      throw new Error("Cannot register a unit with an empty type name.");
    }
    this.manifests.set(manifest.typeName, freezeManifest(manifest));
  }

  lookup(typeName: string): UnitManifest {
    const manifest = this.manifests.get(typeName);
    if (!manifest) {
      throw new NotationError("UNKNOWN_TYPE", `Unknown unit type: ${typeName}`);
    }
    return manifest;
  }

  isKnown(typeName: string): boolean {
    return this.manifests.has(typeName);
  }

  typeNames(): string[] {
    return [...this.manifests.keys()];
  }

  get size(): number {
    return this.manifests.size;
  }
}
