import { OfflineEngine } from "@audio/engine";
import { seedLetters } from "@bindings/random";
import { LetterRegistry } from "@bindings/registry";
import type { SessionConfig } from "@config/config";
import { silentLogger } from "@config/logger";
import type { Logger } from "@config/logger";
import { createDefaultCatalog } from "@units/library";
import type { UnitCatalog } from "@units/catalog";
import { formatBindings } from "./format";
import { Session } from "./session";

export interface SessionRuntime {
  catalog: UnitCatalog;
  registry: LetterRegistry;
  engine: OfflineEngine;
  session: Session;
  /** The detailed binding table as it stood right after seeding. */
  bindingTable: string[];
}

export interface RuntimeLoggers {
  session?: Logger;
  engine?: Logger;
}

/** Catalog, seeded letters, a prepared engine and a session over them. */
export function createSessionRuntime(
  config: SessionConfig,
  loggers: RuntimeLoggers = {}
): SessionRuntime {
  const catalog = createDefaultCatalog();
  const registry = new LetterRegistry(catalog);
  seedLetters(registry, catalog, {
    seed: config.seed,
    randomizeParams: config.randomizeParams
  });
  const bindingTable = formatBindings(registry, true);

  const engine = new OfflineEngine({ logger: loggers.engine ?? silentLogger });
  engine.prepare(config.sampleRate, config.blockSize);

  const session = new Session({
    catalog,
    registry,
    engine,
    logger: loggers.session ?? silentLogger
  });
  (loggers.session ?? silentLogger).info("Session ready", {
    seed: config.seed,
    letters: registry.boundLetters().length
  });
  return { catalog, registry, engine, session, bindingTable };
}
