import { applyGraph } from "@audio/engine";
import type { AudioEngine } from "@audio/engine";
import type { LetterRegistry } from "@bindings/registry";
import { silentLogger } from "@config/logger";
import type { Logger } from "@config/logger";
import { createGraph } from "@graph/graph";
import type { PatchGraph } from "@graph/types";
import { executeBindCommand } from "@notation/command";
import { NotationCompiler } from "@notation/compiler";
import { isNotationError } from "@notation/errors";
import type { UnitCatalog } from "@units/catalog";
import { formatBindings, formatGraph } from "./format";

export type SessionResultKind = "ok" | "error" | "ignored" | "exit";

export interface SessionResult {
  kind: SessionResultKind;
  lines: string[];
  exit: boolean;
}

export interface SessionOptions {
  catalog: UnitCatalog;
  registry: LetterRegistry;
  engine: AudioEngine;
  logger?: Logger;
}

const QUOTED = /"([^"]*)"/;

const ok = (...lines: string[]): SessionResult => ({ kind: "ok", lines, exit: false });

/**
 * One command line in, printable lines out. Verbs are matched without regard
 * to case; everything after the verb is lower-cased first.
 */
export class Session {
  private readonly catalog: UnitCatalog;
  private readonly registry: LetterRegistry;
  private readonly engine: AudioEngine;
  private readonly compiler: NotationCompiler;
  private readonly logger: Logger;
  private savedNotation: string | null = null;
  private current: PatchGraph = createGraph();

  constructor(options: SessionOptions) {
    this.catalog = options.catalog;
    this.registry = options.registry;
    this.engine = options.engine;
    this.logger = options.logger ?? silentLogger;
    this.compiler = new NotationCompiler(this.registry);
  }

  get notation(): string | null {
    return this.savedNotation;
  }

  get graph(): PatchGraph {
    return this.current;
  }

  processLine(line: string): SessionResult {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return { kind: "ignored", lines: [], exit: false };
    }

    const [first] = trimmed.split(/\s+/);
    const verb = first.toUpperCase();
    const rest = trimmed.slice(first.length).trim().toLowerCase();

    try {
      switch (verb) {
        case "SET":
          return this.set(rest);
        case "PLAY":
          return this.play();
        case "PAUSE":
          return this.pause();
        case "PRINT":
          return ok(...formatBindings(this.registry, rest === "v"));
        case "EXIT":
          return { kind: "exit", lines: ["Bye."], exit: true };
      }

      const quoted = QUOTED.exec(trimmed);
      if (quoted) {
        this.savedNotation = quoted[1].toLowerCase();
        return ok(`Saved notation "${this.savedNotation}". Type PLAY to hear it.`);
      }
      return { kind: "ignored", lines: [], exit: false };
    } catch (error) {
      if (isNotationError(error)) {
        this.logger.warn("Command rejected", { line: trimmed, code: error.code });
        return { kind: "error", lines: [`Error (${error.code}): ${error.message}`], exit: false };
      }
      throw error;
    }
  }

  private set(rest: string): SessionResult {
    const outcome = executeBindCommand(this.registry, this.catalog, `set ${rest}`);
    const applied = outcome.overrides.map(([name, value]) => `${name}=${value}`).join(", ");
    const summary =
      outcome.action === "bind"
        ? `Bound '${outcome.letter}' to ${outcome.typeName}`
        : `Updated '${outcome.letter}' (${outcome.typeName})`;
    return ok(applied.length > 0 ? `${summary}: ${applied}` : summary);
  }

  private play(): SessionResult {
    if (this.savedNotation === null) {
      return {
        kind: "error",
        lines: ['Nothing to play. Enter a notation in double quotes first, e.g. "ab(cd)".'],
        exit: false
      };
    }
    const graph = this.compiler.compile(this.savedNotation);
    applyGraph(this.engine, graph);
    this.current = graph;
    this.logger.info("Graph applied", {
      notation: this.savedNotation,
      nodes: graph.nodes.length,
      connections: graph.connections.length
    });
    return ok(`Playing "${this.savedNotation}"`, ...formatGraph(graph));
  }

  private pause(): SessionResult {
    this.engine.clear();
    this.current = createGraph();
    return ok("Paused.");
  }
}
