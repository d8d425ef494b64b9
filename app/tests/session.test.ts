import { beforeEach, describe, expect, it } from "vitest";
import { OfflineEngine } from "@audio/engine";
import { LetterRegistry } from "@bindings/registry";
import { createSessionRuntime } from "@session/bootstrap";
import { formatGraph } from "@session/format";
import { Session } from "@session/session";
import { createDefaultCatalog } from "@units/library";

const RULE = "------------------------";

describe("session", () => {
  let registry: LetterRegistry;
  let engine: OfflineEngine;
  let session: Session;

  beforeEach(() => {
    const catalog = createDefaultCatalog();
    registry = new LetterRegistry(catalog);
    engine = new OfflineEngine();
    engine.prepare(48000, 128);
    session = new Session({ catalog, registry, engine });
  });

  it("binds and updates letters", () => {
    expect(session.processLine("SET h sin")).toEqual({
      kind: "ok",
      lines: ["Bound 'h' to sin"],
      exit: false
    });
    expect(session.processLine("set h note 60").lines).toEqual(["Updated 'h' (sin): note=60"]);
    expect(session.processLine("SET G Delay Time 1").lines).toEqual([
      "Bound 'g' to delay: time=1"
    ]);
  });

  it("saves quoted notation and plays it", () => {
    session.processLine("SET h sin");
    expect(session.processLine('"H"').lines).toEqual([
      'Saved notation "h". Type PLAY to hear it.'
    ]);
    expect(session.notation).toBe("h");

    expect(session.processLine("PLAY")).toEqual({
      kind: "ok",
      lines: [
        'Playing "h"',
        "=== Nodes ===",
        "  h#1 sin (oscillator)",
        "=== Connections ===",
        "  h#1.left -> output.left",
        "  h#1.right -> output.right"
      ],
      exit: false
    });
    expect(engine.nodeCount).toBe(1);
    expect(engine.connectionCount).toBe(2);
  });

  it("rebuilds from scratch on every play", () => {
    session.processLine("SET h sin");
    session.processLine('"h h"');
    session.processLine("PLAY");
    session.processLine("PLAY");
    expect(engine.nodeCount).toBe(2);
    expect(session.graph.nodes.map((node) => node.id)).toEqual([1, 2]);
  });

  it("keeps the running graph when a play fails", () => {
    session.processLine("SET h sin");
    session.processLine('"h"');
    session.processLine("PLAY");

    session.processLine('"hx"');
    expect(session.processLine("PLAY")).toEqual({
      kind: "error",
      lines: ["Error (UNBOUND_LETTER): Letter 'x' is not bound."],
      exit: false
    });
    expect(engine.nodeCount).toBe(1);
    expect(session.graph.nodes).toHaveLength(1);
  });

  it("pauses idempotently and keeps the notation", () => {
    session.processLine("SET h sin");
    session.processLine('"h"');
    session.processLine("PLAY");

    expect(session.processLine("PAUSE").lines).toEqual(["Paused."]);
    expect(session.processLine("pause").lines).toEqual(["Paused."]);
    expect(engine.nodeCount).toBe(0);
    expect(session.graph.nodes).toHaveLength(0);
    expect(session.notation).toBe("h");

    session.processLine("PLAY");
    expect(engine.nodeCount).toBe(1);
  });

  it("prints bindings briefly or with values", () => {
    expect(session.processLine("PRINT").lines).toEqual(["No letters are currently bound."]);

    session.processLine("SET h sin note 60");
    session.processLine("SET a midi");
    expect(session.processLine("PRINT").lines).toEqual([
      "Current letter bindings:",
      RULE,
      "  'a' -> midi",
      "  'h' -> sin",
      RULE
    ]);
    expect(session.processLine("print V").lines).toEqual([
      "Current letter bindings:",
      RULE,
      "Letter 'a': midi",
      "    - bpm = 120 (default: 120)",
      "    - on = 1 (default: 1)",
      "    - off = 1 (default: 1)",
      "Letter 'h': sin",
      "    - note = 60 (default: 66)",
      RULE
    ]);
  });

  it("reports notation errors and carries on", () => {
    expect(session.processLine("SET q chorus")).toEqual({
      kind: "error",
      lines: ["Error (UNKNOWN_TYPE): Unknown unit type: chorus"],
      exit: false
    });
    expect(session.processLine("PLAY").kind).toBe("error");
    expect(session.processLine("SET h sin").kind).toBe("ok");
  });

  it("ignores blank and unrecognised lines", () => {
    expect(session.processLine("   ").kind).toBe("ignored");
    expect(session.processLine("hello there").kind).toBe("ignored");
    expect(session.notation).toBeNull();
  });

  it("ends on EXIT", () => {
    expect(session.processLine("exit")).toEqual({ kind: "exit", lines: ["Bye."], exit: true });
  });
});

describe("graph listing", () => {
  it("shows pulse wiring", () => {
    const runtime = createSessionRuntime({
      seed: 0,
      randomizeParams: false,
      sampleRate: 48000,
      blockSize: 128,
      quiet: true
    });
    runtime.session.processLine("SET a midi");
    runtime.session.processLine("SET b sin");
    runtime.session.processLine("SET c square");
    runtime.session.processLine('"a(bc)"');
    runtime.session.processLine("PLAY");

    expect(formatGraph(runtime.session.graph)).toEqual([
      "=== Nodes ===",
      "  a#1 midi (pulse)",
      "  b#2 sin (oscillator)",
      "  c#3 square (oscillator)",
      "=== Connections ===",
      "  a#1.midi -> b#2.midi",
      "  a#1.midi -> c#3.midi",
      "  b#2.left -> output.left",
      "  b#2.right -> output.right",
      "  c#3.left -> output.left",
      "  c#3.right -> output.right"
    ]);
    expect(runtime.registry.boundLetters()).toHaveLength(26);
    expect(runtime.engine.currentSampleRate).toBe(48000);
  });

  it("captures the seeded binding table at startup", () => {
    const runtime = createSessionRuntime({
      seed: 0,
      randomizeParams: false,
      sampleRate: 48000,
      blockSize: 128,
      quiet: true
    });
    runtime.session.processLine("SET a sin");

    expect(runtime.bindingTable.slice(0, 8)).toEqual([
      "Current letter bindings:",
      RULE,
      "Letter 'a': reverb",
      "    - size = 0.5 (default: 0.5)",
      "    - damp = 0.4 (default: 0.4)",
      "    - wet = 0.5 (default: 0.5)",
      "    - dry = 0.5 (default: 0.5)",
      "    - width = 0.2 (default: 0.2)"
    ]);
    expect(runtime.bindingTable[runtime.bindingTable.length - 1]).toBe(RULE);
  });

  it("marks an empty graph", () => {
    const runtime = createSessionRuntime({
      seed: 1,
      randomizeParams: true,
      sampleRate: 44100,
      blockSize: 256,
      quiet: true
    });
    expect(formatGraph(runtime.session.graph)).toEqual([
      "=== Nodes ===",
      "  (none)",
      "=== Connections ===",
      "  (none)"
    ]);
  });
});
