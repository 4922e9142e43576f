import { describe, expect, it } from "vitest";
import { FrameGraph, FrameGraphLookupError } from "../modules/frames/frame-graph";
import { createFrameEventLog } from "../modules/frames/frame-logger";

describe("frame graph arena", () => {
  it("hands out shared node handles to frames and boundaries", () => {
    const graph = new FrameGraph();
    graph.createNode("n0", 1);
    graph.createFrame("f");
    graph.createFrame("g");
    graph.createBoundary("b");
    graph.attachNode("f", "n0");
    graph.attachNode("g", "n0");
    graph.encloseNode("b", "n0");

    graph.frame("f").normalizeNodes(0.5);

    expect(graph.frame("g").nodes[0]).toBe(graph.node("n0"));
    expect(graph.boundary("b").nodes[0]).toBe(graph.node("n0"));
    expect(graph.frame("g").nodes[0]?.state).toBe(0.5);
  });

  it("rejects unknown ids", () => {
    const graph = new FrameGraph();
    expect(() => graph.frame("missing")).toThrow(FrameGraphLookupError);
    expect(() => graph.node("missing")).toThrow("unknown node missing");
    expect(() => graph.createFrame("f", { originNodeId: "nope" })).toThrow("unknown node nope");
  });

  it("drops nested frames from the top-level list", () => {
    const graph = new FrameGraph();
    graph.createFrame("parent");
    graph.createFrame("child");
    graph.nestFrame("parent", "child");

    expect(graph.topLevelFrames.map((frame) => frame.id)).toEqual(["parent"]);
    expect(graph.frame("parent").subFrames.map((frame) => frame.id)).toEqual(["child"]);
  });

  it("counts a self-link once and symmetric links once per pair", () => {
    const graph = new FrameGraph();
    graph.createFrame("a");
    graph.createFrame("b");
    graph.linkFrames("a", "b");
    graph.linkFrames("b", "a");
    graph.linkFrames("a", "a");

    expect(graph.counts()).toEqual({
      nodes: 0,
      frames: 2,
      topLevelFrames: 2,
      boundaries: 0,
      peerLinks: 2,
      nestingEdges: 0,
    });
  });
});

describe("frame graph checks", () => {
  it("reports stability without touching state below the threshold", () => {
    const graph = new FrameGraph();
    graph.createNode("a", 0.25);
    graph.createNode("b", -0.25);
    graph.createFrame("f");
    graph.attachNode("f", "a");
    graph.attachNode("f", "b");

    const result = graph.checkInstability(1);

    expect(result).toEqual({ unstable: false, magnitude: 0.5, threshold: 1, repairedFrames: [] });
    expect(graph.node("a").state).toBe(0.25);
    expect(graph.frame("f").scale).toBe(1);
  });

  it("self-repairs every top-level frame when unstable", () => {
    const graph = new FrameGraph();
    graph.createNode("a", 1);
    graph.createNode("b", -1);
    graph.createFrame("f");
    graph.createFrame("s");
    graph.attachNode("f", "a");
    graph.attachNode("f", "b");
    graph.attachNode("s", "a");
    graph.nestFrame("f", "s");

    const result = graph.checkInstability(1);

    expect(result.unstable).toBe(true);
    expect(result.magnitude).toBe(2);
    expect(result.repairedFrames).toEqual(["f"]);
    expect(graph.node("a").state).toBeCloseTo(0.9025, 12);
    expect(graph.node("b").state).toBeCloseTo(-0.95, 12);
    expect(graph.frame("f").scale).toBeCloseTo(0.95, 12);
    expect(graph.frame("s").scale).toBeCloseTo(0.95, 12);
  });

  it("lists boundaries below the coherence threshold", () => {
    const events = createFrameEventLog();
    const graph = new FrameGraph({ loggerFor: events.loggerFor });
    graph.createBoundary("b1");
    graph.createBoundary("b2");
    graph.boundary("b1").perturb(0.5);

    expect(graph.checkCoherence()).toEqual({ ok: false, violations: ["b1"] });
    expect(events.messagesFor("graph")).toEqual(["coherence violation b1 coherence=0.500"]);
  });

  it("reports divergence without repairing", () => {
    const graph = new FrameGraph();
    graph.createNode("a", 60);
    graph.createNode("b", 50);

    expect(graph.checkDivergence()).toEqual({ diverged: true, total: 110, cutoff: 100 });
    expect(graph.node("a").state).toBe(60);

    const relaxed = new FrameGraph({ divergenceCutoff: 200 });
    relaxed.createNode("a", 60);
    expect(relaxed.checkDivergence().diverged).toBe(false);
  });

  it("perturbs, auto-reseals and seals boundaries", () => {
    const graph = new FrameGraph();
    graph.createBoundary("b1");
    graph.createBoundary("b2");
    graph.perturbBoundaries(0.5);

    expect(graph.autoResealAll()).toEqual([]);

    graph.boundary("b1").phaseCoherence = 0.8;
    expect(graph.autoResealAll()).toEqual(["b1"]);
    expect(graph.boundary("b1").phaseCoherence).toBe(1);

    expect(graph.sealBoundaries(["b2"])).toEqual(["b2"]);
    expect(graph.boundary("b2").sealed).toBe(true);
  });

  it("trips the nesting depth guard on cyclic nesting", () => {
    const graph = new FrameGraph({ maxNestingDepth: 4 });
    graph.createFrame("a");
    graph.createFrame("b");
    graph.nestFrame("a", "b");
    graph.frame("b").addSubFrame(graph.frame("a"));
    graph.createNode("x", 5);

    expect(() => graph.frame("a").adjustParametersAndNormalizeNodes()).toThrow(
      "frame a exceeded nesting depth 4",
    );
  });
});

describe("frame graph with reused ids", () => {
  it("keeps a shadowed node in the instability check", () => {
    const graph = new FrameGraph();
    const first = graph.createNode("x", 5);
    graph.createFrame("f");
    graph.attachNode("f", "x");
    const second = graph.createNode("x", 0);

    const result = graph.checkInstability(1);

    expect(graph.node("x")).toBe(second);
    expect(result.unstable).toBe(true);
    expect(result.magnitude).toBe(5);
    expect(result.repairedFrames).toEqual(["f"]);
    expect(first.state).toBeCloseTo(4.75, 12);
    expect(second.state).toBe(0);
    expect(graph.totalState()).toBeCloseTo(4.75, 12);
    expect(graph.counts().nodes).toBe(2);
    expect(graph.snapshot().nodes).toEqual([
      "DistinctionNode(x, state=4.750)",
      "DistinctionNode(x, state=0.000)",
    ]);
  });

  it("counts both frames and nests only the latest under a reused id", () => {
    const graph = new FrameGraph();
    const first = graph.createFrame("f");
    const second = graph.createFrame("f");
    expect(graph.frame("f")).toBe(second);
    expect(graph.counts().frames).toBe(2);
    expect(graph.counts().topLevelFrames).toBe(2);

    graph.createFrame("p");
    graph.nestFrame("p", "f");

    expect(graph.topLevelFrames).toEqual([first, graph.frame("p")]);
    expect(graph.counts()).toMatchObject({ frames: 3, topLevelFrames: 2, nestingEdges: 1 });
  });

  it("perturbs and validates every boundary under a reused id", () => {
    const graph = new FrameGraph();
    graph.createBoundary("b");
    graph.createBoundary("b");
    graph.perturbBoundaries(0.5);

    expect(graph.counts().boundaries).toBe(2);
    expect(graph.checkCoherence()).toEqual({ ok: false, violations: ["b", "b"] });
  });
});

describe("frame graph instability threshold", () => {
  it("stays stable when the magnitude equals the threshold", () => {
    const graph = new FrameGraph();
    graph.createNode("a", 0.5);
    graph.createNode("b", -0.5);
    graph.createFrame("f");
    graph.attachNode("f", "a");
    graph.attachNode("f", "b");

    const result = graph.checkInstability(1);

    expect(result).toEqual({ unstable: false, magnitude: 1, threshold: 1, repairedFrames: [] });
    expect(graph.node("a").state).toBe(0.5);
    expect(graph.node("b").state).toBe(-0.5);
    expect(graph.frame("f").scale).toBe(1);
    expect(graph.frame("f").phaseOffset).toBe(0);
  });
});
