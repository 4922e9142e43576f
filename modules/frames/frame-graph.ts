import { FRAME_CONSTANTS } from "../core/frame-constants";
import { BoundaryLoop } from "./boundary-loop";
import { DistinctionNode } from "./distinction-node";
import {
  boundaryScope,
  frameScope,
  silentLoggerFactory,
  type FrameLogger,
  type FrameLoggerFactory,
} from "./frame-logger";
import { ReferenceFrame } from "./reference-frame";

export type FrameGraphOptions = {
  loggerFor?: FrameLoggerFactory;
  maxNestingDepth?: number;
  divergenceCutoff?: number;
};

export type CreateFrameInput = {
  originNodeId?: string;
  scale?: number;
  phaseOffset?: number;
};

export type CoherenceCheck = {
  ok: boolean;
  violations: string[];
};

export type InstabilityCheck = {
  unstable: boolean;
  magnitude: number;
  threshold: number;
  repairedFrames: string[];
};

export type DivergenceCheck = {
  diverged: boolean;
  total: number;
  cutoff: number;
};

export type FrameGraphCounts = {
  nodes: number;
  frames: number;
  topLevelFrames: number;
  boundaries: number;
  peerLinks: number;
  nestingEdges: number;
};

export type FrameGraphSnapshot = {
  counts: FrameGraphCounts;
  nodes: string[];
  frames: string[];
  boundaries: string[];
};

export class FrameGraphLookupError extends Error {
  kind: "node" | "frame" | "boundary";
  id: string;
  constructor(kind: "node" | "frame" | "boundary", id: string) {
    super(`unknown ${kind} ${id}`);
    this.kind = kind;
    this.id = id;
    this.name = "FrameGraphLookupError";
  }
}

/**
 * Arena for one scenario. Owns every node, boundary and frame, addressed by
 * id; frames and boundaries only hold shared handles to the node table.
 *
 * Nesting declared through {@link FrameGraph.nestFrame} must form a forest.
 * This is not checked; a cycle ends in a `FrameNestingDepthError` on the next
 * adjustment.
 *
 * Ids are not required to be unique. A reused id shadows the earlier entity
 * for lookups, but the earlier one stays in the arena and keeps counting
 * toward checks, counts and snapshots.
 */
export class FrameGraph {
  private readonly nodeTable = new Map<string, DistinctionNode>();
  private readonly frameTable = new Map<string, ReferenceFrame>();
  private readonly boundaryTable = new Map<string, BoundaryLoop>();
  // Every entity ever created, in creation order. Ids are not unique; the
  // tables above resolve a reused id to its latest entity.
  private readonly nodeList: DistinctionNode[] = [];
  private readonly frameList: ReferenceFrame[] = [];
  private readonly boundaryList: BoundaryLoop[] = [];
  private readonly topLevel: ReferenceFrame[] = [];
  private readonly loggerFor: FrameLoggerFactory;
  private readonly maxNestingDepth: number;
  private readonly divergenceCutoff: number;
  private readonly logger: FrameLogger;

  constructor(options: FrameGraphOptions = {}) {
    this.loggerFor = options.loggerFor ?? silentLoggerFactory;
    this.maxNestingDepth = options.maxNestingDepth ?? FRAME_CONSTANTS.DEFAULT_MAX_NESTING_DEPTH;
    this.divergenceCutoff = options.divergenceCutoff ?? FRAME_CONSTANTS.DIVERGENCE_CUTOFF;
    this.logger = this.loggerFor("graph");
  }

  // -- construction ---------------------------------------------------------

  createNode(label: string, state: number): DistinctionNode {
    const node = new DistinctionNode(label, state);
    this.nodeTable.set(label, node);
    this.nodeList.push(node);
    return node;
  }

  createFrame(id: string, input: CreateFrameInput = {}): ReferenceFrame {
    const frame = new ReferenceFrame(id, {
      originNode: input.originNodeId === undefined ? undefined : this.node(input.originNodeId),
      scale: input.scale,
      phaseOffset: input.phaseOffset,
      logger: this.loggerFor(frameScope(id)),
      maxNestingDepth: this.maxNestingDepth,
    });
    this.frameTable.set(id, frame);
    this.frameList.push(frame);
    this.topLevel.push(frame);
    return frame;
  }

  createBoundary(id: string, coherence?: number): BoundaryLoop {
    const boundary = new BoundaryLoop(id, {
      coherence,
      logger: this.loggerFor(boundaryScope(id)),
    });
    this.boundaryTable.set(id, boundary);
    this.boundaryList.push(boundary);
    return boundary;
  }

  // -- lookup ---------------------------------------------------------------

  node(id: string): DistinctionNode {
    const node = this.nodeTable.get(id);
    if (!node) throw new FrameGraphLookupError("node", id);
    return node;
  }

  frame(id: string): ReferenceFrame {
    const frame = this.frameTable.get(id);
    if (!frame) throw new FrameGraphLookupError("frame", id);
    return frame;
  }

  boundary(id: string): BoundaryLoop {
    const boundary = this.boundaryTable.get(id);
    if (!boundary) throw new FrameGraphLookupError("boundary", id);
    return boundary;
  }

  get nodes(): DistinctionNode[] {
    return [...this.nodeList];
  }

  get frames(): ReferenceFrame[] {
    return [...this.frameList];
  }

  get boundaries(): BoundaryLoop[] {
    return [...this.boundaryList];
  }

  get topLevelFrames(): ReferenceFrame[] {
    return [...this.topLevel];
  }

  // -- edges ----------------------------------------------------------------

  attachNode(frameId: string, nodeId: string): void {
    this.frame(frameId).addNode(this.node(nodeId));
  }

  encloseNode(boundaryId: string, nodeId: string): void {
    this.boundary(boundaryId).addNode(this.node(nodeId));
  }

  attachBoundary(frameId: string, boundaryId: string): void {
    this.frame(frameId).addBoundary(this.boundary(boundaryId));
  }

  /** Declares a nesting edge; the child stops being a top-level frame. */
  nestFrame(parentId: string, childId: string): void {
    const parent = this.frame(parentId);
    const child = this.frame(childId);
    parent.addSubFrame(child);
    const idx = this.topLevel.indexOf(child);
    if (idx >= 0) this.topLevel.splice(idx, 1);
  }

  linkFrames(aId: string, bId: string): void {
    this.frame(aId).linkFrame(this.frame(bId));
  }

  // -- checks ---------------------------------------------------------------

  totalAbsoluteState(): number {
    let total = 0;
    for (const node of this.nodeList) total += Math.abs(node.state);
    return total;
  }

  totalState(): number {
    let total = 0;
    for (const node of this.nodeList) total += node.state;
    return total;
  }

  /**
   * Not read-only: when the aggregate magnitude exceeds `threshold`, every
   * top-level frame self-adjusts before the result is returned.
   */
  checkInstability(threshold: number): InstabilityCheck {
    const magnitude = this.totalAbsoluteState();
    if (magnitude <= threshold) {
      return { unstable: false, magnitude, threshold, repairedFrames: [] };
    }
    this.logger(`instability magnitude=${magnitude.toFixed(3)} threshold=${threshold}`);
    const repairedFrames: string[] = [];
    for (const frame of this.topLevelFrames) {
      frame.adjustParametersAndNormalizeNodes();
      repairedFrames.push(frame.id);
    }
    return { unstable: true, magnitude, threshold, repairedFrames };
  }

  checkCoherence(): CoherenceCheck {
    const violations: string[] = [];
    for (const boundary of this.boundaryList) {
      if (!boundary.isCoherent()) {
        violations.push(boundary.id);
        this.logger(`coherence violation ${boundary.id} coherence=${boundary.phaseCoherence.toFixed(3)}`);
      }
    }
    return { ok: violations.length === 0, violations };
  }

  checkDivergence(): DivergenceCheck {
    const total = this.totalState();
    const diverged = total > this.divergenceCutoff;
    if (diverged) {
      this.logger(`divergence total=${total.toFixed(3)} cutoff=${this.divergenceCutoff}`);
    }
    return { diverged, total, cutoff: this.divergenceCutoff };
  }

  perturbBoundaries(amount: number): void {
    for (const boundary of this.boundaryList) boundary.perturb(amount);
  }

  /** Returns the ids of boundaries that `autoReseal` flipped back to sealed. */
  autoResealAll(): string[] {
    const resealed: string[] = [];
    for (const boundary of this.boundaryList) {
      if (boundary.autoReseal()) resealed.push(boundary.id);
    }
    return resealed;
  }

  /** Hard-resets the named boundaries; returns the ids it sealed. */
  sealBoundaries(ids: string[]): string[] {
    for (const id of ids) this.boundary(id).sealBoundary();
    return [...ids];
  }

  // -- reporting ------------------------------------------------------------

  counts(): FrameGraphCounts {
    let peerEntries = 0;
    let selfLinks = 0;
    let nestingEdges = 0;
    for (const frame of this.frameList) {
      peerEntries += frame.peerLinks.size;
      if (frame.peerLinks.has(frame)) selfLinks += 1;
      nestingEdges += frame.subFrames.length;
    }
    return {
      nodes: this.nodeList.length,
      frames: this.frameList.length,
      topLevelFrames: this.topLevel.length,
      boundaries: this.boundaryList.length,
      peerLinks: (peerEntries - selfLinks) / 2 + selfLinks,
      nestingEdges,
    };
  }

  snapshot(): FrameGraphSnapshot {
    return {
      counts: this.counts(),
      nodes: this.nodes.map((node) => node.toString()),
      frames: this.frames.map((frame) => frame.toString()),
      boundaries: this.boundaries.map((boundary) => boundary.toString()),
    };
  }
}
