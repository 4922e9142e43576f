import { FRAME_CONSTANTS, fixed3 } from "../core/frame-constants";
import type { BoundaryLoop } from "./boundary-loop";
import type { DistinctionNode } from "./distinction-node";
import { silentLogger, type FrameLogger } from "./frame-logger";

export type ReferenceFrameOptions = {
  originNode?: DistinctionNode;
  scale?: number;
  phaseOffset?: number;
  logger?: FrameLogger;
  maxNestingDepth?: number;
};

export class FrameNestingDepthError extends Error {
  frameId: string;
  depth: number;
  constructor(frameId: string, depth: number) {
    super(`frame ${frameId} exceeded nesting depth ${depth}; sub-frame edges must stay acyclic`);
    this.frameId = frameId;
    this.depth = depth;
    this.name = "FrameNestingDepthError";
  }
}

/**
 * Container of nodes and boundaries with scale/phase parameters, symmetric
 * peer links and an owned list of sub-frames.
 *
 * Self-adjustment recurses through `subFrames` and then nudges peers one hop.
 * Nesting edges must stay acyclic: a cycle there recurses until
 * `maxNestingDepth` and throws {@link FrameNestingDepthError}. Peer cycles are
 * harmless because propagation never recurses.
 */
export class ReferenceFrame {
  readonly originNode?: DistinctionNode;
  scale: number;
  phaseOffset: number;
  readonly nodes: DistinctionNode[] = [];
  readonly boundaries: BoundaryLoop[] = [];
  readonly peerLinks = new Set<ReferenceFrame>();
  readonly subFrames: ReferenceFrame[] = [];
  private readonly logger: FrameLogger;
  private readonly maxNestingDepth: number;

  constructor(
    readonly id: string,
    options: ReferenceFrameOptions = {},
  ) {
    this.originNode = options.originNode;
    this.scale = options.scale ?? 1;
    this.phaseOffset = options.phaseOffset ?? 0;
    this.logger = options.logger ?? silentLogger;
    this.maxNestingDepth = Math.max(
      1,
      options.maxNestingDepth ?? FRAME_CONSTANTS.DEFAULT_MAX_NESTING_DEPTH,
    );
  }

  addNode(node: DistinctionNode): void {
    this.nodes.push(node);
  }

  addBoundary(boundary: BoundaryLoop): void {
    this.boundaries.push(boundary);
  }

  addSubFrame(sub: ReferenceFrame): void {
    this.subFrames.push(sub);
  }

  /** Symmetric and idempotent; a self-link is a single set entry. */
  linkFrame(other: ReferenceFrame): void {
    if (this.peerLinks.has(other)) return;
    this.peerLinks.add(other);
    other.peerLinks.add(this);
    this.logger(`linked ${this.id} <-> ${other.id}`);
    other.logger(`linked ${other.id} <-> ${this.id}`);
  }

  /**
   * Damp scale, advance phase, normalize nodes, recurse into sub-frames
   * (pre-order), then propagate to this frame's own peers.
   */
  adjustParametersAndNormalizeNodes(depth = 0): void {
    if (depth >= this.maxNestingDepth) {
      throw new FrameNestingDepthError(this.id, depth);
    }
    this.scale *= FRAME_CONSTANTS.DAMPING_FACTOR;
    this.phaseOffset += FRAME_CONSTANTS.PHASE_STEP;
    this.logger(`adjusted scale=${fixed3(this.scale)} phase=${fixed3(this.phaseOffset)}`);
    this.normalizeNodes();

    for (const sub of this.subFrames) {
      sub.adjustParametersAndNormalizeNodes(depth + 1);
    }

    this.propagateAdjustment();
  }

  /** One hop: peers' sub-frames and peers' peers are untouched. */
  propagateAdjustment(): void {
    for (const peer of this.peerLinks) {
      peer.scale *= FRAME_CONSTANTS.PROPAGATION_FACTOR;
      peer.phaseOffset -= FRAME_CONSTANTS.PROPAGATION_PHASE_STEP;
      const change = `scale=${fixed3(peer.scale)} phase=${fixed3(peer.phaseOffset)}`;
      this.logger(`propagated to ${peer.id} ${change}`);
      peer.logger(`received propagation from ${this.id} ${change}`);
      peer.normalizeNodes();
    }
  }

  normalizeNodes(factor: number = FRAME_CONSTANTS.DAMPING_FACTOR): void {
    for (const node of this.nodes) {
      node.state *= factor;
    }
    this.logger(`normalized ${this.nodes.length} nodes by ${factor}`);
  }

  toString(): string {
    return (
      `ReferenceFrame(${this.id}, origin=${this.originNode?.label ?? "none"}, ` +
      `scale=${fixed3(this.scale)}, phase=${fixed3(this.phaseOffset)}, ` +
      `nodes=${this.nodes.length}, boundaries=${this.boundaries.length}, ` +
      `peers=${this.peerLinks.size}, sub_frames=${this.subFrames.length})`
    );
  }
}
