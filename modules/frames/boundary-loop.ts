import { FRAME_CONSTANTS, fixed3 } from "../core/frame-constants";
import type { DistinctionNode } from "./distinction-node";
import { silentLogger, type FrameLogger } from "./frame-logger";

export type BoundaryLoopOptions = {
  coherence?: number;
  logger?: FrameLogger;
};

/**
 * Closure over a set of nodes with a coherence scalar.
 *
 * `sealed` only drops when a perturbation takes coherence below the
 * threshold, and only comes back through `sealBoundary` or `autoReseal`.
 * Coherence climbing back over the threshold on its own leaves the flag
 * alone.
 */
export class BoundaryLoop {
  readonly nodes: DistinctionNode[] = [];
  phaseCoherence: number;
  sealed = true;
  private readonly logger: FrameLogger;

  constructor(
    readonly id: string,
    options: BoundaryLoopOptions = {},
  ) {
    this.phaseCoherence = options.coherence ?? FRAME_CONSTANTS.SEALED_COHERENCE;
    this.logger = options.logger ?? silentLogger;
  }

  addNode(node: DistinctionNode): void {
    this.nodes.push(node);
  }

  /** Amounts are not validated; coherence may go negative. */
  perturb(amount: number): void {
    this.phaseCoherence -= amount;
    this.logger(`perturbed by ${fixed3(amount)} coherence=${fixed3(this.phaseCoherence)}`);
    if (this.sealed && this.phaseCoherence < FRAME_CONSTANTS.COHERENCE_THRESHOLD) {
      this.sealed = false;
      this.logger(`unsealed coherence=${fixed3(this.phaseCoherence)}`);
    }
  }

  /** Hard reset: coherence 1.0, sealed. */
  sealBoundary(): void {
    this.phaseCoherence = FRAME_CONSTANTS.SEALED_COHERENCE;
    this.sealed = true;
    this.logger("sealed");
  }

  autoReseal(): boolean {
    if (this.sealed || this.phaseCoherence < FRAME_CONSTANTS.COHERENCE_THRESHOLD) {
      return false;
    }
    this.sealBoundary();
    return true;
  }

  isCoherent(): boolean {
    return this.phaseCoherence >= FRAME_CONSTANTS.COHERENCE_THRESHOLD;
  }

  toString(): string {
    return `BoundaryLoop(${this.id}, nodes=${this.nodes.length}, coherence=${fixed3(this.phaseCoherence)}, sealed=${this.sealed})`;
  }
}
