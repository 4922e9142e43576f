import { fixed3 } from "../core/frame-constants";

/**
 * Atomic labeled scalar. One instance is shared by every frame and boundary
 * that holds it; the scenario owns its lifetime.
 */
export class DistinctionNode {
  constructor(
    readonly label: string,
    public state: number,
  ) {}

  toString(): string {
    return `DistinctionNode(${this.label}, state=${fixed3(this.state)})`;
  }
}
