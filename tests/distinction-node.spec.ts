import { describe, expect, it } from "vitest";
import { DistinctionNode } from "../modules/frames/distinction-node";

describe("distinction node", () => {
  it("renders label and state to 3 decimals", () => {
    expect(new DistinctionNode("n1", 0.05).toString()).toBe("DistinctionNode(n1, state=0.050)");
    expect(new DistinctionNode("n2", 1.23456).toString()).toBe("DistinctionNode(n2, state=1.235)");
  });

  it("keeps state mutable", () => {
    const node = new DistinctionNode("n0", 2);
    node.state *= 0.5;
    expect(node.state).toBe(1);
  });
});
