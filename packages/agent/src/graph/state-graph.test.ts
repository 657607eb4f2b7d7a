import { describe, it, expect, vi } from "vitest";
import { END, StateGraph } from "./state-graph.js";
import { GraphDefinitionError, GraphRoutingError } from "../lib/errors.js";

interface Counter {
  trail: string[];
  value: number;
}

interface Ctx {
  threshold: number;
}

function step(name: string, delta: number) {
  return (s: Counter): Counter => ({ trail: [...s.trail, name], value: s.value + delta });
}

function buildBranching() {
  return new StateGraph<Counter, Ctx>()
    .registerNode("start", step("start", 1))
    .registerNode("big", step("big", 10))
    .registerNode("small", step("small", 0))
    .setEntry("start")
    .addConditionalEdge("start", (s, ctx) => (s.value >= ctx.threshold ? "big" : "small"), ["big", "small"])
    .addEdge("big", END)
    .addEdge("small", END)
    .compile();
}

describe("StateGraph", () => {
  it("follows a conditional route using state and context", async () => {
    const graph = buildBranching();

    const high = await graph.run({ trail: [], value: 5 }, { threshold: 3 });
    expect(high.visited).toEqual(["start", "big"]);
    expect(high.state).toEqual({ trail: ["start", "big"], value: 16 });

    const low = await graph.run({ trail: [], value: 0 }, { threshold: 3 });
    expect(low.visited).toEqual(["start", "small"]);
  });

  it("routers see the state written by the node they follow", async () => {
    const router = vi.fn((s: Counter) => (s.value === 2 ? END : "never"));
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("only", step("only", 2))
      .registerNode("never", step("never", 0))
      .addConditionalEdge("only", router)
      .addEdge("never", END)
      .setEntry("only")
      .compile();

    const result = await graph.run({ trail: [], value: 0 }, { threshold: 0 });
    expect(router).toHaveBeenCalledWith({ trail: ["only"], value: 2 }, { threshold: 0 });
    expect(result.visited).toEqual(["only"]);
  });

  it("awaits async nodes and reports each node before it runs", async () => {
    const entered: Array<[string, number]> = [];
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("a", async (s) => ({ ...s, value: s.value + 1 }))
      .registerNode("b", async (s) => ({ ...s, value: s.value * 10 }))
      .addEdge("a", "b")
      .addEdge("b", END)
      .setEntry("a")
      .compile();

    const result = await graph.run({ trail: [], value: 1 }, { threshold: 0 }, {
      onNodeEnter: (node, s) => entered.push([node, s.value]),
    });

    expect(result.state.value).toBe(20);
    expect(entered).toEqual([["a", 1], ["b", 2]]);
  });

  it("propagates an exception thrown by a node", async () => {
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("boom", () => {
        throw new Error("node failed");
      })
      .addEdge("boom", END)
      .setEntry("boom")
      .compile();

    await expect(graph.run({ trail: [], value: 0 }, { threshold: 0 })).rejects.toThrow("node failed");
  });

  it("rejects a route outside the declared targets", async () => {
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("a", step("a", 0))
      .registerNode("b", step("b", 0))
      .registerNode("c", step("c", 0))
      .addConditionalEdge("a", () => "c", ["b", END])
      .addEdge("b", END)
      .addEdge("c", END)
      .setEntry("a")
      .compile();

    await expect(graph.run({ trail: [], value: 0 }, { threshold: 0 })).rejects.toThrow(GraphRoutingError);
  });

  it("rejects a route to an unregistered node", async () => {
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("a", step("a", 0))
      .addConditionalEdge("a", () => "ghost")
      .setEntry("a")
      .compile();

    await expect(graph.run({ trail: [], value: 0 }, { threshold: 0 })).rejects.toThrow(
      'Router after "a" returned unknown node "ghost"',
    );
  });

  it("stops a cycle at the step limit", async () => {
    const graph = new StateGraph<Counter, Ctx>()
      .registerNode("loop", step("loop", 1))
      .addEdge("loop", "loop")
      .setEntry("loop")
      .compile();

    await expect(graph.run({ trail: [], value: 0 }, { threshold: 0 }, { maxSteps: 5 })).rejects.toThrow(
      'Run exceeded 5 steps (last node "loop")',
    );
  });

  describe("compile", () => {
    it("requires an entry node", () => {
      const builder = new StateGraph<Counter, Ctx>().registerNode("a", step("a", 0)).addEdge("a", END);
      expect(() => builder.compile()).toThrow("Invalid graph: entry node not set");
    });

    it("requires an outgoing edge on every node", () => {
      const builder = new StateGraph<Counter, Ctx>()
        .registerNode("a", step("a", 0))
        .registerNode("b", step("b", 0))
        .addEdge("a", END)
        .setEntry("a");
      expect(() => builder.compile()).toThrow('node "b" has no outgoing edge');
    });

    it("rejects edges to unknown nodes", () => {
      const builder = new StateGraph<Counter, Ctx>().registerNode("a", step("a", 0)).addEdge("a", "z").setEntry("a");
      expect(() => builder.compile()).toThrow('edge "a" -> "z" targets an unknown node');
    });

    it("rejects duplicate nodes, duplicate edges and the reserved name", () => {
      const builder = new StateGraph<Counter, Ctx>().registerNode("a", step("a", 0)).addEdge("a", END);
      expect(() => builder.registerNode("a", step("a", 0))).toThrow(GraphDefinitionError);
      expect(() => builder.addEdge("a", "a")).toThrow('Node "a" already has an outgoing edge');
      expect(() => builder.registerNode(END, step("x", 0))).toThrow(GraphDefinitionError);
    });
  });

  it("describes its topology", () => {
    expect(buildBranching().describe()).toEqual({
      entry: "start",
      nodes: ["start", "big", "small"],
      edges: [
        { from: "start", to: ["big", "small"], conditional: true },
        { from: "big", to: [END], conditional: false },
        { from: "small", to: [END], conditional: false },
      ],
    });
  });
});
