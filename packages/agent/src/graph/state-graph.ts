import { GraphDefinitionError, GraphRoutingError } from "../lib/errors.js";

/** Terminal sentinel returned by routers and used as an edge target. */
export const END = "__end__";

export type NodeFn<S, C> = (state: S, context: C) => S | Promise<S>;
export type Router<S, C> = (state: S, context: C) => string;

type Edge<S, C> =
  | { kind: "static"; to: string }
  | { kind: "conditional"; router: Router<S, C>; targets: readonly string[] | null };

export interface RunOptions<S> {
  /** Called before each node runs; the runner feeds the runtime tracker from here. */
  onNodeEnter?: (node: string, state: S) => void;
  maxSteps?: number;
}

export interface RunResult<S> {
  state: S;
  visited: string[];
}

export interface GraphDescription {
  entry: string;
  nodes: string[];
  edges: Array<{ from: string; to: string[]; conditional: boolean }>;
}

const DEFAULT_MAX_STEPS = 50;

/**
 * Builder for a directed graph of state-transform nodes. Each node has exactly one
 * outgoing edge: static, or a router picking the next node (or END) at run time.
 */
export class StateGraph<S, C> {
  private readonly nodes = new Map<string, NodeFn<S, C>>();
  private readonly edges = new Map<string, Edge<S, C>>();
  private entry: string | null = null;

  registerNode(name: string, fn: NodeFn<S, C>): this {
    if (name === END) throw new GraphDefinitionError(`"${END}" is reserved`);
    if (this.nodes.has(name)) throw new GraphDefinitionError(`Node "${name}" already registered`);
    this.nodes.set(name, fn);
    return this;
  }

  addEdge(from: string, to: string): this {
    this.assertNoEdge(from);
    this.edges.set(from, { kind: "static", to });
    return this;
  }

  /** `targets` declares every name the router may return; omit it to allow any registered node. */
  addConditionalEdge(from: string, router: Router<S, C>, targets?: readonly string[]): this {
    this.assertNoEdge(from);
    this.edges.set(from, { kind: "conditional", router, targets: targets ?? null });
    return this;
  }

  setEntry(name: string): this {
    this.entry = name;
    return this;
  }

  compile(): CompiledGraph<S, C> {
    const problems: string[] = [];
    const known = (name: string) => name === END || this.nodes.has(name);

    if (this.entry === null) problems.push("entry node not set");
    else if (!this.nodes.has(this.entry)) problems.push(`entry "${this.entry}" is not a registered node`);

    for (const name of this.nodes.keys()) {
      if (!this.edges.has(name)) problems.push(`node "${name}" has no outgoing edge`);
    }
    for (const [from, edge] of this.edges) {
      if (!this.nodes.has(from)) problems.push(`edge from unknown node "${from}"`);
      const targets = edge.kind === "static" ? [edge.to] : edge.targets ?? [];
      for (const to of targets) {
        if (!known(to)) problems.push(`edge "${from}" -> "${to}" targets an unknown node`);
      }
    }

    if (problems.length > 0 || this.entry === null) {
      throw new GraphDefinitionError(`Invalid graph: ${problems.join("; ")}`);
    }
    return new CompiledGraph(this.entry, new Map(this.nodes), new Map(this.edges));
  }

  private assertNoEdge(from: string): void {
    if (this.edges.has(from)) throw new GraphDefinitionError(`Node "${from}" already has an outgoing edge`);
  }
}

export class CompiledGraph<S, C> {
  constructor(
    private readonly entry: string,
    private readonly nodes: ReadonlyMap<string, NodeFn<S, C>>,
    private readonly edges: ReadonlyMap<string, Edge<S, C>>,
  ) {}

  /**
   * Runs nodes strictly in sequence from the entry until a route reaches END.
   * Routers see the state as left by the node they follow.
   */
  async run(initial: S, context: C, options: RunOptions<S> = {}): Promise<RunResult<S>> {
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    const visited: string[] = [];
    let state = initial;
    let current = this.entry;

    while (current !== END) {
      if (visited.length >= maxSteps) {
        throw new GraphRoutingError(`Run exceeded ${maxSteps} steps (last node "${current}")`);
      }
      const fn = this.nodes.get(current);
      const edge = this.edges.get(current);
      if (!fn || !edge) throw new GraphRoutingError(`Unknown node "${current}"`);

      options.onNodeEnter?.(current, state);
      state = await fn(state, context);
      visited.push(current);

      current = this.resolveNext(current, edge, state, context);
    }

    return { state, visited };
  }

  describe(): GraphDescription {
    return {
      entry: this.entry,
      nodes: [...this.nodes.keys()],
      edges: [...this.edges].map(([from, edge]) => ({
        from,
        to: edge.kind === "static" ? [edge.to] : [...(edge.targets ?? [])],
        conditional: edge.kind === "conditional",
      })),
    };
  }

  private resolveNext(from: string, edge: Edge<S, C>, state: S, context: C): string {
    if (edge.kind === "static") return edge.to;
    const next = edge.router(state, context);
    if (edge.targets && !edge.targets.includes(next)) {
      throw new GraphRoutingError(`Router after "${from}" returned undeclared target "${next}"`);
    }
    if (next !== END && !this.nodes.has(next)) {
      throw new GraphRoutingError(`Router after "${from}" returned unknown node "${next}"`);
    }
    return next;
  }
}
