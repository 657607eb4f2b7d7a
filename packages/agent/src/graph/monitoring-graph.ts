import type { MonitoringState } from "../types/state.js";
import { MonitoringNode, afterMonitor, type MonitoringNodeName } from "./routers.js";
import { END, StateGraph, type CompiledGraph, type NodeFn } from "./state-graph.js";

export type MonitoringStages<C> = Record<MonitoringNodeName, NodeFn<MonitoringState, C>>;
export type MonitoringGraph<C> = CompiledGraph<MonitoringState, C>;

/** monitor -> [should retract?] retract -> END */
export function buildMonitoringGraph<C>(stages: MonitoringStages<C>): MonitoringGraph<C> {
  return new StateGraph<MonitoringState, C>()
    .registerNode(MonitoringNode.monitor, stages.monitor)
    .registerNode(MonitoringNode.retract, stages.retract)
    .setEntry(MonitoringNode.monitor)
    .addConditionalEdge(MonitoringNode.monitor, afterMonitor, [MonitoringNode.retract, END])
    .addEdge(MonitoringNode.retract, END)
    .compile();
}
