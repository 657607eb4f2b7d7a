export type EventType =
  | "daemon_started"
  | "daemon_stopped"
  | "agent_started"
  | "agent_paused"
  | "cycle_started"
  | "target_processed"
  | "monitoring_completed"
  | "cycle_completed"
  | "manual_trigger"
  | "feature_flags_updated"
  | "scheduler_error";

export interface AgentEvent {
  type: EventType;
  timestamp: string;
  data: Record<string, unknown>;
}

/** Append-only sink for scheduler and control events. */
export interface EventSink {
  append(event: AgentEvent): Promise<void>;
}
