import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { AgentEvent, EventSink } from "../types/events.js";

/** NDJSON event log, one event per line. */
export class EventLog implements EventSink {
  private filePath: string;
  private ready: Promise<void>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.ready = mkdir(dirname(filePath), { recursive: true }).then(() => {});
  }

  async append(event: AgentEvent): Promise<void> {
    await this.ready;
    await appendFile(this.filePath, JSON.stringify(event) + "\n", "utf-8");
  }
}
