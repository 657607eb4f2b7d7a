import { describe, it, expect, afterEach } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EventLog } from "./event-log.js";

const tmpDir = join(tmpdir(), "pricing-agent-event-log-test");

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("EventLog", () => {
  it("appends one JSON line per event", async () => {
    const path = join(tmpDir, "nested", "events.ndjson");
    const log = new EventLog(path);

    await log.append({ type: "cycle_started", timestamp: "2026-01-05T10:00:00.000Z", data: { targets: 3 } });
    await log.append({ type: "cycle_completed", timestamp: "2026-01-05T10:05:00.000Z", data: { cyclesCompleted: 1 } });

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({ type: "cycle_started", timestamp: "2026-01-05T10:00:00.000Z", data: { targets: 3 } });
    expect(JSON.parse(lines[1]).type).toBe("cycle_completed");
  });
});
