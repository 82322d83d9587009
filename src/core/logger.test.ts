import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logDeployEvent, resolveDebugFlagFromArgv } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("JsonlLogger", () => {
  it("writes events with run metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1" });

    logger.log({ type: "deploy.start", payload: { repo: "octocat.github.io" } });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);

    const event = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(event.type).toBe("deploy.start");
    expect(event.run_id).toBe("run-1");
    expect(event.payload).toEqual({ repo: "octocat.github.io" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });

    logDeployEvent(logger, "phase.complete", { phase: "dependencies" });
    logDeployEvent(logger, "phase.complete", { phase: "fields" });
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    const events = lines.map((line) => JSON.parse(line) as Record<string, unknown>);

    expect(events.map((e) => e.payload)).toEqual([{ phase: "dependencies" }, { phase: "fields" }]);
  });

  it("ignores writes after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    logger.close();
    logger.log({ type: "late" });
    logger.close();

    expect(fs.readFileSync(logPath, "utf8")).toBe("");
  });
});

describe("eventWithTs", () => {
  it("omits empty payloads and keeps explicit timestamps", () => {
    const event = eventWithTs({ type: "deploy.complete", ts: "2024-01-02T03:04:05.000Z", payload: {} }, {
      runId: "run-4",
    });

    expect(event).toEqual({
      ts: "2024-01-02T03:04:05.000Z",
      type: "deploy.complete",
      run_id: "run-4",
    });
  });

  it("requires a run id", () => {
    expect(() => eventWithTs({ type: "orphan" })).toThrow("run_id is required for log events");
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("uses the last debug flag before the argument terminator", () => {
    expect(resolveDebugFlagFromArgv(["node", "folio", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["node", "folio", "deploy", "--debug"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["node", "folio", "--", "--debug"])).toBeUndefined();
  });
});
