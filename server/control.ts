import {
  controlCommandSchema,
  type ControlCommand,
  type ControlResponse,
} from "@shared/schema";
import { buildCapabilitiesPayload, buildRunList } from "@shared/protocol-utils";
import type { Monitor } from "./monitor";

function describeIssues(issues: Array<{ path: Array<string | number>; message: string }>) {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function requestIdOf(message: unknown): string | undefined {
  if (message && typeof message === "object" && "request_id" in message) {
    const value = message.request_id;
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

export function runCommand(monitor: Monitor, command: ControlCommand): ControlResponse {
  const { registry, scheduler } = monitor;
  const request_id = command.request_id;

  switch (command.type) {
    case "hello":
      return { type: "capabilities", request_id, payload: buildCapabilitiesPayload() };
    case "ingest_batch":
      return { type: "ingest_report", request_id, payload: monitor.ingest(command.records) };
    case "set_threshold":
      scheduler.onThreshold(command.value);
      return { type: "ack", request_id, payload: command.type };
    case "zoom_select":
      scheduler.onZoomSelect(command.min, command.max);
      return { type: "ack", request_id, payload: command.type };
    case "zoom_cancel":
      scheduler.onZoomCancel();
      return { type: "ack", request_id, payload: command.type };
    case "set_chart_range":
      scheduler.onChartRange(command.range);
      return { type: "ack", request_id, payload: command.type };
    case "scroll":
      scheduler.onScroll(command.center);
      return { type: "ack", request_id, payload: command.type };
    case "select_run":
      if (!registry.has(command.runId)) {
        return { type: "error", request_id, error: `Unknown run ${command.runId}` };
      }
      scheduler.selectRun(command.runId);
      return { type: "ack", request_id, payload: command.type };
    case "create_run": {
      if (command.runId !== undefined && registry.has(command.runId)) {
        return { type: "error", request_id, error: `Run ${command.runId} already exists` };
      }
      const runId = scheduler.createRun(command.runId);
      return { type: "run_created", request_id, payload: { runId } };
    }
    case "list_runs":
      return {
        type: "runs_list",
        request_id,
        payload: buildRunList(registry.list(), scheduler.selectedRun),
      };
    case "get_snapshot": {
      if (command.runId !== undefined && !registry.has(command.runId)) {
        return { type: "error", request_id, error: `Unknown run ${command.runId}` };
      }
      const snapshot = scheduler.snapshot(command.runId);
      if (!snapshot) {
        return { type: "error", request_id, error: "No run selected" };
      }
      return { type: "view_snapshot", request_id, payload: snapshot };
    }
  }
}

/**
 * Validates one decoded control message and runs it. Never throws; bad input
 * comes back as an `error` response.
 */
export function handleControlMessage(monitor: Monitor, message: unknown): ControlResponse {
  const parsed = controlCommandSchema.safeParse(message);
  if (!parsed.success) {
    return {
      type: "error",
      request_id: requestIdOf(message),
      error: `Invalid command: ${describeIssues(parsed.error.issues)}`,
    };
  }
  return runCommand(monitor, parsed.data);
}
