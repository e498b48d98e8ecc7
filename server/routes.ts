import type { Express } from "express";
import type { Server } from "http";
import multer from "multer";
import { WebSocketServer, WebSocket } from "ws";
import { z } from "zod";
import { runIdParamSchema, type ControlResponse } from "@shared/schema";
import { buildCapabilitiesPayload, buildRunList } from "@shared/protocol-utils";
import { handleControlMessage, requestIdOf } from "./control";
import { LiveSourceManager } from "./live-source";
import { log } from "./log";
import type { Monitor } from "./monitor";
import { registerLiveRoutes } from "./routes/live-routes";
import { parseRecordLines } from "./stream-utils";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 100 * 1024 * 1024 },
});

const registerSchema = z.object({
  type: z.literal("register"),
  role: z.string().optional(),
});

const ingestBodySchema = z.union([
  z.array(z.unknown()),
  z.object({ records: z.array(z.unknown()) }).transform((body) => body.records),
]);

export interface RegisteredRoutes {
  liveSources: LiveSourceManager;
  close: () => void;
}

export function registerRoutes(
  httpServer: Server,
  app: Express,
  { monitor, livePollIntervalMs }: { monitor: Monitor; livePollIntervalMs: number },
): RegisteredRoutes {
  const { registry, scheduler } = monitor;
  const frontendClients = new Set<WebSocket>();
  const agentClients = new Set<WebSocket>();
  const pendingClients = new Set<WebSocket>();

  function send(client: WebSocket, message: ControlResponse) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(message));
    }
  }

  function broadcast(clients: Set<WebSocket>, message: ControlResponse) {
    clients.forEach((client) => send(client, message));
  }

  const detachSnapshots = scheduler.onSnapshot((snapshot) => {
    broadcast(frontendClients, { type: "view_snapshot", payload: snapshot });
  });
  const detachRuns = registry.onRunCreated((run) => {
    const notice: ControlResponse = {
      type: "run_created",
      payload: { runId: run.runId, title: run.title },
    };
    broadcast(frontendClients, notice);
    broadcast(agentClients, notice);
  });

  const liveSources = new LiveSourceManager(monitor.ingest, (sourceId, error) => {
    console.error(`[live] Poll error (${sourceId}):`, error);
  });

  app.use((_req, res, next) => {
    res.setHeader("X-Spotwatch-Control-WS", "/ws/control");
    next();
  });

  const wss = new WebSocketServer({ noServer: true });

  httpServer.on("upgrade", (req, socket, head) => {
    if (!req.url?.startsWith("/ws/control")) {
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws) => {
    pendingClients.add(ws);
    log("New connection, awaiting registration", "ws");

    ws.on("message", (data) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch {
        send(ws, { type: "error", error: "Invalid message format" });
        return;
      }

      const registration = registerSchema.safeParse(message);
      if (registration.success) {
        pendingClients.delete(ws);
        if (registration.data.role === "frontend") {
          frontendClients.add(ws);
          log(`Frontend registered, total frontends: ${frontendClients.size}`, "ws");
          send(ws, { type: "ack", payload: "registered as frontend" });
          send(ws, { type: "runs_list", payload: buildRunList(registry.list(), scheduler.selectedRun) });
          if (scheduler.lastSnapshot) {
            send(ws, { type: "view_snapshot", payload: scheduler.lastSnapshot });
          }
        } else {
          agentClients.add(ws);
          log(`Agent registered, total agents: ${agentClients.size}`, "ws");
          send(ws, { type: "ack", payload: "registered as agent" });
        }
        return;
      }

      if (pendingClients.has(ws)) {
        send(ws, {
          type: "error",
          error: "Must register first with {type:'register', role:'frontend'|'agent'}",
          request_id: requestIdOf(message),
        });
        return;
      }

      send(ws, handleControlMessage(monitor, message));
    });

    ws.on("close", () => {
      pendingClients.delete(ws);
      if (frontendClients.delete(ws)) {
        log(`Frontend disconnected, remaining: ${frontendClients.size}`, "ws");
      } else if (agentClients.delete(ws)) {
        log(`Agent disconnected, remaining: ${agentClients.size}`, "ws");
      }
    });

    ws.on("error", (err) => {
      console.error("[ws] Error:", err);
    });
  });

  app.get("/api/capabilities", (_req, res) => {
    res.json(buildCapabilitiesPayload());
  });

  app.get("/api/runs", (_req, res) => {
    const runs = buildRunList(registry.list(), scheduler.selectedRun);
    res.json({ runs, count: runs.length, selectedRunId: scheduler.selectedRun });
  });

  app.get("/api/runs/:runId/snapshot", (req, res) => {
    const runId = runIdParamSchema.safeParse(req.params.runId);
    if (!runId.success || !registry.has(runId.data)) {
      return res.status(404).json({ error: `Unknown run ${req.params.runId}` });
    }
    return res.json(scheduler.snapshot(runId.data));
  });

  app.post("/api/ingest", (req, res) => {
    const parsed = ingestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Expected an array of records or {records: [...]}" });
    }
    return res.json({ success: true, ...monitor.ingest(parsed.data) });
  });

  app.post("/api/upload", upload.single("file"), (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }
    const values = parseRecordLines(req.file.buffer.toString("utf-8").split("\n"));
    const report = monitor.ingest(values);
    if (report.kept === 0) {
      return res.status(400).json({ error: "No valid records found in file", ...report });
    }
    return res.json({ success: true, filename: req.file.originalname, ...report });
  });

  registerLiveRoutes({ app, liveSources, defaultPollIntervalMs: livePollIntervalMs });

  return {
    liveSources,
    close: () => {
      liveSources.stopAll();
      detachSnapshots();
      detachRuns();
      wss.clients.forEach((client) => client.close());
      wss.close();
    },
  };
}
