import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { log } from "./log";
import { createMonitor } from "./monitor";
import { registerRoutes } from "./routes";

const config = loadConfig();
const monitor = createMonitor(config);

const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "10mb" }));
app.use(express.urlencoded({ extended: false }));

if (config.nodeEnv !== "production") {
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });
}

function summarizeBody(body: unknown): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return summary;
  }
  const fields = new Map(Object.entries(body));
  for (const key of ["success", "error", "running", "count", "received", "kept", "dropped", "runId"]) {
    const value = fields.get(key);
    if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
      summary[key] = value;
    }
  }
  const runs = fields.get("runs");
  if (Array.isArray(runs)) {
    summary.runsCount = runs.length;
  }
  return summary;
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (!path.startsWith("/api")) {
      return;
    }
    let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
    if (capturedJsonResponse !== undefined) {
      if (config.logApiBody) {
        let serialized = "";
        try {
          serialized = JSON.stringify(capturedJsonResponse);
        } catch {
          serialized = "[unserializable json]";
        }
        const limit = 2000;
        logLine += ` :: ${
          serialized.length > limit
            ? `${serialized.slice(0, limit)}... (${serialized.length} chars)`
            : serialized
        }`;
      } else {
        const summary = summarizeBody(capturedJsonResponse);
        if (Object.keys(summary).length > 0) {
          logLine += ` :: ${JSON.stringify(summary)}`;
        }
      }
    }
    log(logLine);
  });

  next();
});

const routes = registerRoutes(httpServer, app, {
  monitor,
  livePollIntervalMs: config.livePollIntervalMs,
});

function statusOf(err: unknown): number {
  if (err && typeof err === "object") {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number") {
      return status;
    }
  }
  return 500;
}

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const status = statusOf(err);
  const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
  console.error("[express] Request failed:", err);
  res.status(status).json({ message });
});

let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log(`received ${signal}, shutting down`, "monitor");
  routes.close();
  const discarded = monitor.scheduler.stop();
  if (discarded > 0) {
    log(`discarded ${discarded} undrained records`, "monitor");
  }
  monitor.scheduler.dispose();
  httpServer.close(() => {
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

monitor.scheduler.start();
httpServer.listen(
  {
    port: config.port,
    host: config.host,
    reusePort: config.reusePort,
  },
  () => {
    log(`serving on port ${config.port}, tick every ${config.tickIntervalMs}ms`);
  },
);
