import type { Express } from "express";
import { z } from "zod";
import type { LiveSourceManager, LiveSourceState } from "../live-source";
import { toLiveSourceStatus } from "../live-source";

const startBodySchema = z.object({
  source: z.string().trim().min(1, "Feed source is required."),
  pollIntervalMs: z.coerce.number().positive().optional(),
  sourceId: z.string().min(1).optional(),
});

type RegisterLiveRoutesOptions = {
  app: Express;
  liveSources: LiveSourceManager;
  defaultPollIntervalMs: number;
};

export function registerLiveRoutes({
  app,
  liveSources,
  defaultPollIntervalMs,
}: RegisterLiveRoutesOptions) {
  app.get("/api/live/status", (_req, res) => {
    const streams = liveSources.list();
    res.json({ running: streams.length > 0, count: streams.length, streams });
  });

  app.post("/api/live/start", (req, res) => {
    const parsed = startBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request." });
    }
    const { source, pollIntervalMs = defaultPollIntervalMs } = parsed.data;
    const sourceId =
      parsed.data.sourceId ?? `live-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;

    try {
      const state = liveSources.start({ source, pollIntervalMs, sourceId });
      return res.json({ success: true, ...toLiveSourceStatus(state) });
    } catch (error) {
      return res.status(409).json({
        error: error instanceof Error ? error.message : "Failed to start live source.",
      });
    }
  });

  app.post("/api/live/stop", (req, res) => {
    const sourceId = typeof req.body?.sourceId === "string" ? req.body.sourceId : null;
    const stopped = sourceId
      ? [liveSources.stop(sourceId)].filter((state): state is LiveSourceState => state !== null)
      : liveSources.stopAll();
    return res.json({
      success: true,
      stopped: stopped.map((state) => state.sourceId),
      running: liveSources.list().length > 0,
    });
  });
}
