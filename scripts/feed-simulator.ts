import WebSocket from "ws";
import { z } from "zod";

const WS_URL = process.env.WS_URL || "ws://localhost:5050/ws/control";
const RUN_NO = Number.parseInt(process.env.SIM_RUN || "1", 10);
const BATCH_SIZE = Number.parseInt(process.env.SIM_BATCH || "20", 10);
const INTERVAL_MS = Number.parseInt(process.env.SIM_INTERVAL_MS || "500", 10);
const TOTAL_FRAMES = Number.parseInt(process.env.SIM_FRAMES || "2000", 10);

const responseSchema = z.object({
  type: z.string(),
  request_id: z.string().optional(),
  payload: z.unknown().optional(),
  error: z.string().optional(),
});

const reportSchema = z.object({
  received: z.number(),
  kept: z.number(),
  dropped: z.number(),
});

function syntheticFrame(frameIdx: number) {
  // Hits come in bursts, like a crystal drifting through the beam.
  const burst = Math.sin(frameIdx / 40) > 0.3;
  const spots = Math.round((burst ? 30 : 4) + Math.random() * (burst ? 60 : 8));
  const indexed = burst && Math.random() > 0.4 ? Math.round(spots * 0.7) : null;
  return {
    run_no: RUN_NO,
    frame_idx: frameIdx,
    n_spots: spots,
    indexed,
    hres: Number((1.6 + Math.random() * 2).toFixed(3)),
  };
}

function main() {
  const ws = new WebSocket(WS_URL);
  let nextFrame = 1;
  let batchNumber = 0;
  let timer: NodeJS.Timeout | null = null;

  const finish = () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
    ws.close();
  };

  const sendBatch = () => {
    if (nextFrame > TOTAL_FRAMES) {
      console.log(`Sent ${TOTAL_FRAMES} frames for run ${RUN_NO}`);
      finish();
      return;
    }
    const last = Math.min(TOTAL_FRAMES, nextFrame + BATCH_SIZE - 1);
    const records: Array<ReturnType<typeof syntheticFrame>> = [];
    for (let frameIdx = nextFrame; frameIdx <= last; frameIdx += 1) {
      records.push(syntheticFrame(frameIdx));
    }
    nextFrame = last + 1;
    batchNumber += 1;
    ws.send(JSON.stringify({ type: "ingest_batch", request_id: `batch-${batchNumber}`, records }));
  };

  ws.on("open", () => {
    console.log(`Connected to ${WS_URL}`);
    ws.send(JSON.stringify({ type: "register", role: "agent" }));
  });

  ws.on("message", (data) => {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      console.error("[sim] Unreadable message:", data.toString());
      return;
    }
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      console.error("[sim] Unexpected message:", raw);
      return;
    }
    const message = parsed.data;
    if (message.type === "ack" && message.payload === "registered as agent") {
      console.log(`Streaming run ${RUN_NO}: ${BATCH_SIZE} frames every ${INTERVAL_MS}ms`);
      sendBatch();
      timer = setInterval(sendBatch, INTERVAL_MS);
      return;
    }
    if (message.type === "ingest_report") {
      const report = reportSchema.safeParse(message.payload);
      if (report.success && report.data.dropped > 0) {
        console.log(`  ${message.request_id}: dropped ${report.data.dropped} of ${report.data.received}`);
      }
      return;
    }
    if (message.type === "run_created") {
      console.log("  run created:", JSON.stringify(message.payload));
      return;
    }
    if (message.type === "error") {
      console.error(`[sim] ${message.request_id ?? "-"}: ${message.error}`);
    }
  });

  ws.on("error", (err) => {
    console.error("[sim] Connection error:", err.message);
    process.exitCode = 1;
    finish();
  });

  ws.on("close", () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
    console.log("Disconnected");
  });

  process.on("SIGINT", finish);
}

main();
