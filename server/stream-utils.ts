import * as fs from "fs";
import type { Readable } from "stream";

/**
 * Decodes JSONL lines into raw record values for ingest validation. Blank
 * lines are skipped; undecodable lines become `null` so they are counted as
 * dropped rather than vanishing.
 */
export function parseRecordLines(lines: readonly string[]): unknown[] {
  const values: unknown[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    try {
      values.push(JSON.parse(trimmed));
    } catch {
      values.push(null);
    }
  }
  return values;
}

// A trailing line that does not parse yet is still being written.
export function splitFeedLines(content: string) {
  const lines = content.split("\n");
  let completeCount = lines.length;
  const last = lines[lines.length - 1];
  if (!last || last.trim() === "") {
    completeCount -= 1;
  } else {
    try {
      JSON.parse(last);
    } catch {
      completeCount -= 1;
    }
  }
  return { lines, completeCount: Math.max(0, completeCount) };
}

export type LineConsumerResult = {
  bytesRead: number;
  lineCount: number;
  remainder: string;
};

export function createAbortError() {
  const error = new Error("AbortError");
  error.name = "AbortError";
  return error;
}

export async function consumeLineStream(options: {
  readable: Readable;
  initialRemainder?: string;
  signal?: AbortSignal;
  onLine: (line: string) => void;
}): Promise<LineConsumerResult> {
  const { readable, signal, onLine } = options;
  let remainder = options.initialRemainder ?? "";
  let bytesRead = 0;
  let lineCount = 0;
  const abortHandler = () => {
    readable.destroy(createAbortError());
  };

  if (signal) {
    if (signal.aborted) {
      abortHandler();
    } else {
      signal.addEventListener("abort", abortHandler, { once: true });
    }
  }

  try {
    for await (const chunk of readable) {
      const chunkText = typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8");
      bytesRead += Buffer.byteLength(chunkText, "utf-8");
      const parts = (remainder + chunkText).split("\n");
      remainder = parts.pop() ?? "";
      for (const part of parts) {
        lineCount += 1;
        onLine(part);
      }
    }
  } finally {
    if (signal) {
      signal.removeEventListener("abort", abortHandler);
    }
  }

  return { bytesRead, lineCount, remainder };
}

export async function streamLinesFromFile(options: {
  filePath: string;
  startOffset: number;
  initialRemainder?: string;
  signal?: AbortSignal;
  onLine: (line: string) => void;
}): Promise<LineConsumerResult> {
  const stream = fs.createReadStream(options.filePath, {
    start: options.startOffset,
    encoding: "utf-8",
  });
  return consumeLineStream({
    readable: stream,
    initialRemainder: options.initialRemainder,
    signal: options.signal,
    onLine: options.onLine,
  });
}
