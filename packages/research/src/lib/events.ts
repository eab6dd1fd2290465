import type { ProgressEvent } from "./types";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  "X-Accel-Buffering": "no",
  "Access-Control-Allow-Origin": "*",
} as const;

export type EventSink = (event: ProgressEvent) => void;

export const encodeEvent = (event: ProgressEvent) => `data: ${JSON.stringify(event)}\n\n`;
