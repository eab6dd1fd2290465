import { describe, expect, it } from "vitest";
import { SSE_HEADERS, encodeEvent } from "../src/lib/events";

describe("encodeEvent", () => {
  it("frames an event as a data line followed by a blank line", () => {
    expect(encodeEvent({ type: "competitors_list", total: 2 })).toBe(
      'data: {"type":"competitors_list","total":2}\n\n',
    );
  });

  it("keeps optional status fields on the wire", () => {
    expect(
      encodeEvent({ type: "status", message: "Starting competitor research...", total_competitors: 3 }),
    ).toBe(
      'data: {"type":"status","message":"Starting competitor research...","total_competitors":3}\n\n',
    );
  });

  it("encodes failed competitors with their error", () => {
    expect(
      encodeEvent({
        type: "competitor",
        competitor: { name: "Beta", url: "https://beta.test", error: "Failed to save: boom" },
      }),
    ).toBe(
      'data: {"type":"competitor","competitor":{"name":"Beta","url":"https://beta.test","error":"Failed to save: boom"}}\n\n',
    );
  });

  it("disables intermediary buffering", () => {
    expect(SSE_HEADERS["Content-Type"]).toBe("text/event-stream");
    expect(SSE_HEADERS["X-Accel-Buffering"]).toBe("no");
    expect(SSE_HEADERS["Cache-Control"]).toBe("no-cache");
  });
});
