import type { Server } from "http";
import type { AddressInfo } from "net";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../src/lib/errors";
import type { ProgressEvent } from "../src/lib/types";
import { MemoryRepository } from "../src/repo/memory";
import { INVALID_JSON_MESSAGE, URL_INVALID_MESSAGE, URL_REQUIRED_MESSAGE, createApp } from "../src/server/app";
import type { AppServices } from "../src/server/services";
import { createDeps, scripted } from "./helpers";

const BETA_LIST = '[{"name":"Beta Corp","url":"https://beta.test"}]';
const BETA_RESEARCH = '{"networth":[{"value":10,"year":2023,"source":"https://s.test"}],"users":[],"funding":[]}';

let server: Server | null = null;

const start = async (services: AppServices) => {
  const app = createApp(services);
  const listening = await new Promise<Server>((resolve) => {
    const instance = app.listen(0, () => resolve(instance));
  });
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("server did not bind a port");
  }
  const { port }: AddressInfo = address;
  return `http://127.0.0.1:${port}`;
};

const memoryServices = (repo = new MemoryRepository()): AppServices => ({
  repository: () => repo,
  pipeline: () => createDeps(repo, scripted(BETA_LIST, () => BETA_RESEARCH)),
});

const readEvents = (body: string): ProgressEvent[] =>
  body
    .split("\n\n")
    .filter((frame) => frame.startsWith("data: "))
    .map((frame) => JSON.parse(frame.slice("data: ".length)));

afterEach(async () => {
  const current = server;
  server = null;
  if (current) {
    await new Promise<void>((resolve, reject) => {
      current.close((error) => (error ? reject(error) : resolve()));
    });
  }
});

describe("competitor stream", () => {
  it("requires a url", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: URL_REQUIRED_MESSAGE });
  });

  it("rejects values that are not urls", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors?url=${encodeURIComponent("not a url")}`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: URL_INVALID_MESSAGE });
  });

  it("rejects malformed JSON bodies", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: INVALID_JSON_MESSAGE });
  });

  it("requires a url in POST bodies", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ company: "https://acme.test" }),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: URL_REQUIRED_MESSAGE });
  });

  it("streams progress events for a POSTed url", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ url: "https://acme.test" }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream");
    expect(response.headers.get("cache-control")).toBe("no-cache");
    expect(response.headers.get("x-accel-buffering")).toBe("no");
    expect(response.headers.get("access-control-allow-origin")).toBe("*");

    const events = readEvents(await response.text());
    expect(events[0]).toEqual({ type: "status", message: "Checking database for existing company..." });
    expect(events.at(-1)).toMatchObject({
      type: "complete",
      company_url: "https://acme.test",
      total_found: 1,
      total_saved: 1,
    });
  });

  it("streams for a url passed as a query parameter", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/competitors?url=${encodeURIComponent("https://acme.test")}`);
    const events = readEvents(await response.text());
    expect(events.map((event) => event.type)).toContain("competitor_research");
    expect(events.at(-1)?.type).toBe("complete");
  });

  it("turns setup failures into an error event", async () => {
    const base = await start({
      repository: () => new MemoryRepository(),
      pipeline: () => {
        throw new ConfigError("Missing required env var: OPENAI_API_KEY");
      },
    });
    const response = await fetch(`${base}/api/competitors?url=https://acme.test`);

    expect(response.status).toBe(200);
    expect(readEvents(await response.text())).toEqual([
      { type: "status", message: "Checking database for existing company..." },
      { type: "error", error: "Missing required env var: OPENAI_API_KEY" },
    ]);
  });
});

describe("company routes", () => {
  it("reports health", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/health`);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("lists, reads and deletes companies", async () => {
    const repo = new MemoryRepository();
    const base = await start(memoryServices(repo));
    await (await fetch(`${base}/api/competitors?url=https://acme.test`)).text();

    const list = await fetch(`${base}/api/companies`);
    expect(await list.json()).toMatchObject({
      companies: [{ name: "Beta Corp" }, { name: "Acme" }],
    });

    const acme = await repo.findCompanyByUrl("https://acme.test");
    const beta = await repo.findCompanyByUrl("https://beta.test");
    if (!acme || !beta) {
      throw new Error("companies were not stored");
    }

    const detail = await fetch(`${base}/api/companies/${acme.id}`);
    expect(await detail.json()).toMatchObject({
      company: { name: "Acme", competitor_ids: [beta.id] },
      competitors: [{ name: "Beta Corp" }],
      research: null,
    });

    const betaDetail = await fetch(`${base}/api/companies/${beta.id}`);
    expect(await betaDetail.json()).toMatchObject({
      research: {
        networth: [{ value: 10, year: 2023, source: "https://s.test" }],
        users: [],
        funding: [],
      },
    });

    const deleted = await fetch(`${base}/api/companies/${beta.id}`, { method: "DELETE" });
    expect(deleted.status).toBe(204);
    expect(repo.records).toHaveLength(0);

    const missing = await fetch(`${base}/api/companies/${beta.id}`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Company not found" });

    const deletedAgain = await fetch(`${base}/api/companies/${beta.id}`, { method: "DELETE" });
    expect(deletedAgain.status).toBe(404);
  });

  it("validates the list limit", async () => {
    const base = await start(memoryServices());
    const response = await fetch(`${base}/api/companies?limit=0`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "limit must be an integer between 1 and 500" });
  });
});
