import { describe, expect, it } from "vitest";
import { extractCompetitorList, extractResearchData } from "../src/lib/extract";

describe("extractCompetitorList", () => {
  it("returns trimmed competitors from an array wrapped in prose", () => {
    const text = [
      "Here you go:",
      '[{"name":" Beta Corp ","url":" https://beta.test "},{"name":"Gamma","url":"https://gamma.test"}]',
      "Let me know if you need more.",
    ].join("\n");

    expect(extractCompetitorList(text)).toEqual([
      { name: "Beta Corp", url: "https://beta.test" },
      { name: "Gamma", url: "https://gamma.test" },
    ]);
  });

  it("reads a fenced json block", () => {
    const text = '```json\n[{"name":"Beta","url":"https://beta.test"}]\n```';
    expect(extractCompetitorList(text)).toEqual([{ name: "Beta", url: "https://beta.test" }]);
  });

  it("skips arrays without usable competitors, such as footnote markers", () => {
    const text = 'Based on public sources [1].\n```json\n[{"name":"Beta","url":"https://beta.test"}]\n```';
    expect(extractCompetitorList(text)).toEqual([{ name: "Beta", url: "https://beta.test" }]);
  });

  it("falls back to a bracket-matching scan for nested arrays", () => {
    const text = 'Answer: [{"name":"Beta","url":"https://beta.test","tags":["crm","sales"]}]';
    expect(extractCompetitorList(text)).toEqual([{ name: "Beta", url: "https://beta.test" }]);
  });

  it("drops entries without a non-empty string name and url", () => {
    const text = JSON.stringify([
      { name: "Beta", url: "https://beta.test" },
      { name: "", url: "https://blank.test" },
      { name: "NoUrl" },
      "junk",
      { name: 42, url: "https://numeric.test" },
    ]);
    expect(extractCompetitorList(text)).toEqual([{ name: "Beta", url: "https://beta.test" }]);
  });

  it("returns an empty list for refusals", () => {
    expect(extractCompetitorList("Sorry, I cannot help.")).toEqual([]);
  });

  it("returns an empty list for malformed arrays", () => {
    expect(extractCompetitorList('[{"name": "Beta", "url": ]')).toEqual([]);
  });
});

describe("extractResearchData", () => {
  it("parses a bare research object", () => {
    const text =
      '{"networth":[{"value":1000000,"year":2022,"source":"https://s.test/a"}],"users":[],"funding":[]}';
    expect(extractResearchData(text)).toEqual({
      networth: [{ value: 1000000, year: 2022, source: "https://s.test/a" }],
      users: [],
      funding: [],
    });
  });

  it("matches keys case-insensitively inside a fenced block", () => {
    const text = [
      "Result:",
      "```json",
      '{"Networth": [{"value": 1, "year": 2020, "source": "https://s.test"}], "USERS": [], "Funding": []}',
      "```",
    ].join("\n");
    expect(extractResearchData(text)).toEqual({
      networth: [{ value: 1, year: 2020, source: "https://s.test" }],
      users: [],
      funding: [],
    });
  });

  it("defaults missing keys to empty arrays", () => {
    const text = '{"networth": [{"value": 5, "year": 2021, "source": "https://s.test"}]}';
    expect(extractResearchData(text)).toEqual({
      networth: [{ value: 5, year: 2021, source: "https://s.test" }],
      users: [],
      funding: [],
    });
  });

  it("prefers the exact key over a differently cased one", () => {
    const text =
      '{"networth": [], "Networth": [{"value": 1, "year": 2020, "source": "x"}], "users": [], "funding": []}';
    expect(extractResearchData(text)?.networth).toEqual([]);
  });

  it("skips unrelated objects before the research object", () => {
    const text =
      'Meta {"note": "draft"} then {"networth": [], "users": [{"value": 10, "year": 2023, "source": "https://s.test"}], "funding": []}';
    expect(extractResearchData(text)).toEqual({
      networth: [],
      users: [{ value: 10, year: 2023, source: "https://s.test" }],
      funding: [],
    });
  });

  it("ignores braces inside string values", () => {
    const text =
      '{"networth": [{"value": 1, "year": 2020, "source": "https://s.test/{id}"}], "users": [], "funding": []}';
    expect(extractResearchData(text)?.networth).toEqual([
      { value: 1, year: 2020, source: "https://s.test/{id}" },
    ]);
  });

  it("accepts a fenced object without any series as empty data", () => {
    const text = 'Nothing reliable found.\n```json\n{"note": "no public data"}\n```';
    expect(extractResearchData(text)).toEqual({ networth: [], users: [], funding: [] });
  });

  it("rejects objects where a series is not an array", () => {
    expect(extractResearchData('{"networth": 5, "users": [], "funding": []}')).toBeNull();
  });

  it("returns null when no JSON is present", () => {
    expect(extractResearchData("I could not find any data for this company.")).toBeNull();
  });
});
