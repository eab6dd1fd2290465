import { isJsonObject, normalizeWhitespace, truncate } from "./normalize";
import {
  TIME_SERIES_VARIANTS,
  type CompetitorCandidate,
  type JsonObject,
  type JsonValue,
  type ResearchData,
} from "./types";

/** One way of pulling JSON candidates out of free-form model output. */
export type ExtractionStrategy = (text: string) => Iterable<string>;

/**
 * A strategy paired with the gate its candidates must pass. Stages are
 * tried in order; the first accepted candidate wins.
 */
export type ExtractionStage<T> = {
  candidates: ExtractionStrategy;
  accept: (value: JsonValue) => T | null;
};

const parseJson = (text: string): JsonValue | undefined => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

export const firstMatch = <T>(text: string, stages: ExtractionStage<T>[]): T | null => {
  for (const { candidates, accept } of stages) {
    for (const candidate of candidates(text)) {
      const parsed = parseJson(candidate);
      if (parsed === undefined) {
        continue;
      }
      const accepted = accept(parsed);
      if (accepted !== null) {
        return accepted;
      }
    }
  }
  return null;
};

function* regexMatches(text: string, pattern: RegExp, group = 0): Iterable<string> {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const global = new RegExp(pattern.source, flags);
  for (const match of text.matchAll(global)) {
    const value = match[group];
    if (value) {
      yield value;
    }
  }
}

/**
 * Yields every complete top-level `open ... close` span, tracking nesting
 * depth and skipping brackets inside JSON strings.
 */
function* balancedSpans(text: string, open: "{" | "[", close: "}" | "]"): Iterable<string> {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }

    if (char === "\"" && depth > 0) {
      inString = true;
    } else if (char === open) {
      if (depth === 0) {
        start = i;
      }
      depth += 1;
    } else if (char === close && depth > 0) {
      depth -= 1;
      if (depth === 0 && start !== -1) {
        yield text.slice(start, i + 1);
        start = -1;
      }
    }
  }
}

// Competitor list

const COMPETITOR_STRATEGIES: ExtractionStrategy[] = [
  (text) => regexMatches(text, /\[[\s\S]*?\]/),
  (text) => regexMatches(text, /```(?:json)?\s*(\[[\s\S]*?\])\s*```/i, 1),
  (text) => balancedSpans(text, "[", "]"),
];

const toCompetitorCandidates = (value: JsonValue): CompetitorCandidate[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }

  const competitors: CompetitorCandidate[] = [];
  for (const item of value) {
    if (!isJsonObject(item)) {
      continue;
    }
    const { name, url } = item;
    if (typeof name !== "string" || typeof url !== "string") {
      continue;
    }
    const trimmedName = normalizeWhitespace(name);
    const trimmedUrl = url.trim();
    if (trimmedName && trimmedUrl) {
      competitors.push({ name: trimmedName, url: trimmedUrl });
    }
  }

  // An array with no usable entry (e.g. a "[1]" footnote in prose) is not the answer.
  return competitors.length ? competitors : null;
};

export const extractCompetitorList = (rawText: string): CompetitorCandidate[] => {
  const competitors = firstMatch(
    rawText,
    COMPETITOR_STRATEGIES.map((candidates) => ({ candidates, accept: toCompetitorCandidates })),
  );
  if (!competitors) {
    console.warn(`[extract] could not parse competitors from response: ${truncate(rawText, 200)}`);
    return [];
  }
  return competitors;
};

// Research data

const KEYED_OBJECT_PATTERNS = [
  /\{[\s\S]*?"networth"[\s\S]*?"users"[\s\S]*?"funding"[\s\S]*?\}/i,
  /\{[\s\S]*?"Networth"[\s\S]*?"Users"[\s\S]*?"Funding"[\s\S]*?\}/i,
  /\{[\s\S]*?networth[\s\S]*?users[\s\S]*?funding[\s\S]*?\}/i,
];

function* keyedObjects(text: string): Iterable<string> {
  for (const pattern of KEYED_OBJECT_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      yield match[0];
    }
  }
}

/** Exact key first, then a case-insensitive match. */
const lookupKey = (object: JsonObject, key: string): JsonValue | undefined => {
  if (key in object) {
    return object[key];
  }
  const found = Object.keys(object).find((candidate) => candidate.toLowerCase() === key);
  return found === undefined ? undefined : object[found];
};

const toResearchData = (value: JsonValue): ResearchData | null => {
  if (!isJsonObject(value)) {
    return null;
  }

  const networth = lookupKey(value, "networth") ?? [];
  const users = lookupKey(value, "users") ?? [];
  const funding = lookupKey(value, "funding") ?? [];

  if (!Array.isArray(networth) || !Array.isArray(users) || !Array.isArray(funding)) {
    return null;
  }

  return { networth, users, funding };
};

// A scanned object must carry at least one series array to count as the answer.
const toScannedResearchData = (value: JsonValue): ResearchData | null => {
  if (!isJsonObject(value)) {
    return null;
  }
  const hasSeries = TIME_SERIES_VARIANTS.some((key) => Array.isArray(lookupKey(value, key)));
  return hasSeries ? toResearchData(value) : null;
};

// Fenced blocks, then a depth-tracking scan, then loose key patterns.
const RESEARCH_STAGES: ExtractionStage<ResearchData>[] = [
  {
    candidates: (text) => regexMatches(text, /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i, 1),
    accept: toResearchData,
  },
  { candidates: (text) => balancedSpans(text, "{", "}"), accept: toScannedResearchData },
  { candidates: keyedObjects, accept: toResearchData },
];

export const extractResearchData = (rawText: string): ResearchData | null => {
  const data = firstMatch(rawText, RESEARCH_STAGES);
  if (!data) {
    console.warn(`[extract] could not parse research data from response: ${truncate(rawText, 500)}`);
  }
  return data;
};
