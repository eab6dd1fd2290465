import type { ResearchRepository } from "../repo/types";
import { errorMessage } from "./errors";
import type { EventSink } from "./events";
import { extractCompetitorList, extractResearchData } from "./extract";
import type { TextGenerator } from "./llm/openai";
import { isJsonObject } from "./normalize";
import { buildDiscoveryPrompt, buildResearchPrompt } from "./prompts";
import type { GenerationSettings } from "./settings";
import {
  TIME_SERIES_VARIANTS,
  isFailedCompetitor,
  type Company,
  type CompetitorCandidate,
  type CompetitorEntry,
  type JsonValue,
  type PipelineResult,
  type ResearchData,
  type ResearchResult,
  type ResearchStatus,
  type ResearchSuccess,
  type SavedCompetitor,
  type TimeSeriesVariant,
} from "./types";
import { deriveCompanyName } from "./url";

export type PipelineDeps = {
  repository: ResearchRepository;
  generator: TextGenerator;
  settings: GenerationSettings;
};

export type PipelineOptions = {
  signal?: AbortSignal;
};

export const PARSE_FAILURE_MESSAGE = "Could not parse research data";

type SaveOutcome = {
  entry: CompetitorEntry;
  id: string | null;
};

const toSavedCompetitor = (company: Company, created: boolean): SavedCompetitor => ({
  id: company.id,
  name: company.name,
  url: company.website_url ?? "",
  created,
});

const buildSuccess = (
  competitor: SavedCompetitor,
  data: Record<TimeSeriesVariant, JsonValue[]>,
  fromCache: boolean,
): ResearchSuccess => ({
  competitor_id: competitor.id,
  competitor_name: competitor.name,
  status: "success",
  from_cache: fromCache,
  networth_count: data.networth.length,
  users_count: data.users.length,
  funding_count: data.funding.length,
  networth: data.networth,
  users: data.users,
  funding: data.funding,
});

const toFiniteNumber = (value: unknown) => {
  if (typeof value === "string" && !value.trim()) {
    return null;
  }
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  return typeof parsed === "number" && Number.isFinite(parsed) ? parsed : null;
};

const toSourceUrl = (value: unknown) => {
  if (typeof value === "string") {
    return value.trim();
  }
  return typeof value === "number" && Number.isFinite(value) ? String(value) : null;
};

/**
 * Writes every well-formed `{value, year, source}` item through the
 * repository upsert. Malformed or failing items are logged and skipped.
 */
export const saveResearchData = async (
  repository: ResearchRepository,
  companyId: string,
  data: ResearchData,
): Promise<number> => {
  let saved = 0;

  for (const variant of TIME_SERIES_VARIANTS) {
    for (const item of data[variant]) {
      if (!isJsonObject(item)) {
        continue;
      }
      const { value, year, source } = item;
      if (value === undefined || year === undefined || source === undefined) {
        continue;
      }
      try {
        const numericValue = toFiniteNumber(value);
        const numericYear = toFiniteNumber(year);
        const sourceUrl = toSourceUrl(source);
        if (numericValue === null || numericYear === null || sourceUrl === null) {
          throw new Error(`invalid ${variant} item ${JSON.stringify(item)}`);
        }
        await repository.upsertTimeSeries({
          variant,
          companyId,
          value: variant === "users" ? Math.trunc(numericValue) : numericValue,
          year: Math.trunc(numericYear),
          sourceUrl,
        });
        saved += 1;
      } catch (error) {
        console.warn(`[research] error saving ${variant} record for ${companyId}:`, errorMessage(error));
      }
    }
  }

  return saved;
};

const resolveExistingCompetitor = async (
  repository: ResearchRepository,
  candidate: CompetitorCandidate,
) => {
  let existing: Company | null = null;

  if (candidate.url) {
    try {
      existing = await repository.findCompanyByUrl(candidate.url);
    } catch (error) {
      console.warn("[research] error checking for existing company by URL:", errorMessage(error));
    }
  }

  // Name match is the fallback dedup key; identical names merge into one company.
  if (!existing) {
    try {
      existing = await repository.findCompanyByName(candidate.name);
    } catch (error) {
      console.warn("[research] error checking for existing company by name:", errorMessage(error));
    }
  }

  return existing;
};

const saveCompetitor = async (
  repository: ResearchRepository,
  candidate: CompetitorCandidate,
): Promise<SaveOutcome> => {
  try {
    const existing = await resolveExistingCompetitor(repository, candidate);

    if (existing) {
      const update: { name?: string; website_url?: string } = {};
      if (existing.name !== candidate.name) {
        update.name = candidate.name;
      }
      if (candidate.url && existing.website_url !== candidate.url) {
        update.website_url = candidate.url;
      }

      let current = existing;
      if (Object.keys(update).length) {
        try {
          current = (await repository.updateCompany(existing.id, update)) ?? existing;
        } catch (error) {
          console.warn("[research] error updating company:", errorMessage(error));
        }
      }

      console.log(`[research] found existing company: ${current.name}`);
      return { entry: toSavedCompetitor(current, false), id: existing.id };
    }

    const created = await repository.createCompany(candidate.name, candidate.url || null);
    console.log(`[research] created new company: ${candidate.name}`);
    return { entry: toSavedCompetitor(created, true), id: created.id };
  } catch (error) {
    console.error(`[research] error saving competitor ${candidate.name}:`, errorMessage(error));
    return {
      entry: {
        name: candidate.name,
        url: candidate.url,
        error: `Failed to save: ${errorMessage(error)}`,
      },
      id: null,
    };
  }
};

const ensureMainCompany = async (
  repository: ResearchRepository,
  companyUrl: string,
  mainCompanyId: string | null,
) => {
  if (mainCompanyId) {
    return mainCompanyId;
  }
  const existing = await repository.findCompanyByUrl(companyUrl);
  if (existing) {
    return existing.id;
  }
  const name = deriveCompanyName(companyUrl);
  const created = await repository.createCompany(name, companyUrl);
  console.log(`[research] created main company: ${name}`);
  return created.id;
};

const discoverCompetitors = async (
  companyUrl: string,
  mainCompanyId: string | null,
  deps: PipelineDeps,
  emit: EventSink,
): Promise<CompetitorEntry[]> => {
  const { repository, generator, settings } = deps;

  const responseText = await generator.completeText(buildDiscoveryPrompt(companyUrl), settings);
  const candidates = extractCompetitorList(responseText);

  emit({ type: "competitors_list", total: candidates.length });

  const mainId = await ensureMainCompany(repository, companyUrl, mainCompanyId);

  const entries: CompetitorEntry[] = [];
  const competitorIds: string[] = [];

  for (const candidate of candidates) {
    const outcome = await saveCompetitor(repository, candidate);
    entries.push(outcome.entry);
    if (outcome.id) {
      competitorIds.push(outcome.id);
    }
    emit({ type: "competitor", competitor: outcome.entry });
  }

  if (competitorIds.length) {
    try {
      await repository.setCompetitorIds(mainId, competitorIds);
      console.log(`[research] updated competitor_ids for main company: ${competitorIds.length} competitors`);
    } catch (error) {
      console.error("[research] error updating competitor_ids for main company:", errorMessage(error));
    }
  }

  return entries;
};

const loadCachedCompetitors = async (
  repository: ResearchRepository,
  competitorIds: string[],
  emit: EventSink,
): Promise<CompetitorEntry[]> => {
  emit({
    type: "status",
    message: `Found existing company with ${competitorIds.length} competitors in database...`,
  });

  const companies = await repository.getCompaniesByIds(competitorIds);
  const entries = companies.map((company) => toSavedCompetitor(company, false));

  emit({ type: "competitors_list", total: entries.length });
  for (const entry of entries) {
    emit({ type: "competitor", competitor: entry });
  }
  return entries;
};

const researchCompetitor = async (
  competitor: SavedCompetitor,
  deps: PipelineDeps,
  emit: EventSink,
): Promise<ResearchResult> => {
  const { repository, generator, settings } = deps;
  const researchStatus = (status: ResearchStatus) =>
    emit({
      type: "research_status",
      competitor_id: competitor.id,
      competitor_name: competitor.name,
      status,
    });

  try {
    researchStatus("checking");

    const existing = await repository.getCompanyAnalysis(competitor.id);
    if (existing) {
      console.log(`[research] found existing analysis for ${competitor.name}, streaming from database`);
      researchStatus("found_in_db");
      return buildSuccess(competitor, existing, true);
    }

    console.log(`[research] no existing analysis for ${competitor.name}, asking the model`);
    researchStatus("analyzing");

    const responseText = await generator.completeText(buildResearchPrompt(competitor.url), settings);
    const data = extractResearchData(responseText);
    if (!data) {
      console.warn(`[research] could not parse research data for ${competitor.name}`);
      return {
        competitor_id: competitor.id,
        competitor_name: competitor.name,
        status: "failed",
        error: PARSE_FAILURE_MESSAGE,
      };
    }

    await saveResearchData(repository, competitor.id, data);
    console.log(`[research] researched and saved data for ${competitor.name}`);
    return buildSuccess(competitor, data, false);
  } catch (error) {
    console.error(`[research] error researching competitor ${competitor.name}:`, errorMessage(error));
    return {
      competitor_id: competitor.id,
      competitor_name: competitor.name,
      status: "error",
      error: errorMessage(error),
    };
  }
};

/**
 * Runs lookup → discover (or reuse cached competitors) → persist → research
 * for one company URL, reporting progress through `emit`. Per-competitor
 * failures become error entries; anything else ends the run with a single
 * `error` event and a null result.
 */
export const runCompetitorResearch = async (
  companyUrl: string,
  resolveDeps: () => PipelineDeps,
  emit: EventSink,
  options: PipelineOptions = {},
): Promise<PipelineResult | null> => {
  const aborted = () => options.signal?.aborted ?? false;

  try {
    emit({ type: "status", message: "Checking database for existing company..." });

    const deps = resolveDeps();
    const existingCompany = await deps.repository.findCompanyByUrl(companyUrl);

    let competitors: CompetitorEntry[];
    if (existingCompany && existingCompany.competitor_ids.length) {
      competitors = await loadCachedCompetitors(deps.repository, existingCompany.competitor_ids, emit);
    } else {
      emit({
        type: "status",
        message: existingCompany
          ? "Company found but no competitors. Finding competitors..."
          : "Company not found. Finding competitors...",
      });
      competitors = await discoverCompetitors(companyUrl, existingCompany?.id ?? null, deps, emit);
    }

    emit({
      type: "status",
      message: "Starting competitor research...",
      total_competitors: competitors.length,
    });

    const researchResults: ResearchResult[] = [];
    for (const competitor of competitors) {
      if (aborted()) {
        console.warn(`[research] client disconnected; stopping research for ${companyUrl}`);
        return null;
      }
      if (isFailedCompetitor(competitor) || !competitor.url) {
        continue;
      }
      const result = await researchCompetitor(competitor, deps, emit);
      researchResults.push(result);
      emit({ type: "competitor_research", result });
    }

    emit({
      type: "complete",
      company_url: companyUrl,
      total_found: competitors.length,
      total_saved: competitors.filter((competitor) => !isFailedCompetitor(competitor)).length,
      research_results: researchResults,
    });

    return { companyUrl, competitors, researchResults };
  } catch (error) {
    console.error("[research] competitor research run failed:", errorMessage(error));
    emit({ type: "error", error: errorMessage(error) });
    return null;
  }
};
