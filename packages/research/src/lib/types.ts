export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Company = {
  id: string;
  name: string;
  website_url: string | null;
  competitor_ids: string[];
  created_at: string;
  updated_at: string;
};

export type CompanyUpdate = {
  name?: string;
  website_url?: string | null;
};

export const TIME_SERIES_VARIANTS = ["networth", "users", "funding"] as const;

export type TimeSeriesVariant = (typeof TIME_SERIES_VARIANTS)[number];

export type FinancialRecord = {
  id: string;
  variant: TimeSeriesVariant;
  company_id: string;
  value: number;
  year: number;
  source_url: string;
  created_at: string;
};

export type CompetitorCandidate = {
  name: string;
  url: string;
};

// Raw arrays as returned by the model; items are validated only when persisted.
export type ResearchData = Record<TimeSeriesVariant, JsonValue[]>;

export type ResearchPoint = {
  value: number;
  year: number;
  source: string;
};

export type CompanyAnalysis = Record<TimeSeriesVariant, ResearchPoint[]>;

export type SavedCompetitor = {
  id: string;
  name: string;
  url: string;
  created: boolean;
};

export type FailedCompetitor = {
  name: string;
  url: string;
  error: string;
};

export type CompetitorEntry = SavedCompetitor | FailedCompetitor;

export type ResearchStatus = "checking" | "analyzing" | "found_in_db";

export type ResearchSuccess = {
  competitor_id: string;
  competitor_name: string;
  status: "success";
  from_cache: boolean;
  networth_count: number;
  users_count: number;
  funding_count: number;
  networth: JsonValue[];
  users: JsonValue[];
  funding: JsonValue[];
};

export type ResearchFailure = {
  competitor_id: string;
  competitor_name: string;
  status: "failed" | "error";
  error: string;
};

export type ResearchResult = ResearchSuccess | ResearchFailure;

export type ProgressEvent =
  | { type: "status"; message: string; total_competitors?: number }
  | { type: "competitors_list"; total: number }
  | { type: "competitor"; competitor: CompetitorEntry }
  | {
      type: "research_status";
      competitor_id: string;
      competitor_name: string;
      status: ResearchStatus;
    }
  | { type: "competitor_research"; result: ResearchResult }
  | {
      type: "complete";
      company_url: string;
      total_found: number;
      total_saved: number;
      research_results: ResearchResult[];
    }
  | { type: "error"; error: string };

export type PipelineResult = {
  companyUrl: string;
  competitors: CompetitorEntry[];
  researchResults: ResearchResult[];
};

export const isFailedCompetitor = (entry: CompetitorEntry): entry is FailedCompetitor =>
  "error" in entry;
