import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { ConflictError, SchemaDriftError, StoreError } from "../lib/errors";
import { getRecordLimit, getSupabaseCredentials } from "../lib/settings";
import type {
  Company,
  CompanyAnalysis,
  CompanyUpdate,
  FinancialRecord,
  TimeSeriesVariant,
} from "../lib/types";
import {
  COMPETITOR_IDS_COLUMN,
  TIME_SERIES_TABLES,
  buildCompanyAnalysis,
  upsertOnConflict,
  writeCompetitorIdsSoftly,
} from "./shared";
import type { ResearchRepository, TimeSeriesInput } from "./types";

const UNIQUE_VIOLATION = "23505";
const UNDEFINED_COLUMN = "42703";
const POSTGREST_MISSING_COLUMN = "PGRST204";

type StoreErrorLike = {
  code?: string | null;
  message: string;
};

const companyRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  website_url: z.string().nullish(),
  competitor_ids: z.array(z.string()).nullish(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
});

const recordRowSchema = z.object({
  id: z.string(),
  company_id: z.string(),
  value_usd: z.coerce.number().optional(),
  value: z.coerce.number().optional(),
  year: z.coerce.number().int(),
  source_url: z.string(),
  created_at: z.string(),
});

const extractColumn = (message: string) => {
  const match = /'(\w+)' column/.exec(message) ?? /column "?(?:\w+\.)?(\w+)"?/.exec(message);
  return match?.[1] ?? "unknown";
};

/**
 * Maps a PostgREST error onto the adapter's error kinds. The structured
 * Postgres code wins; the message is only consulted when no code came back.
 */
export const classifyStoreError = (error: StoreErrorLike, context: string): Error => {
  const code = error.code || undefined;
  const message = error.message;

  if (code === UNIQUE_VIOLATION || (!code && message.toLowerCase().includes("duplicate key"))) {
    return new ConflictError(`${context}: ${message}`);
  }

  const missingColumnMessage = /column/i.test(message) && /does not exist|could not find/i.test(message);
  if (
    code === UNDEFINED_COLUMN ||
    code === POSTGREST_MISSING_COLUMN ||
    (!code && missingColumnMessage)
  ) {
    return new SchemaDriftError(extractColumn(message), `${context}: ${message}`);
  }

  return new StoreError(`${context}: ${message}`, code);
};

export const parseCompanyRow = (row: unknown): Company => {
  const parsed = companyRowSchema.parse(row);
  return {
    id: parsed.id,
    name: parsed.name,
    website_url: parsed.website_url ?? null,
    competitor_ids: parsed.competitor_ids ?? [],
    created_at: parsed.created_at,
    updated_at: parsed.updated_at ?? parsed.created_at,
  };
};

export const parseRecordRow = (variant: TimeSeriesVariant, row: unknown): FinancialRecord => {
  const parsed = recordRowSchema.parse(row);
  const { valueColumn, table } = TIME_SERIES_TABLES[variant];
  const value = valueColumn === "value_usd" ? parsed.value_usd : parsed.value;
  if (value === undefined || !Number.isFinite(value)) {
    throw new StoreError(`${table} row ${parsed.id} has no ${valueColumn}`);
  }
  return {
    id: parsed.id,
    variant,
    company_id: parsed.company_id,
    value,
    year: parsed.year,
    source_url: parsed.source_url,
    created_at: parsed.created_at,
  };
};

const parseCompanyRows = (rows: unknown[] | null) => (rows ?? []).map(parseCompanyRow);

const withUpdatedAt = <T extends Record<string, unknown>>(data: T) => ({
  ...data,
  updated_at: new Date().toISOString(),
});

export class SupabaseRepository implements ResearchRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly recordLimit = 100,
  ) {}

  async listCompanies(limit = 100): Promise<Company[]> {
    const { data, error } = await this.client
      .from("companies")
      .select("*")
      .order("created_at", { ascending: false })
      .limit(limit);
    if (error) {
      throw classifyStoreError(error, "companies list");
    }
    return parseCompanyRows(data);
  }

  async getCompany(id: string): Promise<Company | null> {
    return this.findOneCompany("id", id);
  }

  async findCompanyByUrl(url: string): Promise<Company | null> {
    return this.findOneCompany("website_url", url);
  }

  async findCompanyByName(name: string): Promise<Company | null> {
    return this.findOneCompany("name", name);
  }

  async getCompaniesByIds(ids: string[]): Promise<Company[]> {
    if (!ids.length) {
      return [];
    }
    const { data, error } = await this.client.from("companies").select("*").in("id", ids);
    if (error) {
      throw classifyStoreError(error, "companies select by ids");
    }
    const byId = new Map(parseCompanyRows(data).map((company) => [company.id, company]));
    return ids.flatMap((id) => {
      const company = byId.get(id);
      return company ? [company] : [];
    });
  }

  async createCompany(name: string, websiteUrl?: string | null): Promise<Company> {
    const row: Record<string, string> = { name };
    if (websiteUrl) {
      row.website_url = websiteUrl;
    }
    const { data, error } = await this.client.from("companies").insert(row).select("*").single();
    if (error) {
      throw classifyStoreError(error, "companies insert");
    }
    return parseCompanyRow(data);
  }

  async updateCompany(id: string, fields: CompanyUpdate): Promise<Company | null> {
    const { data, error } = await this.client
      .from("companies")
      .update(withUpdatedAt(fields))
      .eq("id", id)
      .select("*");
    if (error) {
      throw classifyStoreError(error, `companies update ${id}`);
    }
    return parseCompanyRows(data)[0] ?? null;
  }

  async deleteCompany(id: string): Promise<boolean> {
    const { data, error } = await this.client.from("companies").delete().eq("id", id).select("id");
    if (error) {
      throw classifyStoreError(error, `companies delete ${id}`);
    }
    return (data ?? []).length > 0;
  }

  async setCompetitorIds(companyId: string, ids: string[]): Promise<Company | null> {
    return writeCompetitorIdsSoftly(companyId, async () => {
      const { data, error } = await this.client
        .from("companies")
        .update(withUpdatedAt({ [COMPETITOR_IDS_COLUMN]: ids }))
        .eq("id", companyId)
        .select("*");
      if (error) {
        throw classifyStoreError(error, `companies ${COMPETITOR_IDS_COLUMN} update ${companyId}`);
      }
      return parseCompanyRows(data)[0] ?? null;
    });
  }

  async listFinancialRecords(
    variant: TimeSeriesVariant,
    companyId?: string,
    limit = this.recordLimit,
  ): Promise<FinancialRecord[]> {
    const { table } = TIME_SERIES_TABLES[variant];
    let query = this.client.from(table).select("*");
    if (companyId) {
      query = query.eq("company_id", companyId);
    }
    const { data, error } = await query
      .order("year", { ascending: false })
      .order("created_at", { ascending: false })
      .limit(limit);
    if (error) {
      throw classifyStoreError(error, `${table} select`);
    }
    return (data ?? []).map((row) => parseRecordRow(variant, row));
  }

  async getCompanyAnalysis(companyId: string): Promise<CompanyAnalysis | null> {
    return buildCompanyAnalysis({
      networth: await this.listFinancialRecords("networth", companyId),
      users: await this.listFinancialRecords("users", companyId),
      funding: await this.listFinancialRecords("funding", companyId),
    });
  }

  async upsertTimeSeries(input: TimeSeriesInput): Promise<FinancialRecord> {
    return upsertOnConflict(
      input,
      (row) => this.insertRecord(row),
      (row) => this.updateRecord(row),
    );
  }

  private async findOneCompany(column: "id" | "name" | "website_url", value: string) {
    const { data, error } = await this.client
      .from("companies")
      .select("*")
      .eq(column, value)
      .limit(1);
    if (error) {
      throw classifyStoreError(error, `companies select by ${column}`);
    }
    return parseCompanyRows(data)[0] ?? null;
  }

  private async insertRecord(input: TimeSeriesInput): Promise<FinancialRecord> {
    const { table, valueColumn } = TIME_SERIES_TABLES[input.variant];
    const { data, error } = await this.client
      .from(table)
      .insert({
        company_id: input.companyId,
        [valueColumn]: input.value,
        year: input.year,
        source_url: input.sourceUrl,
      })
      .select("*")
      .single();
    if (error) {
      throw classifyStoreError(error, `${table} insert`);
    }
    return parseRecordRow(input.variant, data);
  }

  private async updateRecord(input: TimeSeriesInput): Promise<FinancialRecord | null> {
    const { table, valueColumn } = TIME_SERIES_TABLES[input.variant];
    const { data, error } = await this.client
      .from(table)
      .update({ [valueColumn]: input.value, source_url: input.sourceUrl })
      .eq("company_id", input.companyId)
      .eq("year", input.year)
      .select("*");
    if (error) {
      throw classifyStoreError(error, `${table} update`);
    }
    const [row] = data ?? [];
    return row === undefined ? null : parseRecordRow(input.variant, row);
  }
}

export const createSupabaseRepository = () => {
  const { url, key } = getSupabaseCredentials();
  return new SupabaseRepository(createClient(url, key), getRecordLimit());
};
