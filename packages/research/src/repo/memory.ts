import { randomUUID } from "crypto";
import { ConflictError, SchemaDriftError, StoreError } from "../lib/errors";
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
  sortRecords,
  upsertOnConflict,
  writeCompetitorIdsSoftly,
} from "./shared";
import type { ResearchRepository, TimeSeriesInput } from "./types";

export type MemoryRepositoryOptions = {
  /** Simulates a store whose companies table predates the competitor_ids column. */
  competitorIdsColumn?: boolean;
  recordLimit?: number;
  now?: () => Date;
};

export class MemoryRepository implements ResearchRepository {
  companies: Company[] = [];
  records: FinancialRecord[] = [];

  private readonly competitorIdsColumn: boolean;
  private readonly recordLimit: number;
  private readonly now: () => Date;

  constructor(options: MemoryRepositoryOptions = {}) {
    this.competitorIdsColumn = options.competitorIdsColumn ?? true;
    this.recordLimit = options.recordLimit ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  private timestamp() {
    return this.now().toISOString();
  }

  async listCompanies(limit = 100): Promise<Company[]> {
    return [...this.companies]
      .reverse()
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, limit)
      .map((company) => ({ ...company }));
  }

  async getCompany(id: string): Promise<Company | null> {
    const company = this.companies.find((item) => item.id === id);
    return company ? { ...company } : null;
  }

  async findCompanyByUrl(url: string): Promise<Company | null> {
    const company = this.companies.find((item) => item.website_url === url);
    return company ? { ...company } : null;
  }

  async findCompanyByName(name: string): Promise<Company | null> {
    const company = this.companies.find((item) => item.name === name);
    return company ? { ...company } : null;
  }

  async getCompaniesByIds(ids: string[]): Promise<Company[]> {
    const byId = new Map(this.companies.map((company) => [company.id, company]));
    return ids.flatMap((id) => {
      const company = byId.get(id);
      return company ? [{ ...company }] : [];
    });
  }

  async createCompany(name: string, websiteUrl?: string | null): Promise<Company> {
    const now = this.timestamp();
    const record: Company = {
      id: randomUUID(),
      name,
      website_url: websiteUrl || null,
      competitor_ids: [],
      created_at: now,
      updated_at: now,
    };
    this.companies.push(record);
    return { ...record };
  }

  async updateCompany(id: string, fields: CompanyUpdate): Promise<Company | null> {
    const existing = this.companies.find((item) => item.id === id);
    if (!existing) {
      return null;
    }
    if (fields.name !== undefined) {
      existing.name = fields.name;
    }
    if (fields.website_url !== undefined) {
      existing.website_url = fields.website_url;
    }
    existing.updated_at = this.timestamp();
    return { ...existing };
  }

  async deleteCompany(id: string): Promise<boolean> {
    const before = this.companies.length;
    this.companies = this.companies.filter((item) => item.id !== id);
    if (this.companies.length === before) {
      return false;
    }
    this.records = this.records.filter((record) => record.company_id !== id);
    return true;
  }

  async setCompetitorIds(companyId: string, ids: string[]): Promise<Company | null> {
    return writeCompetitorIdsSoftly(companyId, async () => {
      if (!this.competitorIdsColumn) {
        throw new SchemaDriftError(
          COMPETITOR_IDS_COLUMN,
          `column companies.${COMPETITOR_IDS_COLUMN} does not exist`,
        );
      }
      const existing = this.companies.find((item) => item.id === companyId);
      if (!existing) {
        return null;
      }
      existing.competitor_ids = [...ids];
      existing.updated_at = this.timestamp();
      return { ...existing };
    });
  }

  async listFinancialRecords(
    variant: TimeSeriesVariant,
    companyId?: string,
    limit = this.recordLimit,
  ): Promise<FinancialRecord[]> {
    const matching = this.records.filter(
      (record) =>
        record.variant === variant && (companyId === undefined || record.company_id === companyId),
    );
    return sortRecords(matching)
      .slice(0, limit)
      .map((record) => ({ ...record }));
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
      async (row) => this.insertRecord(row),
      async (row) => this.updateRecord(row),
    );
  }

  private findRecord(input: TimeSeriesInput) {
    return this.records.find(
      (record) =>
        record.variant === input.variant &&
        record.company_id === input.companyId &&
        record.year === input.year,
    );
  }

  private insertRecord(input: TimeSeriesInput): FinancialRecord {
    const { table } = TIME_SERIES_TABLES[input.variant];
    if (!this.companies.some((company) => company.id === input.companyId)) {
      throw new StoreError(`${table}: company ${input.companyId} does not exist`, "23503");
    }
    if (this.findRecord(input)) {
      throw new ConflictError(
        `duplicate key value violates unique constraint "${table}_company_id_year_key"`,
      );
    }

    const record: FinancialRecord = {
      id: randomUUID(),
      variant: input.variant,
      company_id: input.companyId,
      value: input.value,
      year: input.year,
      source_url: input.sourceUrl,
      created_at: this.timestamp(),
    };
    this.records.push(record);
    return { ...record };
  }

  private updateRecord(input: TimeSeriesInput): FinancialRecord | null {
    const existing = this.findRecord(input);
    if (!existing) {
      return null;
    }
    existing.value = input.value;
    existing.source_url = input.sourceUrl;
    return { ...existing };
  }
}
