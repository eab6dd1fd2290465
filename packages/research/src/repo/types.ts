import type {
  Company,
  CompanyAnalysis,
  CompanyUpdate,
  FinancialRecord,
  TimeSeriesVariant,
} from "../lib/types";

export type TimeSeriesInput = {
  variant: TimeSeriesVariant;
  companyId: string;
  value: number;
  year: number;
  sourceUrl: string;
};

export interface ResearchRepository {
  listCompanies(limit?: number): Promise<Company[]>;
  getCompany(id: string): Promise<Company | null>;
  findCompanyByUrl(url: string): Promise<Company | null>;
  findCompanyByName(name: string): Promise<Company | null>;
  getCompaniesByIds(ids: string[]): Promise<Company[]>;
  createCompany(name: string, websiteUrl?: string | null): Promise<Company>;
  updateCompany(id: string, fields: CompanyUpdate): Promise<Company | null>;
  deleteCompany(id: string): Promise<boolean>;
  /** Returns null without throwing when the store has no competitor_ids column. */
  setCompetitorIds(companyId: string, ids: string[]): Promise<Company | null>;
  listFinancialRecords(
    variant: TimeSeriesVariant,
    companyId?: string,
    limit?: number,
  ): Promise<FinancialRecord[]>;
  getCompanyAnalysis(companyId: string): Promise<CompanyAnalysis | null>;
  upsertTimeSeries(input: TimeSeriesInput): Promise<FinancialRecord>;
}
