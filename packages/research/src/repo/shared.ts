import { ConflictError, SchemaDriftError, StoreError } from "../lib/errors";
import {
  TIME_SERIES_VARIANTS,
  type CompanyAnalysis,
  type FinancialRecord,
  type TimeSeriesVariant,
} from "../lib/types";
import type { TimeSeriesInput } from "./types";

export const TIME_SERIES_TABLES: Record<
  TimeSeriesVariant,
  { table: string; valueColumn: "value_usd" | "value" }
> = {
  networth: { table: "company_networth", valueColumn: "value_usd" },
  users: { table: "company_users", valueColumn: "value" },
  funding: { table: "company_funding", valueColumn: "value_usd" },
};

export const COMPETITOR_IDS_COLUMN = "competitor_ids";

/**
 * Insert first; when the (company_id, year) row already exists the store
 * raises ConflictError and the existing row takes the new value and source.
 */
export const upsertOnConflict = async (
  input: TimeSeriesInput,
  insert: (input: TimeSeriesInput) => Promise<FinancialRecord>,
  update: (input: TimeSeriesInput) => Promise<FinancialRecord | null>,
): Promise<FinancialRecord> => {
  try {
    return await insert(input);
  } catch (error) {
    if (!(error instanceof ConflictError)) {
      throw error;
    }
  }

  const updated = await update(input);
  if (!updated) {
    throw new StoreError(
      `${TIME_SERIES_TABLES[input.variant].table} conflict for ${input.companyId}/${input.year} but no row to update`,
    );
  }
  return updated;
};

export const writeCompetitorIdsSoftly = async <T>(
  companyId: string,
  write: () => Promise<T | null>,
): Promise<T | null> => {
  try {
    return await write();
  } catch (error) {
    if (error instanceof SchemaDriftError) {
      console.warn(
        `[repo] ${error.column} column unavailable; competitor ids not stored for ${companyId}:`,
        error.message,
      );
      return null;
    }
    throw error;
  }
};

export const sortRecords = (records: FinancialRecord[]) =>
  [...records].sort((a, b) => {
    if (a.year !== b.year) {
      return b.year - a.year;
    }
    return b.created_at.localeCompare(a.created_at);
  });

export const buildCompanyAnalysis = (
  recordsByVariant: Record<TimeSeriesVariant, FinancialRecord[]>,
): CompanyAnalysis | null => {
  const hasAny = TIME_SERIES_VARIANTS.some((variant) => recordsByVariant[variant].length > 0);
  if (!hasAny) {
    return null;
  }

  const toPoints = (variant: TimeSeriesVariant) =>
    recordsByVariant[variant].map((record) => ({
      value: record.value,
      year: record.year,
      source: record.source_url,
    }));

  return {
    networth: toPoints("networth"),
    users: toPoints("users"),
    funding: toPoints("funding"),
  };
};
