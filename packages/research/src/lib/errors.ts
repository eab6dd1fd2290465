export type ResearchErrorCode =
  | "CONFLICT"
  | "SCHEMA_DRIFT"
  | "STORE_ERROR"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND";

export class ResearchError extends Error {
  constructor(
    public readonly code: ResearchErrorCode,
    message: string,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = "ResearchError";
  }
}

/** Raised by a store when an insert hits the (company_id, year) uniqueness constraint. */
export class ConflictError extends ResearchError {
  constructor(message: string) {
    super("CONFLICT", message, 409);
    this.name = "ConflictError";
  }
}

/** The store schema lacks a column the adapter writes to. */
export class SchemaDriftError extends ResearchError {
  constructor(
    public readonly column: string,
    message: string,
  ) {
    super("SCHEMA_DRIFT", message, 500);
    this.name = "SchemaDriftError";
  }
}

export class StoreError extends ResearchError {
  constructor(
    message: string,
    public readonly storeCode?: string,
  ) {
    super("STORE_ERROR", message, 500);
    this.name = "StoreError";
  }
}

export class ConfigError extends ResearchError {
  constructor(message: string) {
    super("CONFIG_ERROR", message, 500);
    this.name = "ConfigError";
  }
}

export class ValidationError extends ResearchError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message, 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ResearchError {
  constructor(resource: string) {
    super("NOT_FOUND", `${resource} not found`, 404);
    this.name = "NotFoundError";
  }
}

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
