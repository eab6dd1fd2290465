export * from "./lib/types";
export * from "./lib/errors";
export { encodeEvent, SSE_HEADERS, type EventSink } from "./lib/events";
export {
  extractCompetitorList,
  extractResearchData,
  firstMatch,
  type ExtractionStage,
  type ExtractionStrategy,
} from "./lib/extract";
export { OpenAiTextGenerator, createTextGenerator, type TextGenerator } from "./lib/llm/openai";
export {
  runCompetitorResearch,
  saveResearchData,
  type PipelineDeps,
  type PipelineOptions,
} from "./lib/research";
export { MemoryRepository, type MemoryRepositoryOptions } from "./repo/memory";
export { SupabaseRepository, classifyStoreError, createSupabaseRepository } from "./repo/supabase";
export type { ResearchRepository, TimeSeriesInput } from "./repo/types";
export { createApp } from "./server/app";
export { defaultServices, type AppServices } from "./server/services";
