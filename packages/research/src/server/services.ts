import { createTextGenerator } from "../lib/llm/openai";
import type { PipelineDeps } from "../lib/research";
import { getGenerationSettings, getRecordLimit, getStoreKind } from "../lib/settings";
import { MemoryRepository } from "../repo/memory";
import { createSupabaseRepository } from "../repo/supabase";
import type { ResearchRepository } from "../repo/types";

/**
 * Resolved per request. Missing credentials surface as a request error
 * or as the stream's `error` event.
 */
export type AppServices = {
  repository: () => ResearchRepository;
  pipeline: () => PipelineDeps;
};

let repository: ResearchRepository | null = null;

const getRepository = () => {
  if (!repository) {
    repository =
      getStoreKind() === "memory"
        ? new MemoryRepository({ recordLimit: getRecordLimit() })
        : createSupabaseRepository();
    console.log(`[server] using ${getStoreKind()} store`);
  }
  return repository;
};

export const defaultServices: AppServices = {
  repository: getRepository,
  pipeline: () => ({
    repository: getRepository(),
    generator: createTextGenerator(),
    settings: getGenerationSettings(),
  }),
};
