import type { TextGenerator } from "../src/lib/llm/openai";
import type { PipelineDeps } from "../src/lib/research";
import type { ProgressEvent } from "../src/lib/types";
import type { ResearchRepository } from "../src/repo/types";

export const isDiscoveryPrompt = (prompt: string) => prompt.includes("who their competitors are");

export class ScriptedGenerator implements TextGenerator {
  prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string) {}

  async completeText(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export const scripted = (discovery: string, research: (prompt: string) => string) =>
  new ScriptedGenerator((prompt) => (isDiscoveryPrompt(prompt) ? discovery : research(prompt)));

export const createDeps = (
  repository: ResearchRepository,
  generator: TextGenerator,
): PipelineDeps => ({
  repository,
  generator,
  settings: { model: "test-model", temperature: 0 },
});

export const collectEvents = () => {
  const events: ProgressEvent[] = [];
  const emit = (event: ProgressEvent) => {
    events.push(event);
  };
  return { events, emit };
};
