import OpenAI from "openai";
import { errorMessage } from "../errors";
import { getOpenAiApiKey, getOpenAiTimeoutMs, type GenerationSettings } from "../settings";

export interface TextGenerator {
  completeText(prompt: string, settings: GenerationSettings): Promise<string>;
}

export class OpenAiTextGenerator implements TextGenerator {
  constructor(private readonly client: OpenAI) {}

  async completeText(prompt: string, settings: GenerationSettings): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: settings.model,
        temperature: settings.temperature,
        messages: [{ role: "user", content: prompt }],
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (error) {
      console.error(`[openai] completion failed (${settings.model}):`, errorMessage(error));
      throw error;
    }
  }
}

let client: OpenAI | null = null;

export const getOpenAiClient = () => {
  if (!client) {
    client = new OpenAI({
      apiKey: getOpenAiApiKey(),
      timeout: getOpenAiTimeoutMs(),
      maxRetries: 0,
    });
  }
  return client;
};

export const createTextGenerator = (): TextGenerator => new OpenAiTextGenerator(getOpenAiClient());
