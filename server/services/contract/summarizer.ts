import type { FastifyBaseLogger } from "fastify";

import { buildContractReviewPrompt } from "../../prompts/contractReviewPrompt";

export const AI_UNAVAILABLE_MESSAGE =
  "AI analysis unavailable. Showing rule-based detection only.";
export const AI_TEMPORARILY_UNAVAILABLE_MESSAGE =
  "AI analysis temporarily unavailable.";

export interface ContractSummarizer {
  /** Resolves with the narrative report or a fallback message; never rejects. */
  summarize(contractText: string): Promise<string>;
}

/**
 * The slice of a hosted model service the summarizer needs.
 */
export interface SummaryModelClient {
  listModelIds(): Promise<string[]>;
  generateText(model: string, prompt: string): Promise<string>;
}

export const PREFERRED_SUMMARY_MODELS = [
  "gpt-4o-mini",
  "gpt-4o",
  "gpt-4.1-mini",
  "gpt-4.1",
] as const;

const TEXT_GENERATION_MODEL_PATTERN = /^(gpt-|o\d)/;
const NON_TEXT_MODEL_PATTERN =
  /(audio|realtime|tts|transcribe|image|search|embedding|instruct)/;

export const supportsTextGeneration = (modelId: string): boolean =>
  TEXT_GENERATION_MODEL_PATTERN.test(modelId) &&
  !NON_TEXT_MODEL_PATTERN.test(modelId);

export const selectSummaryModel = (available: string[]): string | null => {
  const preferred = PREFERRED_SUMMARY_MODELS.find((id) =>
    available.includes(id),
  );
  if (preferred) return preferred;
  return available.find(supportsTextGeneration) ?? null;
};

export interface ContractSummarizerOptions {
  /** `null` when the service is not configured. */
  client: SummaryModelClient | null;
  /** Skips model discovery when set. */
  model?: string | null;
  logger?: FastifyBaseLogger;
}

export function createContractSummarizer(
  options: ContractSummarizerOptions,
): ContractSummarizer {
  const { client, logger } = options;
  let modelPromise: Promise<string | null> | null = null;

  const resolveModel = (
    summaryClient: SummaryModelClient,
  ): Promise<string | null> => {
    if (!modelPromise) {
      modelPromise = options.model
        ? Promise.resolve(options.model)
        : summaryClient
            .listModelIds()
            .then((ids) => {
              const selected = selectSummaryModel(ids);
              if (!selected) {
                logger?.warn(
                  { available: ids.length },
                  "[SUMMARY] No text generation model offered by the service",
                );
              }
              return selected;
            })
            .catch((err: unknown) => {
              logger?.warn({ err }, "[SUMMARY] Failed to list models");
              return null;
            });
    }
    return modelPromise;
  };

  return {
    async summarize(contractText) {
      if (!client) return AI_UNAVAILABLE_MESSAGE;

      const model = await resolveModel(client);
      if (!model) return AI_UNAVAILABLE_MESSAGE;

      try {
        return await client.generateText(
          model,
          buildContractReviewPrompt(contractText),
        );
      } catch (err) {
        logger?.warn({ err, model }, "[SUMMARY] Contract analysis request failed");
        return AI_TEMPORARILY_UNAVAILABLE_MESSAGE;
      }
    },
  };
}

/** The parts of the `openai` client the summary adapter calls. */
export interface OpenAIResponsesApi {
  models: { list(): AsyncIterable<{ id: string }> };
  responses: {
    create(body: {
      model: string;
      input: string;
    }): PromiseLike<{ output_text: string }>;
  };
}

export function createOpenAISummaryClient(
  client: OpenAIResponsesApi,
): SummaryModelClient {
  return {
    async listModelIds() {
      const ids: string[] = [];
      for await (const model of client.models.list()) {
        ids.push(model.id);
      }
      return ids;
    },
    async generateText(model, prompt) {
      const response = await client.responses.create({ model, input: prompt });
      return response.output_text;
    },
  };
}
