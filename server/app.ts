import Fastify from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";

import type { AppEnv } from "./config/env";
import contractsRoutes from "./routes/contracts";
import { getOpenAIClient } from "./services/openaiClient";
import type { ContractTextExtractor } from "./services/contract/extractor";
import {
  createContractSummarizer,
  createOpenAISummaryClient,
  type ContractSummarizer,
} from "./services/contract/summarizer";

export interface BuildAppOptions {
  env: AppEnv;
  summarizer?: ContractSummarizer;
  extractor?: ContractTextExtractor;
}

export async function buildApp(options: BuildAppOptions) {
  const { env } = options;
  const app = Fastify({ logger: { level: env.LOG_LEVEL } });

  const summarizer =
    options.summarizer ??
    createContractSummarizer({
      client: env.OPENAI_API_KEY
        ? createOpenAISummaryClient(getOpenAIClient(env.OPENAI_API_KEY))
        : null,
      model: env.OPENAI_MODEL,
      logger: app.log,
    });

  if (!env.OPENAI_API_KEY && !options.summarizer) {
    app.log.warn(
      "[STARTUP] OPENAI_API_KEY not set; only rule-based detection is available",
    );
  }

  await app.register(cors, {
    origin: env.CLIENT_ORIGIN ?? false,
    credentials: true,
  });
  await app.register(multipart, {
    limits: {
      fileSize: env.UPLOAD_SIZE_LIMIT_BYTES,
      files: 1,
    },
  });

  app.get("/api/health", async () => ({ status: "ok" }));

  await app.register(contractsRoutes, {
    summarizer,
    extractor: options.extractor,
    strictFormats: env.STRICT_UPLOAD_FORMATS,
  });

  return app;
}
