import type {
  FastifyPluginAsync,
  FastifyReply,
  FastifyRequest,
} from "fastify";

import {
  analyzeContract,
  buildAnalysisReport,
  REPORT_FILENAME,
  type ContractAnalysis,
} from "../services/contract/analysis";
import { resolveDocumentFormat } from "../services/contract/document";
import {
  DecodeError,
  UnsupportedFormatError,
} from "../services/contract/errors";
import type { ContractTextExtractor } from "../services/contract/extractor";
import type { ContractSummarizer } from "../services/contract/summarizer";

export interface ContractRoutesOptions {
  summarizer: ContractSummarizer;
  extractor?: ContractTextExtractor;
  strictFormats?: boolean;
}

const FILE_TOO_LARGE_CODE = "FST_REQ_FILE_TOO_LARGE";

const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === code;

const contractsRoutes: FastifyPluginAsync<ContractRoutesOptions> = async (
  fastify,
  options,
) => {
  const { summarizer, extractor, strictFormats = false } = options;

  // Sends the error reply itself and resolves with null when the upload
  // cannot be analyzed.
  const analyzeUpload = async (
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<ContractAnalysis | null> => {
    if (!request.isMultipart()) {
      reply
        .status(415)
        .send({ error: "Expected a multipart/form-data upload" });
      return null;
    }

    try {
      const filePart = await request.file();
      if (!filePart) {
        reply.status(400).send({ error: "No file provided" });
        return null;
      }

      const content = await filePart.toBuffer();
      const filename = filePart.filename || "contract.txt";
      const format = resolveDocumentFormat(filename, { strict: strictFormats });

      return await analyzeContract(
        { document: { content, format }, filename },
        { summarizer, extractor, logger: request.log },
      );
    } catch (err) {
      if (hasErrorCode(err, FILE_TOO_LARGE_CODE)) {
        reply.status(413).send({ error: "Uploaded file is too large" });
        return null;
      }
      if (err instanceof UnsupportedFormatError) {
        reply.status(415).send({ error: err.message });
        return null;
      }
      if (err instanceof DecodeError) {
        reply.status(422).send({ error: err.message });
        return null;
      }
      request.log.error({ err }, "[CONTRACT] Contract analysis failed");
      reply.status(500).send({
        error:
          err instanceof Error
            ? err.message
            : "Failed to extract text from uploaded file",
      });
      return null;
    }
  };

  fastify.post("/api/contracts/analyze", async (request, reply) => {
    const analysis = await analyzeUpload(request, reply);
    if (!analysis) return reply;
    return reply.send({ success: true, analysis });
  });

  fastify.post("/api/contracts/report", async (request, reply) => {
    const analysis = await analyzeUpload(request, reply);
    if (!analysis) return reply;
    return reply
      .header("Content-Type", "text/plain; charset=utf-8")
      .header(
        "Content-Disposition",
        `attachment; filename="${REPORT_FILENAME}"`,
      )
      .send(buildAnalysisReport(analysis));
  });
};

export default contractsRoutes;
