import { describe, test } from "node:test";
import assert from "node:assert/strict";

import {
  analyzeContract,
  buildAnalysisReport,
  CONTRACT_TYPE_LABEL,
  type ContractAnalysis,
} from "../analysis";
import { DecodeError } from "../errors";
import { createExtractor } from "../extractor";
import type { ContractSummarizer } from "../summarizer";

const createRecordingSummarizer = (reply = "Narrative assessment") => {
  const received: string[] = [];
  const summarizer: ContractSummarizer = {
    summarize: async (text) => {
      received.push(text);
      return reply;
    },
  };
  return { summarizer, received };
};

describe("analyzeContract", () => {
  test("extracts, scores and summarizes a plain text upload", async () => {
    const { summarizer, received } = createRecordingSummarizer();
    const text = "Either party may terminate with 30 days notice.";

    const analysis = await analyzeContract(
      {
        document: { content: Buffer.from(text, "utf8"), format: "plain-text" },
        filename: "notice.txt",
      },
      { summarizer },
    );

    assert.deepEqual(analysis, {
      filename: "notice.txt",
      format: "plain-text",
      contractType: CONTRACT_TYPE_LABEL,
      riskLevel: "Medium",
      risks: ["Unilateral termination clause"],
      aiAnalysis: "Narrative assessment",
      metadata: {
        fileSize: 47,
        characterCount: 47,
        wordCount: 8,
      },
    });
    assert.deepEqual(received, [text]);
  });

  test("passes extracted pdf text to the summarizer", async () => {
    const { summarizer, received } = createRecordingSummarizer();
    const extractor = createExtractor({
      readPdfPages: async () => ["Disputes: jurisdiction of State X.", "Supplier will indemnify."],
    });

    const analysis = await analyzeContract(
      {
        document: { content: Buffer.from("%PDF"), format: "pdf" },
        filename: "msa.pdf",
      },
      { summarizer, extractor },
    );

    assert.deepEqual(received, [
      "Disputes: jurisdiction of State X.\nSupplier will indemnify.\n",
    ]);
    assert.deepEqual(analysis.risks, [
      "Unlimited indemnity clause",
      "Foreign jurisdiction clause",
    ]);
    assert.equal(analysis.riskLevel, "High");
  });

  test("does not call the summarizer when extraction fails", async () => {
    const { summarizer, received } = createRecordingSummarizer();

    await assert.rejects(
      () =>
        analyzeContract(
          {
            document: { content: Buffer.from([0xc3, 0x28]), format: "plain-text" },
            filename: "broken.txt",
          },
          { summarizer },
        ),
      DecodeError,
    );
    assert.equal(received.length, 0);
  });
});

describe("buildAnalysisReport", () => {
  const baseAnalysis: ContractAnalysis = {
    filename: "msa.pdf",
    format: "pdf",
    contractType: CONTRACT_TYPE_LABEL,
    riskLevel: "High",
    risks: ["Unilateral termination clause", "Foreign jurisdiction clause"],
    aiAnalysis: "1. Contract type: Master services agreement",
    metadata: { fileSize: 10, characterCount: 10, wordCount: 2 },
  };

  test("lists detected clauses and the AI explanation", () => {
    assert.equal(
      buildAnalysisReport(baseAnalysis),
      [
        "Contract Risk Report",
        "File: msa.pdf",
        "Contract Type: Commercial / Service Agreement",
        "Overall Risk Level: High",
        "",
        "Detected Risky Clauses:",
        "- Unilateral termination clause",
        "- Foreign jurisdiction clause",
        "",
        "AI Explanation:",
        "1. Contract type: Master services agreement",
        "",
      ].join("\n"),
    );
  });

  test("notes when no risky clauses were found", () => {
    const report = buildAnalysisReport({
      ...baseAnalysis,
      riskLevel: "Low",
      risks: [],
    });

    assert.ok(
      report.includes(
        "Overall Risk Level: Low\n\nDetected Risky Clauses:\nNo major risky clauses detected.\n\nAI Explanation:",
      ),
    );
  });
});
