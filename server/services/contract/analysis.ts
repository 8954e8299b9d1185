import type { FastifyBaseLogger } from "fastify";

import type { ContractDocument, DocumentFormat } from "./document";
import { defaultExtractor, type ContractTextExtractor } from "./extractor";
import { scoreRisk, type RiskFinding, type RiskLevel } from "./riskScorer";
import type { ContractSummarizer } from "./summarizer";

export const CONTRACT_TYPE_LABEL = "Commercial / Service Agreement";
export const REPORT_FILENAME = "contract_risk_report.txt";

export interface ContractAnalysis {
  filename: string;
  format: DocumentFormat;
  contractType: string;
  riskLevel: RiskLevel;
  risks: RiskFinding[];
  aiAnalysis: string;
  metadata: {
    fileSize: number;
    characterCount: number;
    wordCount: number;
  };
}

export interface AnalyzeContractInput {
  document: ContractDocument;
  filename: string;
}

export interface AnalyzeContractDeps {
  summarizer: ContractSummarizer;
  extractor?: ContractTextExtractor;
  logger?: FastifyBaseLogger;
}

export async function analyzeContract(
  input: AnalyzeContractInput,
  deps: AnalyzeContractDeps,
): Promise<ContractAnalysis> {
  const { document, filename } = input;
  const extractor = deps.extractor ?? defaultExtractor;

  const text = await extractor.extract(document);
  const assessment = scoreRisk(text);

  deps.logger?.info(
    {
      filename,
      format: document.format,
      riskLevel: assessment.level,
      findings: assessment.findings.length,
    },
    "[CONTRACT] Rule-based risk assessment complete",
  );

  const aiAnalysis = await deps.summarizer.summarize(text);

  return {
    filename,
    format: document.format,
    contractType: CONTRACT_TYPE_LABEL,
    riskLevel: assessment.level,
    risks: assessment.findings,
    aiAnalysis,
    metadata: {
      fileSize: document.content.length,
      characterCount: text.length,
      wordCount: text.split(/\s+/).filter(Boolean).length,
    },
  };
}

export function buildAnalysisReport(analysis: ContractAnalysis): string {
  const clauseLines = analysis.risks.length
    ? analysis.risks.map((risk) => `- ${risk}`)
    : ["No major risky clauses detected."];

  return [
    "Contract Risk Report",
    `File: ${analysis.filename}`,
    `Contract Type: ${analysis.contractType}`,
    `Overall Risk Level: ${analysis.riskLevel}`,
    "",
    "Detected Risky Clauses:",
    ...clauseLines,
    "",
    "AI Explanation:",
    analysis.aiAnalysis,
    "",
  ].join("\n");
}
