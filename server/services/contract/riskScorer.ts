export type RiskLevel = "Low" | "Medium" | "High";

export type RiskFinding = string;

export interface RiskAssessment {
  findings: RiskFinding[];
  level: RiskLevel;
}

export interface RiskRule {
  readonly label: RiskFinding;
  /** Lower-case substrings; any one of them triggers the rule. */
  readonly keywords: readonly string[];
}

const rule = (label: RiskFinding, keywords: string[]): RiskRule =>
  Object.freeze({ label, keywords: Object.freeze(keywords) });

export const RISK_RULES: readonly RiskRule[] = Object.freeze([
  rule("Unilateral termination clause", ["terminate"]),
  rule("Unlimited indemnity clause", ["indemnify", "indemnity"]),
  rule("Foreign jurisdiction clause", ["jurisdiction"]),
]);

export const severityForFindingCount = (count: number): RiskLevel => {
  if (count >= 2) return "High";
  if (count === 1) return "Medium";
  return "Low";
};

/**
 * Flags the fixed checklist of risky clause keywords in contract text.
 * Each rule fires at most once and findings keep checklist order.
 */
export function scoreRisk(text: string): RiskAssessment {
  const normalized = text.toLowerCase();
  const findings: RiskFinding[] = [];

  for (const rule of RISK_RULES) {
    if (rule.keywords.some((keyword) => normalized.includes(keyword))) {
      findings.push(rule.label);
    }
  }

  return {
    findings,
    level: severityForFindingCount(findings.length),
  };
}
