export const contractReviewInstructions = `You are a legal contract risk analysis assistant.

Analyze the contract below and provide:

1. Contract type
2. Overall risk level (Low / Medium / High)
3. Risky clauses
4. Simple business explanation
5. Safer recommendations`;

export const buildContractReviewPrompt = (contractText: string): string =>
  `${contractReviewInstructions}\n\nContract:\n${contractText}\n`;
