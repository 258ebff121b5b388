/**
 * Grounded Answer Prompts
 * 
 * Phrases an answer from retrieved proposal text only.
 */

/**
 * Exact reply the model gives when the records do not contain the answer.
 * The retriever turns it into a NotFound refusal.
 */
export const DATA_NOT_AVAILABLE_SENTINEL = "Data not available in proposal records.";

export const GROUNDED_ANSWER_SYSTEM_PROMPT = `You are an insurance data assistant. Answer ONLY from the proposal records provided by the user message. Do not infer, assume, extrapolate, or use any knowledge outside the provided records.

If the exact data needed to answer is not present, respond with exactly: ${DATA_NOT_AVAILABLE_SENTINEL}

Always name the Quote ID of every record you use.
Be concise. Output plain text only. No markdown, no bullet points, no bold, no numbered lists.`;

export function buildGroundedAnswerUserPrompt(question: string, context: string): string {
  return `=== PROPOSAL RECORDS ===
${context}
=== END OF RECORDS ===

Question: ${question}

Answer:`;
}
