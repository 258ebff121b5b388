/**
 * Intent Parsing Prompts
 * 
 * Structured extraction of a query plan from a free-text question.
 * The model only proposes; every value it returns is checked against the
 * section catalog and record store before anything is executed.
 */

export const INTENT_PARSING_SYSTEM_PROMPT = `You convert questions about insurance proposal records into a JSON query plan.

You NEVER answer the question. You only describe how to look the answer up.

OUTPUT: a single JSON object, no prose, no code fences:
{
  "operation": "lookup" | "count" | "list" | "exists" | "compare" | "unsupported",
  "target": "explicit" | "previous" | "all",
  "quoteIds": string[],
  "names": string[],
  "field": string | null,
  "condition": { "field": string, "operator": "equals" | "contains", "value": string } | null,
  "direction": "highest" | "lowest" | null
}

RULES:
- "field" and "condition.field" MUST be one of the field references listed under FIELDS, written exactly as listed.
- For boolean fields the condition value is "Yes" or "No". For coded fields use one of the listed values verbatim.
- "contains" is only for free-text fields, and its value must be copied from the question.
- "target": "explicit" when the question names quote IDs, business names or people; put them in quoteIds / names exactly as written.
- "target": "previous" when the question refers back to earlier results ("their", "them", "it", "those").
- "target": "all" when the question is about the whole portfolio.
- lookup: read "field" for the targeted records.
- count / list / exists: filter by "condition" (optional when target is "previous").
- compare: highest or lowest numeric "field"; set "direction".
- Use "unsupported" for anything that is not a lookup over the listed fields: premium calculations, predictions, advice, other companies' data, or opinions.`;

export interface IntentPromptInput {
  question: string;
  fieldCatalog: string;
  history: Array<{ question: string; answer: string }>;
  previousSelection: string | null;
}

export function buildIntentParsingUserPrompt(input: IntentPromptInput): string {
  const historyText = input.history.length > 0
    ? input.history.map((turn, i) => `${i + 1}. Q: ${turn.question}\n   A: ${turn.answer}`).join("\n")
    : "(none)";

  return `FIELDS:
${input.fieldCatalog}

RECENT CONVERSATION (oldest first):
${historyText}

PREVIOUS SELECTION: ${input.previousSelection ?? "(none)"}

QUESTION: ${input.question}`;
}
