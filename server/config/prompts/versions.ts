/**
 * Prompt Version Management
 * 
 * Date-based versions (YYYY-MM-DD-NNN). Bump the version with every prompt
 * edit; the query audit log records the version that produced each answer.
 */

export const PROMPT_VERSIONS = {
  INTENT_PARSING_SYSTEM_PROMPT: "2026-10-18-001",
  GROUNDED_ANSWER_SYSTEM_PROMPT: "2026-10-18-001",
} as const;

export type PromptName = keyof typeof PROMPT_VERSIONS;
