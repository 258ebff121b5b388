/**
 * Centralized Prompt Configuration
 * 
 * All LLM prompts are maintained in this single location.
 * 
 * Structure:
 * - intentParsing.ts: Question → JSON query plan
 * - groundedAnswer.ts: Answer phrasing over retrieved proposal text
 * - versions.ts: Version tags written to the query audit log
 */

export * from "./intentParsing";
export * from "./groundedAnswer";
export * from "./versions";
