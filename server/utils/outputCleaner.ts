/**
 * LLM output cleanup.
 *
 * Answers are plain text. Models still slip in markdown, HTML tags or list
 * markers; these rules strip them. Rules run in order.
 */

interface CleanRule {
  pattern: RegExp;
  replacement: string;
}

const rules: CleanRule[] = [
  // ```lang ... ``` → contents
  { pattern: /```[a-z]*\n?([\s\S]*?)```/gi, replacement: '$1' },
  // <br> → newline, other tags removed
  { pattern: /<br\s*\/?>/gi, replacement: '\n' },
  { pattern: /<\/?[a-z][^>]*>/gi, replacement: '' },
  // **bold**, __bold__, *italic*, `code`, ~~strike~~
  { pattern: /\*\*(.+?)\*\*/g, replacement: '$1' },
  { pattern: /__(.+?)__/g, replacement: '$1' },
  { pattern: /(^|[^*])\*([^*\n]+)\*/g, replacement: '$1$2' },
  { pattern: /`([^`]+)`/g, replacement: '$1' },
  { pattern: /~~(.+?)~~/g, replacement: '$1' },
  // headings, bullets, numbered lists
  { pattern: /^#+\s+/gm, replacement: '' },
  { pattern: /^\s*[-*•]\s+/gm, replacement: '' },
  { pattern: /^\s*\d+[.)]\s+/gm, replacement: '' },
  // [text](url) → text
  { pattern: /\[([^\]]+)\]\([^)]*\)/g, replacement: '$1' },
  // collapse blank-line runs and trailing spaces
  { pattern: /[ \t]+$/gm, replacement: '' },
  { pattern: /\n{3,}/g, replacement: '\n\n' },
];

/**
 * Convert model output to plain text.
 */
export function cleanOutput(text: string): string {
  let result = text;
  for (const rule of rules) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result.trim();
}
