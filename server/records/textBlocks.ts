/**
 * Text Block Rendering
 *
 * Purpose:
 * Renders one (record, section) pair into the plain text that gets embedded
 * and shown to the grounded-answer prompt. Output depends only on the record
 * and the catalog, so rebuilding the index from the same snapshot yields the
 * same text.
 *
 * Layer: Records
 */

import type { SectionCatalog } from "./sectionSchema";
import type { ProposalRecord, SectionSchema, TextBlock } from "./types";
import { textBlockId } from "./types";

export function renderTextBlock(
  record: ProposalRecord,
  section: SectionSchema,
  catalog: SectionCatalog,
): TextBlock | null {
  const data = record.sections[section.name];
  if (!data) return null;

  const lines: string[] = [];
  for (const field of section.fields) {
    if (field.scope === "item") continue;
    const value = catalog.decode(field, data.fields[field.key] ?? null);
    if (value !== null) lines.push(`${field.label}: ${value}`);
  }

  if (section.list) {
    const itemFields = section.fields.filter(f => f.scope === "item");
    data.items.forEach((item, i) => {
      const parts: string[] = [];
      for (const field of itemFields) {
        const value = catalog.decode(field, item[field.key] ?? null);
        if (value !== null) parts.push(`${field.label}: ${value}`);
      }
      if (parts.length > 0) lines.push(`Entry ${i + 1}: ${parts.join("; ")}`);
    });
  }

  if (lines.length === 0) return null;

  const header = [
    `Quote ID: ${record.quoteId}`,
    `Business: ${record.businessName}`,
    `Section: ${section.title}`,
  ];

  return {
    id: textBlockId(record.quoteId, section.name),
    quoteId: record.quoteId,
    section: section.name,
    text: [...header, ...lines].join("\n"),
  };
}

export function renderTextBlocks(record: ProposalRecord, catalog: SectionCatalog): TextBlock[] {
  const blocks: TextBlock[] = [];
  for (const section of catalog.sections) {
    const block = renderTextBlock(record, section, catalog);
    if (block) blocks.push(block);
  }
  return blocks;
}
