/**
 * Proposal Record Types
 *
 * Purpose:
 * Shapes of the loaded proposal snapshot. Records are frozen after load and
 * shared read-only between concurrent requests.
 *
 * Layer: Records (data model)
 */

export type FieldValue = string | number | boolean | null;

export type FieldRow = Readonly<Record<string, FieldValue>>;

export interface SectionData {
  fields: FieldRow;
  /** Ordered entries of a list-valued section (e.g. individual claims). */
  items: readonly FieldRow[];
}

export interface ProposalContact {
  personInCharge: string | null;
  email: string | null;
  mobile: string | null;
  userName: string | null;
}

export interface ProposalRecord {
  quoteId: string;
  businessName: string;
  location: string | null;
  contact: ProposalContact;
  sections: Readonly<Record<string, SectionData>>;
}

export type FieldKind = "boolean" | "enum" | "text" | "number";

export interface FieldSchema {
  key: string;
  label: string;
  kind: FieldKind;
  /** Code table used to decode raw values ("001" → "Yes"). */
  codes?: string;
  aliases: string[];
  /** Extra phrases that select a code, keyed by phrase. */
  valueAliases: Record<string, string>;
  /** "item" fields live on each entry of a list-valued section. */
  scope: "section" | "item";
}

export interface SectionSchema {
  name: string;
  title: string;
  list: boolean;
  fields: FieldSchema[];
}

/** A field addressed as "section.key". */
export interface FieldDescriptor {
  ref: string;
  section: SectionSchema;
  field: FieldSchema;
}

export interface TextBlock {
  /** "<quoteId>::<section>" */
  id: string;
  quoteId: string;
  section: string;
  text: string;
}

/** Reserved section that exposes a record's top-level attributes as fields. */
export const METADATA_SECTION = "metadata";

export function textBlockId(quoteId: string, section: string): string {
  return `${quoteId}::${section}`;
}
