/**
 * Section Catalog
 *
 * Purpose:
 * Loads the static section schema and code tables (server/config/sectionSchemas.json)
 * and answers the questions every resolver asks about fields: what a field is
 * called, which phrases name it, and how its raw codes decode to labels.
 *
 * Layer: Records (static configuration)
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { FieldDescriptor, FieldSchema, FieldValue, SectionSchema } from "./types";
import { SnapshotLoadError } from "../utils/errorHandler";

export const DEFAULT_SECTION_SCHEMA_URL = new URL("../config/sectionSchemas.json", import.meta.url);

const fieldSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/),
  label: z.string().min(1),
  kind: z.enum(["boolean", "enum", "text", "number"]),
  codes: z.string().optional(),
  aliases: z.array(z.string().min(1)).default([]),
  valueAliases: z.record(z.string()).default({}),
  scope: z.enum(["section", "item"]).default("section"),
});

const sectionSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]+$/),
  title: z.string().min(1),
  list: z.boolean().default(false),
  fields: z.array(fieldSchema).min(1),
});

const catalogFileSchema = z.object({
  codeTables: z.record(z.record(z.string())),
  sections: z.array(sectionSchema).min(1),
});

export type CatalogDefinition = z.input<typeof catalogFileSchema>;

export class SectionCatalog {
  readonly sections: readonly SectionSchema[];
  private readonly codeTables: Record<string, Record<string, string>>;
  private readonly byRef = new Map<string, FieldDescriptor>();

  constructor(definition: CatalogDefinition) {
    const parsed = catalogFileSchema.safeParse(definition);
    if (!parsed.success) {
      throw new SnapshotLoadError(`Invalid section schema: ${fromZodError(parsed.error).message}`);
    }

    this.codeTables = parsed.data.codeTables;
    this.sections = parsed.data.sections;

    for (const section of this.sections) {
      for (const field of section.fields) {
        const ref = `${section.name}.${field.key}`;
        if (this.byRef.has(ref)) {
          throw new SnapshotLoadError(`Duplicate field "${ref}" in section schema`);
        }
        if (field.codes && !this.codeTables[field.codes]) {
          throw new SnapshotLoadError(`Field "${ref}" references unknown code table "${field.codes}"`);
        }
        if ((field.kind === "boolean" || field.kind === "enum") && !field.codes) {
          throw new SnapshotLoadError(`Field "${ref}" is ${field.kind} but declares no code table`);
        }
        if (field.scope === "item" && !section.list) {
          throw new SnapshotLoadError(`Field "${ref}" is item-scoped but section "${section.name}" is not a list`);
        }
        this.byRef.set(ref, { ref, section, field });
      }
    }
  }

  static fromFile(location: URL | string = DEFAULT_SECTION_SCHEMA_URL): SectionCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(location, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SnapshotLoadError(`Cannot read section schema: ${message}`);
    }
    const parsed = catalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotLoadError(`Invalid section schema: ${fromZodError(parsed.error).message}`);
    }
    return new SectionCatalog(parsed.data);
  }

  section(name: string): SectionSchema | undefined {
    return this.sections.find(s => s.name === name);
  }

  field(ref: string): FieldDescriptor | undefined {
    return this.byRef.get(ref);
  }

  /** Every field in declaration order. */
  fields(): FieldDescriptor[] {
    return Array.from(this.byRef.values());
  }

  /**
   * Decode a raw stored value into its display form.
   * Empty strings and nulls decode to null; unknown codes pass through unchanged.
   */
  decode(field: FieldSchema, raw: FieldValue): string | null {
    if (raw === null) return null;
    const text = String(raw).trim();
    if (text === "") return null;
    if (!field.codes) return text;

    const table = this.codeTables[field.codes] ?? {};
    return table[text] ?? table[text.toLowerCase()] ?? text;
  }

  /** Distinct labels of a field's code table, in table order. */
  valueLabels(field: FieldSchema): string[] {
    if (!field.codes) return [];
    const table = this.codeTables[field.codes] ?? {};
    return Array.from(new Set(Object.values(table)));
  }

  /** Label for a code, used to resolve valueAliases. */
  codeLabel(field: FieldSchema, code: string): string | undefined {
    if (!field.codes) return undefined;
    return this.codeTables[field.codes]?.[code];
  }
}
