/**
 * Record Store
 *
 * Purpose:
 * In-memory, read-only view over one proposal snapshot: records by quote id,
 * their rendered text blocks, and decoded field values.
 *
 * Iteration order is always quote id ascending so every scan over the store
 * is reproducible.
 *
 * Layer: Records
 */

import type { SectionCatalog } from "./sectionSchema";
import type { FieldDescriptor, ProposalRecord, TextBlock } from "./types";
import { renderTextBlocks } from "./textBlocks";
import { SnapshotLoadError } from "../utils/errorHandler";

export class RecordStore {
  readonly catalog: SectionCatalog;
  private readonly records = new Map<string, ProposalRecord>();
  private readonly blocks = new Map<string, TextBlock>();
  private readonly sortedIds: string[];

  constructor(records: readonly ProposalRecord[], catalog: SectionCatalog) {
    this.catalog = catalog;
    for (const record of records) {
      if (this.records.has(record.quoteId)) {
        throw new SnapshotLoadError(`Duplicate quote id "${record.quoteId}"`);
      }
      this.records.set(record.quoteId, record);
      for (const block of renderTextBlocks(record, catalog)) {
        this.blocks.set(block.id, block);
      }
    }
    this.sortedIds = Array.from(this.records.keys()).sort();
  }

  get size(): number {
    return this.records.size;
  }

  get textBlockCount(): number {
    return this.blocks.size;
  }

  ids(): readonly string[] {
    return this.sortedIds;
  }

  has(quoteId: string): boolean {
    return this.records.has(quoteId);
  }

  get(quoteId: string): ProposalRecord | undefined {
    return this.records.get(quoteId);
  }

  textBlock(id: string): TextBlock | undefined {
    return this.blocks.get(id);
  }

  textBlocks(): TextBlock[] {
    return Array.from(this.blocks.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /**
   * Decoded values of a field on one record. Section-scoped fields yield at
   * most one value; item-scoped fields yield one per list entry that has it.
   */
  values(record: ProposalRecord, descriptor: FieldDescriptor): string[] {
    const data = record.sections[descriptor.section.name];
    if (!data) return [];

    const { field } = descriptor;
    if (field.scope === "item") {
      const values: string[] = [];
      for (const item of data.items) {
        const value = this.catalog.decode(field, item[field.key] ?? null);
        if (value !== null) values.push(value);
      }
      return values;
    }

    const value = this.catalog.decode(field, data.fields[field.key] ?? null);
    return value === null ? [] : [value];
  }

  /** Records whose business name or person in charge equals `name` (case-insensitive). */
  findByName(name: string): ProposalRecord[] {
    const wanted = name.trim().toLowerCase();
    if (!wanted) return [];
    return this.sortedIds
      .map(id => this.records.get(id))
      .filter((record): record is ProposalRecord => record !== undefined)
      .filter(record =>
        record.businessName.toLowerCase() === wanted ||
        record.contact.personInCharge?.toLowerCase() === wanted,
      );
  }

  /** Business names and person-in-charge names, for entity detection. */
  knownNames(): Array<{ name: string; quoteId: string }> {
    const names: Array<{ name: string; quoteId: string }> = [];
    for (const id of this.sortedIds) {
      const record = this.records.get(id);
      if (!record) continue;
      names.push({ name: record.businessName, quoteId: id });
      if (record.contact.personInCharge) {
        names.push({ name: record.contact.personInCharge, quoteId: id });
      }
    }
    return names;
  }
}
