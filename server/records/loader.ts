/**
 * Proposal Snapshot Loader
 *
 * Purpose:
 * Reads the cleaned proposal JSON, validates it with zod and produces frozen
 * ProposalRecords. The reserved "metadata" section is synthesized from the
 * record's top-level attributes so resolvers can treat business name,
 * location and contact fields like any other field.
 *
 * Any problem here is fatal: the service does not start on a partial snapshot.
 *
 * Layer: Records
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { SectionCatalog } from "./sectionSchema";
import type { FieldRow, ProposalRecord, SectionData } from "./types";
import { METADATA_SECTION } from "./types";
import { SnapshotLoadError } from "../utils/errorHandler";

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const fieldRowSchema = z.record(fieldValueSchema);

const rawSectionSchema = z.object({
  fields: fieldRowSchema.default({}),
  items: z.array(fieldRowSchema).default([]),
});

const rawProposalSchema = z.object({
  quoteId: z.string().trim().min(1, "quoteId is required"),
  businessName: z.string().trim().min(1, "businessName is required"),
  location: z.string().nullable().default(null),
  contact: z
    .object({
      personInCharge: z.string().nullable().default(null),
      email: z.string().nullable().default(null),
      mobile: z.string().nullable().default(null),
      userName: z.string().nullable().default(null),
    })
    .default({}),
  sections: z.record(rawSectionSchema).default({}),
});

export const proposalFileSchema = z.array(rawProposalSchema);

export type RawProposal = z.input<typeof rawProposalSchema>;

export function readJsonFile(location: URL | string, what: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(location, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SnapshotLoadError(`Cannot read ${what} (${String(location)}): ${message}`);
  }
}

function freezeSection(data: SectionData): SectionData {
  return Object.freeze({
    fields: Object.freeze({ ...data.fields }),
    items: Object.freeze(data.items.map(item => Object.freeze({ ...item }))),
  });
}

/**
 * Validate raw proposals and build frozen records.
 */
export function buildProposalRecords(raw: unknown, catalog: SectionCatalog): ProposalRecord[] {
  const parsed = proposalFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotLoadError(`Invalid proposal data: ${fromZodError(parsed.error).message}`);
  }

  const seen = new Set<string>();
  const unknownSections = new Set<string>();

  const records = parsed.data.map(p => {
    if (seen.has(p.quoteId)) {
      throw new SnapshotLoadError(`Duplicate quote id "${p.quoteId}"`);
    }
    seen.add(p.quoteId);

    const sections: Record<string, SectionData> = {};
    for (const [name, data] of Object.entries(p.sections)) {
      if (name === METADATA_SECTION) {
        throw new SnapshotLoadError(`Record ${p.quoteId} uses reserved section name "${METADATA_SECTION}"`);
      }
      if (!catalog.section(name)) unknownSections.add(name);
      sections[name] = freezeSection(data);
    }

    const metadata: FieldRow = {
      business_name: p.businessName,
      location: p.location,
      person_in_charge: p.contact.personInCharge,
      email: p.contact.email,
      mobile: p.contact.mobile,
      user_name: p.contact.userName,
    };
    sections[METADATA_SECTION] = freezeSection({ fields: metadata, items: [] });

    const record: ProposalRecord = {
      quoteId: p.quoteId,
      businessName: p.businessName,
      location: p.location,
      contact: Object.freeze({ ...p.contact }),
      sections: Object.freeze(sections),
    };
    return Object.freeze(record);
  });

  if (unknownSections.size > 0) {
    console.warn(`[RecordLoader] Sections not in schema (kept, not indexed): ${Array.from(unknownSections).sort().join(", ")}`);
  }

  return records;
}

export function loadProposalRecords(location: URL | string, catalog: SectionCatalog): ProposalRecord[] {
  const records = buildProposalRecords(readJsonFile(location, "proposal data"), catalog);
  if (records.length === 0) {
    throw new SnapshotLoadError("Proposal data contains no records");
  }
  console.log(`[RecordLoader] Loaded ${records.length} proposal records`);
  return records;
}
