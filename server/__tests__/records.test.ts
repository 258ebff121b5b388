import { describe, it, expect, vi } from "vitest";
import { buildProposalRecords } from "../records/loader";
import { RecordStore } from "../records/recordStore";
import { SectionCatalog } from "../records/sectionSchema";
import { SnapshotLoadError } from "../utils/errorHandler";
import { fixtureStore } from "./helpers";

describe("SectionCatalog", () => {
  const catalog = SectionCatalog.fromFile();

  it("decodes code-table values", () => {
    const descriptor = catalog.field("cctv.maintenance_contract");
    expect(descriptor?.field.label).toBe("CCTV maintenance contract");
    expect(descriptor && catalog.decode(descriptor.field, "001")).toBe("Yes");
    expect(descriptor && catalog.decode(descriptor.field, "002")).toBe("No");
  });

  it("treats empty values as absent and passes unknown codes through", () => {
    const descriptor = catalog.field("safe.grade");
    expect(descriptor && catalog.decode(descriptor.field, "")).toBeNull();
    expect(descriptor && catalog.decode(descriptor.field, null)).toBeNull();
    expect(descriptor && catalog.decode(descriptor.field, "099")).toBe("099");
  });

  it("rejects enum fields without a code table", () => {
    expect(
      () =>
        new SectionCatalog({
          codeTables: {},
          sections: [{ name: "cctv", title: "CCTV", fields: [{ key: "backup", label: "Backup", kind: "enum" }] }],
        }),
    ).toThrow(SnapshotLoadError);
  });
});

describe("buildProposalRecords", () => {
  const catalog = SectionCatalog.fromFile();

  it("synthesizes the metadata section", () => {
    const [record] = buildProposalRecords(
      [{ quoteId: "MYTESTQT001", businessName: "Test Gold", contact: { personInCharge: "Aina" }, sections: {} }],
      catalog,
    );
    expect(record.sections.metadata.fields.business_name).toBe("Test Gold");
    expect(record.sections.metadata.fields.person_in_charge).toBe("Aina");
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("rejects duplicate quote ids", () => {
    const raw = [
      { quoteId: "MYTESTQT001", businessName: "A" },
      { quoteId: "MYTESTQT001", businessName: "B" },
    ];
    expect(() => buildProposalRecords(raw, catalog)).toThrow('Duplicate quote id "MYTESTQT001"');
  });

  it("rejects a supplied metadata section", () => {
    const raw = [{ quoteId: "MYTESTQT001", businessName: "A", sections: { metadata: { fields: {} } } }];
    expect(() => buildProposalRecords(raw, catalog)).toThrow(SnapshotLoadError);
  });

  it("rejects records without a business name", () => {
    expect(() => buildProposalRecords([{ quoteId: "MYTESTQT001" }], catalog)).toThrow(SnapshotLoadError);
  });

  it("warns about sections missing from the schema", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    buildProposalRecords([{ quoteId: "MYTESTQT001", businessName: "A", sections: { extras: { fields: { a: 1 } } } }], catalog);
    expect(warn).toHaveBeenCalledWith("[RecordLoader] Sections not in schema (kept, not indexed): extras");
    warn.mockRestore();
  });
});

describe("RecordStore", () => {
  const store = fixtureStore();

  it("orders ids ascending", () => {
    expect(store.size).toBe(10);
    expect(store.ids()[0]).toBe("MYJADEQT001");
    expect(store.ids()[9]).toBe("MYJADEQT010");
  });

  it("renders one text block per populated section", () => {
    expect(store.textBlockCount).toBe(44);
    expect(store.textBlock("MYJADEQT001::cctv")?.text).toBe(
      [
        "Quote ID: MYJADEQT001",
        "Business: Ja Assure IN",
        "Section: CCTV Security",
        "CCTV installed: Yes",
        "Number of cameras: 8",
        "CCTV maintenance contract: Yes",
      ].join("\n"),
    );
    expect(store.textBlock("MYJADEQT010::cctv")).toBeUndefined();
  });

  it("renders list entries of list sections", () => {
    expect(store.textBlock("MYJADEQT002::claim_history")?.text).toBe(
      [
        "Quote ID: MYJADEQT002",
        "Business: Golden Lotus Jewellers",
        "Section: Claim History",
        "Claim status: Claims within the past 3 years",
        "Entry 1: Year of claim: 2022; Amount of claim: 15000; Claim description: Snatch theft at counter",
      ].join("\n"),
    );
  });

  it("returns one value per list item for item-scoped fields", () => {
    const record = store.get("MYJADEQT002");
    const descriptor = store.catalog.field("claim_history.year_of_claim");
    expect(record && descriptor && store.values(record, descriptor)).toEqual(["2022"]);
  });

  it("finds records by business or person name, ignoring case", () => {
    expect(store.findByName("ja assure in").map(r => r.quoteId)).toEqual(["MYJADEQT001"]);
    expect(store.findByName("Ahmad Faizal").map(r => r.quoteId)).toEqual(["MYJADEQT002"]);
    expect(store.findByName("Nobody")).toEqual([]);
  });

  it("rejects duplicate records", () => {
    const record = store.get("MYJADEQT001");
    expect(record).toBeDefined();
    if (record) {
      expect(() => new RecordStore([record, record], store.catalog)).toThrow(SnapshotLoadError);
    }
  });
});
