import { describe, it, expect } from "vitest";
import { RefusalReason } from "@shared/schema";
import { describeConditions, formatAnswer, formatRefusal, renderPayload } from "../resolution/answerFormatter";
import type { Condition, RecordRow } from "../resolution/types";

const cctv: Condition = {
  field: "cctv.maintenance_contract",
  label: "CCTV maintenance contract",
  operator: "equals",
  value: "Yes",
};

function rows(count: number): RecordRow[] {
  return Array.from({ length: count }, (_, i) => ({
    quoteId: `MYTESTQT${String(i + 1).padStart(3, "0")}`,
    businessName: `Shop ${i + 1}`,
  }));
}

describe("describeConditions", () => {
  it("renders equals and contains conditions", () => {
    expect(
      describeConditions([
        cctv,
        { field: "claim_history.description", label: "Claim description", operator: "contains", value: "theft" },
      ]),
    ).toBe('CCTV maintenance contract = Yes and Claim description contains "theft"');
  });
});

describe("renderPayload", () => {
  it("renders counts", () => {
    expect(renderPayload({ kind: "count", conditions: [cctv], count: 8 })).toBe(
      "8 proposal(s) match the criteria (CCTV maintenance contract = Yes).",
    );
  });

  it("renders lists and caps them at twenty rows", () => {
    const text = renderPayload({ kind: "list", conditions: [cctv], rows: rows(23) });
    const lines = text.split("\n");
    expect(lines[0]).toBe("Found 23 matching proposal(s) (CCTV maintenance contract = Yes):");
    expect(lines[1]).toBe("- MYTESTQT001: Shop 1");
    expect(lines).toHaveLength(22);
    expect(lines[21]).toBe("... and 3 more.");
  });

  it("renders an empty list as a zero count", () => {
    expect(renderPayload({ kind: "list", conditions: [cctv], rows: [] })).toBe(
      "0 proposal(s) match the criteria (CCTV maintenance contract = Yes).",
    );
  });

  it("renders existence answers", () => {
    expect(renderPayload({ kind: "exists", conditions: [cctv], count: 2 })).toBe(
      "Yes, 2 proposal(s) match the criteria (CCTV maintenance contract = Yes).",
    );
    expect(renderPayload({ kind: "exists", conditions: [cctv], count: 0 })).toBe(
      "No proposals match the criteria (CCTV maintenance contract = Yes).",
    );
  });

  it("renders single and multiple lookups", () => {
    const one = { quoteId: "MYTESTQT001", businessName: "Shop 1", value: "Grade II" };
    const two = { quoteId: "MYTESTQT002", businessName: "Shop 2", value: "Grade IV" };
    expect(renderPayload({ kind: "lookup", fieldLabel: "Safe grade", rows: [one] })).toBe(
      "Safe grade for MYTESTQT001 (Shop 1): Grade II",
    );
    expect(renderPayload({ kind: "lookup", fieldLabel: "Safe grade", rows: [one, two] })).toBe(
      "- Safe grade for MYTESTQT001 (Shop 1): Grade II\n- Safe grade for MYTESTQT002 (Shop 2): Grade IV",
    );
  });

  it("renders comparisons", () => {
    expect(
      renderPayload({
        kind: "compare",
        direction: "highest",
        fieldLabel: "Sum assured limit",
        row: { quoteId: "MYTESTQT001", businessName: "Shop 1", value: "2000000" },
      }),
    ).toBe("The highest sum assured limit is 2000000 for MYTESTQT001 (Shop 1).");
  });

  it("cleans markdown out of free text", () => {
    expect(renderPayload({ kind: "text", text: "**MYTESTQT001** has a *Grade II* safe." })).toBe(
      "MYTESTQT001 has a Grade II safe.",
    );
  });
});

describe("formatAnswer / formatRefusal", () => {
  it("deduplicates and sorts evidence", () => {
    const answer = formatAnswer("semantic", { kind: "text", text: "ok" }, ["MYTESTQT002", "MYTESTQT001", "MYTESTQT002"], "t1");
    expect(answer).toEqual({ text: "ok", strategy: "semantic", evidence: ["MYTESTQT001", "MYTESTQT002"], traceId: "t1" });
  });

  it("builds refusals with no evidence", () => {
    expect(formatRefusal(RefusalReason.NotFound, "t2")).toEqual({
      text: "Data not available in proposal records.",
      strategy: "refusal",
      evidence: [],
      refusalReason: RefusalReason.NotFound,
      traceId: "t2",
    });
  });
});
