import { describe, it, expect, vi } from "vitest";
import { RefusalReason } from "@shared/schema";
import { DATA_NOT_AVAILABLE_SENTINEL } from "../config/prompts";
import { LLMError, generateText } from "../llm/client";
import type { Embedder } from "../llm/embeddings";
import { SemanticRetriever, buildContext, isDataNotAvailable } from "../resolution/semanticRetriever";
import type { TextBlock } from "../records/types";
import { InMemoryVectorIndex } from "../vectorIndex";
import { StubEmbedder, fixtureSnapshot, makeContext, queuedGenerate } from "./helpers";

const CCTV_QUESTION = "Tell me about the CCTV setup at Ja Assure IN";
const MIXED_QUESTION = "What do we know about cameras and claims?";

const embedder = new StubEmbedder({
  [CCTV_QUESTION]: [1, 0, 0],
  [MIXED_QUESTION]: [1, 1, 0],
});

const snapshot = fixtureSnapshot();

const CCTV_BLOCK = [
  "Quote ID: MYJADEQT001",
  "Business: Ja Assure IN",
  "Section: CCTV Security",
  "CCTV installed: Yes",
  "Number of cameras: 8",
  "CCTV maintenance contract: Yes",
].join("\n");

const CLAIM_BLOCK = [
  "Quote ID: MYJADEQT002",
  "Business: Golden Lotus Jewellers",
  "Section: Claim History",
  "Claim status: Claims within the past 3 years",
  "Entry 1: Year of claim: 2022; Amount of claim: 15000; Claim description: Snatch theft at counter",
].join("\n");

function block(id: string, text: string): TextBlock {
  const [quoteId, section] = id.split("::");
  return { id, quoteId, section, text };
}

describe("buildContext", () => {
  it("keeps whole blocks while they fit", () => {
    const blocks = [block("A::x", "aaaa"), block("B::x", "bbbb"), block("C::x", "cccc")];
    const { text, used } = buildContext(blocks, 4 + 7 + 4);
    expect(used.map(b => b.id)).toEqual(["A::x", "B::x"]);
    expect(text).toBe("aaaa\n\n---\n\nbbbb");
  });

  it("always keeps the top block", () => {
    const { used } = buildContext([block("A::x", "a".repeat(50))], 10);
    expect(used).toHaveLength(1);
  });
});

describe("isDataNotAvailable", () => {
  it("recognizes the sentinel with or without the full stop", () => {
    expect(isDataNotAvailable(DATA_NOT_AVAILABLE_SENTINEL)).toBe(true);
    expect(isDataNotAvailable("data not available in proposal records")).toBe(true);
    expect(isDataNotAvailable("MYJADEQT001 has 8 cameras.")).toBe(false);
  });
});

describe("SemanticRetriever", () => {
  it("ranks hits by score, then by block id", async () => {
    const retriever = new SemanticRetriever({ embedder, generate: queuedGenerate() });
    const retrieved = await retriever.retrieve(MIXED_QUESTION, snapshot);
    expect(retrieved.map(r => r.block.id)).toEqual([
      "MYJADEQT001::cctv",
      "MYJADEQT002::claim_history",
      "MYJADEQT003::alarm",
    ]);
    expect(retrieved[2].score).toBe(0);
  });

  it("accepts only a best score strictly above the threshold", () => {
    const retriever = new SemanticRetriever({ embedder, generate: queuedGenerate(), threshold: 0.5 });
    expect(retriever.accept([0.5, 0.2])).toBe(false);
    expect(retriever.accept([0.2, 0.51])).toBe(true);
    expect(retriever.accept([])).toBe(false);
  });

  it("answers from the accepted blocks", async () => {
    const generate = queuedGenerate("**MYJADEQT001** has 8 cameras with a maintenance contract.");
    const retriever = new SemanticRetriever({ embedder, generate });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, snapshot));

    expect(outcome).toEqual({
      status: "matched",
      stage: "semantic",
      payload: { kind: "text", text: "MYJADEQT001 has 8 cameras with a maintenance contract." },
      evidence: ["MYJADEQT001"],
      topScore: 1,
    });
    const [request] = generate.mock.calls[0];
    expect(request.temperature).toBe(0);
    expect(request.messages[1].content).toContain(CCTV_BLOCK);
    expect(request.messages[1].content).not.toContain("Section: Alarm");
  });

  it("refuses below the threshold", async () => {
    const generate = queuedGenerate();
    const retriever = new SemanticRetriever({ embedder, generate });
    const outcome = await retriever.run(makeContext("Something the index has never seen", snapshot));

    expect(outcome).toEqual({
      status: "failed",
      reason: RefusalReason.BelowConfidenceThreshold,
      terminal: true,
      detail: "best similarity 0.000 does not exceed 0.5",
      topScore: 0,
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it("falls back to the retrieved text when generation fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const generate = queuedGenerate(new LLMError("timeout", "gpt-4o-mini timed out after 15000ms", "openai"));
    const retriever = new SemanticRetriever({ embedder, generate });
    const outcome = await retriever.run(makeContext(MIXED_QUESTION, snapshot));

    expect(outcome.status === "matched" && outcome.payload).toEqual({
      kind: "text",
      text: `${CCTV_BLOCK}\n\n---\n\n${CLAIM_BLOCK}`,
    });
    expect(outcome.status === "matched" && outcome.evidence).toEqual(["MYJADEQT001", "MYJADEQT002"]);
    warn.mockRestore();
  });

  it("falls back to the retrieved text when the answer model has no provider", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const retriever = new SemanticRetriever({ embedder, generate: generateText, model: "mistral-large" });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, snapshot));

    expect(outcome).toEqual({
      status: "matched",
      stage: "semantic",
      payload: { kind: "text", text: CCTV_BLOCK },
      evidence: ["MYJADEQT001"],
      topScore: 1,
    });
    warn.mockRestore();
  });

  it("turns the not-available sentinel into a NotFound refusal", async () => {
    const retriever = new SemanticRetriever({ embedder, generate: queuedGenerate(DATA_NOT_AVAILABLE_SENTINEL) });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, snapshot));
    expect(outcome.status === "failed" && outcome.reason).toBe(RefusalReason.NotFound);
  });

  it("reports hits that do not resolve to a text block", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const index = new InMemoryVectorIndex("text-embedding-3-small", 3, [{ id: "MYJADEQT099::cctv", vector: [1, 0, 0] }]);
    const retriever = new SemanticRetriever({ embedder, generate: queuedGenerate() });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, fixtureSnapshot({ index })));

    expect(outcome).toEqual({
      status: "failed",
      reason: RefusalReason.InconsistentEvidence,
      terminal: true,
      detail: 'Text block "MYJADEQT099::cctv" does not resolve to a record section',
    });
    error.mockRestore();
  });

  it("times out a stalled embedding call", async () => {
    const stalled: Embedder = {
      model: "text-embedding-3-small",
      embed: () => new Promise<number[]>(() => {}),
      embedBatch: () => new Promise<number[][]>(() => {}),
    };
    const retriever = new SemanticRetriever({ embedder: stalled, generate: queuedGenerate(), embeddingTimeoutMs: 10 });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, snapshot));

    expect(outcome).toEqual({
      status: "failed",
      reason: RefusalReason.UpstreamTimeout,
      terminal: true,
      detail: "Question embedding timed out after 10ms",
    });
  });

  it("maps embedding outages to UpstreamUnavailable", async () => {
    const failing: Embedder = {
      model: "text-embedding-3-small",
      embed: async () => {
        throw new LLMError("unavailable", "[Embeddings] Request failed: 503", "openai");
      },
      embedBatch: async () => [],
    };
    const retriever = new SemanticRetriever({ embedder: failing, generate: queuedGenerate() });
    const outcome = await retriever.run(makeContext(CCTV_QUESTION, snapshot));
    expect(outcome.status === "failed" && outcome.reason).toBe(RefusalReason.UpstreamUnavailable);
  });
});
