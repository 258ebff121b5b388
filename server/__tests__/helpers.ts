import { vi } from "vitest";
import type { Request, Response } from "express";
import type { GenerateTextFn, LLMRequestOptions, LLMResponse } from "../llm/client";
import type { EmbedOptions, Embedder } from "../llm/embeddings";
import { loadProposalRecords } from "../records/loader";
import { RecordStore } from "../records/recordStore";
import { SectionCatalog } from "../records/sectionSchema";
import { PredefinedTable } from "../resolution/predefinedMatcher";
import type { EngineSnapshot, SnapshotParts } from "../resolution/snapshot";
import type { ResolutionContext } from "../resolution/types";
import type { ConversationTurn } from "../resolution/conversationState";
import { InMemoryVectorIndex } from "../vectorIndex";

export const FIXTURES = new URL("./fixtures/", import.meta.url);
export const FIXTURE_PROPOSALS = new URL("proposals.json", FIXTURES);
export const FIXTURE_PREDEFINED = new URL("predefined_qa.json", FIXTURES);
export const FIXTURE_INDEX = new URL("vector_index.json", FIXTURES);

export function fixtureStore(): RecordStore {
  const catalog = SectionCatalog.fromFile();
  return new RecordStore(loadProposalRecords(FIXTURE_PROPOSALS, catalog), catalog);
}

/**
 * Embedder that looks vectors up by exact text. Unknown text embeds to the
 * zero vector, which scores 0 against everything.
 */
export class StubEmbedder implements Embedder {
  readonly model: string;
  readonly calls: string[] = [];
  private readonly vectors: Map<string, number[]>;
  private readonly dimensions: number;

  constructor(vectors: Record<string, number[]>, dimensions = 3, model = "text-embedding-3-small") {
    this.vectors = new Map(Object.entries(vectors));
    this.dimensions = dimensions;
    this.model = model;
  }

  async embed(text: string, _options?: EmbedOptions): Promise<number[]> {
    this.calls.push(text);
    return this.vectors.get(text) ?? new Array<number>(this.dimensions).fill(0);
  }

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    return Promise.all(texts.map(t => this.embed(t, options)));
  }
}

export function fixtureIndex(): InMemoryVectorIndex {
  return InMemoryVectorIndex.fromFile(FIXTURE_INDEX);
}

export function fixtureParts(overrides: Partial<SnapshotParts> = {}): SnapshotParts {
  const store = overrides.store ?? fixtureStore();
  return {
    catalog: store.catalog,
    store,
    index: overrides.index ?? fixtureIndex(),
    predefined: overrides.predefined ?? PredefinedTable.fromFile(FIXTURE_PREDEFINED, store),
  };
}

export function fixtureSnapshot(overrides: Partial<SnapshotParts> = {}): EngineSnapshot {
  return { ...fixtureParts(overrides), version: 1, loadedAt: new Date("2026-10-18T00:00:00.000Z") };
}

export function makeContext(
  question: string,
  snapshot: EngineSnapshot,
  history: readonly ConversationTurn[] = [],
): ResolutionContext {
  return { question, history, snapshot, traceId: "trace-test" };
}

/**
 * generateText stand-in answering from a queue of texts (or errors).
 */
export function queuedGenerate(...responses: Array<string | Error>) {
  const queue = [...responses];
  return vi.fn<GenerateTextFn>(async (opts: LLMRequestOptions): Promise<LLMResponse> => {
    const next = queue.shift();
    if (next === undefined) throw new Error("no queued LLM response");
    if (next instanceof Error) throw next;
    return { text: next, provider: "openai", model: opts.model };
  });
}

export interface MockResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  ended: boolean;
  status: ReturnType<typeof vi.fn>;
  json: ReturnType<typeof vi.fn>;
  end: ReturnType<typeof vi.fn>;
  set: ReturnType<typeof vi.fn>;
  setHeader: ReturnType<typeof vi.fn>;
  headersSent: boolean;
}

export function mockResponse(): MockResponse {
  const res: MockResponse = {
    statusCode: 200,
    body: undefined,
    headers: {},
    ended: false,
    headersSent: false,
    status: vi.fn((code: number) => {
      res.statusCode = code;
      return res;
    }),
    json: vi.fn((body: unknown) => {
      res.body = body;
      res.ended = true;
      return res;
    }),
    end: vi.fn(() => {
      res.ended = true;
      return res;
    }),
    set: vi.fn((name: string, value: string) => {
      res.headers[name.toLowerCase()] = value;
      return res;
    }),
    setHeader: vi.fn((name: string, value: string) => {
      res.headers[name.toLowerCase()] = value;
      return res;
    }),
  };
  return res;
}

export interface MockRequestInit {
  body?: unknown;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  ip?: string;
  method?: string;
  path?: string;
}

export function mockRequest(init: MockRequestInit = {}) {
  const headers = Object.fromEntries(Object.entries(init.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    body: init.body,
    params: init.params ?? {},
    ip: init.ip ?? "127.0.0.1",
    method: init.method ?? "GET",
    path: init.path ?? "/",
    get: (name: string) => headers[name.toLowerCase()],
  };
}

/**
 * Express handlers only touch the members the mocks provide.
 */
export function asExpress(req: ReturnType<typeof mockRequest>, res: MockResponse): [Request, Response] {
  return [req as unknown as Request, res as unknown as Response];
}

/** A NextFunction spy whose recorded calls keep the error argument's type. */
export function nextSpy() {
  return vi.fn<(error?: unknown) => void>();
}
