import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { QueryResolutionEngine } from "../resolution/engine";
import { PredefinedStrategy } from "../resolution/predefinedMatcher";
import {
  endSessionHandler,
  errorMiddleware,
  healthHandler,
  queryHandler,
  reloadHandler,
} from "../routes";
import { ServiceUnavailableError, SnapshotLoadError, ValidationError } from "../utils/errorHandler";
import { z } from "zod";
import { asExpress, fixtureParts, mockRequest, mockResponse, nextSpy } from "./helpers";

const QUERY_RESPONSE = z.object({ sessionId: z.string() }).passthrough();

function newEngine() {
  return new QueryResolutionEngine({
    strategies: [new PredefinedStrategy()],
    audit: () => {},
    newTraceId: () => "trace-1",
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /api/health", () => {
  it("answers 503 until the snapshot is loaded", async () => {
    const engine = newEngine();
    const res = mockResponse();
    healthHandler(engine)(...asExpress(mockRequest(), res));
    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      status: "initializing",
      ready: false,
      snapshotVersion: null,
      records: 0,
      textBlocks: 0,
      indexedBlocks: 0,
      loadedAt: null,
    });

    await engine.initialize(async () => fixtureParts());
    const ready = mockResponse();
    healthHandler(engine)(...asExpress(mockRequest(), ready));
    expect(ready.statusCode).toBe(200);
    expect(ready.body).toEqual(expect.objectContaining({ status: "ok", snapshotVersion: 1 }));
  });
});

describe("POST /api/query", () => {
  it("passes ServiceUnavailableError on while loading", async () => {
    const next = nextSpy();
    await queryHandler(newEngine())(
      ...asExpress(mockRequest({ body: { question: "Which proposals have reported claims?" } }), mockResponse()),
      next,
    );
    expect(next.mock.calls[0][0]).toBeInstanceOf(ServiceUnavailableError);
  });

  it("returns the answer under a new session when none is given", async () => {
    const engine = newEngine();
    await engine.initialize(async () => fixtureParts());
    const res = mockResponse();

    await queryHandler(engine)(
      ...asExpress(mockRequest({ body: { question: "Which proposals have reported claims?" } }), res),
      nextSpy(),
    );

    const body = QUERY_RESPONSE.parse(res.body);
    expect(body.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(body).toEqual({
      question: "Which proposals have reported claims?",
      sessionId: body.sessionId,
      answer: {
        text: "Golden Lotus Jewellers (MYJADEQT002) reported a claim in 2022.",
        strategy: "predefined",
        evidence: ["MYJADEQT002"],
        traceId: "trace-1",
      },
    });
    expect(engine.history(body.sessionId)).toHaveLength(1);
  });

  it("keeps the caller's session id", async () => {
    const engine = newEngine();
    await engine.initialize(async () => fixtureParts());
    const res = mockResponse();

    await queryHandler(engine)(
      ...asExpress(mockRequest({ body: { question: "Which proposals have reported claims?", sessionId: "web-7" } }), res),
      nextSpy(),
    );

    expect(QUERY_RESPONSE.parse(res.body).sessionId).toBe("web-7");
    expect(engine.history("web-7")).toHaveLength(1);
  });
});

describe("DELETE /api/sessions/:id", () => {
  it("clears the session and answers 204", async () => {
    const engine = newEngine();
    await engine.initialize(async () => fixtureParts());
    await engine.resolve("Which proposals have reported claims?", "web-1");
    const res = mockResponse();

    endSessionHandler(engine)(...asExpress(mockRequest({ params: { id: "web-1" } }), res));

    expect(res.statusCode).toBe(204);
    expect(res.ended).toBe(true);
    expect(engine.history("web-1")).toEqual([]);
  });
});

describe("POST /api/admin/reload", () => {
  it("publishes a new snapshot", async () => {
    const engine = newEngine();
    await engine.initialize(async () => fixtureParts());
    const res = mockResponse();

    await reloadHandler(engine, async () => fixtureParts())(...asExpress(mockRequest(), res), nextSpy());

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual(expect.objectContaining({ ready: true, snapshotVersion: 2 }));
  });

  it("reports a rejected snapshot while the old one keeps serving", async () => {
    const engine = newEngine();
    await engine.initialize(async () => fixtureParts());
    const res = mockResponse();
    const loader = async () => {
      throw new SnapshotLoadError('Duplicate quote id "MYJADEQT001"');
    };

    await reloadHandler(engine, loader)(...asExpress(mockRequest(), res), nextSpy());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({
      error: 'Duplicate quote id "MYJADEQT001"',
      status: expect.objectContaining({ snapshotVersion: 1 }),
    });
  });

  it("forwards unexpected errors", async () => {
    const engine = newEngine();
    const next = nextSpy();
    const failure = new Error("disk unavailable");

    await reloadHandler(engine, async () => {
      throw failure;
    })(...asExpress(mockRequest(), mockResponse()), next);

    expect(next).toHaveBeenCalledWith(failure);
  });
});

describe("errorMiddleware", () => {
  it("maps errors to JSON", () => {
    const res = mockResponse();
    errorMiddleware(new ValidationError("question: Required"), ...asExpress(mockRequest(), res), nextSpy());
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: "question: Required" });
  });

  it("defers to Express once headers are sent", () => {
    const res = mockResponse();
    res.headersSent = true;
    const next = nextSpy();
    const error = new Error("late");

    errorMiddleware(error, ...asExpress(mockRequest(), res), next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.status).not.toHaveBeenCalled();
  });
});
