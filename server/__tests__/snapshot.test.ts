import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { parseEnv } from "../config/env";
import { SnapshotHolder, createDiskSnapshotLoader, loadSnapshotFromDisk } from "../resolution/snapshot";
import { SnapshotLoadError } from "../utils/errorHandler";
import { FIXTURE_INDEX, FIXTURE_PREDEFINED, FIXTURE_PROPOSALS, fixtureParts } from "./helpers";

const sources = {
  proposalsPath: FIXTURE_PROPOSALS,
  predefinedPath: FIXTURE_PREDEFINED,
  vectorIndexPath: FIXTURE_INDEX,
};

let log: MockInstance<typeof console.log>;

beforeEach(() => {
  log = vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadSnapshotFromDisk", () => {
  it("loads every part and logs the totals", () => {
    const parts = loadSnapshotFromDisk(sources, "text-embedding-3-small");

    expect(parts.store.size).toBe(10);
    expect(parts.index.size).toBe(3);
    expect(parts.predefined.size).toBe(2);
    expect(parts.catalog).toBe(parts.store.catalog);
    expect(log).toHaveBeenCalledWith("[Snapshot] 10 records, 44 text blocks, 3 indexed, 2 predefined answers");
  });

  it("rejects an index built with another embedding model", () => {
    expect(() => loadSnapshotFromDisk(sources, "text-embedding-3-large")).toThrow(
      "Vector index was built with text-embedding-3-small but questions are embedded with text-embedding-3-large. Rebuild the index.",
    );
  });

  it("fails on a missing records file", async () => {
    const loader = createDiskSnapshotLoader({ ...sources, proposalsPath: "/nonexistent/proposals.json" });
    await expect(loader()).rejects.toThrow(SnapshotLoadError);
  });
});

describe("SnapshotHolder", () => {
  it("publishes frozen snapshots with increasing versions", () => {
    const holder = new SnapshotHolder();
    expect(holder.current()).toBeNull();

    const first = holder.publish(fixtureParts());
    const second = holder.publish(fixtureParts());

    expect(first.version).toBe(1);
    expect(second.version).toBe(2);
    expect(holder.current()).toBe(second);
    expect(Object.isFrozen(second)).toBe(true);
  });
});

describe("parseEnv", () => {
  it("applies defaults", () => {
    const env = parseEnv({});
    expect(env.PORT).toBe(5000);
    expect(env.INTENT_MODEL).toBe("gpt-4o-mini");
    expect(env.ANSWER_MODEL).toBe("gpt-4o");
    expect(env.EMBEDDING_MODEL).toBe("text-embedding-3-small");
    expect(env.QUERY_LOG_ENABLED).toBe(true);
    expect(env.ADMIN_TOKEN).toBeUndefined();
    expect(env.PROPOSALS_PATH.endsWith("/data/proposals.json")).toBe(true);
  });

  it("coerces and validates values", () => {
    expect(parseEnv({ PORT: "8080", QUERY_LOG_ENABLED: "0" })).toMatchObject({ PORT: 8080, QUERY_LOG_ENABLED: false });
    expect(() => parseEnv({ PORT: "http" })).toThrow("[Config] Invalid environment");
  });

  it("rejects answer and intent models no client can serve", () => {
    expect(() => parseEnv({ ANSWER_MODEL: "mistral-large" })).toThrow(/ANSWER_MODEL/);
    expect(parseEnv({ INTENT_MODEL: "gemini-2.5-flash" }).INTENT_MODEL).toBe("gemini-2.5-flash");
  });
});
