import { createHash } from "crypto";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { PipelineResult } from "@/common/types/core";
import { InMemoryResultSink, JsonFileResultSink } from "../result-sink";

const result = (requestId: string): PipelineResult =>
  Object.freeze({
    requestId,
    symbol: "AAPL",
    sourceId: "quotes-api",
    decision: "accepted",
    reasons: [],
    attempts: 1,
    completedAt: 1704067200000,
  });

describe("InMemoryResultSink", () => {
  it("should keep only the newest results up to its capacity", async () => {
    const sink = new InMemoryResultSink(2);

    await sink.store(result("r1"));
    await sink.store(result("r2"));
    await sink.store(result("r3"));

    expect(sink.list().map(stored => stored.requestId)).toEqual(["r2", "r3"]);
    expect(sink.get("r1")).toBeUndefined();
    expect(sink.get("r3")?.decision).toBe("accepted");
  });

  it("should empty on clear", async () => {
    const sink = new InMemoryResultSink();
    await sink.store(result("r1"));

    sink.clear();

    expect(sink.list()).toEqual([]);
  });
});

describe("JsonFileResultSink", () => {
  let directory: string;

  const hashOf = (requestId: string) => createHash("sha256").update(requestId).digest("hex").slice(0, 8);

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "result-sink-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should write one JSON document per request", async () => {
    const sink = new JsonFileResultSink(join(directory, "results"));

    await sink.store(result("r1"));

    expect(await readdir(join(directory, "results"))).toEqual([`r1-${hashOf("r1")}.json`]);
    const written = JSON.parse(await readFile(join(directory, "results", `r1-${hashOf("r1")}.json`), "utf8"));
    expect(written).toEqual({
      requestId: "r1",
      symbol: "AAPL",
      sourceId: "quotes-api",
      decision: "accepted",
      reasons: [],
      attempts: 1,
      completedAt: 1704067200000,
    });
  });

  it("should keep request ids from escaping the directory", () => {
    const sink = new JsonFileResultSink(directory);

    expect(sink.pathFor("../etc/passwd")).toBe(join(directory, `.._etc_passwd-${hashOf("../etc/passwd")}.json`));
    expect(sink.pathFor("batch 7:a")).toBe(join(directory, `batch_7_a-${hashOf("batch 7:a")}.json`));
  });

  it("should give ids that reduce to the same name their own files", async () => {
    const sink = new JsonFileResultSink(directory);

    await sink.store(result("a/b"));
    await sink.store(result("a_b"));

    expect(sink.pathFor("a/b")).not.toBe(sink.pathFor("a_b"));
    expect((await readdir(directory)).sort()).toEqual([`a_b-${hashOf("a/b")}.json`, `a_b-${hashOf("a_b")}.json`].sort());
    expect(JSON.parse(await readFile(sink.pathFor("a/b"), "utf8")).requestId).toBe("a/b");
  });
});
