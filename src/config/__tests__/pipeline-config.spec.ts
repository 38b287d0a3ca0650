import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { assertValidPipelineConfig, buildPipelineConfig, pipelineConfigProblems } from "../pipeline-config";

describe("pipeline config", () => {
  it("should build a valid configuration from the environment defaults", () => {
    expect(pipelineConfigProblems(buildPipelineConfig())).toEqual([]);
  });

  it("should apply overrides on top of the defaults", () => {
    const config = buildPipelineConfig({ batchConcurrency: 7, resultSink: "file", resultSinkDirectory: "/tmp/results" });

    expect(config.batchConcurrency).toBe(7);
    expect(config.resultSink).toBe("file");
    expect(config.resultSinkDirectory).toBe("/tmp/results");
  });

  it("should list each invalid setting", () => {
    const defaults = buildPipelineConfig();
    const config = buildPipelineConfig({
      retryPolicy: { ...defaults.retryPolicy, maxAttempts: 0 },
      defaultRateLimit: { ratePerSecond: 5, burst: 0 },
      attemptTimeoutMs: 0,
      acceptanceThreshold: 2,
      batchConcurrency: 1.5,
      resultSink: "file",
      resultSinkDirectory: "",
    });

    expect(pipelineConfigProblems(config)).toEqual([
      "retryPolicy: maxAttempts must be a positive integer (got 0)",
      "defaultRateLimit: burst must be a positive integer (got 0)",
      "attemptTimeoutMs must be > 0 (got 0)",
      "acceptanceThreshold must be within [0, 1] (got 2)",
      "batchConcurrency must be a positive integer (got 1.5)",
      "resultSinkDirectory is required for the file sink",
    ]);
  });

  it("should throw a ConfigurationError carrying the problems", () => {
    const config = buildPipelineConfig({ attemptTimeoutMs: -1 });

    let caught: unknown;
    try {
      assertValidPipelineConfig(config);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.problems).toEqual(["attemptTimeoutMs must be > 0 (got -1)"]);
  });
});
