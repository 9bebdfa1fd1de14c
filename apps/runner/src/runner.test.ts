import { describe, it, expect } from "vitest";
import type { Item, RunSummary } from "shared-types";
import {
  formatResults,
  formatSummary,
  parseClassicFile,
  parseProcessorSpec,
  parseRunnerArgs,
  progressLine,
  runMetadata,
  strategyProcessor,
  type RunnerConfig,
} from "./runner";

function argv(...args: string[]): string[] {
  return ["/usr/bin/node", "/tmp/runner.ts", ...args];
}

function parsed(...args: string[]): RunnerConfig {
  const cfg = parseRunnerArgs(argv(...args));
  if (!cfg) throw new Error("expected a config, got help");
  return cfg;
}

const item: Item = {
  type: "multiple_choice_text",
  id: "q1",
  question: "?",
  choices: [
    { id: "A", text: "a" },
    { id: "B", text: "b" },
    { id: "C", text: "c" },
  ],
};

/* ------------------------------------------------------------------ */
/*  Arguments                                                          */
/* ------------------------------------------------------------------ */

describe("parseRunnerArgs", () => {
  it("parses a run command", () => {
    const cfg = parsed("run", "--dataset", "ds-1", "--project=p1", "--experiment", "exp", "--maxItems", "20", "--strategy", "last");
    expect(cfg).toMatchObject({
      command: "run",
      datasetId: "ds-1",
      projectId: "p1",
      experiment: "exp",
      maxItems: 20,
      strategy: "last",
      processor: null,
      json: false,
      withResponses: false,
    });
    expect(cfg.serviceUrl).toBeUndefined();
  });

  it("returns null for --help", () => {
    expect(parseRunnerArgs(argv("run", "--help"))).toBeNull();
  });

  it("rejects a missing or unknown command", () => {
    expect(() => parsed()).toThrow(/^Missing command/);
    expect(() => parsed("launch")).toThrow(/^Unknown command: launch/);
  });

  it("requires the options of the command", () => {
    expect(() => parsed("replay")).toThrow(/^Missing required option --run/);
    expect(() => parsed("run", "--dataset", "ds-1", "--project", "p1")).toThrow(/^Missing required option --experiment/);
  });

  it("rejects unknown options and bad values with exit code 2", () => {
    expect(() => parsed("datasets", "--verbose")).toThrow(expect.objectContaining({ exitCode: 2 }));
    expect(() => parsed("datasets", "--maxItems", "0")).toThrow(/^--maxItems must be positive, got: 0/);
    expect(() => parsed("datasets", "--strategy", "random")).toThrow(/^Invalid value for --strategy: random/);
    expect(() => parsed("summary", "--run")).toThrow(/^Missing value for --run/);
  });

  it("parses a processor module with an export name", () => {
    expect(parsed("replay", "--run", "r1", "--processor", "./answer.mjs#pick").processor).toEqual({
      module: "./answer.mjs",
      exportName: "pick",
    });
  });
});

describe("parseProcessorSpec", () => {
  it("defaults to the default export", () => {
    expect(parseProcessorSpec("./answer.mjs")).toEqual({ module: "./answer.mjs", exportName: "default" });
    expect(parseProcessorSpec("./answer.mjs#")).toEqual({ module: "./answer.mjs", exportName: "default" });
  });
});

/* ------------------------------------------------------------------ */
/*  Processors and metadata                                            */
/* ------------------------------------------------------------------ */

describe("strategyProcessor", () => {
  it("picks the first or last choice", () => {
    expect(strategyProcessor("first")(item)).toBe("A");
    expect(strategyProcessor("last")(item)).toBe("C");
  });

  it("fails on an item without choices", () => {
    expect(() => strategyProcessor("first")({ ...item, choices: [] })).toThrow("Item q1 has no choices");
  });
});

describe("runMetadata", () => {
  it("names the processor in the model metadata", () => {
    expect(runMetadata(parsed("run", "--dataset", "d", "--project", "p", "--experiment", "e"))).toEqual({
      model_metadata: { name: "strategy:first" },
      test_configuration: { max_items: null },
      inference_setup: { runner: "adaptive-eval runner" },
    });
    expect(runMetadata(parsed("replay", "--run", "r1", "--processor", "./m.mjs")).model_metadata.name).toBe(
      "./m.mjs#default"
    );
  });
});

/* ------------------------------------------------------------------ */
/*  Classic evaluation file                                            */
/* ------------------------------------------------------------------ */

describe("parseClassicFile", () => {
  const file = JSON.stringify({
    project_id: "p-file",
    experiment_name: "from-file",
    dataset_id: "ds-file",
    model_name: "test-model",
    items: [{ dataset_item_id: "i1", model_input: "in", model_output: "out", gold_output: "out" }],
    metrics: [{ metric_id: "accuracy", value: 0.9 }],
  });

  it("fills defaults and lets command-line options win", () => {
    const cfg = parsed("classic", "--file", "eval.json", "--project", "p-cli");
    expect(parseClassicFile(file, cfg)).toEqual({
      project_id: "p-cli",
      experiment_name: "from-file",
      dataset_id: "ds-file",
      model_name: "test-model",
      hyperparameters: {},
      items: [{ dataset_item_id: "i1", model_input: "in", model_output: "out", gold_output: "out", metrics: {} }],
      metrics: [{ metric_id: "accuracy", value: 0.9 }],
    });
  });

  it("rejects a file without a model name", () => {
    const cfg = parsed("classic", "--file", "eval.json");
    expect(() => parseClassicFile("{}", cfg)).toThrow("Invalid classic evaluation file eval.json: / must have required property 'model_name'");
  });

  it("requires ids from somewhere", () => {
    const cfg = parsed("classic", "--file", "eval.json");
    expect(() => parseClassicFile(JSON.stringify({ model_name: "m" }), cfg)).toThrow(/^Missing --project/);
  });
});

/* ------------------------------------------------------------------ */
/*  Output                                                             */
/* ------------------------------------------------------------------ */

describe("output", () => {
  it("formats progress", () => {
    expect(progressLine(3, 12)).toBe("progress 3/12 (25%)");
    expect(progressLine(0, 0)).toBe("progress 0/0 (100%)");
  });

  it("formats results with responses", () => {
    expect(
      formatResults({
        run_id: "rp1",
        score: { theta: 0.42, std_error: 0.5 },
        responses: [{ dataset_item_id: "i1", value: "A", correct: true }],
      })
    ).toEqual(["run_id: rp1", "theta: 0.42", "std_error: 0.5", "  i1: A correct"]);
  });

  it("formats a run summary", () => {
    const summary: RunSummary = {
      id: "r1",
      dataset_id: "ds-1",
      dataset: [item],
      responses: [{ dataset_item_id: "q1", value: "B", correct: false }],
      state: { responses: ["B"], thetas: [0, -0.5], std_error_history: [1, 0.8], kl_info_history: [], effective_difficulties: [] },
      completed: true,
      metadata: {},
    };
    expect(formatSummary(summary)).toEqual([
      "run_id: r1",
      "dataset: ds-1",
      "completed: true",
      "items: 1",
      "correct: 0/1",
      "theta: -0.5",
      "std_error: 0.8",
    ]);
  });
});
