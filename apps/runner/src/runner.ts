// apps/runner/src/runner.ts
//
// Pure pieces of the runner CLI: argument parsing into a typed config,
// built-in item processors, classic-evaluation file parsing and output
// formatting. index.ts does the I/O.

import Ajv from "ajv";
import { CliUsageError, makeArgvHelpers, type ArgvHelpers } from "cli-utils";
import type { ClassicEvalItem, ClassicEvalRequest, Item, RunMetadata, RunResults, RunSummary } from "shared-types";

export const HELP_TEXT = `
Usage:
  runner <command> [options]

Commands:
  datasets                  List the datasets available to the API key
  me                        Show the caller's user and organization
  run                       Run an adaptive test           (--dataset --project --experiment)
  replay                    Replay a finished run          (--run)
  summary                   Show the summary of a run      (--run)
  create-project            Create a project               (--name [--description] [--team])
  classic                   Submit a classic evaluation    (--file [--project] [--experiment] [--dataset])

Connection:
  --serviceUrl <url>        Service base URL (default: ADAPTIVE_EVAL_SERVICE_URL or http://localhost:8787/adaptive-testing)
  --apiKey <key>            API key (default: ADAPTIVE_EVAL_API_KEY)

Runs:
  --maxItems <n>            Progress denominator (default: ADAPTIVE_EVAL_MAX_ITEMS or 150)
  --processor <mod>[#name]  Item processor module, run on a worker thread (default export unless #name)
  --strategy first|last     Built-in processor when --processor is absent (default: first)
  --withResponses           Include per-item responses (replay only)

Output:
  --json                    Print machine-readable JSON
  --help, -h                Show this help

Exit codes:
  0  success
  1  runtime error
  2  bad arguments / usage

Examples:
  runner datasets
  runner run --dataset arithmetic-basics --project p1 --experiment baseline --strategy last
  runner replay --run run-1 --processor ./answer.mjs#pick --withResponses --json
`.trim();

export const COMMANDS = ["datasets", "me", "run", "replay", "summary", "create-project", "classic"] as const;

export type Command = (typeof COMMANDS)[number];

export type Strategy = "first" | "last";

export type ProcessorSpec = { module: string; exportName: string };

export type RunnerConfig = {
  command: Command;
  serviceUrl?: string;
  apiKey?: string;
  maxItems?: number;
  json: boolean;

  datasetId: string | null;
  projectId: string | null;
  experiment: string | null;
  runId: string | null;
  name: string | null;
  description: string | null;
  teamId: string | null;
  file: string | null;

  processor: ProcessorSpec | null;
  strategy: Strategy;
  withResponses: boolean;
};

const ALLOWED = new Set([
  "--serviceUrl",
  "--apiKey",
  "--maxItems",
  "--dataset",
  "--project",
  "--experiment",
  "--run",
  "--name",
  "--description",
  "--team",
  "--file",
  "--processor",
  "--strategy",
  "--withResponses",
  "--json",
  "--help",
]);

const VALUE_FLAGS = [
  "--serviceUrl",
  "--apiKey",
  "--maxItems",
  "--dataset",
  "--project",
  "--experiment",
  "--run",
  "--name",
  "--description",
  "--team",
  "--file",
  "--processor",
  "--strategy",
];

function isCommand(v: string): v is Command {
  return COMMANDS.some((c) => c === v);
}

export function parseProcessorSpec(raw: string): ProcessorSpec {
  const idx = raw.lastIndexOf("#");
  if (idx <= 0) return { module: raw, exportName: "default" };
  const exportName = raw.slice(idx + 1);
  return { module: raw.slice(0, idx), exportName: exportName || "default" };
}

function parseStrategy(h: ArgvHelpers): Strategy {
  const raw = h.getArg("--strategy") ?? "first";
  if (raw !== "first" && raw !== "last") throw h.usage(`Invalid value for --strategy: ${raw} (expected first or last)`);
  return raw;
}

/** Options each command cannot do without. */
const REQUIRED: Record<Command, string[]> = {
  datasets: [],
  me: [],
  run: ["--dataset", "--project", "--experiment"],
  replay: ["--run"],
  summary: ["--run"],
  "create-project": ["--name"],
  classic: ["--file"],
};

/** Returns null when help was requested. */
export function parseRunnerArgs(argv: string[]): RunnerConfig | null {
  const h = makeArgvHelpers(argv, HELP_TEXT);
  if (h.hasFlag("--help", "-h")) return null;

  h.assertNoUnknownOptions(ALLOWED);
  h.assertHasValue(...VALUE_FLAGS);

  const command = h.command();
  if (command === null) throw h.usage("Missing command");
  if (!isCommand(command)) throw h.usage(`Unknown command: ${command}`);
  for (const flag of REQUIRED[command]) h.requireArg(flag);

  const maxItems = h.parseIntFlag("--maxItems", null);
  if (maxItems !== null && maxItems <= 0) throw h.usage(`--maxItems must be positive, got: ${maxItems}`);
  const processorRaw = h.getArg("--processor");

  return {
    command,
    serviceUrl: h.getArg("--serviceUrl") ?? undefined,
    apiKey: h.getArg("--apiKey") ?? undefined,
    maxItems: maxItems ?? undefined,
    json: h.hasFlag("--json"),

    datasetId: h.getArg("--dataset"),
    projectId: h.getArg("--project"),
    experiment: h.getArg("--experiment"),
    runId: h.getArg("--run"),
    name: h.getArg("--name"),
    description: h.getArg("--description"),
    teamId: h.getArg("--team"),
    file: h.getArg("--file"),

    processor: processorRaw ? parseProcessorSpec(processorRaw) : null,
    strategy: parseStrategy(h),
    withResponses: h.hasFlag("--withResponses"),
  };
}

/* ------------------------------------------------------------------ */
/*  Processors and metadata                                            */
/* ------------------------------------------------------------------ */

export function strategyProcessor(strategy: Strategy): (item: Item) => string {
  return (item) => {
    const choice = strategy === "first" ? item.choices[0] : item.choices.at(-1);
    if (!choice) throw new Error(`Item ${item.id} has no choices`);
    return choice.id;
  };
}

export function runMetadata(cfg: RunnerConfig): RunMetadata {
  const name = cfg.processor ? `${cfg.processor.module}#${cfg.processor.exportName}` : `strategy:${cfg.strategy}`;
  return {
    model_metadata: { name },
    test_configuration: { max_items: cfg.maxItems ?? null },
    inference_setup: { runner: "adaptive-eval runner" },
  };
}

/* ------------------------------------------------------------------ */
/*  Classic evaluation file                                            */
/* ------------------------------------------------------------------ */

type ClassicFile = {
  project_id?: string;
  experiment_name?: string;
  dataset_id?: string;
  model_name: string;
  hyperparameters?: Record<string, unknown>;
  items?: Array<Omit<ClassicEvalItem, "metrics"> & { metrics?: Record<string, unknown> }>;
  metrics?: ClassicEvalRequest["metrics"];
};

const classicFileSchema = {
  type: "object",
  required: ["model_name"],
  properties: {
    project_id: { type: "string" },
    experiment_name: { type: "string" },
    dataset_id: { type: "string" },
    model_name: { type: "string" },
    hyperparameters: { type: "object" },
    items: {
      type: "array",
      items: {
        type: "object",
        required: ["dataset_item_id", "model_input", "model_output", "gold_output"],
        properties: {
          dataset_item_id: { type: "string" },
          model_input: { type: "string" },
          model_output: { type: "string" },
          gold_output: { type: "string" },
          metrics: { type: "object" },
        },
      },
    },
    metrics: {
      type: "array",
      items: {
        type: "object",
        required: ["metric_id", "value"],
        properties: { metric_id: { type: "string" }, value: { type: ["string", "number", "boolean"] } },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateClassicFile = ajv.compile<ClassicFile>(classicFileSchema);

/** Command-line options win over the file's own ids. */
export function parseClassicFile(raw: string, cfg: RunnerConfig): ClassicEvalRequest {
  const parsed: unknown = JSON.parse(raw);
  if (!validateClassicFile(parsed)) {
    const why = (validateClassicFile.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`);
    throw new CliUsageError(`Invalid classic evaluation file ${cfg.file ?? ""}: ${why.join("; ")}`);
  }

  const pick = (flagValue: string | null, fileValue: string | undefined, flag: string): string => {
    const v = flagValue ?? fileValue;
    if (!v) throw new CliUsageError(`Missing ${flag} (not given on the command line or in the file)\n\n${HELP_TEXT}`);
    return v;
  };

  return {
    project_id: pick(cfg.projectId, parsed.project_id, "--project"),
    experiment_name: pick(cfg.experiment, parsed.experiment_name, "--experiment"),
    dataset_id: pick(cfg.datasetId, parsed.dataset_id, "--dataset"),
    model_name: parsed.model_name,
    hyperparameters: parsed.hyperparameters ?? {},
    items: (parsed.items ?? []).map((it) => ({ ...it, metrics: it.metrics ?? {} })),
    metrics: parsed.metrics ?? [],
  };
}

/* ------------------------------------------------------------------ */
/*  Output                                                             */
/* ------------------------------------------------------------------ */

export function progressLine(current: number, total: number): string {
  const pct = total > 0 ? Math.floor((current / total) * 100) : 100;
  return `progress ${current}/${total} (${pct}%)`;
}

export function formatResults(results: RunResults): string[] {
  const lines = [`run_id: ${results.run_id}`];
  if (results.score) {
    lines.push(`theta: ${results.score.theta}`);
    lines.push(`std_error: ${results.score.std_error}`);
  }
  for (const r of results.responses ?? []) {
    lines.push(`  ${r.dataset_item_id}: ${String(r.value)} ${r.correct ? "correct" : "wrong"}`);
  }
  return lines;
}

export function formatSummary(summary: RunSummary): string[] {
  const theta = summary.state.thetas.at(-1);
  const se = summary.state.std_error_history.at(-1);
  return [
    `run_id: ${summary.id}`,
    `dataset: ${summary.dataset_id}`,
    `completed: ${summary.completed}`,
    `items: ${summary.dataset.length}`,
    `correct: ${summary.responses.filter((r) => r.correct).length}/${summary.responses.length}`,
    `theta: ${theta ?? "n/a"}`,
    `std_error: ${se ?? "n/a"}`,
  ];
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
