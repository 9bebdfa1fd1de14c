// packages/adaptive-client/src/protocol.ts
//
// The run orchestrator, written once. Each flow is a generator that yields
// effects (round trips and item-processor calls) and receives their typed
// results; driver.ts performs the effects either with await or blocking.
// Progress callbacks are called from here directly since they are
// synchronous in both contexts.

import type {
  AdaptiveTestState,
  Item,
  ProgressCallback,
  ReplayRequestItem,
  ReplayResponse,
  RunMetadata,
  RunResponse,
  RunResults,
  RunState,
  RunSummary,
  Score,
} from "shared-types";
import { RunStateError, UnsupportedFeatureError, ValidationError } from "./errors";

export type Metadata = RunMetadata | Record<string, unknown>;

export type Effect =
  | { kind: "start_run"; datasetId: string; projectId: string; experiment: string; metadata: Metadata }
  | { kind: "continue_run"; runId: string; itemChoiceId: string }
  | { kind: "run_summary"; runId: string }
  | { kind: "submit_replay"; runId: string; responses: ReplayRequestItem[]; metadata: Metadata }
  | { kind: "process_item"; item: Item };

export type EffectResult =
  | { kind: "start_run"; value: RunResponse }
  | { kind: "continue_run"; value: RunResponse }
  | { kind: "run_summary"; value: RunSummary }
  | { kind: "submit_replay"; value: ReplayResponse }
  | { kind: "process_item"; value: string };

export type EffectKind = Effect["kind"];

export type Protocol<T> = Generator<Effect, T, EffectResult>;

export type RunOptions = {
  withResponses?: boolean;
};

export type AdaptiveRunParams = {
  datasetId: string;
  projectId: string;
  experiment: string;
  metadata: Metadata;
  /** Progress denominator only. */
  maxItems: number;
  onProgress?: ProgressCallback;
  withResponses?: boolean;
};

export type ReplayRunParams = {
  previousRunId: string;
  metadata: Metadata;
  onProgress?: ProgressCallback;
  withResponses?: boolean;
};

/* ------------------------------------------------------------------ */
/*  Single effects                                                     */
/* ------------------------------------------------------------------ */

function unexpected(expected: EffectKind, got: EffectResult): RunStateError {
  return new RunStateError(`Driver answered a ${expected} effect with a ${got.kind} result`);
}

function* startRun(
  datasetId: string,
  projectId: string,
  experiment: string,
  metadata: Metadata
): Generator<Effect, RunResponse, EffectResult> {
  const res = yield { kind: "start_run", datasetId, projectId, experiment, metadata };
  if (res.kind !== "start_run") throw unexpected("start_run", res);
  return res.value;
}

function* continueRun(runId: string, itemChoiceId: string): Generator<Effect, RunResponse, EffectResult> {
  const res = yield { kind: "continue_run", runId, itemChoiceId };
  if (res.kind !== "continue_run") throw unexpected("continue_run", res);
  return res.value;
}

function* runSummary(runId: string): Generator<Effect, RunSummary, EffectResult> {
  const res = yield { kind: "run_summary", runId };
  if (res.kind !== "run_summary") throw unexpected("run_summary", res);
  return res.value;
}

function* submitReplay(
  runId: string,
  responses: ReplayRequestItem[],
  metadata: Metadata
): Generator<Effect, ReplayResponse, EffectResult> {
  const res = yield { kind: "submit_replay", runId, responses, metadata };
  if (res.kind !== "submit_replay") throw unexpected("submit_replay", res);
  return res.value;
}

function* processItem(item: Item): Generator<Effect, string, EffectResult> {
  const res = yield { kind: "process_item", item };
  if (res.kind !== "process_item") throw unexpected("process_item", res);
  return res.value;
}

/* ------------------------------------------------------------------ */
/*  Scoring                                                            */
/* ------------------------------------------------------------------ */

export function scoreFromState(state: RunState): Score {
  const theta = state.thetas.at(-1);
  const stdError = state.std_error_history.at(-1);
  if (theta === undefined || stdError === undefined) {
    throw new RunStateError("Cannot score a run with an empty theta or standard error history");
  }
  return { theta, std_error: stdError };
}

export function scoreFromSnapshots(states: AdaptiveTestState[]): Score {
  const last = states.at(-1);
  if (!last) throw new RunStateError("Cannot score a run without any state snapshot");
  return scoreFromState(last.state);
}

function snapshot(runId: string, res: RunResponse): AdaptiveTestState {
  return { run_id: runId, state: res.state, completed: res.completed };
}

/* ------------------------------------------------------------------ */
/*  Flows                                                              */
/* ------------------------------------------------------------------ */

/**
 * Full adaptive run: start, then answer and continue until the service
 * reports completion or stops handing out items.
 */
export function* adaptiveRun(params: AdaptiveRunParams): Protocol<RunResults> {
  if (params.withResponses) {
    throw new UnsupportedFeatureError(
      "withResponses",
      "withResponses is not supported for adaptive runs. Use runReplay with withResponses instead."
    );
  }

  const states: AdaptiveTestState[] = [];
  let res = yield* startRun(params.datasetId, params.projectId, params.experiment, params.metadata);
  const runId = res.run_info.id;
  states.push(snapshot(runId, res));

  let current = 0;
  while (!res.completed && res.next_item) {
    params.onProgress?.(current, params.maxItems);
    const choice = yield* processItem(res.next_item);
    res = yield* continueRun(runId, choice);
    states.push(snapshot(runId, res));
    current += 1;
  }
  params.onProgress?.(current, current);

  return { run_id: runId, score: scoreFromSnapshots(states) };
}

export function assertUniqueDatasetItems(dataset: Item[]): void {
  const seen = new Set<string>();
  for (const item of dataset) {
    if (seen.has(item.id)) {
      throw new ValidationError(`Run summary lists item ${item.id} more than once; cannot replay it`);
    }
    seen.add(item.id);
  }
}

/** Re-answer the exact item sequence of an earlier run and submit it as a replay. */
export function* replayRun(params: ReplayRunParams): Protocol<RunResults> {
  const summary = yield* runSummary(params.previousRunId);
  assertUniqueDatasetItems(summary.dataset);

  const total = summary.dataset.length;
  const responses: ReplayRequestItem[] = [];
  for (const [idx, item] of summary.dataset.entries()) {
    params.onProgress?.(idx, total);
    const choice = yield* processItem(item);
    responses.push({ item_id: item.id, item_choice_id: choice });
  }
  params.onProgress?.(total, total);

  const replay = yield* submitReplay(params.previousRunId, responses, params.metadata);
  return {
    run_id: replay.id,
    score: scoreFromState(replay.state),
    ...(params.withResponses ? { responses: replay.responses } : {}),
  };
}
