// apps/mock-service/src/store.ts
//
// In-memory state of the stand-in service. The theta update is a toy:
// it moves theta by the current standard error towards the answer's
// direction and shrinks the error. It exists to make runs deterministic.

import { readFileSync } from "node:fs";
import { validate, type SeedDataset, type SeedFile, type SeedItem } from "./schemas";

export const DEFAULT_DATASETS_PATH = new URL("../data/datasets.json", import.meta.url);

const INITIAL_THETA = 0;
const INITIAL_STD_ERROR = 1;
const STD_ERROR_DECAY = 0.8;

export type WireState = {
  responses: string[];
  thetas: number[];
  std_error_history: number[];
  kl_info_history: number[];
  effective_difficulties: number[];
};

export type AnswerRecord = { datasetItemId: string; value: string; correct: boolean };

export type StoredRun = {
  id: string;
  datasetId: string;
  projectId: string;
  experiment: string;
  metadata: Record<string, unknown>;
  presented: SeedItem[];
  answers: AnswerRecord[];
  state: WireState;
  completed: boolean;
  replayOf: string | null;
  createdAt: Date;
  completedAt: Date | null;
};

export class StoreError extends Error {
  constructor(
    public readonly status: number,
    public readonly title: string,
    detail: string
  ) {
    super(detail);
    this.name = "StoreError";
  }
}

export function loadSeed(path: URL | string = DEFAULT_DATASETS_PATH): SeedFile {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!validate.seedFile(raw)) {
    throw new Error(`Invalid dataset seed file ${String(path)}: ${JSON.stringify(validate.seedFile.errors)}`);
  }
  return raw;
}

function round(n: number): number {
  return Math.round(n * 1e6) / 1e6;
}

function emptyState(): WireState {
  return {
    responses: [],
    thetas: [INITIAL_THETA],
    std_error_history: [INITIAL_STD_ERROR],
    kl_info_history: [],
    effective_difficulties: [],
  };
}

/** Append one theta/standard-error pair for an answer. */
export function applyAnswer(state: WireState, choiceId: string, correct: boolean): WireState {
  const theta = state.thetas.at(-1) ?? INITIAL_THETA;
  const se = state.std_error_history.at(-1) ?? INITIAL_STD_ERROR;
  return {
    responses: [...state.responses, choiceId],
    thetas: [...state.thetas, round(theta + (correct ? se : -se) / 2)],
    std_error_history: [...state.std_error_history, round(se * STD_ERROR_DECAY)],
    kl_info_history: [...state.kl_info_history, round(se * se)],
    effective_difficulties: [...state.effective_difficulties, round(theta)],
  };
}

export type StoreOptions = {
  datasets: SeedDataset[];
  /** The service ends a run after this many answers. */
  maxItems: number;
  now: () => Date;
};

export class MockStore {
  private readonly datasets = new Map<string, SeedDataset>();
  private readonly runs = new Map<string, StoredRun>();
  private readonly counters = new Map<string, number>();

  constructor(private readonly options: StoreOptions) {
    for (const ds of options.datasets) this.datasets.set(ds.id, ds);
  }

  nextId(prefix: string): string {
    const n = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, n);
    return `${prefix}-${n}`;
  }

  now(): Date {
    return this.options.now();
  }

  listDatasets(): SeedDataset[] {
    return [...this.datasets.values()];
  }

  dataset(id: string): SeedDataset {
    const ds = this.datasets.get(id);
    if (!ds) throw new StoreError(404, "Not Found", `Dataset ${id} does not exist`);
    return ds;
  }

  run(id: string): StoredRun {
    const run = this.runs.get(id);
    if (!run) throw new StoreError(404, "Not Found", `Run ${id} does not exist`);
    return run;
  }

  /** The item the client has to answer next, or null once the run is over. */
  pendingItem(run: StoredRun): SeedItem | null {
    if (run.completed) return null;
    return run.presented.at(-1) ?? null;
  }

  startRun(datasetId: string, projectId: string, experiment: string, metadata: Record<string, unknown>): StoredRun {
    const ds = this.dataset(datasetId);
    const first = ds.items[0];
    const run: StoredRun = {
      id: this.nextId("run"),
      datasetId,
      projectId,
      experiment,
      metadata,
      presented: first ? [first] : [],
      answers: [],
      state: emptyState(),
      completed: first === undefined,
      replayOf: null,
      createdAt: this.now(),
      completedAt: first === undefined ? this.now() : null,
    };
    this.runs.set(run.id, run);
    return run;
  }

  continueRun(runId: string, choiceId: string): StoredRun {
    const run = this.run(runId);
    const item = this.pendingItem(run);
    if (!item) throw new StoreError(409, "Conflict", `Run ${runId} is already completed`);
    if (!item.choices.some((c) => c.id === choiceId)) {
      throw new StoreError(422, "Unprocessable Entity", `Choice ${choiceId} is not an option of item ${item.id}`);
    }

    const correct = item.answer === choiceId;
    run.answers.push({ datasetItemId: item.id, value: choiceId, correct });
    run.state = applyAnswer(run.state, choiceId, correct);

    const next = this.dataset(run.datasetId).items[run.presented.length];
    if (next === undefined || run.answers.length >= this.options.maxItems) {
      run.completed = true;
      run.completedAt = this.now();
    } else {
      run.presented.push(next);
    }
    return run;
  }

  replay(previousRunId: string, responses: { itemId: string; itemChoiceId: string }[], metadata: Record<string, unknown>): StoredRun {
    const previous = this.run(previousRunId);
    if (!previous.completed) {
      throw new StoreError(422, "Unprocessable Entity", `Run ${previousRunId} is not completed yet`);
    }

    const byId = new Map(previous.presented.map((it) => [it.id, it]));
    const seen = new Set<string>();
    const presented: SeedItem[] = [];
    const answers: AnswerRecord[] = [];
    let state = emptyState();

    for (const r of responses) {
      if (seen.has(r.itemId)) throw new StoreError(422, "Unprocessable Entity", `Duplicate item id ${r.itemId}`);
      seen.add(r.itemId);
      const item = byId.get(r.itemId);
      if (!item) {
        throw new StoreError(422, "Unprocessable Entity", `Item ${r.itemId} was not part of run ${previousRunId}`);
      }
      const correct = item.answer === r.itemChoiceId;
      presented.push(item);
      answers.push({ datasetItemId: item.id, value: r.itemChoiceId, correct });
      state = applyAnswer(state, r.itemChoiceId, correct);
    }

    const run: StoredRun = {
      id: this.nextId("replay"),
      datasetId: previous.datasetId,
      projectId: previous.projectId,
      experiment: previous.experiment,
      metadata,
      presented,
      answers,
      state,
      completed: true,
      replayOf: previous.id,
      createdAt: this.now(),
      completedAt: this.now(),
    };
    this.runs.set(run.id, run);
    return run;
  }
}
