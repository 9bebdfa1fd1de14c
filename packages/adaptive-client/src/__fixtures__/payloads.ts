// Wire payload builders for tests (camelCase, as the service sends them).

export function wireItem(id: string, choiceIds: string[] = ["A", "B"]) {
  return {
    type: "multiple_choice_text",
    id,
    question: `Question ${id}?`,
    choices: choiceIds.map((c) => ({ id: c, text: `Choice ${c}` })),
  };
}

export function wireState(thetas: number[], stdErrors: number[]) {
  return {
    responses: [],
    thetas,
    std_error_history: stdErrors,
    kl_info_history: [],
    effective_difficulties: [],
  };
}

export function wireRun(opts: {
  runId?: string;
  thetas: number[];
  stdErrors: number[];
  nextItem?: unknown;
  completed?: boolean;
}) {
  return {
    runInfo: { id: opts.runId ?? "r1" },
    state: wireState(opts.thetas, opts.stdErrors),
    nextItem: opts.nextItem ?? null,
    completed: opts.completed ?? false,
  };
}

export function wireSummary(opts: { id?: string; items: unknown[]; thetas?: number[]; stdErrors?: number[] }) {
  return {
    id: opts.id ?? "r1",
    datasetId: "ds-1",
    dataset: opts.items,
    responses: [],
    state: wireState(opts.thetas ?? [0.1], opts.stdErrors ?? [0.5]),
    completed: true,
    metadata: {},
  };
}

export function wireReplay(opts: { id?: string; replayOf?: string; thetas: number[]; stdErrors: number[]; responses?: unknown[] }) {
  return {
    id: opts.id ?? "rp1",
    datasetId: "ds-1",
    state: wireState(opts.thetas, opts.stdErrors),
    replayOfRun: opts.replayOf ?? "r1",
    completedAt: "2024-03-01T10:00:00Z",
    createdAt: "2024-03-01T09:59:00Z",
    metadata: {},
    dataset: [],
    responses: opts.responses ?? [],
  };
}

export const METADATA = {
  model_metadata: { name: "test-model" },
  test_configuration: {},
  inference_setup: {},
};
