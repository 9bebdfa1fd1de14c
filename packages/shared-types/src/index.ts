// packages/shared-types/src/index.ts
//
// Canonical domain records shared by adaptive-client, runner and mock-service.
// Types only, no runtime logic.
//
// Field names are snake_case; the wire protocol is camelCase and the
// client's mapper translates between the two.

/* ------------------------------------------------------------------ */
/*  Items                                                              */
/* ------------------------------------------------------------------ */

export type TextChoice = {
    id: string;
    text: string;
};

export type MultipleChoiceTextItem = {
    type: "multiple_choice_text";
    id: string;
    question: string;
    choices: TextChoice[];
};

/** Closed union of every item shape the client knows how to present. */
export type Item = MultipleChoiceTextItem;

export type ItemType = Item["type"];

/* ------------------------------------------------------------------ */
/*  Run state                                                          */
/* ------------------------------------------------------------------ */

/** Append-only scoring history. `thetas` and `std_error_history` always
 *  have the same length and grow by one per answered item. */
export type RunState = {
    responses: string[];
    thetas: number[];
    std_error_history: number[];
    kl_info_history: number[];
    effective_difficulties: number[];
};

export type RunInfo = {
    id: string;
};

export type RunResponse = {
    run_info: RunInfo;
    state: RunState;
    /** Null once the run is completed. */
    next_item: Item | null;
    completed: boolean;
};

/** One snapshot kept by the orchestrator per round trip. */
export type AdaptiveTestState = {
    run_id: string;
    state: RunState;
    completed: boolean;
};

export type ItemResponse = {
    dataset_item_id: string;
    value: unknown;
    correct: boolean;
};

export type RunSummary = {
    id: string;
    dataset_id: string;
    /** Items in original presentation order. */
    dataset: Item[];
    responses: ItemResponse[];
    state: RunState;
    completed: boolean;
    metadata: Record<string, unknown>;
};

/* ------------------------------------------------------------------ */
/*  Replay                                                             */
/* ------------------------------------------------------------------ */

export type ReplayRequestItem = {
    item_id: string;
    item_choice_id: string;
};

export type ReplayRequest = {
    responses: ReplayRequestItem[];
};

export type ReplayResponse = {
    id: string;
    dataset_id: string;
    state: RunState;
    replay_of_run: string;
    completed_at: Date | null;
    created_at: Date | null;
    metadata: Record<string, unknown>;
    dataset: Item[];
    responses: ItemResponse[];
};

/* ------------------------------------------------------------------ */
/*  Results                                                            */
/* ------------------------------------------------------------------ */

export type Score = {
    theta: number;
    std_error: number;
};

export type RunResults = {
    run_id: string;
    score?: Score;
    responses?: ItemResponse[];
};

/** Called with (current, total) before each item and once more with
 *  (count, count) when the run is over. */
export type ProgressCallback = (current: number, total: number) => void;

/* ------------------------------------------------------------------ */
/*  Metadata                                                           */
/* ------------------------------------------------------------------ */

export type ModelMetadata = {
    name: string;
    [key: string]: unknown;
};

/** Descriptive payload attached to a run or replay. Sent as-is. */
export type RunMetadata = {
    model_metadata: ModelMetadata;
    test_configuration: Record<string, unknown>;
    inference_setup: Record<string, unknown>;
};

/* ------------------------------------------------------------------ */
/*  Accounts, datasets, projects                                       */
/* ------------------------------------------------------------------ */

export type AuthToken = {
    token: string;
    expires: Date;
};

export type Dataset = {
    id: string;
    name: string;
};

export type UserInfo = {
    id: string;
    email: string;
    firstname: string;
    lastname: string;
    created_at: Date | null;
};

export type Organization = {
    id: string;
    name: string;
    type: string;
    role: string;
};

export type MeResponse = {
    user: UserInfo;
    organization: Organization;
};

export type Project = {
    id: string;
    name: string;
    description: string | null;
    account_id: string;
    created_at: Date;
    updated_at: Date;
};

/* ------------------------------------------------------------------ */
/*  Classic evaluation                                                 */
/* ------------------------------------------------------------------ */

export type MetricValue = string | number | boolean;

export type MetricValueType = "String" | "Float" | "Integer" | "Boolean";

export type ClassicEvalItem = {
    dataset_item_id: string;
    model_input: string;
    model_output: string;
    gold_output: string;
    metrics: Record<string, unknown>;
};

export type ClassicEvalMetric = {
    metric_id: string;
    value: MetricValue;
};

export type ClassicEvalRequest = {
    project_id: string;
    experiment_name: string;
    dataset_id: string;
    model_name: string;
    hyperparameters: Record<string, unknown>;
    items: ClassicEvalItem[];
    metrics: ClassicEvalMetric[];
};

export type ClassicEvalResponse = {
    id: string;
    organization_id: string;
    project_id: string;
    experiment_id: string;
    experiment_name: string;
    dataset_id: string;
    user_id: string;
    type: string;
    model_name: string;
    hyperparameters: Record<string, unknown>;
    created_at: Date;
    user: UserInfo;
    response_count: number;
};
