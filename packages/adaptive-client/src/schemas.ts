// packages/adaptive-client/src/schemas.ts
//
// Wire payload shapes (camelCase, as the service sends them) and the JSON
// schemas that check them. Only keys the mapper reads are described;
// anything else in a payload is ignored.

/* ------------------------------------------------------------------ */
/*  Wire types                                                         */
/* ------------------------------------------------------------------ */

export type WireRunState = {
  responses?: string[];
  thetas?: number[];
  std_error_history?: number[];
  kl_info_history?: number[];
  effective_difficulties?: number[];
};

export type WireItemBase = {
  type?: string;
  question?: unknown;
  choices?: unknown;
};

export type WireChoice = { id: string; text?: string; value?: string };

export type WireMultipleChoiceTextItem = {
  id: string;
  question: string;
  choices: WireChoice[];
};

export type WireRunResponse = {
  runInfo: { id: string };
  state: WireRunState;
  nextItem?: unknown;
  completed?: boolean;
};

export type WireItemResponse = {
  datasetItemId: string;
  value: unknown;
  correct: boolean;
};

export type WireRunSummary = {
  id: string;
  datasetId: string;
  state: WireRunState;
  dataset?: unknown[];
  responses?: unknown[];
  completed?: boolean;
  metadata?: Record<string, unknown>;
};

export type WireReplayResponse = {
  id: string;
  datasetId: string;
  state: WireRunState;
  replayOfRun: string;
  completedAt?: string | null;
  createdAt?: string | null;
  metadata?: Record<string, unknown>;
  dataset?: unknown[];
  responses?: unknown[];
};

export type WireDatasets = { data: { id: string; name: string }[] };

export type WireUser = {
  id: string;
  email: string;
  firstname: string;
  lastname: string;
  createdAt?: string | null;
};

export type WireMe = {
  user: WireUser;
  organization: { id: string; name: string; type: string; role: string };
};

export type WireProject = {
  id: string;
  name: string;
  description?: string | null;
  accountId: string;
  createdAt: string;
  updatedAt: string;
};

export type WireClassicEvalResponse = {
  id: string;
  organizationId: string;
  projectId: string;
  experimentId: string;
  experimentName: string;
  datasetId: string;
  userId: string;
  type: string;
  modelName: string;
  hyperparameters?: Record<string, unknown>;
  createdAt: string;
  user: WireUser;
  responseCount: number;
};

export type WireAuth = { token: string; expires: string };

/* ------------------------------------------------------------------ */
/*  Schemas                                                            */
/* ------------------------------------------------------------------ */

const str = { type: "string" } as const;
const nullableStr = { type: ["string", "null"] } as const;
const obj = { type: "object" } as const;
const numbers = { type: "array", items: { type: "number" } } as const;
const objects = { type: "array", items: obj } as const;

export const runStateSchema = {
  type: "object",
  properties: {
    responses: { type: "array", items: str },
    thetas: numbers,
    std_error_history: numbers,
    kl_info_history: numbers,
    effective_difficulties: numbers,
  },
} as const;

export const itemBaseSchema = {
  type: "object",
  properties: { type: str },
} as const;

export const multipleChoiceTextItemSchema = {
  type: "object",
  required: ["id", "question", "choices"],
  properties: {
    id: str,
    question: str,
    choices: {
      type: "array",
      items: {
        type: "object",
        required: ["id"],
        properties: { id: str, text: str, value: str },
      },
    },
  },
} as const;

export const runResponseSchema = {
  type: "object",
  required: ["runInfo", "state"],
  properties: {
    runInfo: { type: "object", required: ["id"], properties: { id: str } },
    state: obj,
    nextItem: { type: ["object", "null"] },
    completed: { type: "boolean" },
  },
} as const;

export const itemResponseSchema = {
  type: "object",
  required: ["datasetItemId", "value", "correct"],
  properties: {
    datasetItemId: str,
    correct: { type: "boolean" },
  },
} as const;

export const runSummarySchema = {
  type: "object",
  required: ["id", "datasetId", "state"],
  properties: {
    id: str,
    datasetId: str,
    state: obj,
    dataset: objects,
    responses: objects,
    completed: { type: "boolean" },
    metadata: obj,
  },
} as const;

export const replayResponseSchema = {
  type: "object",
  required: ["id", "datasetId", "state", "replayOfRun"],
  properties: {
    id: str,
    datasetId: str,
    state: obj,
    replayOfRun: str,
    completedAt: nullableStr,
    createdAt: nullableStr,
    metadata: obj,
    dataset: objects,
    responses: objects,
  },
} as const;

export const datasetsSchema = {
  type: "object",
  required: ["data"],
  properties: {
    data: {
      type: "array",
      items: { type: "object", required: ["id", "name"], properties: { id: str, name: str } },
    },
  },
} as const;

const userSchema = {
  type: "object",
  required: ["id", "email", "firstname", "lastname"],
  properties: { id: str, email: str, firstname: str, lastname: str, createdAt: nullableStr },
} as const;

export const meSchema = {
  type: "object",
  required: ["user", "organization"],
  properties: {
    user: userSchema,
    organization: {
      type: "object",
      required: ["id", "name", "type", "role"],
      properties: { id: str, name: str, type: str, role: str },
    },
  },
} as const;

export const projectSchema = {
  type: "object",
  required: ["id", "name", "accountId", "createdAt", "updatedAt"],
  properties: {
    id: str,
    name: str,
    description: nullableStr,
    accountId: str,
    createdAt: str,
    updatedAt: str,
  },
} as const;

export const classicEvalResponseSchema = {
  type: "object",
  required: [
    "id",
    "organizationId",
    "projectId",
    "experimentId",
    "experimentName",
    "datasetId",
    "userId",
    "type",
    "modelName",
    "createdAt",
    "user",
    "responseCount",
  ],
  properties: {
    id: str,
    organizationId: str,
    projectId: str,
    experimentId: str,
    experimentName: str,
    datasetId: str,
    userId: str,
    type: str,
    modelName: str,
    hyperparameters: obj,
    createdAt: str,
    user: userSchema,
    responseCount: { type: "integer" },
  },
} as const;

export const authSchema = {
  type: "object",
  required: ["token", "expires"],
  properties: { token: str, expires: str },
} as const;
