// apps/mock-service/src/schemas.ts
//
// Request bodies the stand-in service accepts, and the dataset seed file.
// Checked with ajv so handlers get typed bodies.

import Ajv, { type ErrorObject } from "ajv";

export type SeedChoice = { id: string; text: string };

export type SeedItem = {
  id: string;
  question: string;
  choices: SeedChoice[];
  /** Correct choice id. Never sent to clients. */
  answer: string;
};

export type SeedDataset = { id: string; name: string; items: SeedItem[] };

export type SeedFile = { datasets: SeedDataset[] };

export type StartRunBody = {
  datasetId: string;
  projectId: string;
  experiment: string;
  metadata?: Record<string, unknown>;
};

export type ContinueRunBody = { runId: string; itemChoiceId: string };

export type ReplayBody = {
  responses: { itemId: string; itemChoiceId: string }[];
  metadata?: Record<string, unknown>;
};

export type ClassicEvalBody = {
  projectId: string;
  experimentName: string;
  datasetId: string;
  modelName: string;
  hyperparameters?: Record<string, unknown>;
  items: { datasetItemId: string; modelInput: string; modelOutput: string; goldOutput: string; metrics?: Record<string, unknown> }[];
  metrics: { metricId: string; valueType: "String" | "Float" | "Integer" | "Boolean"; value: string | number | boolean }[];
};

export type AuthBody = { apiKey: string };

export type CreateProjectBody = { name: string; teamId?: string; description?: string };

const str = { type: "string" } as const;
const nonEmpty = { type: "string", minLength: 1 } as const;
const obj = { type: "object" } as const;

const seedFileSchema = {
  type: "object",
  required: ["datasets"],
  properties: {
    datasets: {
      type: "array",
      items: {
        type: "object",
        required: ["id", "name", "items"],
        properties: {
          id: str,
          name: str,
          items: {
            type: "array",
            items: {
              type: "object",
              required: ["id", "question", "choices", "answer"],
              properties: {
                id: str,
                question: str,
                answer: str,
                choices: {
                  type: "array",
                  minItems: 1,
                  items: { type: "object", required: ["id", "text"], properties: { id: str, text: str } },
                },
              },
            },
          },
        },
      },
    },
  },
} as const;

const startRunSchema = {
  type: "object",
  required: ["datasetId", "projectId", "experiment"],
  properties: { datasetId: nonEmpty, projectId: nonEmpty, experiment: nonEmpty, metadata: obj },
} as const;

const continueRunSchema = {
  type: "object",
  required: ["runId", "itemChoiceId"],
  properties: { runId: nonEmpty, itemChoiceId: nonEmpty },
} as const;

const replaySchema = {
  type: "object",
  required: ["responses"],
  properties: {
    responses: {
      type: "array",
      items: {
        type: "object",
        required: ["itemId", "itemChoiceId"],
        properties: { itemId: nonEmpty, itemChoiceId: nonEmpty },
      },
    },
    metadata: obj,
  },
} as const;

const classicEvalSchema = {
  type: "object",
  required: ["projectId", "experimentName", "datasetId", "modelName", "items", "metrics"],
  properties: {
    projectId: nonEmpty,
    experimentName: nonEmpty,
    datasetId: nonEmpty,
    modelName: nonEmpty,
    hyperparameters: obj,
    items: {
      type: "array",
      items: {
        type: "object",
        required: ["datasetItemId", "modelInput", "modelOutput", "goldOutput"],
        properties: { datasetItemId: str, modelInput: str, modelOutput: str, goldOutput: str, metrics: obj },
      },
    },
    metrics: {
      type: "array",
      items: {
        type: "object",
        required: ["metricId", "valueType", "value"],
        properties: {
          metricId: nonEmpty,
          valueType: { enum: ["String", "Float", "Integer", "Boolean"] },
          value: { type: ["string", "number", "boolean"] },
        },
      },
    },
  },
} as const;

const authSchema = {
  type: "object",
  required: ["apiKey"],
  properties: { apiKey: str },
} as const;

const createProjectSchema = {
  type: "object",
  required: ["name"],
  properties: { name: nonEmpty, teamId: str, description: str },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });

export const validate = {
  seedFile: ajv.compile<SeedFile>(seedFileSchema),
  startRun: ajv.compile<StartRunBody>(startRunSchema),
  continueRun: ajv.compile<ContinueRunBody>(continueRunSchema),
  replay: ajv.compile<ReplayBody>(replaySchema),
  classicEval: ajv.compile<ClassicEvalBody>(classicEvalSchema),
  auth: ajv.compile<AuthBody>(authSchema),
  createProject: ajv.compile<CreateProjectBody>(createProjectSchema),
};

/** ajv errors as the `{ msg }` list a 422 `detail` carries. */
export function toDetail(errors: ErrorObject[] | null | undefined): { msg: string }[] {
  return (errors ?? []).map((e) => ({ msg: `${e.instancePath || "body"} ${e.message ?? e.keyword}` }));
}
