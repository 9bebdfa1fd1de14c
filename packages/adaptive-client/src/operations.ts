// packages/adaptive-client/src/operations.ts
//
// One request descriptor per API operation, shared by the async and the
// blocking client. A descriptor says what to send and how to decode a 2xx
// body; `completeOperation` turns the raw session response into a record
// or a classified error. Building and completing are both pure.

import type {
  AuthToken,
  ClassicEvalRequest,
  ClassicEvalResponse,
  Dataset,
  MeResponse,
  MetricValueType,
  Project,
  ReplayRequestItem,
  ReplayResponse,
  RunMetadata,
  RunResponse,
  RunSummary,
} from "shared-types";
import { AdaptiveEvalError, ApiError, PayloadTooLargeError, ValidationError } from "./errors";
import type { HttpMethod, HttpResponse } from "./http";
import {
  toAuthToken,
  toClassicEvalResponse,
  toDatasets,
  toMeResponse,
  toProject,
  toReplayResponse,
  toRunResponse,
  toRunSummary,
} from "./mapper";

export type Operation<T> = {
  /** Used in log lines and error messages. */
  name: string;
  method: HttpMethod;
  path: string;
  body?: unknown;
  decode: (json: unknown) => T;
};

/* ------------------------------------------------------------------ */
/*  Descriptors                                                        */
/* ------------------------------------------------------------------ */

export function listDatasetsOp(): Operation<Dataset[]> {
  return { name: "list datasets", method: "GET", path: "datasets", decode: toDatasets };
}

export function startRunOp(
  datasetId: string,
  projectId: string,
  experiment: string,
  metadata?: RunMetadata | Record<string, unknown>
): Operation<RunResponse> {
  return {
    name: "start run",
    method: "POST",
    path: "runs/start",
    body: { datasetId, projectId, experiment, metadata: metadata ?? {} },
    decode: toRunResponse,
  };
}

export function continueRunOp(runId: string, itemChoiceId: string): Operation<RunResponse> {
  return {
    name: "continue run",
    method: "POST",
    path: "runs/continue",
    body: { itemChoiceId, runId },
    decode: toRunResponse,
  };
}

export function runSummaryOp(runId: string): Operation<RunSummary> {
  return {
    name: "run summary",
    method: "GET",
    path: `runs/adaptive/${encodeURIComponent(runId)}`,
    decode: toRunSummary,
  };
}

export function submitReplayOp(
  runId: string,
  responses: ReplayRequestItem[],
  metadata?: RunMetadata | Record<string, unknown>
): Operation<ReplayResponse> {
  assertUniqueReplayItems(responses);
  return {
    name: "submit replay",
    method: "POST",
    path: `runs/${encodeURIComponent(runId)}/replay`,
    body: {
      responses: responses.map((r) => ({ itemId: r.item_id, itemChoiceId: r.item_choice_id })),
      metadata: metadata ?? {},
    },
    decode: toReplayResponse,
  };
}

export function submitClassicEvalOp(request: ClassicEvalRequest): Operation<ClassicEvalResponse> {
  return {
    name: "submit classic evaluation",
    method: "POST",
    path: "runs/classic",
    body: {
      projectId: request.project_id,
      experimentName: request.experiment_name,
      datasetId: request.dataset_id,
      modelName: request.model_name,
      hyperparameters: request.hyperparameters,
      items: request.items.map((it) => ({
        datasetItemId: it.dataset_item_id,
        modelInput: it.model_input,
        modelOutput: it.model_output,
        goldOutput: it.gold_output,
        metrics: it.metrics,
      })),
      metrics: request.metrics.map((m) => ({
        metricId: m.metric_id,
        valueType: metricValueType(m.value),
        value: m.value,
      })),
    },
    decode: toClassicEvalResponse,
  };
}

export function meOp(): Operation<MeResponse> {
  return { name: "caller identity", method: "GET", path: "../admin/api-keys/me", decode: toMeResponse };
}

export type CreateProjectOptions = {
  teamId?: string;
  description?: string;
};

export function createProjectOp(name: string, options: CreateProjectOptions = {}): Operation<Project> {
  return {
    name: "create project",
    method: "POST",
    path: "../admin/public/projects",
    body: {
      name,
      ...(options.teamId !== undefined ? { teamId: options.teamId } : {}),
      ...(options.description !== undefined ? { description: options.description } : {}),
    },
    decode: toProject,
  };
}

export function authenticateOp(apiKey: string): Operation<AuthToken> {
  return { name: "authenticate", method: "POST", path: "client/auth", body: { apiKey }, decode: toAuthToken };
}

export function refreshTokenOp(): Operation<AuthToken> {
  return { name: "refresh token", method: "GET", path: "client/token", decode: toAuthToken };
}

/* ------------------------------------------------------------------ */
/*  Request-side checks                                                */
/* ------------------------------------------------------------------ */

export function metricValueType(value: unknown): MetricValueType {
  switch (typeof value) {
    case "string":
      return "String";
    case "boolean":
      return "Boolean";
    case "number":
      if (Number.isInteger(value)) return "Integer";
      if (Number.isFinite(value)) return "Float";
      break;
  }
  const kind = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  throw new ValidationError(`Unsupported metric value type: ${kind}. Supported types: string, number, boolean`);
}

export function assertUniqueReplayItems(items: ReplayRequestItem[]): void {
  const seen = new Set<string>();
  for (const it of items) {
    if (seen.has(it.item_id)) {
      throw new ValidationError(`Duplicate item id in replay request: ${it.item_id}`);
    }
    seen.add(it.item_id);
  }
}

/* ------------------------------------------------------------------ */
/*  Response classification                                            */
/* ------------------------------------------------------------------ */

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

/** `detail` is either a plain string or a list of `{ msg }` entries. */
function detailText(body: unknown): string | undefined {
  const detail = field(body, "detail");
  if (typeof detail === "string" && detail) return detail;
  if (Array.isArray(detail)) {
    const msgs = detail
      .map((d) => {
        const msg = field(d, "msg");
        return typeof msg === "string" ? msg : typeof d === "string" ? d : JSON.stringify(d);
      })
      .filter((m) => m.length > 0);
    return msgs.length ? msgs.join("; ") : undefined;
  }
  return undefined;
}

function stringField(body: unknown, key: string): string | undefined {
  const v = field(body, key);
  return typeof v === "string" && v ? v : undefined;
}

/** Map a non-2xx response to the matching error class. */
export function classifyFailure(res: HttpResponse): ApiError {
  const body = parseJson(res.text);
  const detail = detailText(body);

  if (res.status === 413) return new PayloadTooLargeError(detail ?? "Payload too large.");
  if (res.status === 422) return new ValidationError(detail ?? "Validation failed.", { status: 422 });

  const title = stringField(body, "title");
  const message =
    (title && detail ? `${title}: ${detail}` : undefined) ??
    detail ??
    title ??
    stringField(body, "message") ??
    (res.text.trim() ? res.text.trim() : undefined) ??
    `HTTP ${res.status}`;
  return new ApiError(message, { status: res.status });
}

export function completeOperation<T>(op: Operation<T>, res: HttpResponse): T {
  if (res.status < 200 || res.status >= 300) throw classifyFailure(res);

  let json: unknown;
  try {
    json = JSON.parse(res.text);
  } catch (err) {
    throw new ApiError(`${op.name}: response body is not valid JSON`, { status: res.status, cause: err });
  }
  return op.decode(json);
}

/** Session-level failures (network, timeout, closed session) become ApiError. */
export function wrapTransportError(op: Operation<unknown>, err: unknown): AdaptiveEvalError {
  if (err instanceof AdaptiveEvalError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ApiError(`${op.name} failed: ${reason}`, { cause: err });
}
