// packages/adaptive-client/src/mapper.ts
//
// Pure functions from parsed wire payloads to domain records.
// This module has NO side-effects and NO I/O. Every function either returns
// a fully-typed record or throws MalformedResponseError /
// UnrecognizedItemTypeError.

import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type {
  AuthToken,
  ClassicEvalResponse,
  Dataset,
  Item,
  ItemResponse,
  MeResponse,
  MultipleChoiceTextItem,
  Project,
  ReplayResponse,
  RunResponse,
  RunState,
  RunSummary,
  TextChoice,
  UserInfo,
} from "shared-types";
import { MalformedResponseError, UnrecognizedItemTypeError } from "./errors";
import {
  authSchema,
  classicEvalResponseSchema,
  datasetsSchema,
  itemBaseSchema,
  itemResponseSchema,
  meSchema,
  multipleChoiceTextItemSchema,
  projectSchema,
  replayResponseSchema,
  runResponseSchema,
  runStateSchema,
  runSummarySchema,
  type WireAuth,
  type WireClassicEvalResponse,
  type WireDatasets,
  type WireItemBase,
  type WireItemResponse,
  type WireMe,
  type WireMultipleChoiceTextItem,
  type WireProject,
  type WireReplayResponse,
  type WireRunResponse,
  type WireRunState,
  type WireRunSummary,
  type WireUser,
} from "./schemas";

const ajv = new Ajv({ allErrors: false, strict: false });

const validators = {
  runState: ajv.compile<WireRunState>(runStateSchema),
  itemBase: ajv.compile<WireItemBase>(itemBaseSchema),
  multipleChoiceTextItem: ajv.compile<WireMultipleChoiceTextItem>(multipleChoiceTextItemSchema),
  runResponse: ajv.compile<WireRunResponse>(runResponseSchema),
  itemResponse: ajv.compile<WireItemResponse>(itemResponseSchema),
  runSummary: ajv.compile<WireRunSummary>(runSummarySchema),
  replayResponse: ajv.compile<WireReplayResponse>(replayResponseSchema),
  datasets: ajv.compile<WireDatasets>(datasetsSchema),
  me: ajv.compile<WireMe>(meSchema),
  project: ajv.compile<WireProject>(projectSchema),
  classicEvalResponse: ajv.compile<WireClassicEvalResponse>(classicEvalResponseSchema),
  auth: ajv.compile<WireAuth>(authSchema),
};

/* ------------------------------------------------------------------ */
/*  Validation helpers                                                 */
/* ------------------------------------------------------------------ */

/** "/choices/0/id" under "$" -> "$.choices[0].id" */
export function jsonPath(base: string, instancePath: string): string {
  let out = base;
  for (const seg of instancePath.split("/").slice(1)) {
    const key = seg.replace(/~1/g, "/").replace(/~0/g, "~");
    out += /^\d+$/.test(key) ? `[${key}]` : `.${key}`;
  }
  return out;
}

function toMalformed(errors: ErrorObject[] | null | undefined, base: string): MalformedResponseError {
  const first = errors?.[0];
  if (!first) return new MalformedResponseError(`Malformed response at ${base}`, { path: base });

  const at = jsonPath(base, first.instancePath);
  if (first.keyword === "required") {
    const key = String(first.params.missingProperty);
    return new MalformedResponseError(`Missing required key "${key}" at ${at}`, { path: `${at}.${key}`, key });
  }
  return new MalformedResponseError(`Malformed response at ${at}: ${first.message ?? first.keyword}`, { path: at });
}

function check<T>(validate: ValidateFunction<T>, json: unknown, path: string): T {
  if (validate(json)) return json;
  throw toMalformed(validate.errors, path);
}

/* ------------------------------------------------------------------ */
/*  Dates                                                              */
/* ------------------------------------------------------------------ */

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function offsetMinutes(tz: string | undefined): number {
  if (tz === undefined || tz === "Z" || tz === "z") return 0;
  const sign = tz.startsWith("-") ? -1 : 1;
  const digits = tz.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/** ISO-8601 date or date-time. No offset means UTC. Fractions beyond
 *  milliseconds are truncated. */
export function parseIsoDate(raw: string, path: string): Date {
  const m = ISO_RE.exec(raw.trim());
  const fail = () => new MalformedResponseError(`Invalid ISO-8601 date at ${path}: ${raw}`, { path });
  if (!m) throw fail();

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4] ?? "0");
  const minute = Number(m[5] ?? "0");
  const second = Number(m[6] ?? "0");
  const millis = Number(`${m[7] ?? ""}000`.slice(0, 3));

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) throw fail();

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  if (new Date(utc).getUTCDate() !== day) throw fail();

  return new Date(utc - offsetMinutes(m[8]) * 60_000);
}

function optionalDate(raw: string | null | undefined, path: string): Date | null {
  return raw ? parseIsoDate(raw, path) : null;
}

/* ------------------------------------------------------------------ */
/*  Items                                                              */
/* ------------------------------------------------------------------ */

function toMultipleChoiceTextItem(json: unknown, path: string): MultipleChoiceTextItem {
  const wire = check(validators.multipleChoiceTextItem, json, path);
  const seen = new Set<string>();
  const choices: TextChoice[] = wire.choices.map((c, idx) => {
    const at = `${path}.choices[${idx}]`;
    const text = c.text ?? c.value;
    if (text === undefined) {
      throw new MalformedResponseError(`Missing required key "text" at ${at}`, { path: `${at}.text`, key: "text" });
    }
    if (seen.has(c.id)) {
      throw new MalformedResponseError(`Duplicate choice id "${c.id}" at ${at}`, { path: `${at}.id` });
    }
    seen.add(c.id);
    return { id: c.id, text };
  });
  return { type: "multiple_choice_text", id: wire.id, question: wire.question, choices };
}

/** Payloads without a `type` that carry question and choices are the
 *  service's legacy multiple-choice shape. */
function legacyItemType(base: WireItemBase): string {
  return base.question !== undefined && base.choices !== undefined ? "multiple_choice_text" : "unknown";
}

export function toItem(json: unknown, path = "$"): Item {
  const base = check(validators.itemBase, json, path);
  const itemType = base.type ?? legacyItemType(base);
  switch (itemType) {
    case "multiple_choice_text":
      return toMultipleChoiceTextItem(json, path);
    default:
      throw new UnrecognizedItemTypeError(itemType);
  }
}

function toItems(json: unknown[] | undefined, path: string): Item[] {
  return (json ?? []).map((item, idx) => toItem(item, `${path}[${idx}]`));
}

/* ------------------------------------------------------------------ */
/*  Runs                                                               */
/* ------------------------------------------------------------------ */

export function toRunState(json: unknown, path = "$"): RunState {
  const wire = check(validators.runState, json, path);
  const state: RunState = {
    responses: wire.responses ?? [],
    thetas: wire.thetas ?? [],
    std_error_history: wire.std_error_history ?? [],
    kl_info_history: wire.kl_info_history ?? [],
    effective_difficulties: wire.effective_difficulties ?? [],
  };
  if (state.thetas.length !== state.std_error_history.length) {
    throw new MalformedResponseError(
      `thetas and std_error_history differ in length at ${path} (${state.thetas.length} vs ${state.std_error_history.length})`,
      { path }
    );
  }
  return state;
}

export function toRunResponse(json: unknown): RunResponse {
  const wire = check(validators.runResponse, json, "$");
  return {
    run_info: { id: wire.runInfo.id },
    state: toRunState(wire.state, "$.state"),
    next_item: wire.nextItem ? toItem(wire.nextItem, "$.nextItem") : null,
    completed: wire.completed ?? false,
  };
}

export function toItemResponses(json: unknown[] | undefined, path: string): ItemResponse[] {
  return (json ?? []).map((entry, idx) => {
    const wire = check(validators.itemResponse, entry, `${path}[${idx}]`);
    return { dataset_item_id: wire.datasetItemId, value: wire.value, correct: wire.correct };
  });
}

export function toRunSummary(json: unknown): RunSummary {
  const wire = check(validators.runSummary, json, "$");
  return {
    id: wire.id,
    dataset_id: wire.datasetId,
    dataset: toItems(wire.dataset, "$.dataset"),
    responses: toItemResponses(wire.responses, "$.responses"),
    state: toRunState(wire.state, "$.state"),
    completed: wire.completed ?? false,
    metadata: wire.metadata ?? {},
  };
}

export function toReplayResponse(json: unknown): ReplayResponse {
  const wire = check(validators.replayResponse, json, "$");
  return {
    id: wire.id,
    dataset_id: wire.datasetId,
    state: toRunState(wire.state, "$.state"),
    replay_of_run: wire.replayOfRun,
    completed_at: optionalDate(wire.completedAt, "$.completedAt"),
    created_at: optionalDate(wire.createdAt, "$.createdAt"),
    metadata: wire.metadata ?? {},
    dataset: toItems(wire.dataset, "$.dataset"),
    responses: toItemResponses(wire.responses, "$.responses"),
  };
}

/* ------------------------------------------------------------------ */
/*  Accounts, datasets, projects, classic evaluation                   */
/* ------------------------------------------------------------------ */

export function toDatasets(json: unknown): Dataset[] {
  const wire = check(validators.datasets, json, "$");
  return wire.data.map((d) => ({ id: d.id, name: d.name }));
}

function toUserInfo(wire: WireUser, path: string): UserInfo {
  return {
    id: wire.id,
    email: wire.email,
    firstname: wire.firstname,
    lastname: wire.lastname,
    created_at: optionalDate(wire.createdAt, `${path}.createdAt`),
  };
}

export function toMeResponse(json: unknown): MeResponse {
  const wire = check(validators.me, json, "$");
  const org = wire.organization;
  return {
    user: toUserInfo(wire.user, "$.user"),
    organization: { id: org.id, name: org.name, type: org.type, role: org.role },
  };
}

export function toProject(json: unknown): Project {
  const wire = check(validators.project, json, "$");
  return {
    id: wire.id,
    name: wire.name,
    description: wire.description ?? null,
    account_id: wire.accountId,
    created_at: parseIsoDate(wire.createdAt, "$.createdAt"),
    updated_at: parseIsoDate(wire.updatedAt, "$.updatedAt"),
  };
}

export function toClassicEvalResponse(json: unknown): ClassicEvalResponse {
  const wire = check(validators.classicEvalResponse, json, "$");
  return {
    id: wire.id,
    organization_id: wire.organizationId,
    project_id: wire.projectId,
    experiment_id: wire.experimentId,
    experiment_name: wire.experimentName,
    dataset_id: wire.datasetId,
    user_id: wire.userId,
    type: wire.type,
    model_name: wire.modelName,
    hyperparameters: wire.hyperparameters ?? {},
    created_at: parseIsoDate(wire.createdAt, "$.createdAt"),
    user: toUserInfo(wire.user, "$.user"),
    response_count: wire.responseCount,
  };
}

export function toAuthToken(json: unknown): AuthToken {
  const wire = check(validators.auth, json, "$");
  return { token: wire.token, expires: parseIsoDate(wire.expires, "$.expires") };
}
