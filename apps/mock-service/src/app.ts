// apps/mock-service/src/app.ts
//
// express app standing in for the evaluation service. Adaptive-testing
// routes live under /adaptive-testing, account and project routes under
// /admin, next to each other the way the real deployment lays them out.

import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from "express";
import type { ValidateFunction } from "ajv";
import { loadSeed, MockStore, StoreError, type StoredRun } from "./store";
import { toDetail, validate, type SeedDataset, type SeedItem } from "./schemas";

export const METADATA_LIMIT_BYTES = 10 * 1024;
const TOKEN_TTL_MS = 60 * 60_000;

export type MockServiceOptions = {
  apiKey: string;
  /** Answers after which the service ends a run. Default 60. */
  maxItems?: number;
  datasets?: SeedDataset[];
  now?: () => Date;
};

/* ------------------------------------------------------------------ */
/*  Wire rendering                                                     */
/* ------------------------------------------------------------------ */

function wireItem(item: SeedItem) {
  return { type: "multiple_choice_text", id: item.id, question: item.question, choices: item.choices };
}

function wireRun(run: StoredRun, nextItem: SeedItem | null) {
  return {
    runInfo: { id: run.id },
    state: run.state,
    nextItem: nextItem ? wireItem(nextItem) : null,
    completed: run.completed,
  };
}

function wireSummary(run: StoredRun) {
  return {
    id: run.id,
    datasetId: run.datasetId,
    dataset: run.presented.map(wireItem),
    responses: run.answers,
    state: run.state,
    completed: run.completed,
    metadata: run.metadata,
  };
}

function wireReplay(run: StoredRun) {
  return {
    id: run.id,
    datasetId: run.datasetId,
    state: run.state,
    replayOfRun: run.replayOf,
    completedAt: run.completedAt?.toISOString() ?? null,
    createdAt: run.createdAt.toISOString(),
    metadata: run.metadata,
    dataset: run.presented.map(wireItem),
    responses: run.answers,
  };
}

/* ------------------------------------------------------------------ */
/*  Request helpers                                                    */
/* ------------------------------------------------------------------ */

function fail(res: Response, status: number, title: string, detail: unknown): void {
  res.status(status).json({ title, detail });
}

/** Typed body or a 422 with the validation messages. */
function bodyOf<T>(req: Request, res: Response, check: ValidateFunction<T>): T | null {
  const body: unknown = req.body ?? {};
  if (check(body)) return body;
  fail(res, 422, "Unprocessable Entity", toDetail(check.errors));
  return null;
}

function metadataTooLarge(res: Response, metadata: Record<string, unknown> | undefined): boolean {
  const size = Buffer.byteLength(JSON.stringify(metadata ?? {}), "utf8");
  if (size <= METADATA_LIMIT_BYTES) return false;
  fail(res, 413, "Payload Too Large", `Metadata is ${size} bytes; the limit is ${METADATA_LIMIT_BYTES} bytes`);
  return true;
}

function guarded(handler: (req: Request, res: Response) => void) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      handler(req, res);
    } catch (err) {
      if (err instanceof StoreError) {
        fail(res, err.status, err.title, err.message);
        return;
      }
      next(err);
    }
  };
}

function httpStatusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

/* ------------------------------------------------------------------ */
/*  App                                                                */
/* ------------------------------------------------------------------ */

export function createApp(options: MockServiceOptions) {
  const now = options.now ?? (() => new Date());
  const store = new MockStore({
    datasets: options.datasets ?? loadSeed().datasets,
    maxItems: options.maxItems ?? 60,
    now,
  });
  const tokens = new Map<string, Date>();

  const user = {
    id: "user-1",
    email: "dev@example.com",
    firstname: "Local",
    lastname: "Developer",
    createdAt: "2024-01-01T00:00:00Z",
  };
  const organization = { id: "org-1", name: "Local organization", type: "personal", role: "owner" };

  function authorized(req: Request): boolean {
    if (req.header("x-api-key") === options.apiKey) return true;
    const auth = req.header("authorization");
    if (!auth?.startsWith("Bearer ")) return false;
    const expires = tokens.get(auth.slice("Bearer ".length));
    return expires !== undefined && expires.getTime() > now().getTime();
  }

  function issueToken(): { token: string; expires: string } {
    const token = store.nextId("token");
    const expires = new Date(now().getTime() + TOKEN_TTL_MS);
    tokens.set(token, expires);
    return { token, expires: expires.toISOString() };
  }

  const requireAuth = (req: Request, res: Response, next: NextFunction) => {
    if (authorized(req)) {
      next();
      return;
    }
    fail(res, 401, "Unauthorized", "Missing or invalid API key");
  };

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  /* ---- adaptive testing ---- */

  const api = express.Router();

  api.post(
    "/client/auth",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.auth);
      if (!body) return;
      if (body.apiKey !== options.apiKey) {
        fail(res, 401, "Unauthorized", "Invalid API key");
        return;
      }
      res.json(issueToken());
    })
  );

  api.use(requireAuth);

  api.get("/client/token", (_req: Request, res: Response) => {
    res.json(issueToken());
  });

  api.get("/datasets", (_req: Request, res: Response) => {
    res.json({ data: store.listDatasets().map((d) => ({ id: d.id, name: d.name, size: d.items.length })) });
  });

  api.post(
    "/runs/start",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.startRun);
      if (!body || metadataTooLarge(res, body.metadata)) return;
      const run = store.startRun(body.datasetId, body.projectId, body.experiment, body.metadata ?? {});
      res.json(wireRun(run, store.pendingItem(run)));
    })
  );

  api.post(
    "/runs/continue",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.continueRun);
      if (!body) return;
      const run = store.continueRun(body.runId, body.itemChoiceId);
      res.json(wireRun(run, store.pendingItem(run)));
    })
  );

  api.get(
    "/runs/adaptive/:runId",
    guarded((req, res) => {
      res.json(wireSummary(store.run(String(req.params.runId))));
    })
  );

  api.post(
    "/runs/:runId/replay",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.replay);
      if (!body || metadataTooLarge(res, body.metadata)) return;
      const run = store.replay(String(req.params.runId), body.responses, body.metadata ?? {});
      res.json(wireReplay(run));
    })
  );

  api.post(
    "/runs/classic",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.classicEval);
      if (!body) return;
      store.dataset(body.datasetId);
      const mismatch = body.metrics.find(
        (m) =>
          (m.valueType === "String" && typeof m.value !== "string") ||
          (m.valueType === "Boolean" && typeof m.value !== "boolean") ||
          (m.valueType === "Integer" && !Number.isInteger(m.value)) ||
          (m.valueType === "Float" && typeof m.value !== "number")
      );
      if (mismatch) {
        fail(res, 422, "Unprocessable Entity", `Metric ${mismatch.metricId} is not a ${mismatch.valueType}`);
        return;
      }
      res.json({
        id: store.nextId("classic"),
        organizationId: organization.id,
        projectId: body.projectId,
        experimentId: store.nextId("experiment"),
        experimentName: body.experimentName,
        datasetId: body.datasetId,
        userId: user.id,
        type: "Classic",
        modelName: body.modelName,
        hyperparameters: body.hyperparameters ?? {},
        createdAt: now().toISOString(),
        user,
        responseCount: body.items.length,
      });
    })
  );

  /* ---- admin ---- */

  const admin = express.Router();
  admin.use(requireAuth);

  admin.get("/api-keys/me", (_req: Request, res: Response) => {
    res.json({ user, organization });
  });

  admin.post(
    "/public/projects",
    guarded((req, res) => {
      const body = bodyOf(req, res, validate.createProject);
      if (!body) return;
      const at = now().toISOString();
      res.status(201).json({
        id: store.nextId("project"),
        name: body.name,
        description: body.description ?? null,
        accountId: body.teamId ?? organization.id,
        createdAt: at,
        updatedAt: at,
      });
    })
  );

  app.use("/adaptive-testing", api);
  app.use("/admin", admin);

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = httpStatusOf(err);
    const detail = err instanceof Error ? err.message : String(err);
    if (status >= 500) console.error(`mock-service error: ${detail}`);
    fail(res, status, status === 413 ? "Payload Too Large" : status >= 500 ? "Internal Server Error" : "Bad Request", detail);
  };
  app.use(onError);

  return app;
}
