// packages/adaptive-client/src/syncClient.ts
//
// Blocking twin of AdaptiveClient. Same operations, same descriptors and
// the same error classification; every call returns only once the round
// trip is over.

import type {
  AuthToken,
  ClassicEvalRequest,
  ClassicEvalResponse,
  Dataset,
  MeResponse,
  Project,
  ReplayRequestItem,
  ReplayResponse,
  RunResponse,
  RunSummary,
} from "shared-types";
import { bearer, sessionHeaders, tokenAction } from "./auth";
import type { ClientInit } from "./client";
import { resolveConfig, type ClientConfig } from "./config";
import type { SyncRunTransport } from "./driver";
import type { HttpResponse, SyncHttpSession } from "./http";
import {
  authenticateOp,
  completeOperation,
  continueRunOp,
  createProjectOp,
  listDatasetsOp,
  meOp,
  refreshTokenOp,
  runSummaryOp,
  startRunOp,
  submitClassicEvalOp,
  submitReplayOp,
  wrapTransportError,
  type CreateProjectOptions,
  type Operation,
} from "./operations";
import type { Metadata } from "./protocol";
import { WorkerFetchSession } from "./workerSession";

export class AdaptiveSyncClient implements SyncRunTransport {
  readonly config: ClientConfig;
  private readonly session: SyncHttpSession;
  private readonly ownsSession: boolean;
  private readonly now: () => number;
  private token: AuthToken | null = null;
  private closed = false;

  constructor(init: ClientInit<SyncHttpSession> = {}) {
    this.config = resolveConfig(init);
    this.now = init.now ?? Date.now;
    this.ownsSession = init.session === undefined;
    this.session =
      init.session ??
      new WorkerFetchSession(
        {
          baseUrl: this.config.serviceUrl,
          headers: sessionHeaders(this.config),
          timeoutMs: this.config.timeoutMs,
        },
        this.config.logger
      );
  }

  private send<T>(op: Operation<T>, headers?: Record<string, string>): T {
    const { logger } = this.config;
    logger.debug("request", { operation: op.name, method: op.method, path: op.path });
    let res: HttpResponse;
    try {
      res = this.session.send({ method: op.method, path: op.path, body: op.body, headers });
    } catch (err) {
      throw wrapTransportError(op, err);
    }
    logger.debug("response", { operation: op.name, status: res.status });
    return completeOperation(op, res);
  }

  private call<T>(op: Operation<T>): T {
    if (this.config.authMode === "api-key") return this.send(op);

    const action = tokenAction(this.token, this.now());
    const token =
      action === "authenticate" ? this.authenticate() : action === "refresh" ? this.refreshToken() : this.token;
    return this.send(op, token ? bearer(token) : undefined);
  }

  /* ---- legacy token surface ---- */

  authenticate(): AuthToken {
    this.token = this.send(authenticateOp(this.config.apiKey));
    return this.token;
  }

  refreshToken(): AuthToken {
    const current = this.token ?? this.authenticate();
    this.token = this.send(refreshTokenOp(), bearer(current));
    return this.token;
  }

  /* ---- operations ---- */

  listDatasets(): Dataset[] {
    return this.call(listDatasetsOp());
  }

  startRun(datasetId: string, projectId: string, experiment: string, metadata?: Metadata): RunResponse {
    return this.call(startRunOp(datasetId, projectId, experiment, metadata));
  }

  continueRun(runId: string, itemChoiceId: string): RunResponse {
    return this.call(continueRunOp(runId, itemChoiceId));
  }

  runSummary(runId: string): RunSummary {
    return this.call(runSummaryOp(runId));
  }

  submitReplay(runId: string, responses: ReplayRequestItem[], metadata?: Metadata): ReplayResponse {
    return this.call(submitReplayOp(runId, responses, metadata));
  }

  submitClassicEval(request: ClassicEvalRequest): ClassicEvalResponse {
    return this.call(submitClassicEvalOp(request));
  }

  me(): MeResponse {
    return this.call(meOp());
  }

  createProject(name: string, options?: CreateProjectOptions): Project {
    return this.call(createProjectOp(name, options));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsSession) this.session.close();
  }
}

export function withSyncClient<T>(init: ClientInit<SyncHttpSession>, fn: (client: AdaptiveSyncClient) => T): T {
  const client = new AdaptiveSyncClient(init);
  try {
    return fn(client);
  } finally {
    client.close();
  }
}
