// packages/adaptive-client/src/client.ts
//
// Async transport client: one method per API operation, one round trip per
// call, no retries. Owns the session it creates; an injected session is
// borrowed and left open.

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
import { resolveConfig, type ClientConfig, type ClientOptions } from "./config";
import type { RunTransport } from "./driver";
import { FetchSession, type HttpResponse, type HttpSession } from "./http";
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

export type ClientInit<S> = ClientOptions & {
  /** Borrowed session; the client never closes it. */
  session?: S;
  /** Clock for token expiry checks. */
  now?: () => number;
};

export class AdaptiveClient implements RunTransport {
  readonly config: ClientConfig;
  private readonly session: HttpSession;
  private readonly ownsSession: boolean;
  private readonly now: () => number;
  private token: AuthToken | null = null;
  private closed = false;

  constructor(init: ClientInit<HttpSession> = {}) {
    this.config = resolveConfig(init);
    this.now = init.now ?? Date.now;
    this.ownsSession = init.session === undefined;
    this.session =
      init.session ??
      new FetchSession({
        baseUrl: this.config.serviceUrl,
        headers: sessionHeaders(this.config),
        timeoutMs: this.config.timeoutMs,
      });
  }

  private async send<T>(op: Operation<T>, headers?: Record<string, string>): Promise<T> {
    const { logger } = this.config;
    logger.debug("request", { operation: op.name, method: op.method, path: op.path });
    let res: HttpResponse;
    try {
      res = await this.session.send({ method: op.method, path: op.path, body: op.body, headers });
    } catch (err) {
      throw wrapTransportError(op, err);
    }
    logger.debug("response", { operation: op.name, status: res.status });
    return completeOperation(op, res);
  }

  private async call<T>(op: Operation<T>): Promise<T> {
    if (this.config.authMode === "api-key") return this.send(op);

    const action = tokenAction(this.token, this.now());
    const token =
      action === "authenticate"
        ? await this.authenticate()
        : action === "refresh"
          ? await this.refreshToken()
          : this.token;
    return this.send(op, token ? bearer(token) : undefined);
  }

  /* ---- legacy token surface ---- */

  /** Exchange the API key for a bearer token and keep it for later calls. */
  async authenticate(): Promise<AuthToken> {
    this.token = await this.send(authenticateOp(this.config.apiKey));
    return this.token;
  }

  async refreshToken(): Promise<AuthToken> {
    const current = this.token ?? (await this.authenticate());
    this.token = await this.send(refreshTokenOp(), bearer(current));
    return this.token;
  }

  /* ---- operations ---- */

  listDatasets(): Promise<Dataset[]> {
    return this.call(listDatasetsOp());
  }

  startRun(datasetId: string, projectId: string, experiment: string, metadata?: Metadata): Promise<RunResponse> {
    return this.call(startRunOp(datasetId, projectId, experiment, metadata));
  }

  continueRun(runId: string, itemChoiceId: string): Promise<RunResponse> {
    return this.call(continueRunOp(runId, itemChoiceId));
  }

  runSummary(runId: string): Promise<RunSummary> {
    return this.call(runSummaryOp(runId));
  }

  async submitReplay(runId: string, responses: ReplayRequestItem[], metadata?: Metadata): Promise<ReplayResponse> {
    return this.call(submitReplayOp(runId, responses, metadata));
  }

  async submitClassicEval(request: ClassicEvalRequest): Promise<ClassicEvalResponse> {
    return this.call(submitClassicEvalOp(request));
  }

  me(): Promise<MeResponse> {
    return this.call(meOp());
  }

  createProject(name: string, options?: CreateProjectOptions): Promise<Project> {
    return this.call(createProjectOp(name, options));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsSession) await this.session.close();
  }
}

/** Scope a client to `fn`; the client is closed however `fn` ends. */
export async function withClient<T>(
  init: ClientInit<HttpSession>,
  fn: (client: AdaptiveClient) => Promise<T> | T
): Promise<T> {
  const client = new AdaptiveClient(init);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
