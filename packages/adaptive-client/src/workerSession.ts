// packages/adaptive-client/src/workerSession.ts
//
// Blocking HTTP session. Requests run on a dedicated worker thread with
// the same fetch/deadline logic as FetchSession; the calling thread parks
// on Atomics.wait until the worker signals, then takes the reply off a
// MessagePort with receiveMessageOnPort. The event loop of the calling
// thread is never needed, so a blocking client works from inside a
// running async function too.

import { MessageChannel, receiveMessageOnPort, Worker } from "node:worker_threads";
import {
  requestBody,
  requestHeaders,
  resolveUrl,
  SessionClosedError,
  RequestTimeoutError,
  type HttpRequest,
  type HttpResponse,
  type SessionOptions,
  type SyncHttpSession,
} from "./http";
import { consoleLogger, type Logger } from "./logger";

type WorkerRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | undefined;
  timeoutMs: number;
};

type WorkerReply =
  | { ok: true; status: number; text: string }
  | { ok: false; timedOut: boolean; name: string; message: string };

const WORKER_SOURCE = `
const { parentPort } = require("node:worker_threads");
parentPort.on("message", async ({ signal, port, request }) => {
  const flag = new Int32Array(signal);
  const deadline = new AbortController();
  const timer = setTimeout(() => deadline.abort(), request.timeoutMs);
  let reply;
  try {
    const res = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: deadline.signal,
    });
    reply = { ok: true, status: res.status, text: await res.text() };
  } catch (err) {
    reply = {
      ok: false,
      timedOut: deadline.signal.aborted,
      name: err && err.name ? String(err.name) : "Error",
      message: err && err.message ? String(err.message) : String(err),
    };
  } finally {
    clearTimeout(timer);
  }
  port.postMessage(reply);
  port.close();
  Atomics.store(flag, 0, 1);
  Atomics.notify(flag, 0);
});
`;

/** Extra wait on top of the request deadline before giving up on the worker. */
const WORKER_GRACE_MS = 2_000;

function isWorkerReply(v: unknown): v is WorkerReply {
  return typeof v === "object" && v !== null && "ok" in v && typeof v.ok === "boolean";
}

export class WorkerFetchSession implements SyncHttpSession {
  private worker: Worker | null = null;
  private closed = false;

  constructor(
    private readonly options: SessionOptions,
    private readonly logger: Logger = consoleLogger("adaptive-client", false)
  ) {}

  private ensureWorker(): Worker {
    if (!this.worker) {
      const worker = new Worker(WORKER_SOURCE, { eval: true });
      // idle workers must not keep the process alive
      worker.unref();
      this.worker = worker;
    }
    return this.worker;
  }

  send(req: HttpRequest): HttpResponse {
    if (this.closed) throw new SessionClosedError();

    const request: WorkerRequest = {
      url: resolveUrl(this.options.baseUrl, req.path),
      method: req.method,
      headers: requestHeaders(this.options, req),
      body: requestBody(req),
      timeoutMs: this.options.timeoutMs,
    };

    const signal = new SharedArrayBuffer(4);
    const flag = new Int32Array(signal);
    const { port1, port2 } = new MessageChannel();

    try {
      this.ensureWorker().postMessage({ signal, port: port2, request }, [port2]);
      const waited = Atomics.wait(flag, 0, 0, this.options.timeoutMs + WORKER_GRACE_MS);
      const received = receiveMessageOnPort(port1);
      if (waited === "timed-out" && !received) throw new RequestTimeoutError(this.options.timeoutMs);

      const reply: unknown = received?.message;
      if (!isWorkerReply(reply)) throw new Error("HTTP worker returned no reply");
      if (reply.ok) return { status: reply.status, text: reply.text };
      if (reply.timedOut) throw new RequestTimeoutError(this.options.timeoutMs);

      const err = new Error(reply.message);
      err.name = reply.name;
      throw err;
    } finally {
      port1.close();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const worker = this.worker;
    this.worker = null;
    if (worker) {
      worker.terminate().catch((err: unknown) => {
        this.logger.warn("HTTP worker did not terminate cleanly", { error: String(err) });
      });
    }
  }
}
