// packages/adaptive-client/src/__fixtures__/scriptedSession.ts
//
// In-process sessions that answer from a script instead of the network.
// Keys are "<METHOD> <path>", e.g. "POST runs/start". A list of replies is
// consumed in order; a function computes the reply from the request.

import type { HttpRequest, HttpResponse, HttpSession, SyncHttpSession } from "../http";

export type ScriptedReply =
  | { status?: number; json: unknown }
  | { status?: number; text: string }
  | { error: Error };

export type ScriptedRoute = ScriptedReply | ScriptedReply[] | ((req: HttpRequest) => ScriptedReply);

export type Script = Record<string, ScriptedRoute>;

function routeKey(req: HttpRequest): string {
  return `${req.method} ${req.path}`;
}

class ScriptBook {
  readonly requests: HttpRequest[] = [];
  closeCount = 0;
  private readonly cursors = new Map<string, number>();

  constructor(private readonly script: Script) {}

  private pick(req: HttpRequest): ScriptedReply {
    const key = routeKey(req);
    const route = this.script[key];
    if (route === undefined) {
      return { status: 404, json: { title: "Not Found", detail: `No scripted reply for ${key}` } };
    }
    if (typeof route === "function") return route(req);
    if (!Array.isArray(route)) return route;

    const idx = this.cursors.get(key) ?? 0;
    const reply = route[idx];
    if (reply === undefined) {
      return { status: 500, json: { detail: `Script for ${key} exhausted after ${route.length} replies` } };
    }
    this.cursors.set(key, idx + 1);
    return reply;
  }

  respond(req: HttpRequest): HttpResponse {
    this.requests.push(req);
    const reply = this.pick(req);
    if ("error" in reply) throw reply.error;
    const status = reply.status ?? 200;
    return "json" in reply ? { status, text: JSON.stringify(reply.json) } : { status, text: reply.text };
  }

  count(method: string, path: string): number {
    return this.requests.filter((r) => r.method === method && r.path === path).length;
  }
}

export class ScriptedSession implements HttpSession {
  private readonly book: ScriptBook;

  constructor(script: Script) {
    this.book = new ScriptBook(script);
  }

  get requests(): HttpRequest[] {
    return this.book.requests;
  }

  get closeCount(): number {
    return this.book.closeCount;
  }

  count(method: string, path: string): number {
    return this.book.count(method, path);
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    return this.book.respond(req);
  }

  async close(): Promise<void> {
    this.book.closeCount += 1;
  }
}

export class ScriptedSyncSession implements SyncHttpSession {
  private readonly book: ScriptBook;

  constructor(script: Script) {
    this.book = new ScriptBook(script);
  }

  get requests(): HttpRequest[] {
    return this.book.requests;
  }

  get closeCount(): number {
    return this.book.closeCount;
  }

  count(method: string, path: string): number {
    return this.book.count(method, path);
  }

  send(req: HttpRequest): HttpResponse {
    return this.book.respond(req);
  }

  close(): void {
    this.book.closeCount += 1;
  }
}
