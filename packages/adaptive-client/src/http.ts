// packages/adaptive-client/src/http.ts
//
// Session abstraction the clients talk through. A session knows the base
// URL, default headers and the per-request deadline; it returns the raw
// status and body text and leaves classification to the caller.

export type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  method: HttpMethod;
  /** Relative to the base URL; may climb out of it with "../". */
  path: string;
  body?: unknown;
  headers?: Record<string, string>;
};

export type HttpResponse = {
  status: number;
  text: string;
};

export interface HttpSession {
  send(req: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface SyncHttpSession {
  send(req: HttpRequest): HttpResponse;
  close(): void;
}

export type SessionOptions = {
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
};

/** resolveUrl("http://h/adaptive-testing", "../admin/x") -> "http://h/admin/x" */
export function resolveUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(path.replace(/^\/+/, ""), base).toString();
}

export function requestHeaders(session: SessionOptions, req: HttpRequest): Record<string, string> {
  return {
    Accept: "application/json",
    ...(req.body !== undefined ? { "Content-Type": "application/json" } : {}),
    ...session.headers,
    ...req.headers,
  };
}

export function requestBody(req: HttpRequest): string | undefined {
  return req.body === undefined ? undefined : JSON.stringify(req.body);
}

export class SessionClosedError extends Error {
  constructor() {
    super("HTTP session is closed");
    this.name = "SessionClosedError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

/** Session over Node's global fetch. Closing aborts whatever is in flight. */
export class FetchSession implements HttpSession {
  private readonly lifetime = new AbortController();

  constructor(private readonly options: SessionOptions) {}

  async send(req: HttpRequest): Promise<HttpResponse> {
    if (this.lifetime.signal.aborted) throw new SessionClosedError();

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.options.timeoutMs);
    const onClose = () => deadline.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });

    try {
      const res = await fetch(resolveUrl(this.options.baseUrl, req.path), {
        method: req.method,
        headers: requestHeaders(this.options, req),
        body: requestBody(req),
        signal: deadline.signal,
      });
      return { status: res.status, text: await res.text() };
    } catch (err) {
      if (this.lifetime.signal.aborted) throw new SessionClosedError();
      if (deadline.signal.aborted) throw new RequestTimeoutError(this.options.timeoutMs);
      throw err;
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }
  }

  async close(): Promise<void> {
    this.lifetime.abort();
  }
}
