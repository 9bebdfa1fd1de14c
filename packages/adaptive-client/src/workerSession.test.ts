import { once } from "node:events";
import { Worker } from "node:worker_threads";
import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import { AdaptiveSyncTest } from "./adaptiveTest";
import { ApiError } from "./errors";
import { RequestTimeoutError, SessionClosedError } from "./http";
import { silentLogger, type Logger } from "./logger";
import { AdaptiveSyncClient } from "./syncClient";
import { WorkerFetchSession } from "./workerSession";

// The blocking session parks this thread, so the stub service has to live
// on a thread of its own.
const STUB_SOURCE = `
const http = require("node:http");
const { parentPort } = require("node:worker_threads");
const state = (thetas, stds) => ({ responses: [], thetas, std_error_history: stds, kl_info_history: [], effective_difficulties: [] });
const server = http.createServer((req, res) => {
  const chunks = [];
  req.on("data", (c) => chunks.push(c));
  req.on("end", () => {
    const body = Buffer.concat(chunks).toString("utf8");
    const send = (status, payload) => {
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(payload));
    };
    if (req.url === "/adaptive-testing/slow") {
      setTimeout(() => send(200, { late: true }), 500);
    } else if (req.url === "/adaptive-testing/runs/start") {
      send(200, {
        runInfo: { id: "r1" },
        state: state([0.1], [0.5]),
        nextItem: { type: "multiple_choice_text", id: "q1", question: "?", choices: [{ id: "A", text: "a" }] },
        completed: false,
      });
    } else if (req.url === "/adaptive-testing/runs/continue") {
      send(200, { runInfo: { id: "r1" }, state: state([0.1, 0.3], [0.5, 0.2]), nextItem: null, completed: true });
    } else if (req.url === "/adaptive-testing/datasets" && req.headers["x-api-key"] !== "test-secret") {
      send(401, { title: "Unauthorized", detail: "Invalid API key" });
    } else {
      send(200, { method: req.method, url: req.url, apiKey: req.headers["x-api-key"] || null, body });
    }
  });
});
server.listen(0, "127.0.0.1", () => parentPort.postMessage(server.address().port));
parentPort.on("message", (msg) => {
  if (msg === "stop") server.close(() => process.exit(0));
});
`;

let stub: Worker;
let base = "";

beforeAll(async () => {
  stub = new Worker(STUB_SOURCE, { eval: true });
  const [port] = await once(stub, "message");
  base = `http://127.0.0.1:${String(port)}/adaptive-testing`;
});

afterAll(async () => {
  await stub.terminate();
});

describe("WorkerFetchSession", () => {
  it("performs a blocking round trip", () => {
    const session = new WorkerFetchSession({ baseUrl: base, headers: { "x-api-key": "test-secret" }, timeoutMs: 2000 });
    try {
      const res = session.send({ method: "POST", path: "echo", body: { a: 1 } });
      expect(res.status).toBe(200);
      expect(JSON.parse(res.text)).toEqual({
        method: "POST",
        url: "/adaptive-testing/echo",
        apiKey: "test-secret",
        body: '{"a":1}',
      });
    } finally {
      session.close();
    }
  });

  it("times out a slow request", () => {
    const session = new WorkerFetchSession({ baseUrl: base, headers: {}, timeoutMs: 50 });
    try {
      expect(() => session.send({ method: "GET", path: "slow" })).toThrow(RequestTimeoutError);
    } finally {
      session.close();
    }
  });

  it("reports a failed worker shutdown through the logger", async () => {
    const warn = vi.fn<Logger["warn"]>();
    const logger: Logger = { debug: () => undefined, warn };
    const session = new WorkerFetchSession({ baseUrl: base, headers: {}, timeoutMs: 2000 }, logger);
    session.send({ method: "GET", path: "echo" });

    const terminate = vi.spyOn(Worker.prototype, "terminate").mockRejectedValueOnce(new Error("worker stuck"));
    try {
      session.close();
      await vi.waitFor(() => {
        expect(warn).toHaveBeenCalledWith("HTTP worker did not terminate cleanly", { error: "Error: worker stuck" });
      });
    } finally {
      terminate.mockRestore();
    }
  });

  it("rejects requests after close", () => {
    const session = new WorkerFetchSession({ baseUrl: base, headers: {}, timeoutMs: 2000 });
    session.close();
    expect(() => session.send({ method: "GET", path: "echo" })).toThrow(SessionClosedError);
  });
});

describe("AdaptiveSyncClient over the worker session", () => {
  it("classifies an error response", () => {
    const client = new AdaptiveSyncClient({ serviceUrl: base, apiKey: "wrong-key", env: {}, logger: silentLogger });
    try {
      expect(() => client.listDatasets()).toThrow(ApiError);
      expect(() => client.listDatasets()).toThrow("Unauthorized: Invalid API key");
    } finally {
      client.close();
    }
  });

  it("runs the blocking facade from inside an async function", async () => {
    const test = new AdaptiveSyncTest({
      clientOptions: { serviceUrl: base, apiKey: "test-secret", env: {}, logger: silentLogger },
      itemProcessor: () => "A",
    });
    try {
      await Promise.resolve();
      const results = test.run("ds-1", "p1", "exp", { model_metadata: { name: "test-model" }, test_configuration: {}, inference_setup: {} });
      expect(results).toEqual({ run_id: "r1", score: { theta: 0.3, std_error: 0.2 } });
    } finally {
      test.close();
    }
  });
});
