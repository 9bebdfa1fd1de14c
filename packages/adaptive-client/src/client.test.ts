import { describe, it, expect } from "vitest";
import { AdaptiveClient, withClient } from "./client";
import { ApiError, PayloadTooLargeError, ValidationError } from "./errors";
import { silentLogger } from "./logger";
import { ScriptedSession } from "./__fixtures__/scriptedSession";
import { METADATA, wireItem, wireRun } from "./__fixtures__/payloads";

const BASE = { apiKey: "test-secret", env: {}, logger: silentLogger };

function authPayload(expires: string, token = "tok-1") {
  return { token, expires };
}

/* ------------------------------------------------------------------ */
/*  Operations                                                         */
/* ------------------------------------------------------------------ */

describe("AdaptiveClient operations", () => {
  it("starts a run with the camelCase body", async () => {
    const session = new ScriptedSession({
      "POST runs/start": { json: wireRun({ thetas: [0.1], stdErrors: [0.5], nextItem: wireItem("q1") }) },
    });
    const client = new AdaptiveClient({ ...BASE, session });

    const res = await client.startRun("ds-1", "p1", "exp", METADATA);

    expect(res.next_item?.id).toBe("q1");
    expect(session.requests).toEqual([
      {
        method: "POST",
        path: "runs/start",
        body: { datasetId: "ds-1", projectId: "p1", experiment: "exp", metadata: METADATA },
        headers: undefined,
      },
    ]);
  });

  it("maps 413 from start run to PayloadTooLargeError", async () => {
    const session = new ScriptedSession({
      "POST runs/start": [{ status: 413, json: { detail: "Metadata too large" } }, { status: 413, text: "" }],
    });
    const client = new AdaptiveClient({ ...BASE, session });

    await expect(client.startRun("ds-1", "p1", "exp", METADATA)).rejects.toThrow(PayloadTooLargeError);
    await expect(client.startRun("ds-1", "p1", "exp", METADATA)).rejects.toThrow("Payload too large.");
  });

  it("classifies errors the same way for every operation", async () => {
    const session = new ScriptedSession({
      "GET runs/adaptive/r1": { status: 422, json: { detail: "Run is still in progress" } },
      "GET ../admin/api-keys/me": { status: 401, json: { title: "Unauthorized", detail: "Invalid API key" } },
    });
    const client = new AdaptiveClient({ ...BASE, session });

    await expect(client.runSummary("r1")).rejects.toBeInstanceOf(ValidationError);
    await expect(client.me()).rejects.toMatchObject({ status: 401, message: "Unauthorized: Invalid API key" });
  });

  it("wraps session failures as ApiError", async () => {
    const session = new ScriptedSession({ "GET datasets": { error: new TypeError("fetch failed") } });
    const client = new AdaptiveClient({ ...BASE, session });

    const err = await client.listDatasets().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: "list datasets failed: fetch failed" });
  });

  it("rejects a duplicate replay item without a round trip", async () => {
    const session = new ScriptedSession({});
    const client = new AdaptiveClient({ ...BASE, session });
    const items = [
      { item_id: "i1", item_choice_id: "A" },
      { item_id: "i1", item_choice_id: "B" },
    ];

    await expect(client.submitReplay("r1", items)).rejects.toThrow(ValidationError);
    expect(session.requests).toHaveLength(0);
  });

  it("rejects an unsupported metric value without a round trip", async () => {
    const session = new ScriptedSession({});
    const client = new AdaptiveClient({ ...BASE, session });

    await expect(
      client.submitClassicEval({
        project_id: "p1",
        experiment_name: "exp",
        dataset_id: "ds-1",
        model_name: "test-model",
        hyperparameters: {},
        items: [],
        metrics: [{ metric_id: "m", value: Number.POSITIVE_INFINITY }],
      })
    ).rejects.toThrow("Unsupported metric value type: number. Supported types: string, number, boolean");
    expect(session.requests).toHaveLength(0);
  });
});

/* ------------------------------------------------------------------ */
/*  Legacy token auth                                                  */
/* ------------------------------------------------------------------ */

describe("AdaptiveClient token auth", () => {
  it("authenticates once and sends the bearer token", async () => {
    const session = new ScriptedSession({
      "POST client/auth": { json: authPayload("2024-03-01T12:00:00Z") },
      "GET datasets": { json: { data: [] } },
    });
    const now = () => Date.parse("2024-03-01T10:00:00Z");
    const client = new AdaptiveClient({ ...BASE, authMode: "token", session, now });

    await client.listDatasets();
    await client.listDatasets();

    expect(session.count("POST", "client/auth")).toBe(1);
    expect(session.requests[0]?.body).toEqual({ apiKey: "test-secret" });
    expect(session.requests[1]?.headers).toEqual({ Authorization: "Bearer tok-1" });
    expect(session.requests[2]?.headers).toEqual({ Authorization: "Bearer tok-1" });
  });

  it("refreshes a token that expires within five minutes", async () => {
    const session = new ScriptedSession({
      "POST client/auth": { json: authPayload("2024-03-01T10:04:00Z", "tok-old") },
      "GET client/token": { json: authPayload("2024-03-01T11:00:00Z", "tok-new") },
      "GET datasets": { json: { data: [] } },
    });
    const now = () => Date.parse("2024-03-01T10:00:00Z");
    const client = new AdaptiveClient({ ...BASE, authMode: "token", session, now });

    await client.authenticate();
    await client.listDatasets();

    expect(session.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      "POST client/auth",
      "GET client/token",
      "GET datasets",
    ]);
    expect(session.requests[1]?.headers).toEqual({ Authorization: "Bearer tok-old" });
    expect(session.requests[2]?.headers).toEqual({ Authorization: "Bearer tok-new" });
  });
});

/* ------------------------------------------------------------------ */
/*  Session ownership                                                  */
/* ------------------------------------------------------------------ */

describe("AdaptiveClient close", () => {
  it("never closes an injected session", async () => {
    const session = new ScriptedSession({});
    const client = new AdaptiveClient({ ...BASE, session });
    await client.close();
    await client.close();
    expect(session.closeCount).toBe(0);
  });

  it("withClient returns the callback result and closes on failure", async () => {
    const session = new ScriptedSession({ "GET datasets": { json: { data: [{ id: "ds-1", name: "A" }] } } });
    const names = await withClient({ ...BASE, session }, async (c) => (await c.listDatasets()).map((d) => d.name));
    expect(names).toEqual(["A"]);

    await expect(
      withClient({ ...BASE, session }, () => {
        throw new Error("caller failed");
      })
    ).rejects.toThrow("caller failed");
  });
});
