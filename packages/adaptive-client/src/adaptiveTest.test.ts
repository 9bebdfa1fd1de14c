import { describe, it, expect } from "vitest";
import { AdaptiveSyncTest, AdaptiveTest } from "./adaptiveTest";
import { AdaptiveClient } from "./client";
import { ItemProcessorMisuseError, UnsupportedFeatureError } from "./errors";
import { silentLogger } from "./logger";
import { ScriptedSession, ScriptedSyncSession, type Script } from "./__fixtures__/scriptedSession";
import { AdaptiveSyncClient } from "./syncClient";
import { METADATA, wireItem, wireReplay, wireRun, wireSummary } from "./__fixtures__/payloads";

const BASE = { apiKey: "test-secret", env: {}, logger: silentLogger };

/** start -> q1 (choice A), continue -> completed */
function oneItemScript(): Script {
  return {
    "POST runs/start": { json: wireRun({ runId: "r1", thetas: [0.1], stdErrors: [0.5], nextItem: wireItem("q1", ["A"]) }) },
    "POST runs/continue": { json: wireRun({ runId: "r1", thetas: [0.1, 0.3], stdErrors: [0.5, 0.2], completed: true }) },
  };
}

function replayScript(): Script {
  return {
    "GET runs/adaptive/r1": { json: wireSummary({ items: [wireItem("i1"), wireItem("i2"), wireItem("i3")] }) },
    "POST runs/r1/replay": {
      json: wireReplay({
        thetas: [0.2, 0.25, 0.3],
        stdErrors: [0.6, 0.5, 0.4],
        responses: [{ datasetItemId: "i1", value: "A", correct: true }],
      }),
    },
  };
}

/* ------------------------------------------------------------------ */
/*  Async facade                                                       */
/* ------------------------------------------------------------------ */

describe("AdaptiveTest", () => {
  it("runs end to end", async () => {
    const session = new ScriptedSession(oneItemScript());
    const progress: Array<[number, number]> = [];
    const test = new AdaptiveTest({
      client: new AdaptiveClient({ ...BASE, session }),
      itemProcessor: async () => "A",
      onProgress: (c, n) => progress.push([c, n]),
    });

    const results = await test.run("ds-1", "p1", "exp", METADATA);

    expect(results).toEqual({ run_id: "r1", score: { theta: 0.3, std_error: 0.2 } });
    expect(session.requests[1]?.body).toEqual({ itemChoiceId: "A", runId: "r1" });
    expect(progress).toEqual([
      [0, 150],
      [1, 1],
    ]);
  });

  it("uses the facade's maxItems as progress denominator", async () => {
    const session = new ScriptedSession(oneItemScript());
    const progress: Array<[number, number]> = [];
    const test = new AdaptiveTest({
      client: new AdaptiveClient({ ...BASE, session }),
      itemProcessor: () => "A",
      maxItems: 20,
      onProgress: (c, n) => progress.push([c, n]),
    });
    await test.run("ds-1", "p1", "exp", METADATA);
    expect(progress[0]).toEqual([0, 20]);
  });

  it("rejects withResponses on run before any round trip", async () => {
    const session = new ScriptedSession(oneItemScript());
    const test = new AdaptiveTest({ client: new AdaptiveClient({ ...BASE, session }), itemProcessor: () => "A" });
    await expect(test.run("ds-1", "p1", "exp", METADATA, { withResponses: true })).rejects.toThrow(UnsupportedFeatureError);
    expect(session.requests).toHaveLength(0);
  });

  it("replays with fresh metadata and returns responses on request", async () => {
    const session = new ScriptedSession(replayScript());
    const test = new AdaptiveTest({ client: new AdaptiveClient({ ...BASE, session }), itemProcessor: async () => "B" });
    const metadata = { ...METADATA, model_metadata: { name: "test-model-v2" } };

    const results = await test.runReplay("r1", metadata, { withResponses: true });

    expect(results).toEqual({
      run_id: "rp1",
      score: { theta: 0.3, std_error: 0.4 },
      responses: [{ dataset_item_id: "i1", value: "A", correct: true }],
    });
    expect(session.requests[1]?.body).toEqual({
      responses: [
        { itemId: "i1", itemChoiceId: "B" },
        { itemId: "i2", itemChoiceId: "B" },
        { itemId: "i3", itemChoiceId: "B" },
      ],
      metadata,
    });
  });

  it("leaves a borrowed client open", async () => {
    const session = new ScriptedSession({});
    const client = new AdaptiveClient({ ...BASE, session });
    const test = new AdaptiveTest({ client, itemProcessor: () => "A" });
    await test.close();
    expect(session.closeCount).toBe(0);
  });
});

/* ------------------------------------------------------------------ */
/*  Blocking facade                                                    */
/* ------------------------------------------------------------------ */

describe("AdaptiveSyncTest", () => {
  it("runs end to end", () => {
    const session = new ScriptedSyncSession(oneItemScript());
    const test = new AdaptiveSyncTest({ client: new AdaptiveSyncClient({ ...BASE, session }), itemProcessor: () => "A" });

    expect(test.run("ds-1", "p1", "exp", METADATA)).toEqual({ run_id: "r1", score: { theta: 0.3, std_error: 0.2 } });
    expect(session.count("POST", "runs/continue")).toBe(1);
  });

  it("rejects an async processor with no network call", () => {
    const session = new ScriptedSyncSession(oneItemScript());
    const test = new AdaptiveSyncTest({
      client: new AdaptiveSyncClient({ ...BASE, session }),
      itemProcessor: async () => "A",
    });

    expect(() => test.run("ds-1", "p1", "exp", METADATA)).toThrow(ItemProcessorMisuseError);
    expect(() => test.runReplay("r1", METADATA)).toThrow(
      "Sync client cannot use an async item processor. Use the async client instead."
    );
    expect(session.requests).toHaveLength(0);
  });

  it("rejects an async processor before its own client touches the network", () => {
    const test = new AdaptiveSyncTest({
      clientOptions: { ...BASE, serviceUrl: "http://127.0.0.1:9/adaptive-testing" },
      itemProcessor: async () => "A",
    });
    try {
      expect(() => test.run("ds-1", "p1", "exp", METADATA)).toThrow(ItemProcessorMisuseError);
    } finally {
      test.close();
    }
  });

  it("detects a plain function returning a promise only once the run has started", () => {
    const session = new ScriptedSyncSession(oneItemScript());
    const test = new AdaptiveSyncTest({
      client: new AdaptiveSyncClient({ ...BASE, session }),
      itemProcessor: () => Promise.resolve("A"),
    });

    expect(() => test.run("ds-1", "p1", "exp", METADATA)).toThrow(ItemProcessorMisuseError);
    expect(session.requests.map((r) => r.path)).toEqual(["runs/start"]);
  });

  it("can be used from inside a running async function", async () => {
    const session = new ScriptedSyncSession(replayScript());
    const test = new AdaptiveSyncTest({ client: new AdaptiveSyncClient({ ...BASE, session }), itemProcessor: () => "A" });

    await Promise.resolve();
    const results = test.runReplay("r1", METADATA);
    await Promise.resolve();

    expect(results.run_id).toBe("rp1");
    expect(results.responses).toBeUndefined();
  });
});
