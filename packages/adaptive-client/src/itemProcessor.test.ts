import { setImmediate as nextTurn } from "node:timers/promises";
import { describe, it, expect } from "vitest";
import type { Item } from "shared-types";
import { ItemProcessorMisuseError } from "./errors";
import { assertSyncProcessor, isAsyncFunction, processItemAsync, processItemSync } from "./itemProcessor";
import { ThreadedItemProcessor } from "./threadedProcessor";

const item: Item = {
  type: "multiple_choice_text",
  id: "q1",
  question: "Pick one",
  choices: [
    { id: "A", text: "first" },
    { id: "B", text: "second" },
  ],
};

const MISUSE = "Sync client cannot use an async item processor. Use the async client instead.";

describe("isAsyncFunction", () => {
  it("tells async functions from plain ones", () => {
    expect(isAsyncFunction(async () => "A")).toBe(true);
    expect(isAsyncFunction(() => "A")).toBe(false);
    expect(isAsyncFunction(() => Promise.resolve("A"))).toBe(false);
  });
});

describe("processItemSync", () => {
  it("returns the choice id of a plain processor", () => {
    expect(processItemSync((it) => it.choices[1]?.id ?? "", item)).toBe("B");
  });

  it("rejects async processors", () => {
    expect(() => processItemSync(async () => "A", item)).toThrow(ItemProcessorMisuseError);
    expect(() => processItemSync(async () => "A", item)).toThrow(MISUSE);
  });

  it("rejects a plain function that returns a promise", () => {
    const sneaky = () => Promise.resolve("A");
    expect(() => processItemSync(sneaky, item)).toThrow(ItemProcessorMisuseError);
  });

  it("leaves no unhandled rejection behind when the returned promise fails", async () => {
    const unhandled: unknown[] = [];
    const onUnhandled = (reason: unknown) => unhandled.push(reason);
    process.on("unhandledRejection", onUnhandled);
    try {
      const failing = () => Promise.reject(new Error("model call failed"));
      expect(() => processItemSync(failing, item)).toThrow(ItemProcessorMisuseError);

      await nextTurn();
      await nextTurn();
      expect(unhandled).toEqual([]);
    } finally {
      process.off("unhandledRejection", onUnhandled);
    }
  });

  it("rejects threaded processors", () => {
    const threaded = new ThreadedItemProcessor({ module: "./does-not-matter.mjs" });
    expect(() => assertSyncProcessor(threaded)).toThrow(ItemProcessorMisuseError);
  });

  it("rejects results that are not a non-empty string", () => {
    expect(() => processItemSync(() => "", item)).toThrow(
      "Item processor must return a non-empty choice id string, got: empty string"
    );
  });

  it("misuse errors are TypeErrors", () => {
    expect(new ItemProcessorMisuseError()).toBeInstanceOf(TypeError);
  });
});

describe("processItemAsync", () => {
  it("awaits async processors", async () => {
    await expect(processItemAsync(async (it) => it.choices[0]?.id ?? "", item)).resolves.toBe("A");
  });

  it("runs plain processors after yielding to the event loop", async () => {
    const order: string[] = [];
    setImmediate(() => order.push("immediate"));
    const choice = await processItemAsync(() => {
      order.push("processor");
      return "B";
    }, item);
    expect(choice).toBe("B");
    expect(order).toEqual(["immediate", "processor"]);
  });

  it("accepts a plain function returning a promise", async () => {
    await expect(processItemAsync(() => Promise.resolve("A"), item)).resolves.toBe("A");
  });

  it("propagates processor errors", async () => {
    await expect(
      processItemAsync(() => {
        throw new Error("model offline");
      }, item)
    ).rejects.toThrow("model offline");
  });
});
