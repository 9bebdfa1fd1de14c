// packages/adaptive-client/src/itemProcessor.ts
//
// Uniform invocation of the caller's per-item callback from either
// execution context.

import { setImmediate as nextTurn } from "node:timers/promises";
import type { Item } from "shared-types";
import { ItemProcessorMisuseError } from "./errors";
import { ThreadedItemProcessor } from "./threadedProcessor";

/** Blocking processor: returns the chosen choice id. */
export type SyncItemProcessor = (item: Item) => string;

/** Suspend-capable processor. */
export type AsyncItemProcessor = (item: Item) => Promise<string>;

export type ItemProcessor = SyncItemProcessor | AsyncItemProcessor | ThreadedItemProcessor;

export function isAsyncFunction(fn: unknown): boolean {
  return typeof fn === "function" && Object.prototype.toString.call(fn) === "[object AsyncFunction]";
}

function isThenable(v: unknown): v is PromiseLike<unknown> {
  return (
    (typeof v === "object" || typeof v === "function") &&
    v !== null &&
    "then" in v &&
    typeof v.then === "function"
  );
}

function choiceId(value: unknown): string {
  if (typeof value !== "string" || value.length === 0) {
    const got = value === null ? "null" : typeof value === "string" ? "empty string" : typeof value;
    throw new ItemProcessorMisuseError(`Item processor must return a non-empty choice id string, got: ${got}`);
  }
  return value;
}

/** Throws unless `processor` can run without the event loop. Checked
 *  before a blocking run makes any network call. */
export function assertSyncProcessor(processor: ItemProcessor): void {
  if (processor instanceof ThreadedItemProcessor || isAsyncFunction(processor)) {
    throw new ItemProcessorMisuseError();
  }
}

export function processItemSync(processor: ItemProcessor, item: Item): string {
  if (processor instanceof ThreadedItemProcessor || isAsyncFunction(processor)) {
    throw new ItemProcessorMisuseError();
  }
  const result: unknown = processor(item);
  if (isThenable(result)) {
    // the misuse error replaces whatever the promise settles to
    Promise.resolve(result).then(undefined, () => undefined);
    throw new ItemProcessorMisuseError();
  }
  return choiceId(result);
}

export async function processItemAsync(processor: ItemProcessor, item: Item): Promise<string> {
  if (processor instanceof ThreadedItemProcessor) {
    return choiceId(await processor.process(item));
  }
  if (isAsyncFunction(processor)) {
    return choiceId(await processor(item));
  }
  // let pending I/O and timers run between steps
  await nextTurn();
  return choiceId(await processor(item));
}
