// packages/adaptive-client/src/threadedProcessor.ts
//
// Runs a module-exported item processor on its own worker thread, so a
// slow blocking callback does not freeze the caller's event loop. The
// worker imports the module once and answers requests by id. It holds the
// process open only while requests are pending.

import path from "node:path";
import { pathToFileURL } from "node:url";
import { Worker } from "node:worker_threads";
import type { Item } from "shared-types";

export type ThreadedItemProcessorOptions = {
  /** File path (relative paths resolve against cwd) or file: URL of an ES module. */
  module: string | URL;
  /** Named export to call. Default: "default". */
  exportName?: string;
};

type Pending = {
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
};

type WorkerReply =
  | { id: number; ok: true; value: unknown }
  | { id: number; ok: false; name: string; message: string };

const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
let loaded;
function load() {
  if (!loaded) {
    loaded = import(workerData.moduleUrl).then((mod) => {
      const fn = mod[workerData.exportName];
      if (typeof fn !== "function") {
        throw new Error("Module " + workerData.moduleUrl + " has no function export \\"" + workerData.exportName + "\\"");
      }
      return fn;
    });
  }
  return loaded;
}
parentPort.on("message", async ({ id, item }) => {
  try {
    const fn = await load();
    const value = await fn(item);
    parentPort.postMessage({ id, ok: true, value });
  } catch (err) {
    parentPort.postMessage({
      id,
      ok: false,
      name: err && err.name ? String(err.name) : "Error",
      message: err && err.message ? String(err.message) : String(err),
    });
  }
});
`;

function isWorkerReply(v: unknown): v is WorkerReply {
  return (
    typeof v === "object" &&
    v !== null &&
    "id" in v &&
    typeof v.id === "number" &&
    "ok" in v &&
    typeof v.ok === "boolean"
  );
}

export function moduleUrl(module: string | URL): string {
  if (module instanceof URL) return module.href;
  if (module.startsWith("file:")) return module;
  return pathToFileURL(path.resolve(module)).href;
}

export class ThreadedItemProcessor {
  readonly moduleUrl: string;
  readonly exportName: string;

  private worker: Worker | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();
  private closed = false;

  constructor(options: ThreadedItemProcessorOptions) {
    this.moduleUrl = moduleUrl(options.module);
    this.exportName = options.exportName ?? "default";
  }

  private ensureWorker(): Worker {
    if (this.worker) return this.worker;

    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { moduleUrl: this.moduleUrl, exportName: this.exportName },
    });
    worker.unref();

    worker.on("message", (msg: unknown) => {
      if (!isWorkerReply(msg)) return;
      const entry = this.pending.get(msg.id);
      if (!entry) return;
      this.pending.delete(msg.id);
      if (this.pending.size === 0) worker.unref();

      if (msg.ok) {
        entry.resolve(msg.value);
      } else {
        const err = new Error(msg.message);
        err.name = msg.name;
        entry.reject(err);
      }
    });

    worker.on("error", (err) => this.failAll(worker, err));
    worker.on("exit", (code) => {
      this.failAll(worker, new Error(`Item processor worker exited with code ${code}`));
    });

    this.worker = worker;
    return worker;
  }

  private failAll(worker: Worker, err: Error): void {
    if (this.worker === worker) this.worker = null;
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) entry.reject(err);
  }

  /** Resolves with whatever the exported function returned; the adapter validates it. */
  process(item: Item): Promise<unknown> {
    if (this.closed) return Promise.reject(new Error("ThreadedItemProcessor is closed"));

    const worker = this.ensureWorker();
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.ref();
      worker.postMessage({ id, item });
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const worker = this.worker;
    this.worker = null;
    if (worker) await worker.terminate();
  }
}
