// packages/adaptive-client/src/driver.ts
//
// Drivers for the protocol generators. `drive` awaits every effect,
// `driveSync` performs them blocking. A failed effect is thrown back into
// the generator so it unwinds at the step that failed.

import type { Item, ReplayRequestItem, ReplayResponse, RunResponse, RunSummary } from "shared-types";
import { processItemAsync, processItemSync, type ItemProcessor } from "./itemProcessor";
import type { Effect, EffectResult, Metadata, Protocol } from "./protocol";

/** The slice of AdaptiveClient the orchestrator needs. */
export interface RunTransport {
  startRun(datasetId: string, projectId: string, experiment: string, metadata?: Metadata): Promise<RunResponse>;
  continueRun(runId: string, itemChoiceId: string): Promise<RunResponse>;
  runSummary(runId: string): Promise<RunSummary>;
  submitReplay(runId: string, responses: ReplayRequestItem[], metadata?: Metadata): Promise<ReplayResponse>;
}

/** The slice of AdaptiveSyncClient the orchestrator needs. */
export interface SyncRunTransport {
  startRun(datasetId: string, projectId: string, experiment: string, metadata?: Metadata): RunResponse;
  continueRun(runId: string, itemChoiceId: string): RunResponse;
  runSummary(runId: string): RunSummary;
  submitReplay(runId: string, responses: ReplayRequestItem[], metadata?: Metadata): ReplayResponse;
}

async function perform(
  effect: Effect,
  transport: RunTransport,
  processItem: (item: Item) => Promise<string>
): Promise<EffectResult> {
  switch (effect.kind) {
    case "start_run":
      return {
        kind: effect.kind,
        value: await transport.startRun(effect.datasetId, effect.projectId, effect.experiment, effect.metadata),
      };
    case "continue_run":
      return { kind: effect.kind, value: await transport.continueRun(effect.runId, effect.itemChoiceId) };
    case "run_summary":
      return { kind: effect.kind, value: await transport.runSummary(effect.runId) };
    case "submit_replay":
      return {
        kind: effect.kind,
        value: await transport.submitReplay(effect.runId, effect.responses, effect.metadata),
      };
    case "process_item":
      return { kind: effect.kind, value: await processItem(effect.item) };
  }
}

function performSync(
  effect: Effect,
  transport: SyncRunTransport,
  processItem: (item: Item) => string
): EffectResult {
  switch (effect.kind) {
    case "start_run":
      return {
        kind: effect.kind,
        value: transport.startRun(effect.datasetId, effect.projectId, effect.experiment, effect.metadata),
      };
    case "continue_run":
      return { kind: effect.kind, value: transport.continueRun(effect.runId, effect.itemChoiceId) };
    case "run_summary":
      return { kind: effect.kind, value: transport.runSummary(effect.runId) };
    case "submit_replay":
      return { kind: effect.kind, value: transport.submitReplay(effect.runId, effect.responses, effect.metadata) };
    case "process_item":
      return { kind: effect.kind, value: processItem(effect.item) };
  }
}

export async function drive<T>(protocol: Protocol<T>, transport: RunTransport, processor: ItemProcessor): Promise<T> {
  const processItem = (item: Item) => processItemAsync(processor, item);
  let step = protocol.next();
  while (!step.done) {
    let result: EffectResult;
    try {
      result = await perform(step.value, transport, processItem);
    } catch (err) {
      step = protocol.throw(err);
      continue;
    }
    step = protocol.next(result);
  }
  return step.value;
}

export function driveSync<T>(protocol: Protocol<T>, transport: SyncRunTransport, processor: ItemProcessor): T {
  const processItem = (item: Item) => processItemSync(processor, item);
  let step = protocol.next();
  while (!step.done) {
    let result: EffectResult;
    try {
      result = performSync(step.value, transport, processItem);
    } catch (err) {
      step = protocol.throw(err);
      continue;
    }
    step = protocol.next(result);
  }
  return step.value;
}
