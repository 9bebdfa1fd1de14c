export { AdaptiveClient, withClient, type ClientInit } from "./client";
export { AdaptiveSyncClient, withSyncClient } from "./syncClient";
export { AdaptiveTest, AdaptiveSyncTest, type AdaptiveTestOptions } from "./adaptiveTest";
export { ThreadedItemProcessor, type ThreadedItemProcessorOptions } from "./threadedProcessor";
export {
  assertSyncProcessor,
  processItemAsync,
  processItemSync,
  type AsyncItemProcessor,
  type ItemProcessor,
  type SyncItemProcessor,
} from "./itemProcessor";
export {
  adaptiveRun,
  replayRun,
  scoreFromState,
  type Effect,
  type EffectResult,
  type Metadata,
  type Protocol,
  type RunOptions,
} from "./protocol";
export { drive, driveSync, type RunTransport, type SyncRunTransport } from "./driver";
export { DEFAULTS, ENV, resolveConfig, type AuthMode, type ClientConfig, type ClientOptions } from "./config";
export { consoleLogger, loggerFromEnv, silentLogger, type Logger, type LogFields } from "./logger";
export {
  FetchSession,
  RequestTimeoutError,
  SessionClosedError,
  type HttpRequest,
  type HttpResponse,
  type HttpSession,
  type SessionOptions,
  type SyncHttpSession,
} from "./http";
export { WorkerFetchSession } from "./workerSession";
export { metricValueType, type CreateProjectOptions } from "./operations";
export {
  AdaptiveEvalError,
  ApiError,
  ConfigurationError,
  ItemProcessorMisuseError,
  MalformedResponseError,
  PayloadTooLargeError,
  RunStateError,
  UnrecognizedItemTypeError,
  UnsupportedFeatureError,
  ValidationError,
} from "./errors";
export * from "./mapper";
