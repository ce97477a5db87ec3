export { parseLivyBatchConfig, resolveVerificationBackend } from "./src/config.js";
export {
  JobFailedError,
  LifecycleError,
  LivyBatchError,
  PollTimeoutError,
  ResponseShapeError,
  TransportError,
  VerificationMismatchError,
  toErrorText,
} from "./src/errors.js";
export type { LifecycleStage } from "./src/errors.js";
export { defaultEndpointClient, requestChecked } from "./src/http.js";
export { BatchLifecycle } from "./src/lifecycle.js";
export type { BatchLifecycleParams } from "./src/lifecycle.js";
export { consoleLogger, createCapturingLogger } from "./src/logger.js";
export { LogPager, LOG_PAGE_LINES } from "./src/logs.js";
export { buildSubmissionPayload } from "./src/payload.js";
export { BatchPoller, classifyBatchState } from "./src/poller.js";
export type { PollOutcome } from "./src/poller.js";
export { renderResponseBody, readPath } from "./src/response.js";
export { LivyBatchService } from "./src/service.js";
export { buildLivyBatchTool, LivyBatchToolSchema } from "./src/tool.js";
export { StatusVerifier } from "./src/verifier.js";
export type * from "./src/types.js";
