import type { EndpointFamily, HttpMethod, VerificationMethod } from "./types.js";

export type LifecycleStage = "submit" | "poll" | "verify" | "logs" | "close";

export class LivyBatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The remote call itself did not complete, or completed with a non-2xx status. */
export class TransportError extends LivyBatchError {
  readonly endpoint: EndpointFamily;
  readonly method: HttpMethod;
  readonly path: string;
  readonly status?: number;

  constructor(params: {
    endpoint: EndpointFamily;
    method: HttpMethod;
    path: string;
    detail: string;
    status?: number;
    cause?: unknown;
  }) {
    const statusPart = params.status != null ? ` (HTTP ${params.status})` : "";
    super(`${params.method} ${params.endpoint}:/${params.path} failed${statusPart}: ${params.detail}`, {
      cause: params.cause,
    });
    this.endpoint = params.endpoint;
    this.method = params.method;
    this.path = params.path;
    this.status = params.status;
  }
}

export class ResponseShapeError extends LivyBatchError {
  readonly path: string;
  readonly renderedBody: string;
  readonly batchId?: string;

  constructor(params: { path: string; renderedBody: string; batchId?: string; cause?: unknown }) {
    const batchPart = params.batchId != null ? ` Batch id=${params.batchId}.` : "";
    super(
      `Can not parse JSON response.${batchPart}\nTried to find JSON path: ${params.path}, but response was:\n${params.renderedBody}`,
      { cause: params.cause },
    );
    this.path = params.path;
    this.renderedBody = params.renderedBody;
    this.batchId = params.batchId;
  }
}

export class PollTimeoutError extends LivyBatchError {
  readonly batchId: string;
  readonly timeoutMs: number;
  readonly polls: number;

  constructor(params: { batchId: string; timeoutMs: number; polls: number; lastState: string }) {
    super(
      `Batch ${params.batchId} did not finish within ${params.timeoutMs / 1000}s (${params.polls} polls, last state '${params.lastState}')`,
    );
    this.batchId = params.batchId;
    this.timeoutMs = params.timeoutMs;
    this.polls = params.polls;
  }
}

export class JobFailedError extends LivyBatchError {
  readonly batchId: string;
  readonly state: string;

  constructor(batchId: string, state: string) {
    super(`Batch ${batchId} failed with state '${state}'`);
    this.batchId = batchId;
    this.state = state;
  }
}

export class VerificationMismatchError extends LivyBatchError {
  readonly backend: VerificationMethod;
  readonly subjectId: string;
  readonly actual: string;
  readonly expected: string;

  constructor(params: {
    backend: VerificationMethod;
    subjectId: string;
    actual: string;
    expected: string;
    message: string;
  }) {
    super(params.message);
    this.backend = params.backend;
    this.subjectId = params.subjectId;
    this.actual = params.actual;
    this.expected = params.expected;
  }
}

/** The single error a lifecycle run surfaces, raised after release was attempted. */
export class LifecycleError extends LivyBatchError {
  readonly batchId?: string;
  readonly stage: LifecycleStage;
  readonly releaseErrors: unknown[];

  constructor(params: {
    batchId?: string;
    stage: LifecycleStage;
    cause: unknown;
    releaseErrors?: unknown[];
  }) {
    const subject = params.batchId != null ? `batch ${params.batchId}` : "batch submission";
    super(`Lifecycle of ${subject} failed during ${params.stage}: ${toErrorText(params.cause)}`, {
      cause: params.cause,
    });
    this.batchId = params.batchId;
    this.stage = params.stage;
    this.releaseErrors = params.releaseErrors ?? [];
  }
}

export function toErrorText(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
