import { ResponseShapeError } from "./errors.js";
import { consoleLogger } from "./logger.js";
import { defaultEndpointClient, requestChecked } from "./http.js";
import { buildSubmissionPayload } from "./payload.js";
import {
  readArray,
  readIdentifier,
  readNumber,
  readString,
  shapeError,
  toJsonPath,
} from "./response.js";
import type {
  BatchJob,
  BatchLogger,
  ConnectionProfile,
  HttpMethod,
  JobSubmission,
  LivyBatchConfig,
  LogPage,
  RemoteEndpointClient,
  RemoteResponse,
} from "./types.js";

export const LIVY_ENDPOINT = "batches";
export const SPARK_ENDPOINT = "api/v1/applications";
export const YARN_ENDPOINT = "ws/v1/cluster/apps";

export type SparkJobStatus = {
  jobId: string;
  status: string;
};

export type LivyBatchServiceParams = {
  config: LivyBatchConfig;
  client?: RemoteEndpointClient;
  logger?: BatchLogger;
};

function encodeSegment(value: string): string {
  return encodeURIComponent(value.trim());
}

function requireId(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`${field} is required`);
  }
  return trimmed;
}

/** One method per remote endpoint; no retries, no state between calls. */
export class LivyBatchService {
  private readonly config: LivyBatchConfig;
  private readonly client: RemoteEndpointClient;
  private readonly logger: BatchLogger;

  constructor(params: LivyBatchServiceParams) {
    this.config = params.config;
    this.client = params.client ?? defaultEndpointClient;
    this.logger = params.logger ?? consoleLogger;
  }

  private async call(
    connection: ConnectionProfile,
    method: HttpMethod,
    path: string,
    body?: string,
  ): Promise<RemoteResponse> {
    return await requestChecked(this.client, {
      connection,
      method,
      path,
      ...(body != null
        ? {
            body,
            headers: {
              "Content-Type": "application/json",
              "X-Requested-By": this.config.requestedBy,
            },
          }
        : {}),
    });
  }

  async submitBatch(submission: JobSubmission): Promise<string> {
    const payload = buildSubmissionPayload(submission);
    this.logger.info(
      `Submitting the batch to Livy... Payload:\n${JSON.stringify(payload, null, 2)}`,
    );
    const response = await this.call(
      this.config.connections.livy,
      "POST",
      LIVY_ENDPOINT,
      JSON.stringify(payload),
    );
    return readIdentifier(response, "id");
  }

  async getBatchState(batchId: string): Promise<BatchJob> {
    const id = requireId(batchId, "batchId");
    const response = await this.call(
      this.config.connections.livy,
      "GET",
      `${LIVY_ENDPOINT}/${encodeSegment(id)}`,
    );
    const state = readString(response, "state", { batchId: id });
    const appId = readOptionalString(response, "appId");
    return {
      batchId: id,
      state,
      ...(appId ? { appId } : {}),
    };
  }

  async getAppId(batchId: string): Promise<string> {
    const id = requireId(batchId, "batchId");
    this.logger.info(`Getting Spark app id from Livy API for batch ${id}...`);
    const response = await this.call(
      this.config.connections.livy,
      "GET",
      `${LIVY_ENDPOINT}/${encodeSegment(id)}`,
    );
    return readString(response, "appId", { batchId: id });
  }

  async getLogPage(batchId: string, from: number, size: number): Promise<LogPage> {
    const id = requireId(batchId, "batchId");
    const response = await this.call(
      this.config.connections.livy,
      "GET",
      `${LIVY_ENDPOINT}/${encodeSegment(id)}/log?from=${from}&size=${size}`,
    );
    const context = { batchId: id };
    const rawLines = readArray(response, "log", context);
    const lines = rawLines.map((line) => {
      if (typeof line !== "string") {
        throw shapeError(response, toJsonPath("log"), context);
      }
      return line;
    });
    const pageFrom = readNumber(response, "from", context);
    const total = readNumber(response, "total", context);
    const next = pageFrom + lines.length;
    // A page must move the cursor past `from` until the total is reached.
    if (next < total && next <= from) {
      throw shapeError(response, toJsonPath("log"), context);
    }
    return { from: pageFrom, total, lines };
  }

  async closeBatch(batchId: string): Promise<void> {
    const id = requireId(batchId, "batchId");
    this.logger.info(`Closing batch with id = ${id}`);
    await this.call(this.config.connections.livy, "DELETE", `${LIVY_ENDPOINT}/${encodeSegment(id)}`);
    this.logger.info(`Batch ${id} has been closed`);
  }

  async getSparkJobs(connection: ConnectionProfile, appId: string): Promise<SparkJobStatus[]> {
    const id = requireId(appId, "appId");
    this.logger.info(`Getting app status (id=${id}) from Spark REST API...`);
    const response = await this.call(connection, "GET", `${SPARK_ENDPOINT}/${encodeSegment(id)}/jobs`);
    return readArray(response, "").map((job) => {
      if (!job || typeof job !== "object" || !("jobId" in job) || !("status" in job)) {
        throw shapeError(response, "$[*].jobId, $[*].status");
      }
      const { jobId, status } = job;
      if ((typeof jobId !== "number" && typeof jobId !== "string") || typeof status !== "string") {
        throw shapeError(response, "$[*].jobId, $[*].status");
      }
      return { jobId: String(jobId), status };
    });
  }

  async getYarnFinalStatus(connection: ConnectionProfile, appId: string): Promise<string> {
    const id = requireId(appId, "appId");
    this.logger.info(`Getting app status (id=${id}) from YARN RM REST API...`);
    const response = await this.call(connection, "GET", `${YARN_ENDPOINT}/${encodeSegment(id)}`);
    return readString(response, "app.finalStatus");
  }
}

function readOptionalString(response: RemoteResponse, path: string): string | undefined {
  try {
    const value = readString(response, path);
    return value.trim().length > 0 ? value : undefined;
  } catch (error) {
    // appId stays null until the Spark application is accepted.
    if (error instanceof ResponseShapeError) {
      return undefined;
    }
    throw error;
  }
}
