import { resolveVerificationBackend } from "./config.js";
import { LifecycleError, toErrorText, type LifecycleStage } from "./errors.js";
import { consoleLogger } from "./logger.js";
import { LogPager } from "./logs.js";
import { BatchPoller } from "./poller.js";
import { LivyBatchService } from "./service.js";
import { StatusVerifier } from "./verifier.js";
import type {
  BatchLogger,
  JobSubmission,
  LivyBatchConfig,
  RemoteEndpointClient,
  Sleep,
  VerificationBackend,
} from "./types.js";

export type BatchLifecycleParams = {
  config: LivyBatchConfig;
  client?: RemoteEndpointClient;
  logger?: BatchLogger;
  sleep?: Sleep;
  now?: () => number;
};

type StageFailure = {
  stage: LifecycleStage;
  error: unknown;
};

/**
 * Submits one Livy batch, waits for it, optionally verifies the outcome
 * elsewhere, then spills its log and deletes it. The delete is attempted
 * exactly once whenever a batch id was obtained.
 */
export class BatchLifecycle {
  readonly service: LivyBatchService;
  readonly poller: BatchPoller;
  readonly verifier: StatusVerifier;
  readonly pager: LogPager;
  private readonly config: LivyBatchConfig;
  private readonly logger: BatchLogger;

  constructor(params: BatchLifecycleParams) {
    this.config = params.config;
    this.logger = params.logger ?? consoleLogger;
    this.service = new LivyBatchService({
      config: params.config,
      client: params.client,
      logger: this.logger,
    });
    this.poller = new BatchPoller({
      service: this.service,
      pollIntervalSec: params.config.pollIntervalSec,
      timeoutMinutes: params.config.timeoutMinutes,
      logger: this.logger,
      sleep: params.sleep,
      now: params.now,
    });
    this.verifier = new StatusVerifier({
      service: this.service,
      emptySparkJobs: params.config.emptySparkJobs,
      logger: this.logger,
    });
    this.pager = new LogPager({ service: this.service, logger: this.logger });
  }

  async run(
    submission: JobSubmission,
    verification: VerificationBackend = resolveVerificationBackend(this.config),
  ): Promise<string> {
    let batchId: string;
    try {
      batchId = await this.service.submitBatch(submission);
    } catch (error) {
      throw new LifecycleError({ stage: "submit", cause: error });
    }
    this.logger.info(`Batch successfully submitted with id = ${batchId}.`);

    let failure: StageFailure | undefined;
    let stage: LifecycleStage = "poll";
    try {
      await this.poller.waitForCompletion(batchId);
      if (verification.kind !== "none") {
        stage = "verify";
        this.logger.info(
          `Additionally verifying status for batch id ${batchId} via ${verification.kind}...`,
        );
        const appId = await this.service.getAppId(batchId);
        this.logger.info(`Found app id '${appId}' for batch id ${batchId}.`);
        await this.verifier.verify(verification, appId);
        this.logger.info(`App '${appId}' associated with batch ${batchId} completed!`);
      }
    } catch (error) {
      failure = { stage, error };
    }

    const releaseFailures = await this.release(batchId, failure != null);

    if (failure) {
      throw new LifecycleError({
        batchId,
        stage: failure.stage,
        cause: failure.error,
        releaseErrors: releaseFailures.map((entry) => entry.error),
      });
    }

    const [firstRelease, ...otherReleases] = releaseFailures;
    if (firstRelease) {
      throw new LifecycleError({
        batchId,
        stage: firstRelease.stage,
        cause: firstRelease.error,
        releaseErrors: otherReleases.map((entry) => entry.error),
      });
    }

    return batchId;
  }

  private shouldSpillLogs(failed: boolean): boolean {
    switch (this.config.logPolicy) {
      case "always":
        return true;
      case "on_failure":
        return failed;
      case "never":
        return false;
    }
  }

  private async release(batchId: string, failed: boolean): Promise<StageFailure[]> {
    const failures: StageFailure[] = [];

    if (this.shouldSpillLogs(failed)) {
      try {
        await this.pager.spillBatchLogs(batchId);
      } catch (error) {
        this.logger.error(`Unable to retrieve log for batch ${batchId}: ${toErrorText(error)}`);
        failures.push({ stage: "logs", error });
      }
    }

    try {
      await this.service.closeBatch(batchId);
    } catch (error) {
      this.logger.error(`Unable to close batch ${batchId}: ${toErrorText(error)}`);
      failures.push({ stage: "close", error });
    }

    return failures;
  }
}
