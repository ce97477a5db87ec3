import { VerificationMismatchError } from "./errors.js";
import { consoleLogger } from "./logger.js";
import type { LivyBatchService } from "./service.js";
import type {
  BatchLogger,
  ConnectionProfile,
  EmptySparkJobsPolicy,
  VerificationBackend,
} from "./types.js";

export const EXPECTED_STATUS = "SUCCEEDED";

type VerifierService = Pick<LivyBatchService, "getSparkJobs" | "getYarnFinalStatus">;

export type StatusVerifierParams = {
  service: VerifierService;
  emptySparkJobs?: EmptySparkJobsPolicy;
  logger?: BatchLogger;
};

/**
 * Cross-checks a Livy `success` against a second status source. Livy in YARN
 * cluster mode reports success even when the Spark application failed.
 */
export class StatusVerifier {
  private readonly service: VerifierService;
  private readonly emptySparkJobs: EmptySparkJobsPolicy;
  private readonly logger: BatchLogger;

  constructor(params: StatusVerifierParams) {
    this.service = params.service;
    this.emptySparkJobs = params.emptySparkJobs ?? "succeed";
    this.logger = params.logger ?? consoleLogger;
  }

  async verify(backend: VerificationBackend, appId: string): Promise<void> {
    switch (backend.kind) {
      case "none":
        return;
      case "spark":
        return await this.checkSparkJobs(backend.connection, appId);
      case "yarn":
        return await this.checkYarnApp(backend.connection, appId);
    }
  }

  private async checkSparkJobs(connection: ConnectionProfile, appId: string): Promise<void> {
    const jobs = await this.service.getSparkJobs(connection, appId);
    if (jobs.length === 0) {
      if (this.emptySparkJobs === "fail") {
        throw new VerificationMismatchError({
          backend: "spark",
          subjectId: appId,
          actual: "NO_JOBS",
          expected: EXPECTED_STATUS,
          message: `Application '${appId}' reported no Spark jobs, expected every job to be '${EXPECTED_STATUS}'`,
        });
      }
      this.logger.warn(`Application '${appId}' reported no Spark jobs; treating it as succeeded`);
      return;
    }

    for (const job of jobs) {
      this.logger.info(`Job id ${job.jobId} associated with application '${appId}' is '${job.status}'`);
      if (job.status !== EXPECTED_STATUS) {
        throw new VerificationMismatchError({
          backend: "spark",
          subjectId: job.jobId,
          actual: job.status,
          expected: EXPECTED_STATUS,
          message: `Job id '${job.jobId}' associated with application '${appId}' is '${job.status}', expected status is '${EXPECTED_STATUS}'`,
        });
      }
    }
  }

  private async checkYarnApp(connection: ConnectionProfile, appId: string): Promise<void> {
    const status = await this.service.getYarnFinalStatus(connection, appId);
    if (status !== EXPECTED_STATUS) {
      throw new VerificationMismatchError({
        backend: "yarn",
        subjectId: appId,
        actual: status,
        expected: EXPECTED_STATUS,
        message: `YARN app ${appId} is '${status}', expected status is '${EXPECTED_STATUS}'`,
      });
    }
  }
}
