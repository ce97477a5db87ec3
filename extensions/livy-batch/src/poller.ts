import { setTimeout as delay } from "node:timers/promises";
import { JobFailedError, PollTimeoutError } from "./errors.js";
import { consoleLogger } from "./logger.js";
import type { LivyBatchService } from "./service.js";
import type { BatchLogger, Sleep } from "./types.js";

export const PENDING_STATES = new Set(["not_started", "starting", "running"]);
export const SUCCESS_STATE = "success";

export type PollPhase = "pending" | "succeeded" | "failed";

export type PollOutcome = {
  batchId: string;
  state: string;
  polls: number;
  elapsedMs: number;
};

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export function classifyBatchState(state: string): PollPhase {
  if (PENDING_STATES.has(state)) {
    return "pending";
  }
  if (state === SUCCESS_STATE) {
    return "succeeded";
  }
  return "failed";
}

export type BatchPollerParams = {
  service: Pick<LivyBatchService, "getBatchState">;
  pollIntervalSec: number;
  timeoutMinutes: number;
  logger?: BatchLogger;
  sleep?: Sleep;
  now?: () => number;
};

export class BatchPoller {
  private readonly service: Pick<LivyBatchService, "getBatchState">;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: BatchLogger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(params: BatchPollerParams) {
    this.service = params.service;
    this.intervalMs = params.pollIntervalSec * 1000;
    this.timeoutMs = params.timeoutMinutes * 60 * 1000;
    this.logger = params.logger ?? consoleLogger;
    this.sleep = params.sleep ?? defaultSleep;
    this.now = params.now ?? (() => Date.now());
  }

  /**
   * One status read. `done` is set once the batch succeeded; any state that is
   * neither pending nor `success` throws JobFailedError.
   */
  async poke(batchId: string): Promise<{ done: boolean; state: string }> {
    this.logger.info(`Getting batch ${batchId} status...`);
    const { state } = await this.service.getBatchState(batchId);
    switch (classifyBatchState(state)) {
      case "pending":
        this.logger.info(`Batch ${batchId} has not finished yet (state is '${state}')`);
        return { done: false, state };
      case "succeeded":
        this.logger.info(`Batch ${batchId} has finished successfully!`);
        return { done: true, state };
      case "failed":
        throw new JobFailedError(batchId, state);
    }
  }

  /** Pokes until terminal; the timeout is checked between pokes, never mid-request. */
  async waitForCompletion(batchId: string): Promise<PollOutcome> {
    const startedAt = this.now();
    let polls = 0;

    while (true) {
      const { done, state } = await this.poke(batchId);
      polls += 1;
      const elapsedMs = this.now() - startedAt;
      if (done) {
        return { batchId, state, polls, elapsedMs };
      }
      if (elapsedMs > this.timeoutMs) {
        throw new PollTimeoutError({
          batchId,
          timeoutMs: this.timeoutMs,
          polls,
          lastState: state,
        });
      }
      await this.sleep(this.intervalMs);
    }
  }
}
