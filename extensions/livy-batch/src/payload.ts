import type { JobSubmission, SubmissionPayload } from "./types.js";

function normalizeString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeStrings(value: readonly string[] | undefined): string[] | undefined {
  const entries = (value ?? []).filter((entry) => entry.trim().length > 0);
  return entries.length > 0 ? entries : undefined;
}

function normalizeNumber(value: number | undefined): number | undefined {
  return value != null && Number.isFinite(value) ? value : undefined;
}

function normalizeMap(
  value: Readonly<Record<string, string>> | undefined,
): Record<string, string> | undefined {
  if (!value || Object.keys(value).length === 0) {
    return undefined;
  }
  return { ...value };
}

function include<K extends keyof SubmissionPayload>(
  payload: SubmissionPayload,
  key: K,
  value: SubmissionPayload[K] | undefined,
): void {
  if (value !== undefined) {
    payload[key] = value;
  }
}

/**
 * Builds the `POST /batches` body. A field is included iff it is present and
 * non-empty: strings non-blank after trimming, lists with at least one
 * non-blank entry, numbers when finite (zero counts are kept), `conf` with at
 * least one key. Nothing is ever sent as null.
 */
export function buildSubmissionPayload(submission: JobSubmission): SubmissionPayload {
  const payload: SubmissionPayload = {};
  include(payload, "file", normalizeString(submission.file));
  include(payload, "proxyUser", normalizeString(submission.proxyUser));
  include(payload, "className", normalizeString(submission.className));
  include(payload, "args", normalizeStrings(submission.args));
  include(payload, "jars", normalizeStrings(submission.jars));
  include(payload, "pyFiles", normalizeStrings(submission.pyFiles));
  include(payload, "files", normalizeStrings(submission.files));
  include(payload, "driverMemory", normalizeString(submission.driverMemory));
  include(payload, "driverCores", normalizeNumber(submission.driverCores));
  include(payload, "executorMemory", normalizeString(submission.executorMemory));
  include(payload, "executorCores", normalizeNumber(submission.executorCores));
  include(payload, "numExecutors", normalizeNumber(submission.numExecutors));
  include(payload, "archives", normalizeStrings(submission.archives));
  include(payload, "queue", normalizeString(submission.queue));
  include(payload, "name", normalizeString(submission.name));
  include(payload, "conf", normalizeMap(submission.conf));
  return payload;
}
