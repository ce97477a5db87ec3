import type {
  ConnectionProfile,
  EmptySparkJobsPolicy,
  EndpointFamily,
  LivyBatchConfig,
  LogPolicy,
  VerificationBackend,
  VerificationMethod,
} from "./types.js";

export const VERIFICATION_METHODS: readonly VerificationMethod[] = ["spark", "yarn"];
export const LOG_POLICIES: readonly LogPolicy[] = ["always", "on_failure", "never"];
const EMPTY_SPARK_JOBS_POLICIES: readonly EmptySparkJobsPolicy[] = ["succeed", "fail"];

const DEFAULT_POLL_INTERVAL_SEC = 20;
const DEFAULT_TIMEOUT_MINUTES = 10;
const DEFAULT_REQUESTED_BY = "livy-batch";

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be an object`);
  }
  return value as Record<string, unknown>;
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(value: unknown, field: string): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${field} must be a positive number`);
  }
  return value;
}

function readStringRecord(value: unknown, field: string): Record<string, string> {
  if (value == null) {
    return {};
  }
  const obj = asObject(value, field);
  const entries = Object.entries(obj).map(([key, entry]) => {
    if (typeof entry !== "string") {
      throw new Error(`${field}.${key} must be a string`);
    }
    return [key, entry] as const;
  });
  return Object.fromEntries(entries);
}

function readChoice<T extends string>(
  value: unknown,
  field: string,
  allowed: readonly T[],
): T | undefined {
  const raw = readString(value, field);
  if (raw == null) {
    return undefined;
  }
  const match = allowed.find((entry) => entry === raw);
  if (!match) {
    throw new Error(`${field} "${raw}" is not supported. Allowed: ${allowed.join(", ")}`);
  }
  return match;
}

function parseConnection(id: EndpointFamily, value: unknown): ConnectionProfile {
  const base = `connections.${id}`;
  const obj = asObject(value, base);
  const baseUrl = readString(obj.baseUrl, `${base}.baseUrl`);
  if (!baseUrl) {
    throw new Error(`${base}.baseUrl is required`);
  }
  if (!/^https?:\/\//i.test(baseUrl)) {
    throw new Error(`${base}.baseUrl must be an http(s) URL`);
  }
  const timeoutMs = readNumber(obj.timeoutMs, `${base}.timeoutMs`);
  if (timeoutMs != null && timeoutMs < 1) {
    throw new Error(`${base}.timeoutMs must be at least 1`);
  }
  return {
    id,
    baseUrl,
    headers: readStringRecord(obj.headers, `${base}.headers`),
    ...(timeoutMs != null ? { timeoutMs: Math.floor(timeoutMs) } : {}),
  };
}

export function parseLivyBatchConfig(value: unknown): LivyBatchConfig {
  const obj = asObject(value ?? {}, "livy-batch config");
  const connectionsObj = asObject(obj.connections ?? {}, "connections");
  if (connectionsObj.livy == null) {
    throw new Error("connections.livy is required");
  }

  const livy = parseConnection("livy", connectionsObj.livy);
  const spark = connectionsObj.spark == null ? undefined : parseConnection("spark", connectionsObj.spark);
  const yarn = connectionsObj.yarn == null ? undefined : parseConnection("yarn", connectionsObj.yarn);

  const verifyIn = readChoice(obj.verifyIn, "verifyIn", VERIFICATION_METHODS);
  if (verifyIn === "spark" && !spark) {
    throw new Error('verifyIn "spark" requires connections.spark');
  }
  if (verifyIn === "yarn" && !yarn) {
    throw new Error('verifyIn "yarn" requires connections.yarn');
  }

  return {
    connections: {
      livy,
      ...(spark ? { spark } : {}),
      ...(yarn ? { yarn } : {}),
    },
    pollIntervalSec: readNumber(obj.pollIntervalSec, "pollIntervalSec") ?? DEFAULT_POLL_INTERVAL_SEC,
    timeoutMinutes: readNumber(obj.timeoutMinutes, "timeoutMinutes") ?? DEFAULT_TIMEOUT_MINUTES,
    ...(verifyIn ? { verifyIn } : {}),
    logPolicy: readChoice(obj.logPolicy, "logPolicy", LOG_POLICIES) ?? "always",
    emptySparkJobs:
      readChoice(obj.emptySparkJobs, "emptySparkJobs", EMPTY_SPARK_JOBS_POLICIES) ?? "succeed",
    requestedBy: readString(obj.requestedBy, "requestedBy") ?? DEFAULT_REQUESTED_BY,
  };
}

/**
 * Resolves a verification method into the backend variant carrying its
 * connection. `undefined` or `"none"` means the Livy state is trusted as-is.
 */
export function resolveVerificationBackend(
  config: LivyBatchConfig,
  method: VerificationMethod | "none" | undefined = config.verifyIn,
): VerificationBackend {
  if (method == null || method === "none") {
    return { kind: "none" };
  }
  const connection = config.connections[method];
  if (!connection) {
    throw new Error(`Verification via ${method} requires connections.${method}`);
  }
  return method === "spark" ? { kind: "spark", connection } : { kind: "yarn", connection };
}
