import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseLivyBatchConfig, resolveVerificationBackend } from "./config.js";
import { BatchLifecycle } from "./lifecycle.js";
import { classifyBatchState } from "./poller.js";
import type {
  BatchLogger,
  LivyBatchConfig,
  RemoteEndpointClient,
  Sleep,
  VerificationBackend,
} from "./types.js";

const ACTIONS = ["run_batch", "batch_state", "batch_logs", "close_batch", "verify_app"] as const;
const VERIFY_CHOICES = ["spark", "yarn", "none"] as const;

const SubmissionSchema = Type.Object(
  {
    file: Type.Optional(Type.String({ description: "Application file (jar or script)" })),
    proxyUser: Type.Optional(Type.String()),
    className: Type.Optional(Type.String({ description: "Main class for jar applications" })),
    args: Type.Optional(Type.Array(Type.String())),
    jars: Type.Optional(Type.Array(Type.String())),
    pyFiles: Type.Optional(Type.Array(Type.String())),
    files: Type.Optional(Type.Array(Type.String())),
    driverMemory: Type.Optional(Type.String()),
    driverCores: Type.Optional(Type.Integer({ minimum: 0 })),
    executorMemory: Type.Optional(Type.String()),
    executorCores: Type.Optional(Type.Integer({ minimum: 0 })),
    numExecutors: Type.Optional(Type.Integer({ minimum: 0 })),
    archives: Type.Optional(Type.Array(Type.String())),
    queue: Type.Optional(Type.String()),
    name: Type.Optional(Type.String()),
    conf: Type.Optional(Type.Record(Type.String(), Type.String())),
  },
  { additionalProperties: false },
);

export const LivyBatchToolSchema = Type.Object(
  {
    action: Type.Union(
      ACTIONS.map((action) => Type.Literal(action)),
      { description: `Action to perform: ${ACTIONS.join(", ")}` },
    ),
    submission: Type.Optional(SubmissionSchema),
    batchId: Type.Optional(Type.String({ description: "Livy batch id" })),
    appId: Type.Optional(Type.String({ description: "Spark/YARN application id" })),
    verifyIn: Type.Optional(
      Type.Union(
        VERIFY_CHOICES.map((choice) => Type.Literal(choice)),
        { description: "Override the configured verification backend" },
      ),
    ),
  },
  { additionalProperties: false },
);

export type LivyBatchToolParams = Static<typeof LivyBatchToolSchema>;

function json(payload: unknown) {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}

function requiredString(value: string | undefined, field: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new Error(`${field} is required`);
  }
  return trimmed;
}

export function validateToolParams(raw: unknown): LivyBatchToolParams {
  if (Value.Check(LivyBatchToolSchema, raw)) {
    return raw;
  }
  const first = Value.Errors(LivyBatchToolSchema, raw).First();
  const detail = first ? `${first.path || "/"}: ${first.message}` : "parameters do not match schema";
  throw new Error(`Invalid livy_batch parameters (${detail})`);
}

export function buildLivyBatchTool(params: {
  config: LivyBatchConfig;
  client?: RemoteEndpointClient;
  logger?: BatchLogger;
  sleep?: Sleep;
  now?: () => number;
}) {
  const lifecycle = new BatchLifecycle(params);

  function backendFor(raw: LivyBatchToolParams): VerificationBackend {
    return resolveVerificationBackend(params.config, raw.verifyIn ?? params.config.verifyIn);
  }

  async function runBatch(raw: LivyBatchToolParams) {
    const verification = backendFor(raw);
    const batchId = await lifecycle.run(raw.submission ?? {}, verification);
    return {
      mode: "run_batch",
      batchId,
      verification: verification.kind,
      logPolicy: params.config.logPolicy,
    };
  }

  async function batchState(raw: LivyBatchToolParams) {
    const batch = await lifecycle.service.getBatchState(requiredString(raw.batchId, "batchId"));
    const phase = classifyBatchState(batch.state);
    return {
      mode: "batch_state",
      ...batch,
      phase,
      done: phase !== "pending",
    };
  }

  async function batchLogs(raw: LivyBatchToolParams) {
    const batchId = requiredString(raw.batchId, "batchId");
    const lines: string[] = [];
    for await (const line of lifecycle.pager.drainBatchLogs(batchId)) {
      lines.push(line);
    }
    return {
      mode: "batch_logs",
      batchId,
      lineCount: lines.length,
      lines,
    };
  }

  async function closeBatch(raw: LivyBatchToolParams) {
    const batchId = requiredString(raw.batchId, "batchId");
    await lifecycle.service.closeBatch(batchId);
    return {
      mode: "close_batch",
      batchId,
      closed: true,
    };
  }

  async function verifyApp(raw: LivyBatchToolParams) {
    const appId = requiredString(raw.appId, "appId");
    const backend = backendFor(raw);
    if (backend.kind === "none") {
      throw new Error("verify_app requires verifyIn or a configured verification backend");
    }
    await lifecycle.verifier.verify(backend, appId);
    return {
      mode: "verify_app",
      appId,
      verification: backend.kind,
      verified: true,
    };
  }

  return {
    name: "livy_batch",
    label: "Livy Batch",
    description:
      "Spark batch jobs through Apache Livy: submit and wait, cross-check the final status in Spark or YARN, drain the batch log and close the batch.",
    parameters: LivyBatchToolSchema,
    async execute(_toolCallId: string, input: unknown) {
      const raw = validateToolParams(input);
      switch (raw.action) {
        case "run_batch":
          return json(await runBatch(raw));

        case "batch_state":
          return json(await batchState(raw));

        case "batch_logs":
          return json(await batchLogs(raw));

        case "close_batch":
          return json(await closeBatch(raw));

        case "verify_app":
          return json(await verifyApp(raw));

        default:
          raw.action satisfies never;
          throw new Error(`Unsupported action: ${String(raw.action)}`);
      }
    },
  };
}

export { parseLivyBatchConfig };
