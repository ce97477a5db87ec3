import { vi } from "vitest";
import type { RemoteEndpointClient, RemoteRequest, RemoteResponse } from "./types.js";

export function jsonResponse(body: unknown, status = 200): RemoteResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

export type FakeLivyOptions = {
  batchId?: number | string;
  /** Successive states returned by `GET batches/<id>`; the last one repeats. */
  states?: string[];
  appId?: string | null;
  logLines?: string[];
  sparkJobs?: unknown;
  yarnFinalStatus?: string;
  submitStatus?: number;
  logStatus?: number;
  closeStatus?: number;
};

/** In-process stand-in for the Livy, Spark and YARN REST endpoints. */
export function createFakeLivy(options: FakeLivyOptions = {}) {
  const calls: RemoteRequest[] = [];
  const batchId = options.batchId ?? 1;
  const states = [...(options.states ?? ["success"])];
  const logLines = options.logLines ?? [];

  const client: RemoteEndpointClient = vi.fn(async (request: RemoteRequest): Promise<RemoteResponse> => {
    calls.push(request);
    const { connection, method, path } = request;

    if (connection.id === "livy") {
      if (method === "POST" && path === "batches") {
        const status = options.submitStatus ?? 201;
        return status >= 300
          ? { status, headers: {}, body: "submission rejected" }
          : jsonResponse({ id: batchId, state: "starting" }, status);
      }

      if (method === "DELETE" && path === `batches/${batchId}`) {
        const status = options.closeStatus ?? 200;
        return status >= 300
          ? { status, headers: {}, body: "close rejected" }
          : jsonResponse({ msg: "deleted" }, status);
      }

      const logMatch = /^batches\/[^/]+\/log\?from=(\d+)&size=(\d+)$/.exec(path);
      if (method === "GET" && logMatch) {
        if (options.logStatus != null) {
          return { status: options.logStatus, headers: {}, body: "log unavailable" };
        }
        const from = Number(logMatch[1]);
        const size = Number(logMatch[2]);
        return jsonResponse({
          id: batchId,
          from,
          total: logLines.length,
          log: logLines.slice(from, from + size),
        });
      }

      if (method === "GET" && path === `batches/${batchId}`) {
        const state = states.length > 1 ? states.shift() : states[0];
        return jsonResponse({ id: batchId, state, appId: options.appId ?? null });
      }
    }

    if (connection.id === "spark" && method === "GET") {
      return jsonResponse(options.sparkJobs ?? []);
    }

    if (connection.id === "yarn" && method === "GET") {
      return jsonResponse({ app: { finalStatus: options.yarnFinalStatus ?? "SUCCEEDED" } });
    }

    return { status: 404, headers: {}, body: `unexpected ${method} ${connection.id}:/${path}` };
  });

  const count = (method: string, path: string) =>
    calls.filter((call) => call.method === method && call.path === path).length;

  return { client, calls, count };
}
