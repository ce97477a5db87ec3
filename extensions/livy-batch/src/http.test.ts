import { afterEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "./errors.js";
import { defaultEndpointClient, joinEndpointUrl, requestChecked } from "./http.js";
import type { ConnectionProfile, RemoteEndpointClient } from "./types.js";

const LIVY: ConnectionProfile = {
  id: "livy",
  baseUrl: "http://livy.test:8998/",
  headers: { Authorization: "Basic test-secret" },
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("endpoint client", () => {
  it("joins base urls and paths with a single slash", () => {
    expect(joinEndpointUrl("http://livy.test:8998/", "/batches")).toBe("http://livy.test:8998/batches");
    expect(joinEndpointUrl("http://rm.test/gateway", "ws/v1/cluster/apps/a1")).toBe(
      "http://rm.test/gateway/ws/v1/cluster/apps/a1",
    );
  });

  it("sends merged headers through fetch and lower-cases response headers", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response('{"id":5}', { status: 201, headers: { "Content-Type": "application/json" } }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await defaultEndpointClient({
      connection: LIVY,
      method: "POST",
      path: "batches",
      body: "{}",
      headers: { "X-Requested-By": "livy-batch" },
    });

    expect(response.status).toBe(201);
    expect(response.body).toBe('{"id":5}');
    expect(response.headers["content-type"]).toBe("application/json");
    expect(fetchMock).toHaveBeenCalledWith("http://livy.test:8998/batches", {
      method: "POST",
      headers: { Authorization: "Basic test-secret", "X-Requested-By": "livy-batch" },
      body: "{}",
      signal: undefined,
    });
  });
});

describe("checked requests", () => {
  it("wraps a failed exchange in a TransportError", async () => {
    const client: RemoteEndpointClient = vi.fn(async () => {
      throw new Error("ECONNREFUSED");
    });

    const error = await requestChecked(client, { connection: LIVY, method: "GET", path: "batches/1" }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError ? error.message : "").toBe(
      "GET livy:/batches/1 failed: ECONNREFUSED",
    );
    expect(error instanceof TransportError ? error.cause : undefined).toBeInstanceOf(Error);
  });

  it("rejects non-2xx replies with the status and body", async () => {
    const client: RemoteEndpointClient = vi.fn(async () => ({
      status: 404,
      headers: {},
      body: "Session '9' not found.",
    }));

    const error = await requestChecked(client, {
      connection: LIVY,
      method: "DELETE",
      path: "batches/9",
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    const transport = error instanceof TransportError ? error : undefined;
    expect(transport?.name).toBe("TransportError");
    expect(transport?.status).toBe(404);
    expect(transport?.endpoint).toBe("livy");
    expect(transport?.message).toBe("DELETE livy:/batches/9 failed (HTTP 404): Session '9' not found.");
  });

  it("passes successful replies through", async () => {
    const client: RemoteEndpointClient = vi.fn(async () => ({ status: 200, headers: {}, body: "ok" }));
    const response = await requestChecked(client, { connection: LIVY, method: "GET", path: "batches" });
    expect(response.body).toBe("ok");
  });
});
