import { TransportError } from "./errors.js";
import type { RemoteEndpointClient, RemoteRequest, RemoteResponse } from "./types.js";

export function joinEndpointUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export const defaultEndpointClient: RemoteEndpointClient = async (request) => {
  const timeoutMs = request.connection.timeoutMs ?? 0;
  const response = await fetch(joinEndpointUrl(request.connection.baseUrl, request.path), {
    method: request.method,
    headers: { ...request.connection.headers, ...request.headers },
    body: request.body,
    signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
  });

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  return {
    status: response.status,
    headers,
    body: await response.text(),
  };
};

export async function requestChecked(
  client: RemoteEndpointClient,
  request: RemoteRequest,
): Promise<RemoteResponse> {
  const base = {
    endpoint: request.connection.id,
    method: request.method,
    path: request.path,
  };

  let response: RemoteResponse;
  try {
    response = await client(request);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TransportError({ ...base, detail, cause: error });
  }

  if (response.status < 200 || response.status >= 300) {
    const detail = response.body.trim() || `status ${response.status}`;
    throw new TransportError({ ...base, detail, status: response.status });
  }
  return response;
}
