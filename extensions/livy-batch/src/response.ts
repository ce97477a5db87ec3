import { ResponseShapeError } from "./errors.js";
import type { RemoteResponse } from "./types.js";

type ParseContext = {
  batchId?: string;
};

function headerValue(response: RemoteResponse, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

export function toJsonPath(path: string): string {
  return path === "" ? "$" : `$.${path}`;
}

/**
 * Renders a response body for diagnostics: pretty JSON when the server declared
 * JSON and the body parses, the raw text otherwise.
 */
export function renderResponseBody(response: RemoteResponse): string {
  const contentType = headerValue(response, "content-type") ?? "";
  if (!contentType.includes("application/json")) {
    return response.body;
  }
  try {
    const pretty = JSON.stringify(JSON.parse(response.body), null, 2);
    return typeof pretty === "string" ? pretty : response.body;
  } catch {
    return response.body;
  }
}

export function shapeError(
  response: RemoteResponse,
  lookupPath: string,
  context: ParseContext = {},
  cause?: unknown,
): ResponseShapeError {
  return new ResponseShapeError({
    path: lookupPath,
    renderedBody: renderResponseBody(response),
    batchId: context.batchId,
    cause,
  });
}

export function parseJsonBody(response: RemoteResponse, context: ParseContext = {}): unknown {
  try {
    return JSON.parse(response.body) as unknown;
  } catch (error) {
    throw shapeError(response, "$", context, error);
  }
}

function lookup(value: unknown, segments: string[]): { found: boolean; value: unknown } {
  let current = value;
  for (const segment of segments) {
    if (!current || typeof current !== "object") {
      return { found: false, value: undefined };
    }
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) {
        return { found: false, value: undefined };
      }
      current = current[index];
      continue;
    }
    if (!Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false, value: undefined };
    }
    current = (current as Record<string, unknown>)[segment];
  }
  return { found: current != null, value: current };
}

/** Returns the non-null value at a dot-separated path such as `app.finalStatus`. */
export function readPath(response: RemoteResponse, path: string, context: ParseContext = {}): unknown {
  const document = parseJsonBody(response, context);
  const segments = path.split(".").filter((segment) => segment.length > 0);
  const result = lookup(document, segments);
  if (!result.found) {
    throw shapeError(response, toJsonPath(path), context);
  }
  return result.value;
}

export function readString(response: RemoteResponse, path: string, context: ParseContext = {}): string {
  const value = readPath(response, path, context);
  if (typeof value !== "string") {
    throw shapeError(response, toJsonPath(path), context);
  }
  return value;
}

export function readNumber(response: RemoteResponse, path: string, context: ParseContext = {}): number {
  const value = readPath(response, path, context);
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw shapeError(response, toJsonPath(path), context);
  }
  return value;
}

export function readIdentifier(
  response: RemoteResponse,
  path: string,
  context: ParseContext = {},
): string {
  const value = readPath(response, path, context);
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  throw shapeError(response, toJsonPath(path), context);
}

export function readArray(response: RemoteResponse, path: string, context: ParseContext = {}): unknown[] {
  const value = path === "" ? parseJsonBody(response, context) : readPath(response, path, context);
  if (!Array.isArray(value)) {
    throw shapeError(response, toJsonPath(path), context);
  }
  return value;
}
