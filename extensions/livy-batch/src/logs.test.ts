import { describe, expect, it, vi } from "vitest";
import { parseLivyBatchConfig } from "./config.js";
import { LivyBatchError, ResponseShapeError } from "./errors.js";
import { createCapturingLogger } from "./logger.js";
import { LogPager, unescapeLogLine } from "./logs.js";
import { LivyBatchService } from "./service.js";
import { createFakeLivy, jsonResponse } from "./test-helpers.js";
import type { LogPage, RemoteEndpointClient } from "./types.js";

const config = parseLivyBatchConfig({ connections: { livy: { baseUrl: "http://livy.test:8998" } } });

function numberedLines(count: number): string[] {
  return Array.from({ length: count }, (_, idx) => `line-${idx}`);
}

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of source) {
    lines.push(line);
  }
  return lines;
}

describe("log pager", () => {
  it("concatenates pages in order and stops at the reported total", async () => {
    const expected = numberedLines(250);
    const { client, calls } = createFakeLivy({ batchId: 5, logLines: expected });
    const logger = createCapturingLogger();
    const pager = new LogPager({ service: new LivyBatchService({ config, client, logger }), logger });

    const lines = await collect(pager.drainBatchLogs("5"));

    expect(lines).toEqual(expected);
    expect(calls.map((call) => call.path)).toEqual([
      "batches/5/log?from=0&size=100",
      "batches/5/log?from=100&size=100",
      "batches/5/log?from=200&size=100",
    ]);
  });

  it("continues from the offset the server actually returned", async () => {
    const pages: LogPage[] = [
      { from: 10, total: 14, lines: ["a", "b"] },
      { from: 12, total: 14, lines: ["c", "d"] },
    ];
    const service = {
      getLogPage: vi.fn(async (): Promise<LogPage> => pages.shift() ?? { from: 0, total: 0, lines: [] }),
    };
    const pager = new LogPager({ service, logger: createCapturingLogger() });

    expect(await collect(pager.drainBatchLogs("1"))).toEqual(["a", "b", "c", "d"]);
    expect(service.getLogPage).toHaveBeenNthCalledWith(1, "1", 0, 100);
    expect(service.getLogPage).toHaveBeenNthCalledWith(2, "1", 12, 100);
  });

  it("makes a single request for an empty log", async () => {
    const { client, calls } = createFakeLivy({ batchId: 2, logLines: [] });
    const pager = new LogPager({
      service: new LivyBatchService({ config, client, logger: createCapturingLogger() }),
    });

    expect(await collect(pager.drainBatchLogs("2"))).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it("renders escaped newlines as line breaks", async () => {
    expect(unescapeLogLine("Traceback:\\n  File x")).toBe("Traceback:\n  File x");

    const { client } = createFakeLivy({ batchId: 3, logLines: ["one\\ntwo"] });
    const pager = new LogPager({
      service: new LivyBatchService({ config, client, logger: createCapturingLogger() }),
    });
    expect(await collect(pager.drainBatchLogs("3"))).toEqual(["one\ntwo"]);
  });

  it("fails fast on a malformed page", async () => {
    const client: RemoteEndpointClient = vi.fn(async () => jsonResponse({ id: 6, from: 0, log: ["x"] }));
    const pager = new LogPager({
      service: new LivyBatchService({ config, client, logger: createCapturingLogger() }),
    });

    const error = await collect(pager.drainBatchLogs("6")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResponseShapeError);
    expect(error instanceof ResponseShapeError ? error.path : undefined).toBe("$.total");
    expect(client).toHaveBeenCalledTimes(1);
  });

  it("fails when a page makes no progress before the total", async () => {
    const service = {
      getLogPage: vi.fn(async (): Promise<LogPage> => ({ from: 0, total: 10, lines: [] })),
    };
    const pager = new LogPager({ service, logger: createCapturingLogger() });

    await expect(collect(pager.drainBatchLogs("7"))).rejects.toThrow(
      "Log for batch 7 made no progress past line 0 of 10",
    );
    expect(service.getLogPage).toHaveBeenCalledTimes(1);
  });

  it("stops when the returned offset stays behind the requested one", async () => {
    const stuck = Array.from({ length: 100 }, () => "x");
    const service = {
      getLogPage: vi.fn(async (): Promise<LogPage> => ({ from: 0, total: 250, lines: stuck })),
    };
    const pager = new LogPager({ service, logger: createCapturingLogger() });
    const lines: string[] = [];

    const error = await (async () => {
      for await (const line of pager.drainBatchLogs("8")) {
        lines.push(line);
      }
    })().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LivyBatchError);
    expect(error instanceof Error ? error.message : undefined).toBe(
      "Log for batch 8 made no progress past line 100 of 250",
    );
    expect(lines).toHaveLength(100);
    expect(service.getLogPage).toHaveBeenCalledTimes(2);
  });

  it("reports the server response when livy ignores the requested offset", async () => {
    const body = { id: 9, from: 0, total: 250, log: Array.from({ length: 100 }, () => "x") };
    const client: RemoteEndpointClient = vi.fn(async () => jsonResponse(body));
    const pager = new LogPager({
      service: new LivyBatchService({ config, client, logger: createCapturingLogger() }),
    });

    const error = await collect(pager.drainBatchLogs("9")).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResponseShapeError);
    expect(error instanceof ResponseShapeError ? error.path : undefined).toBe("$.log");
    expect(error instanceof ResponseShapeError ? error.renderedBody : undefined).toBe(
      JSON.stringify(body, null, 2),
    );
    expect(client).toHaveBeenCalledTimes(2);
  });

  it("spills the log between banners through the logger", async () => {
    const { client } = createFakeLivy({ batchId: 4, logLines: ["first", "second"] });
    const logger = createCapturingLogger();
    const pager = new LogPager({ service: new LivyBatchService({ config, client, logger }), logger });

    const count = await pager.spillBatchLogs("4");

    const dashes = "-".repeat(50);
    expect(count).toBe(2);
    expect(logger.messages("info")).toEqual([
      `${dashes}Full log for batch 4${dashes}`,
      "first",
      "second",
      `${dashes}End of full log for batch 4${dashes}`,
    ]);
  });
});
