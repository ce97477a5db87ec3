import { LivyBatchError } from "./errors.js";
import { consoleLogger } from "./logger.js";
import type { LivyBatchService } from "./service.js";
import type { BatchLogger, LogPage } from "./types.js";

export const LOG_PAGE_LINES = 100;
const BANNER_DASHES = "-".repeat(50);

export function unescapeLogLine(line: string): string {
  return line.replace(/\\n/g, "\n");
}

export type LogPagerParams = {
  service: Pick<LivyBatchService, "getLogPage">;
  logger?: BatchLogger;
  pageSize?: number;
};

export class LogPager {
  private readonly service: Pick<LivyBatchService, "getLogPage">;
  private readonly logger: BatchLogger;
  private readonly pageSize: number;

  constructor(params: LogPagerParams) {
    this.service = params.service;
    this.logger = params.logger ?? consoleLogger;
    this.pageSize = params.pageSize ?? LOG_PAGE_LINES;
  }

  /**
   * Yields every log line of a batch in order, one page request at a time.
   * Stops once `from + lines.length` reaches the server-reported total, and
   * fails on a page that ends at or before the requested offset.
   */
  async *drainBatchLogs(batchId: string): AsyncGenerator<string, number, void> {
    let from = 0;
    let pages = 0;

    while (true) {
      const page: LogPage = await this.service.getLogPage(batchId, from, this.pageSize);
      pages += 1;
      const next = page.from + page.lines.length;
      if (next < page.total && next <= from) {
        throw new LivyBatchError(
          `Log for batch ${batchId} made no progress past line ${from} of ${page.total}`,
        );
      }
      for (const line of page.lines) {
        yield unescapeLogLine(line);
      }
      if (next >= page.total) {
        return pages;
      }
      from = next;
    }
  }

  /** Writes the full batch log to the logger between two banner lines. */
  async spillBatchLogs(batchId: string): Promise<number> {
    this.logger.info(`${BANNER_DASHES}Full log for batch ${batchId}${BANNER_DASHES}`);
    let lines = 0;
    for await (const line of this.drainBatchLogs(batchId)) {
      this.logger.info(line);
      lines += 1;
    }
    this.logger.info(`${BANNER_DASHES}End of full log for batch ${batchId}${BANNER_DASHES}`);
    return lines;
  }
}
