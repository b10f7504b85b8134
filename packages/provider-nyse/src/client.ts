/**
 * HTTP access to the NYSE holidays page.
 *
 * The axios timeout covers a stalled socket; an additional timer aborts the
 * request and rejects, so a server that trickles bytes cannot hold the
 * refresh cycle past `timeoutMs`.
 */

import axios from "axios";
import type { AxiosInstance } from "axios";
import type { Logger } from "@market-hours/logger";
import { ParseError } from "@market-hours/contracts";
import { httpStatusError, timeoutError, toAcquisitionError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = "market-hours-calendar/0.1 (+holiday schedule refresh)";

export interface PageClientConfig {
  source: string;
  timeoutMs: number;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/**
 * Fetches HTML pages with a bounded timeout.
 */
export class PageClient {
  private readonly http: AxiosInstance;
  private readonly config: PageClientConfig;

  constructor(config: PageClientConfig) {
    this.config = config;
    this.http = config.httpClient ?? axios.create();
  }

  /**
   * GET a page and return its body as text.
   *
   * @throws AcquisitionError on network failure, non-2xx status or timeout
   * @throws ParseError when the body is not text
   */
  async getText(url: string): Promise<string> {
    const { source, timeoutMs } = this.config;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(timeoutError(source, url, timeoutMs));
      }, timeoutMs);
    });

    this.config.logger?.debug("Schedule page request", { source, url, timeoutMs });

    let status: number;
    let data: unknown;
    try {
      const response = await Promise.race([
        this.http.get<unknown>(url, {
          timeout: timeoutMs,
          signal: controller.signal,
          responseType: "text",
          validateStatus: () => true,
          headers: { "User-Agent": USER_AGENT, Accept: "text/html" },
        }),
        deadline,
      ]);
      status = response.status;
      data = response.data;
    } catch (error) {
      throw toAcquisitionError(error, source, url, timeoutMs);
    } finally {
      clearTimeout(timer);
    }

    if (status < 200 || status >= 300) {
      throw httpStatusError(source, url, status);
    }

    if (typeof data !== "string") {
      throw new ParseError(`Expected an HTML body from ${url}, got ${typeof data}`, { source });
    }

    this.config.logger?.debug("Schedule page received", { source, url, status, bytes: data.length });
    return data;
  }
}
