import axios, { AxiosInstance, isCancel } from "axios";
import { FetchOutcome } from "./types.js";
import { errorMessage } from "./utils.js";

export interface FetcherOptions {
  userAgent: string;
  timeoutMs: number;
  /** Defaults to a fresh axios instance. */
  http?: AxiosInstance;
}

export interface Fetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

/**
 * One bounded GET per call. Failures come back as `{ ok: false }`, never as
 * a rejection, and nothing is retried.
 */
export class HttpFetcher implements Fetcher {
  private readonly http: AxiosInstance;

  constructor(private readonly options: FetcherOptions) {
    this.http = options.http ?? axios.create();
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const { timeoutMs } = this.options;
    try {
      const res = await this.http.get<unknown>(url, {
        headers: { "User-Agent": this.options.userAgent },
        // `timeout` only covers socket idle time; the signal bounds the whole request
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        responseType: "text",
        validateStatus: () => true,
      });

      if (res.status < 200 || res.status >= 400) {
        return { ok: false, cause: `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}` };
      }

      const contentType = res.headers["content-type"];
      return {
        ok: true,
        html: typeof res.data === "string" ? res.data : String(res.data ?? ""),
        contentType: typeof contentType === "string" ? contentType : undefined,
      };
    } catch (err) {
      if (isCancel(err)) return { ok: false, cause: `timeout of ${timeoutMs}ms exceeded` };
      return { ok: false, cause: errorMessage(err) };
    }
  }
}
