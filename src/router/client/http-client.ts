import type { Logger } from "../../observability/logger.ts";
import { secondsSince, upstreamDuration } from "../../observability/metrics.ts";
import type { FetchLike, HttpClientOptions, UpstreamResult } from "./types.ts";

export const UNREADABLE_BODY = "<unreadable response body>";

/**
 * HttpClient issues single-attempt GET requests and classifies the outcome.
 * Never throws: transport and HTTP failures come back as UpstreamResult variants.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions, logger: Logger) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = logger;
  }

  /**
   * Execute a GET request. `label` names the route for metrics, since the URL
   * itself carries caller-supplied identifiers.
   */
  async get(url: string, label: string): Promise<UpstreamResult> {
    const controller = new AbortController();
    const timeout =
      this.timeoutMs > 0 ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;
    const start = process.hrtime.bigint();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          accept: "application/json",
          "user-agent": this.userAgent,
        },
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      upstreamDuration.observe({ endpoint: label, result: "error" }, secondsSince(start));
      this.logger.debug({ error, url }, "HTTP GET request failed before a response");
      return { ok: false, reason: "transport", error };
    }

    const read = await this.readBody(response, url);
    clearTimeout(timeout);
    upstreamDuration.observe(
      { endpoint: label, result: String(response.status) },
      secondsSince(start),
    );
    this.logger.debug({ url, status: response.status }, "HTTP GET request completed");

    if (!response.ok) {
      return {
        ok: false,
        reason: "http",
        status: response.status,
        body: read.ok ? read.text : UNREADABLE_BODY,
        headers: response.headers,
      };
    }

    if (!read.ok) {
      return { ok: false, reason: "body", status: response.status, error: read.error };
    }

    return { ok: true, status: response.status, body: read.text, headers: response.headers };
  }

  private async readBody(
    response: Response,
    url: string,
  ): Promise<{ ok: true; text: string } | { ok: false; error: unknown }> {
    try {
      return { ok: true, text: await response.text() };
    } catch (error) {
      this.logger.warn({ error, url, status: response.status }, "Failed to read response body");
      return { ok: false, error };
    }
  }
}
