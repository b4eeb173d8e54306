import type { Logger } from "../observability/logger.ts";
import type { Endpoint } from "../server/endpoint.ts";
import type { UpstreamConfig } from "../types/config.ts";
import type { RoaSetResult, StatusResult, ValidityResult } from "../types/rpki.ts";
import { HttpClient } from "./client/http-client.ts";
import { createResponseSchemas, type ResponseSchema, type ResponseSchemas } from "./client/schemas.ts";
import type { FetchLike, UpstreamResult } from "./client/types.ts";
import {
  DecodeError,
  NetworkError,
  UpstreamError,
  describeError,
  type OperationResult,
  type RpkiError,
} from "./errors.ts";

export const USER_AGENT = "rpki-mcp/0.1.0";

export interface RpkiClientOptions {
  endpoint: Endpoint;
  upstream: Pick<UpstreamConfig, "requestTimeoutMs" | "unknownFields">;
  logger: Logger;
  fetch?: FetchLike;
}

/**
 * RpkiClient queries the relying party's HTTP API.
 *
 * Identifiers are inserted into the URL verbatim: the upstream is the
 * authority on ASN and prefix syntax.
 */
export class RpkiClient {
  private readonly endpoint: Endpoint;
  private readonly httpClient: HttpClient;
  private readonly schemas: ResponseSchemas;

  constructor(options: RpkiClientOptions) {
    this.endpoint = options.endpoint;
    this.httpClient = new HttpClient(
      {
        timeoutMs: options.upstream.requestTimeoutMs,
        userAgent: USER_AGENT,
        fetch: options.fetch,
      },
      options.logger,
    );
    this.schemas = createResponseSchemas(options.upstream.unknownFields);
  }

  getStatus(): Promise<OperationResult<StatusResult>> {
    return this.fetchAndDecode(`${this.endpoint}/api/v1/status`, this.schemas.status);
  }

  getValidity(asn: string, prefix: string): Promise<OperationResult<ValidityResult>> {
    return this.fetchAndDecode(
      `${this.endpoint}/api/v1/validity/${asn}/${prefix}`,
      this.schemas.validity,
    );
  }

  getRoas(asn: string): Promise<OperationResult<RoaSetResult>> {
    return this.fetchAndDecode(`${this.endpoint}/json?select-asn=${asn}`, this.schemas.roas);
  }

  private async fetchAndDecode<T>(
    url: string,
    schema: ResponseSchema<T>,
  ): Promise<OperationResult<T>> {
    const result = await this.httpClient.get(url, schema.name);

    if (!result.ok) {
      return { ok: false, error: toGatewayError(result, url, schema.name) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.body);
    } catch (error) {
      return {
        ok: false,
        error: new DecodeError(
          `Invalid JSON in ${schema.name} response: ${describeError(error)}`,
          result.status,
          { cause: error },
        ),
      };
    }

    const decoded = schema.decode(raw);
    if (!decoded.ok) {
      return {
        ok: false,
        error: new DecodeError(
          `Unexpected ${schema.name} response: ${decoded.issues}`,
          result.status,
        ),
      };
    }

    return { ok: true, value: decoded.value };
  }
}

function toGatewayError(
  failure: Exclude<UpstreamResult, { ok: true }>,
  url: string,
  name: string,
): RpkiError {
  switch (failure.reason) {
    case "transport":
      return new NetworkError(`Request to ${url} failed: ${describeError(failure.error)}`, {
        cause: failure.error,
      });
    case "http":
      return new UpstreamError(failure.status, failure.body);
    case "body":
      return new DecodeError(
        `Failed to read ${name} response body: ${describeError(failure.error)}`,
        failure.status,
        { cause: failure.error },
      );
  }
}
