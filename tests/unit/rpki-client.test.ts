import { describe, expect, it, vi } from "vitest";
import { UNREADABLE_BODY } from "../../src/router/client/http-client.ts";
import type { FetchLike } from "../../src/router/client/types.ts";
import { DecodeError, NetworkError, UpstreamError } from "../../src/router/errors.ts";
import { RpkiClient, USER_AGENT } from "../../src/router/rpki-client.ts";
import { createFakeFetch, jsonBody, textBody } from "../helpers/fake-fetch.ts";
import { createTestLogger } from "../helpers/test-logger.ts";

const ENDPOINT = "http://rpki.test";

const statusDocument = {
  version: "0.14.0",
  serial: 7,
  now: "2026-01-05T10:00:00+00:00",
  lastUpdateStart: "2026-01-05T09:58:00+00:00",
  lastUpdateDone: "2026-01-05T09:59:30+00:00",
  lastUpdateDuration: 90,
};

function createClient(fetch: FetchLike, requestTimeoutMs = 0) {
  const { logger } = createTestLogger();
  return new RpkiClient({
    endpoint: ENDPOINT,
    upstream: { requestTimeoutMs, unknownFields: "reject" },
    logger,
    fetch,
  });
}

describe("RpkiClient", () => {
  describe("request construction", () => {
    it("should request the status path with JSON headers", async () => {
      const fetch = createFakeFetch({ "/api/v1/status": jsonBody(statusDocument) });

      await createClient(fetch).getStatus();

      expect(fetch).toHaveBeenCalledTimes(1);
      const url = fetch.mock.calls[0]?.[0];
      const init = fetch.mock.calls[0]?.[1];
      expect(url).toBe("http://rpki.test/api/v1/status");
      expect(init?.method).toBe("GET");
      expect(init?.headers).toEqual({ accept: "application/json", "user-agent": USER_AGENT });
    });

    it("should insert the ASN and prefix into the validity path verbatim", async () => {
      const fetch = createFakeFetch({});

      await createClient(fetch).getValidity("AS65000", "192.0.2.0/24");

      expect(fetch.mock.calls[0]?.[0]).toBe("http://rpki.test/api/v1/validity/AS65000/192.0.2.0/24");
    });

    it("should select ROAs by ASN in the query string", async () => {
      const fetch = createFakeFetch({});

      await createClient(fetch).getRoas("AS65000");

      expect(fetch.mock.calls[0]?.[0]).toBe("http://rpki.test/json?select-asn=AS65000");
    });
  });

  describe("getStatus", () => {
    it("should return the success variant", async () => {
      const fetch = createFakeFetch({ "/api/v1/status": jsonBody(statusDocument) });

      const result = await createClient(fetch).getStatus();

      expect(result).toEqual({ ok: true, value: { kind: "success", ...statusDocument } });
    });

    it("should return an upstream-reported error as a successful result", async () => {
      const fetch = createFakeFetch({
        "/api/v1/status": jsonBody({ error: "initial validation still running" }),
      });

      const result = await createClient(fetch).getStatus();

      expect(result).toEqual({
        ok: true,
        value: { kind: "error", error: "initial validation still running" },
      });
    });
  });

  describe("failures", () => {
    it("should map a non-2xx response to an upstream error carrying the body", async () => {
      const fetch = createFakeFetch({
        "/api/v1/validity/AS65000/192.0.2.0/24": textBody("not found", 404),
      });

      const result = await createClient(fetch).getValidity("AS65000", "192.0.2.0/24");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UpstreamError);
      expect(result.error.toTypedError()).toEqual({ code: 404, message: "not found" });
    });

    it("should not decode the body of an error response", async () => {
      const fetch = createFakeFetch({ "/api/v1/status": jsonBody(statusDocument, 503) });

      const result = await createClient(fetch).getStatus();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("upstream");
      expect(result.error.code).toBe(503);
      expect(result.error.message).toBe(JSON.stringify(statusDocument));
    });

    it("should use a placeholder when an error body cannot be read", async () => {
      const response = new Response("boom", { status: 500 });
      vi.spyOn(response, "text").mockRejectedValue(new Error("stream reset"));
      const fetch = createFakeFetch({ "/api/v1/status": () => response });

      const result = await createClient(fetch).getStatus();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.toTypedError()).toEqual({ code: 500, message: UNREADABLE_BODY });
    });

    it("should map an unreadable 2xx body to a decode error", async () => {
      const response = new Response("{}", { status: 200 });
      vi.spyOn(response, "text").mockRejectedValue(new Error("stream reset"));
      const fetch = createFakeFetch({ "/api/v1/status": () => response });

      const result = await createClient(fetch).getStatus();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.toTypedError()).toEqual({
        code: 200,
        message: "Failed to read status response body: stream reset",
      });
    });

    it("should map an unreachable host to a network error", async () => {
      const fetch = createFakeFetch({});

      const result = await createClient(fetch).getStatus();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(NetworkError);
      expect(result.error.toTypedError()).toEqual({
        code: -1,
        message:
          "Request to http://rpki.test/api/v1/status failed: fetch failed: getaddrinfo ENOTFOUND rpki.test",
      });
    });

    it("should abort a request that outlives the timeout", async () => {
      const fetch = vi.fn<FetchLike>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
          }),
      );

      const result = await createClient(fetch, 20).getStatus();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("network");
      expect(result.error.message).toBe(
        "Request to http://rpki.test/api/v1/status failed: request aborted",
      );
    });

    it("should map invalid JSON to a decode error with the response status", async () => {
      const fetch = createFakeFetch({ "/json?select-asn=AS65000": textBody("<html>", 200) });

      const result = await createClient(fetch).getRoas("AS65000");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("decode");
      expect(result.error.code).toBe(200);
      expect(result.error.message.startsWith("Invalid JSON in roas response: ")).toBe(true);
    });

    it("should map a shape mismatch to a decode error naming the field", async () => {
      const fetch = createFakeFetch({
        "/json?select-asn=AS65000": jsonBody({
          metadata: { generated: 1, generatedTime: "2026-01-05T09:59:30Z" },
          roas: [{ asn: "AS65000", prefix: "192.0.2.0/24", maxLength: 24 }],
        }),
      });

      const result = await createClient(fetch).getRoas("AS65000");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.toTypedError()).toEqual({
        code: 200,
        message: "Unexpected roas response: roas.0.ta: Required",
      });
    });
  });
});
