/**
 * UpstreamSuccess is a 2xx response whose body has been read as text.
 */
export interface UpstreamSuccess {
  ok: true;
  status: number;
  body: string;
  headers: Headers;
}

/**
 * UpstreamHttpFailure is a non-2xx response from the upstream.
 */
export interface UpstreamHttpFailure {
  ok: false;
  reason: "http";
  status: number;
  body: string;
  headers: Headers;
}

/**
 * UpstreamTransportFailure means no response was received at all.
 */
export interface UpstreamTransportFailure {
  ok: false;
  reason: "transport";
  error: unknown;
}

/**
 * UpstreamBodyFailure is a 2xx response whose body could not be read.
 */
export interface UpstreamBodyFailure {
  ok: false;
  reason: "body";
  status: number;
  error: unknown;
}

export type UpstreamResult =
  | UpstreamSuccess
  | UpstreamHttpFailure
  | UpstreamTransportFailure
  | UpstreamBodyFailure;

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * HttpClientOptions configures the HTTP client behavior.
 */
export interface HttpClientOptions {
  /** 0 disables the abort timer. */
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}
