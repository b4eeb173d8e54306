import { InputError } from "../router/errors.ts";

/**
 * Base URL of the upstream relying party, checked once at startup and never
 * changed afterwards.
 */
export type Endpoint = string;

const SUPPORTED_SCHEMES = ["http://", "https://"] as const;

/**
 * Syntactic pre-check only: no request is made, and URLs that carry a valid
 * scheme but are otherwise malformed surface later as network errors.
 */
export function validateEndpoint(rawEndpoint: string): Endpoint {
  const trimmed = rawEndpoint.trim();
  if (!trimmed) {
    throw new InputError("Upstream endpoint is required");
  }

  const scheme = SUPPORTED_SCHEMES.find((candidate) => trimmed.startsWith(candidate));
  if (!scheme) {
    throw new InputError(
      `Upstream endpoint must start with http:// or https:// (got "${trimmed}")`,
    );
  }

  // Path templates are appended with a leading slash.
  const rest = trimmed.slice(scheme.length).replace(/\/+$/, "");
  return `${scheme}${rest}`;
}
