import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { TypedError } from "./errors.ts";
import type { StatusResult } from "../types/rpki.ts";

export type StructuredValue = { [key: string]: unknown };

/**
 * Re-serializes a typed result into a plain JSON object, so the caller always
 * receives the documented field names and nothing else.
 */
export function toStructured(value: object): StructuredValue {
  const serialized: unknown = JSON.parse(JSON.stringify(value));
  if (typeof serialized !== "object" || serialized === null || Array.isArray(serialized)) {
    throw new TypeError("Result did not serialize to a JSON object");
  }
  return { ...serialized };
}

/**
 * The status variant tag is internal; the caller sees only the variant's fields.
 */
export function statusPayload(status: StatusResult): StructuredValue {
  if (status.kind === "error") {
    return toStructured({ error: status.error });
  }
  const { kind: _kind, ...fields } = status;
  return toStructured(fields);
}

export function structuredResult(payload: StructuredValue): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: payload,
  };
}

export function errorResult(error: TypedError): CallToolResult {
  const payload = { code: error.code, message: error.message };
  return {
    content: [{ type: "text", text: JSON.stringify(payload) }],
    structuredContent: payload,
    isError: true,
  };
}
