import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { Logger } from "../observability/logger.ts";
import { toolCallCounter } from "../observability/metrics.ts";
import { decodeRoaFile } from "../roa/roa-decoder.ts";
import type { RoaConfig } from "../types/config.ts";
import { describeError, type OperationResult, type RpkiError } from "./errors.ts";
import {
  errorResult,
  statusPayload,
  structuredResult,
  toStructured,
  type StructuredValue,
} from "./responses.ts";
import type { RpkiClient } from "./rpki-client.ts";

export type ToolName = "status" | "validity" | "roas" | "parseRoaFile";

export interface ToolRouterOptions {
  client: RpkiClient;
  logger: Logger;
  roa: RoaConfig;
}

/**
 * ToolRouter binds the tool surface to the gateway client and the ROA decoder.
 * Every failure is logged once and returned to the caller as `{ code, message }`.
 */
export class ToolRouter {
  private readonly client: RpkiClient;
  private readonly logger: Logger;
  private readonly roa: RoaConfig;

  constructor(options: ToolRouterOptions) {
    this.client = options.client;
    this.logger = options.logger;
    this.roa = options.roa;
  }

  register(server: McpServer): void {
    server.registerTool(
      "status",
      {
        title: "Relying party status",
        description: "Status of the RPKI relying party",
      },
      () => this.status(),
    );

    server.registerTool(
      "validity",
      {
        title: "Route origin validity",
        description: "RPKI validity of a route, given its origin AS and prefix",
        inputSchema: {
          asn: z.string().describe("Origin AS number, e.g. AS65000"),
          prefix: z.string().describe("Route prefix, e.g. 192.0.2.0/24"),
        },
      },
      ({ asn, prefix }) => this.validity(asn, prefix),
    );

    server.registerTool(
      "roas",
      {
        title: "ROAs by origin",
        description: "Validated ROA payloads for an origin AS",
        inputSchema: {
          asn: z.string().describe("Origin AS number, e.g. AS65000"),
        },
      },
      ({ asn }) => this.roas(asn),
    );

    server.registerTool(
      "parseRoaFile",
      {
        title: "Parse ROA file",
        description: "Decode a local ROA object into its origin AS and prefixes",
        inputSchema: {
          path: z.string().describe("Path of the .roa file to decode"),
        },
      },
      ({ path }) => this.parseRoaFile(path),
    );
  }

  status(): Promise<CallToolResult> {
    return this.run("status", {}, () => this.client.getStatus(), statusPayload);
  }

  validity(asn: string, prefix: string): Promise<CallToolResult> {
    return this.run(
      "validity",
      { asn, prefix },
      () => this.client.getValidity(asn, prefix),
      toStructured,
    );
  }

  roas(asn: string): Promise<CallToolResult> {
    return this.run("roas", { asn }, () => this.client.getRoas(asn), toStructured);
  }

  parseRoaFile(path: string): Promise<CallToolResult> {
    return this.run(
      "parseRoaFile",
      { path },
      () => decodeRoaFile(path, { strict: this.roa.strict }),
      toStructured,
    );
  }

  private async run<T>(
    tool: ToolName,
    args: Record<string, string>,
    operation: () => Promise<OperationResult<T>>,
    toPayload: (value: T) => StructuredValue,
  ): Promise<CallToolResult> {
    const result = await operation();

    if (!result.ok) {
      toolCallCounter.inc({ tool, result: result.error.kind });
      this.reportError(tool, args, result.error);
      return errorResult(result.error.toTypedError());
    }

    toolCallCounter.inc({ tool, result: "success" });
    return structuredResult(toPayload(result.value));
  }

  private reportError(tool: ToolName, args: Record<string, string>, error: RpkiError): void {
    try {
      this.logger.error(
        { tool, args, kind: error.kind, code: error.code, err: error },
        `${tool} failed: ${error.message}`,
      );
    } catch (logError) {
      process.stderr.write(
        `rpki-mcp: could not log ${error.kind} error from ${tool}: ${describeError(logError)}\n`,
      );
    }
  }
}
