import { z } from "zod";

export type UnknownFieldPolicy = "reject" | "strip";

export interface UpstreamConfig {
  endpoint: string;
  /** 0 disables the abort timer; the runtime's own defaults still apply. */
  requestTimeoutMs: number;
  unknownFields: UnknownFieldPolicy;
}

export interface RoaConfig {
  strict: boolean;
}

export interface LoggingConfig {
  file: string;
  level: string;
}

/**
 * Shape of `rpki-mcp.yaml`. Every section and field may be absent or null;
 * defaults are applied by the config manager.
 */
export const ConfigDocumentSchema = z.object({
  upstream: z
    .object({
      endpoint: z.string().nullish(),
      requestTimeoutMs: z.number().int().nonnegative().nullish(),
      unknownFields: z.enum(["reject", "strip"]).nullish(),
    })
    .nullish(),
  roa: z
    .object({
      strict: z.boolean().nullish(),
    })
    .nullish(),
  logging: z
    .object({
      file: z.string().nullish(),
      level: z.string().nullish(),
    })
    .nullish(),
});

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

export interface ResolvedConfig {
  upstream: UpstreamConfig;
  roa: RoaConfig;
  logging: LoggingConfig;
}
