import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { formatIssues } from "../router/client/schemas.ts";
import { InputError, describeError } from "../router/errors.ts";
import {
  ConfigDocumentSchema,
  type ConfigDocument,
  type LoggingConfig,
  type ResolvedConfig,
  type RoaConfig,
  type UpstreamConfig,
} from "../types/config.ts";
import { validateEndpoint } from "./endpoint.ts";

const DEFAULT_UPSTREAM_CONFIG: Omit<UpstreamConfig, "endpoint"> = {
  requestTimeoutMs: 0,
  unknownFields: "reject",
};

const DEFAULT_ROA_CONFIG: RoaConfig = {
  strict: false,
};

const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  file: "logs/rpki_mcp.log",
  level: "debug",
};

const EMPTY_DOCUMENT: ConfigDocument = {};

export interface ConfigManagerOptions {
  /** Endpoint given on the command line; wins over every other source. */
  endpoint?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * ConfigManager resolves the process configuration once at startup. The
 * resulting endpoint is fixed for the lifetime of the process.
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly currentConfig: ResolvedConfig;

  constructor(options: ConfigManagerOptions = {}) {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();

    // Priority: CLI option > ENV var > CWD
    this.configPath = options.configPath
      ? resolve(cwd, options.configPath)
      : env.RPKI_MCP_CONFIG
        ? resolve(cwd, env.RPKI_MCP_CONFIG)
        : resolve(cwd, "rpki-mcp.yaml");

    this.currentConfig = this.load(options.endpoint, env, cwd);
  }

  getConfig(): ResolvedConfig {
    return this.currentConfig;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private load(cliEndpoint: string | undefined, env: NodeJS.ProcessEnv, cwd: string): ResolvedConfig {
    const doc = this.readDocument(this.configPath);

    const rawEndpoint = cliEndpoint ?? env.RPKI_ENDPOINT ?? doc.upstream?.endpoint ?? undefined;
    if (rawEndpoint === undefined) {
      throw new InputError(
        "Upstream endpoint is required: pass it as the first argument, set RPKI_ENDPOINT, " +
          `or set upstream.endpoint in ${this.configPath}`,
      );
    }

    const upstream: UpstreamConfig = {
      endpoint: validateEndpoint(rawEndpoint),
      requestTimeoutMs: doc.upstream?.requestTimeoutMs ?? DEFAULT_UPSTREAM_CONFIG.requestTimeoutMs,
      unknownFields: doc.upstream?.unknownFields ?? DEFAULT_UPSTREAM_CONFIG.unknownFields,
    } satisfies UpstreamConfig;

    const roa: RoaConfig = {
      strict: doc.roa?.strict ?? DEFAULT_ROA_CONFIG.strict,
    } satisfies RoaConfig;

    const logging: LoggingConfig = {
      file: resolve(cwd, env.RPKI_MCP_LOG_FILE ?? doc.logging?.file ?? DEFAULT_LOGGING_CONFIG.file),
      level: env.LOG_LEVEL ?? doc.logging?.level ?? DEFAULT_LOGGING_CONFIG.level,
    } satisfies LoggingConfig;

    return { upstream, roa, logging } satisfies ResolvedConfig;
  }

  private readDocument(path: string): ConfigDocument {
    if (!existsSync(path)) {
      return EMPTY_DOCUMENT;
    }
    const raw = readFileSync(path, "utf8");
    if (!raw.trim()) {
      return EMPTY_DOCUMENT;
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      throw new InputError(`Failed to parse configuration ${path}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (parsed === null || parsed === undefined) {
      return EMPTY_DOCUMENT;
    }

    const result = ConfigDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new InputError(`Invalid configuration ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
  }
}
