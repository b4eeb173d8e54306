import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { createLogger, type Logger } from "../observability/logger.ts";
import { registry } from "../observability/metrics.ts";
import type { FetchLike } from "../router/client/types.ts";
import { RpkiClient } from "../router/rpki-client.ts";
import { ToolRouter } from "../router/tool-router.ts";
import type { ResolvedConfig } from "../types/config.ts";
import { ConfigManager } from "./config-manager.ts";

export const SERVER_INFO = {
  name: "rpki-mcp",
  version: "0.1.0",
  title: "MCP server for RPKI",
};

export const SERVER_INSTRUCTIONS = "MCP server that exposes functionalities of RPKI relay parties";

export interface ServerOptions {
  endpoint?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the file logger, mainly for tests. */
  logger?: Logger;
  fetch?: FetchLike;
}

export interface RpkiServerContext {
  server: McpServer;
  config: ResolvedConfig;
  logger: Logger;
  router: ToolRouter;
  connect(transport: Transport): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Resolves configuration, opens the log and registers the tools. Throws
 * InputError on bad configuration and a filesystem error if the log cannot be
 * opened; both are fatal to startup.
 */
export function createRpkiServer(options: ServerOptions = {}): RpkiServerContext {
  const configManager = new ConfigManager({
    endpoint: options.endpoint,
    configPath: options.configPath,
    env: options.env,
    cwd: options.cwd,
  });
  const config = configManager.getConfig();

  const logger =
    options.logger ?? createLogger({ file: config.logging.file, level: config.logging.level });

  const client = new RpkiClient({
    endpoint: config.upstream.endpoint,
    upstream: config.upstream,
    logger,
    fetch: options.fetch,
  });
  const router = new ToolRouter({ client, logger, roa: config.roa });

  const server = new McpServer(SERVER_INFO, {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  });
  router.register(server);

  logger.info(
    {
      endpoint: config.upstream.endpoint,
      configPath: configManager.getConfigPath(),
      strictRoa: config.roa.strict,
    },
    "RPKI MCP server initialized",
  );

  return {
    server,
    config,
    logger,
    router,
    async connect(transport) {
      await server.connect(transport);
      logger.info("RPKI MCP server connected");
    },
    async stop() {
      await server.close();
      logger.info({ metrics: await registry.getMetricsAsJSON() }, "RPKI MCP server stopped");
    },
  } satisfies RpkiServerContext;
}

/**
 * Starts the server on stdio and stops it on SIGINT or SIGTERM.
 */
export async function startRpkiServer(options: ServerOptions = {}): Promise<RpkiServerContext> {
  const context = createRpkiServer(options);
  await context.connect(new StdioServerTransport());

  const handleSignal = (signal: string) => {
    context.logger.info({ signal }, "Received shutdown signal");
    context
      .stop()
      .catch((error: unknown) => {
        context.logger.error({ error }, "Failed to stop RPKI MCP server cleanly");
      })
      .finally(() => process.exit(0));
  };

  process.once("SIGTERM", handleSignal);
  process.once("SIGINT", handleSignal);

  return context;
}
