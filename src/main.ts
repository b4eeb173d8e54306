import { describeError } from "./router/errors.ts";
import { startRpkiServer } from "./server/server.ts";

function usage(): void {
  process.stderr.write(`Usage:
  rpki-mcp <endpoint> [--config <rpki-mcp.yaml>]

  <endpoint>   Base URL of the RPKI relying party, e.g. http://localhost:8323
               (falls back to RPKI_ENDPOINT, then upstream.endpoint in the config file)
`);
}

interface CliArgs {
  endpoint?: string;
  configPath?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];

    if (token === "--help" || token === "-h") {
      usage();
      process.exit(0);
    }

    if (token === "--config" || token === "-c") {
      parsed.configPath = argv[i + 1];
      i += 1;
      continue;
    }

    if (parsed.endpoint === undefined) {
      parsed.endpoint = token;
    }
  }

  return parsed;
}

try {
  await startRpkiServer(parseArgs(process.argv.slice(2)));
} catch (error) {
  // stdout belongs to the protocol.
  process.stderr.write(`Error starting server: ${describeError(error)}\n`);
  process.exit(1);
}
