import { EdgeAgent } from "./agent";
import { loadConfig, type AgentConfig } from "./config";
import {
  debugFlagsForLogLevel,
  formatDebugLine,
  isLogLevel,
  parseDebugEnv,
  type DebugFlag,
  type LogLevel,
} from "./debug";
import { VERSION } from "./version";

export type CliArgs = {
  /** overrides `LOG_LEVEL` */
  logLevel?: LogLevel;
  /** explicit debug flags, same syntax as TUNNELGATE_DEBUG */
  debug?: Set<DebugFlag>;
  help: boolean;
  version: boolean;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, version: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--":
        continue;
      case "--log-level": {
        const level = argv[++i];
        if (level === undefined || !isLogLevel(level)) {
          throw new CliUsageError("--log-level must be one of debug, info, warn, error");
        }
        args.logLevel = level;
        break;
      }
      case "--debug": {
        const value = argv[++i];
        if (!value) throw new CliUsageError("--debug requires a value");
        args.debug = parseDebugEnv(value);
        break;
      }
      case "--version":
      case "-v":
        args.version = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

export function usage(): string {
  return [
    "Usage: tunnelgate [options]",
    "Options:",
    "  --log-level LEVEL   debug|info|warn|error (default info, or LOG_LEVEL)",
    "  --debug FLAGS       Debug components, e.g. http,tcp or all",
    "  --version           Print version",
    "  --help              Show this help",
    "",
    "Configuration is read from the environment (API_PORT, PUBLIC_PORT, TCP_PORT,",
    "TLS_CERT_PATH, TLS_KEY_PATH, MAX_TUNNELS, WG_INTERFACE, LOG_LEVEL, ...).",
  ].join("\n");
}

/** Apply command line overrides on top of the environment config */
export function applyCliArgs(config: AgentConfig, args: CliArgs): AgentConfig {
  const logLevel = args.logLevel ?? config.logLevel;
  if (args.debug) {
    return { ...config, logLevel, debug: new Set(args.debug) };
  }
  if (args.logLevel) {
    return { ...config, logLevel, debug: debugFlagsForLogLevel(args.logLevel) };
  }
  return config;
}

export async function runAgent(argv: string[] = process.argv.slice(2)) {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(usage());
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  const config = applyCliArgs(loadConfig(), args);
  const agent = new EdgeAgent({ config, version: VERSION });

  agent.on("debug", (component, message) => {
    process.stdout.write(`${formatDebugLine(component, message)}\n`);
  });

  await agent.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    process.stdout.write(`${formatDebugLine("agent", `${signal} received, shutting down`)}\n`);
    agent.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
