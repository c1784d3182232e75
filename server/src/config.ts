import fs from "node:fs/promises";
import { parseArgs } from "node:util";
import yaml from "js-yaml";
import { z } from "zod";

import { LOG_LEVELS } from "./log.js";

export interface Endpoint {
  readonly scheme: "http" | "https";
  readonly host: string;
  readonly port: number;
  readonly path: string;
}

export function endpointUrl(e: Endpoint) {
  const host = e.host.includes(":") && !e.host.startsWith("[") ? `[${e.host}]` : e.host;
  return `${e.scheme}://${host}:${e.port}${e.path}`;
}

const URL_DELIMITERS = /[\s/?#@\\]/;

/** Null when the endpoint makes a URL whose host is exactly the configured one. */
export function endpointProblem(e: Endpoint): string | null {
  if (URL_DELIMITERS.test(e.host)) return `invalid host "${e.host}"`;
  try {
    new URL(endpointUrl(e));
  } catch {
    return `invalid endpoint URL ${endpointUrl(e)}`;
  }
  return null;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const SettingsSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).default(80),
  path: z.string().startsWith("/", "path must start with /").default("/mcp"),
  scheme: z.enum(["http", "https"]).default("http"),
  discover: z.boolean().default(false),
  serviceType: z.string().min(1).default("mcp"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

const BridgeConfigSchema = SettingsSchema.refine((c) => c.discover || c.host !== undefined, {
  message: "host is required unless discover is set",
  path: ["host"],
}).superRefine((c, ctx) => {
  if (c.host === undefined) return;
  const problem = endpointProblem({ scheme: c.scheme, host: c.host, port: c.port, path: c.path });
  if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem, path: ["host"] });
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

// YAML files use the same keys; unknown keys are rejected so typos surface.
const FileSettingsSchema = SettingsSchema.partial().strict();

export const USAGE = `Usage: mcp-stdio-http-bridge --host <hostname-or-ip> [options]

Options:
  --host <host>           remote hostname or IP
  --port <port>           HTTP port (default: 80)
  --path <path>           MCP endpoint path (default: /mcp)
  --scheme <http|https>   URL scheme (default: http)
  --discover              find the remote via mDNS instead of --host
  --service-type <type>   mDNS service type to browse (default: mcp)
  --log-level <level>     trace|debug|info|warn|error|silent (default: info)
  --config <file>         YAML file with any of the settings above
  -h, --help              show this help`;

export type CliArgs =
  | { help: true }
  | { help: false; configFile?: string; settings: Record<string, unknown> };

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        host: { type: "string" },
        port: { type: "string" },
        path: { type: "string" },
        scheme: { type: "string" },
        discover: { type: "boolean" },
        "service-type": { type: "string" },
        "log-level": { type: "string" },
        config: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = parseFlags(argv);
  if (values.help) return { help: true };

  return {
    help: false,
    configFile: values.config,
    settings: dropUndefined({
      host: values.host,
      port: values.port,
      path: values.path,
      scheme: values.scheme,
      discover: values.discover,
      serviceType: values["service-type"],
      logLevel: values["log-level"],
    }),
  };
}

export async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (e) {
    throw new ConfigError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (e) {
    throw new ConfigError(`invalid YAML in ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (doc === undefined || doc === null) return {};

  const parsed = FileSettingsSchema.safeParse(doc);
  if (!parsed.success) throw new ConfigError(`${file}: ${formatIssues(parsed.error)}`);
  return dropUndefined(parsed.data);
}

/**
 * Layers defaults < YAML file < environment < flags and validates the result.
 */
export async function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  warn: (message: string) => void = (message) => console.error("[mcp-bridge] WARN", message)
): Promise<BridgeConfig | "help"> {
  const cli = parseCliArgs(argv);
  if (cli.help) return "help";

  const fromFile = cli.configFile ? await readConfigFile(cli.configFile) : {};
  const fromEnv = dropUndefined({ logLevel: envLogLevel(env.LOG_LEVEL, warn) });

  const parsed = BridgeConfigSchema.safeParse({ ...fromFile, ...fromEnv, ...cli.settings });
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  return parsed.data;
}

// LOG_LEVEL is advisory: any casing works and unknown values fall back to the default.
function envLogLevel(value: string | undefined, warn: (message: string) => void) {
  if (!value) return undefined;
  const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
  if (!level) warn(`ignoring unknown LOG_LEVEL "${value}"`);
  return level;
}

function formatIssues(err: z.ZodError) {
  return err.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

function dropUndefined(o: Record<string, unknown>) {
  return Object.fromEntries(Object.entries(o).filter(([, v]) => v !== undefined));
}
