import { ApiError } from "./errors.js";
import { DEFAULT_RPC_TIMEOUT_MS } from "./utils/time.js";

export type TransportKind = "stdio" | "http";

export interface AppConfig {
  /** MCP transport the tool server listens on. */
  transport: TransportKind;
  httpHost: string;
  httpPort: number;
  /** Host side of the forwarded snippet server port. */
  snippetHost: string;
  snippetPort: number;
  /**
   * Round-trip ceiling for one snippet RPC. Wait-style operations must ask
   * for less than this.
   */
  rpcTimeoutMs: number;
  /** Strict lookups for every handle the tool server creates. */
  raiseOnMissing: boolean;
}

const DEFAULT_SNIPPET_PORT = 9008;
const DEFAULT_HTTP_PORT = 3000;

export function resolveConfig(
  overrides: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  return {
    transport: overrides.transport ?? parseTransport(env.UIOBJECT_TRANSPORT),
    httpHost: overrides.httpHost ?? env.UIOBJECT_HTTP_HOST ?? "127.0.0.1",
    httpPort: overrides.httpPort ?? parseInteger("UIOBJECT_HTTP_PORT", env.UIOBJECT_HTTP_PORT, DEFAULT_HTTP_PORT),
    snippetHost: overrides.snippetHost ?? env.UIOBJECT_SNIPPET_HOST ?? "127.0.0.1",
    snippetPort:
      overrides.snippetPort ?? parseInteger("UIOBJECT_SNIPPET_PORT", env.UIOBJECT_SNIPPET_PORT, DEFAULT_SNIPPET_PORT),
    rpcTimeoutMs:
      overrides.rpcTimeoutMs ??
      parseInteger("UIOBJECT_RPC_TIMEOUT_MS", env.UIOBJECT_RPC_TIMEOUT_MS, DEFAULT_RPC_TIMEOUT_MS),
    raiseOnMissing: overrides.raiseOnMissing ?? env.UIOBJECT_RAISE_ON_MISSING === "1",
  };
}

export function parseTransport(value: string | undefined): TransportKind {
  if (value === undefined || value === "") return "stdio";
  if (value === "stdio" || value === "http") return value;
  throw new ApiError(`Unknown transport '${value}' (expected stdio or http)`, { transport: value });
}

export function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ApiError(`${name} must be a positive integer, got '${value}'`, { [name]: value });
  }
  return parsed;
}

/** Flags accepted by the command line entry point. */
export interface CliOptions {
  transport?: string;
  host?: string;
  port?: string;
  snippetHost?: string;
  snippetPort?: string;
  rpcTimeout?: string;
  strict?: boolean;
}

/**
 * Turn command line flags into config overrides
 */
export function toOverrides(opts: CliOptions): Partial<AppConfig> {
  const overrides: Partial<AppConfig> = {};
  if (opts.transport !== undefined) overrides.transport = parseTransport(opts.transport);
  if (opts.host !== undefined) overrides.httpHost = opts.host;
  if (opts.port !== undefined) overrides.httpPort = parseInteger("--port", opts.port, 0);
  if (opts.snippetHost !== undefined) overrides.snippetHost = opts.snippetHost;
  if (opts.snippetPort !== undefined) overrides.snippetPort = parseInteger("--snippet-port", opts.snippetPort, 0);
  if (opts.rpcTimeout !== undefined) overrides.rpcTimeoutMs = parseInteger("--rpc-timeout", opts.rpcTimeout, 0);
  if (opts.strict !== undefined) overrides.raiseOnMissing = opts.strict;
  return overrides;
}
