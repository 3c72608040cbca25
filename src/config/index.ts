import { existsSync, readFileSync, statSync } from "node:fs";
import { ConfigFileSchema } from "./schema.ts";
import { findConfigFile } from "./paths.ts";
import { logger } from "../core/logger.ts";
import { AmbiguousConnectionError, ConfigError, errorMessage } from "../core/errors.ts";
import { expandHome, substituteEnv } from "../utils/env.ts";

/** A named connection from the configuration file. */
export interface ConnectionConfig {
  name: string;
  url: string;
  historyFile?: string;
}

/** What to connect to, and which history file goes with it. */
export interface ConnectionSpec {
  /** Section name, when the spec came from the configuration file. */
  name?: string;
  url: string;
  historyFile: string;
}

export class Configuration {
  constructor(
    public readonly connections: ConnectionConfig[],
    public readonly path: string,
  ) {}

  /** Sections whose name starts with `spec`, ignoring case. */
  lookup(spec: string): ConnectionConfig[] {
    const prefix = spec.toLowerCase();
    return this.connections.filter((c) => c.name.toLowerCase().startsWith(prefix));
  }
}

/**
 * Parse a configuration file. Environment variables are substituted in
 * `url` and `history`, and `~` is expanded in `history`.
 *
 * @throws {ConfigError} if the file can't be read or doesn't validate
 */
export function parseConfiguration(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Configuration {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Unable to read "${path}": ${errorMessage(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const [section, field] = issue?.path ?? [];
    if (section !== undefined && field !== undefined) {
      throw new ConfigError(`"${path}": Section "${section}" ${issue?.message}.`);
    }
    throw new ConfigError(`"${path}": ${issue?.message ?? "invalid configuration"}.`);
  }

  const connections = Object.entries(parsed.data).map(([name, section]) => ({
    name,
    url: substituteEnv(section.url, env),
    historyFile:
      section.history === undefined
        ? undefined
        : expandHome(substituteEnv(section.history, env)),
  }));

  return new Configuration(connections, path);
}

/**
 * Load the configuration used by the shell.
 *
 * An explicit path that doesn't exist only earns a warning; one that
 * isn't a regular file is fatal. Without an explicit path, the first
 * existing candidate location is used, if any.
 */
export function loadConfiguration(explicitPath?: string): Configuration | null {
  const path = explicitPath === undefined ? findConfigFile() : expandHome(explicitPath);
  if (path === null) return null;

  if (!existsSync(path)) {
    logger.warn(`Configuration file "${path}" does not exist.`);
    return null;
  }
  if (!statSync(path).isFile()) {
    throw new ConfigError(`Configuration file "${path}" is not a file.`);
  }

  return parseConfiguration(path);
}

/**
 * Turn a command-line or `.connect` spec into a connection.
 *
 * A spec that names exactly one configuration section (by prefix) uses
 * that section's URL and history file; one that names none is taken as
 * a URL.
 *
 * @throws {AmbiguousConnectionError} if the spec names several sections
 */
export function resolveConnection(
  configuration: Configuration | null,
  spec: string,
  defaultHistoryFile: string,
): ConnectionSpec {
  if (configuration === null) {
    return { url: spec, historyFile: defaultHistoryFile };
  }

  const matches = configuration.lookup(spec);
  if (matches.length > 1) {
    throw new AmbiguousConnectionError(spec, matches.map((c) => c.name), configuration.path);
  }

  const [match] = matches;
  if (match === undefined) {
    return { url: spec, historyFile: defaultHistoryFile };
  }

  return {
    name: match.name,
    url: match.url,
    historyFile: match.historyFile ?? defaultHistoryFile,
  };
}
