/**
 * Expected error caused by user input or missing configuration.
 * Displayed as a clean message with an optional hint. Exit code 1.
 *
 * Throw this from command handlers for any failure the user can fix
 * (bad flags, a broken configuration file, an unreachable database).
 */
export class UserError extends Error {
  constructor(message: string, public hint?: string) {
    super(message);
    this.name = "UserError";
  }
}

/**
 * The configuration file exists but can't be read or doesn't match the
 * expected shape. Always fatal: no session can start without it.
 */
export class ConfigError extends UserError {
  constructor(message: string) {
    super(message, "Run `sqlshell --help` to see where the configuration file is looked up.");
    this.name = "ConfigError";
  }
}

/**
 * A connection name matched more than one section in the configuration
 * file. Fatal at startup; reported and ignored by `.connect`.
 */
export class AmbiguousConnectionError extends UserError {
  constructor(
    public spec: string,
    public matches: string[],
    configPath: string,
  ) {
    super(`"${spec}" matches more than one section in "${configPath}": ${matches.join(", ")}`);
    this.name = "AmbiguousConnectionError";
  }
}

/** The database could not be reached, or its URL isn't supported. */
export class ConnectionError extends UserError {
  constructor(message: string, public url?: string) {
    super(message);
    this.name = "ConnectionError";
  }
}

/** Message of anything thrown, for reporting. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
