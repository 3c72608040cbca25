import { ConnectionError } from "../core/errors.ts";
import type { BackendKind } from "./types.ts";

export interface DatabaseTarget {
  kind: BackendKind;
  /** URL in the form the backend's driver accepts. */
  driverUrl: string;
}

const MEMORY = ":memory:";
const SCHEME = /^([a-zA-Z][a-zA-Z0-9.-]*)(\+[^:]*)?:(.*)$/;

/**
 * Work out the backend kind for a connection URL and rewrite the URL
 * for its driver. A `+driver` suffix on the scheme
 * (`postgresql+pg8000://…`) is accepted and ignored.
 *
 * SQLite URLs follow the usual three-slash convention:
 * `sqlite:///relative.db`, `sqlite:////absolute.db`, and `sqlite://`
 * for an in-memory database.
 *
 * @throws {ConnectionError} for schemes no backend handles
 */
export function parseDatabaseUrl(url: string): DatabaseTarget {
  if (url === MEMORY) return { kind: "sqlite", driverUrl: MEMORY };

  const match = SCHEME.exec(url);
  const scheme = match?.[1]?.toLowerCase();
  const rest = match?.[3] ?? "";

  switch (scheme) {
    case "sqlite":
      return { kind: "sqlite", driverUrl: sqliteDriverUrl(rest) };

    case "file":
      return { kind: "sqlite", driverUrl: url };

    case "libsql":
    case "http":
    case "https":
    case "ws":
    case "wss":
      return { kind: "libsql", driverUrl: url };

    case "postgres":
    case "postgresql":
      return { kind: "postgres", driverUrl: `postgres:${rest}` };

    case "mysql":
    case "mariadb":
      return { kind: "mysql", driverUrl: `mysql:${rest}` };

    default:
      throw new ConnectionError(
        `Unsupported database URL "${url}". Expected a sqlite:, file:, libsql:, postgresql: or mysql: URL.`,
        url,
      );
  }
}

function sqliteDriverUrl(rest: string): string {
  if (rest === "" || rest === "//") return MEMORY;
  if (rest.startsWith("///")) {
    const path = rest.slice(3);
    return path === "" || path === MEMORY ? MEMORY : `file:${path}`;
  }
  if (rest.startsWith("//")) return `file:${rest.slice(2)}`;
  return `file:${rest}`;
}
