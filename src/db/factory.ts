/**
 * Engine factory.
 *
 * Dialect modules are imported lazily, so the PostgreSQL and MySQL
 * drivers only load when a session asks for them.
 */
import { KyselyEngine } from "./kysely.ts";
import { createLibsqlEngine } from "./libsql.ts";
import { parseDatabaseUrl } from "./url.ts";
import type { Engine } from "./types.ts";

/** Opens an engine for a connection URL. */
export type EngineFactory = (url: string) => Promise<Engine>;

/**
 * Open an engine for any supported URL.
 *
 * @throws {ConnectionError} if the URL's scheme isn't supported
 */
export async function createEngine(url: string): Promise<Engine> {
  const { kind, driverUrl } = parseDatabaseUrl(url);

  switch (kind) {
    case "sqlite":
    case "libsql":
      return createLibsqlEngine(driverUrl, kind, url);

    case "postgres": {
      const { createPostgresDatabase } = await import("./dialects/postgres.ts");
      const { db, runner } = await createPostgresDatabase(driverUrl);
      return new KyselyEngine(db, runner, kind, url);
    }

    case "mysql": {
      const { createMysqlDatabase } = await import("./dialects/mysql.ts");
      const { db, runner } = await createMysqlDatabase(driverUrl);
      return new KyselyEngine(db, runner, kind, url);
    }
  }
}
