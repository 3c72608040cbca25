/**
 * MySQL dialect adapter, on the `mysql2` package. Also serves MariaDB.
 */
import { Kysely, MysqlDialect } from "kysely";
import type { Pool, PoolConnection } from "mysql2";
import { z } from "zod";
import { logger } from "../../core/logger.ts";
import { errorMessage } from "../../core/errors.ts";
import { RowCollector, type StatementRunner } from "../collector.ts";
import type { StatementResult } from "../types.ts";

export interface MysqlDatabase {
  db: Kysely<unknown>;
  runner: StatementRunner;
}

const fieldsSchema = z.array(z.object({ name: z.string() }));
const rowSchema = z.record(z.unknown());
const okPacketSchema = z.object({ affectedRows: z.number() });

function getConnection(pool: Pool): Promise<PoolConnection> {
  return new Promise((resolve, reject) => {
    pool.getConnection((err, conn) => (err ? reject(err) : resolve(conn)));
  });
}

function settle(fn: (done: (err: unknown) => void) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    fn((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Stream one statement's rows. `fields` only arrives for statements
 * with a result set; anything else reports an OK packet.
 */
function streamQuery(conn: PoolConnection, text: string, limit: number): Promise<StatementResult> {
  return new Promise((resolve, reject) => {
    const collector = new RowCollector(limit);
    let columns: string[] | null = null;
    let rowsAffected = 0;

    conn
      .query(text)
      .on("fields", (fields: unknown) => {
        const parsed = fieldsSchema.safeParse(fields);
        columns = parsed.success ? parsed.data.map((f) => f.name) : [];
      })
      .on("result", (result: unknown) => {
        if (columns === null) {
          const ok = okPacketSchema.safeParse(result);
          if (ok.success) rowsAffected += ok.data.affectedRows;
          return;
        }
        const row = rowSchema.safeParse(result);
        if (row.success) collector.add(row.data);
      })
      .on("error", (err: unknown) => reject(err))
      .on("end", () => {
        resolve(columns === null ? { kind: "none", rowsAffected } : collector.result(columns));
      });
  });
}

class MysqlRunner implements StatementRunner {
  constructor(private readonly pool: Pool) {}

  async run(text: string, limit: number): Promise<StatementResult> {
    const conn = await getConnection(this.pool);
    try {
      await settle((done) => conn.beginTransaction(done));
      try {
        const result = await streamQuery(conn, text, limit);
        await settle((done) => conn.commit(done));
        return result;
      } catch (err) {
        await settle((done) => conn.rollback(done)).catch((rollbackErr: unknown) => {
          logger.dim(`Rollback failed: ${errorMessage(rollbackErr)}`);
        });
        throw err;
      }
    } finally {
      conn.release();
    }
  }
}

export async function createMysqlDatabase(uri: string): Promise<MysqlDatabase> {
  const mysql2 = await import("mysql2");
  const createPool = mysql2.default?.createPool ?? mysql2.createPool;

  const pool = createPool({ uri, connectionLimit: 4 });

  return {
    db: new Kysely<unknown>({ dialect: new MysqlDialect({ pool }) }),
    runner: new MysqlRunner(pool),
  };
}
