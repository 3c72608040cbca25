import { logger } from "../core/logger.ts";
import { ConnectionError, errorMessage } from "../core/errors.ts";
import { createEngine, type EngineFactory } from "./factory.ts";
import type { Engine } from "./types.ts";

/**
 * Opens engines and keeps them for the life of the process, keyed by
 * URL. Reconnecting to a URL seen before reuses its engine.
 */
export class ConnectionManager {
  private readonly engines = new Map<string, Engine>();

  constructor(private readonly factory: EngineFactory = createEngine) {}

  /**
   * Return the engine for `url`, opening it on first use. A new engine
   * is only kept once a round trip to the database has succeeded.
   *
   * @throws {ConnectionError} if the database can't be reached
   */
  async connect(url: string): Promise<Engine> {
    const cached = this.engines.get(url);
    if (cached) return cached;

    let engine: Engine;
    try {
      engine = await this.factory(url);
    } catch (err) {
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Unable to connect to ${url}: ${errorMessage(err)}`, url);
    }

    try {
      await engine.listTables();
    } catch (err) {
      await engine.close().catch((closeErr: unknown) => {
        logger.dim(`Closing ${url} failed: ${errorMessage(closeErr)}`);
      });
      throw new ConnectionError(`Unable to connect to ${url}: ${errorMessage(err)}`, url);
    }

    this.engines.set(url, engine);
    return engine;
  }

  /** Whether an engine for `url` is already open. */
  has(url: string): boolean {
    return this.engines.has(url);
  }

  async closeAll(): Promise<void> {
    const engines = [...this.engines.values()];
    this.engines.clear();
    await Promise.all(engines.map((e) => e.close()));
  }
}
