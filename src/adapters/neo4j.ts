import neo4j from "neo4j-driver";
import { logger } from "../utils/logger";
import type { GraphAdapter, GraphSettings, QueryParameters, ResultRow } from "./graph";

// The slice of neo4j-driver's Driver and Session this adapter calls.
export interface CypherRecord {
  toObject(): ResultRow;
}

export interface CypherSession {
  run(query: string, parameters: QueryParameters): PromiseLike<{ records: CypherRecord[] }>;
  close(): Promise<void>;
}

export interface CypherDriver {
  session(config?: { database?: string }): CypherSession;
  verifyConnectivity(config?: { database?: string }): Promise<unknown>;
  close(): Promise<void>;
}

function preview(cypher: string): string {
  return cypher.replace(/\s+/g, " ").trim().slice(0, 50);
}

export class Neo4jAdapter implements GraphAdapter {
  private closed = false;

  constructor(private driver: CypherDriver, private database?: string) {}

  static fromSettings(settings: GraphSettings): Neo4jAdapter {
    const driver = neo4j.driver(settings.uri, neo4j.auth.basic(settings.username, settings.password), {
      disableLosslessIntegers: true,
    });
    return new Neo4jAdapter(driver, settings.database);
  }

  async verifyConnectivity(): Promise<void> {
    await this.driver.verifyConnectivity(this.sessionConfig());
  }

  async run(cypher: string, params: QueryParameters): Promise<ResultRow[]> {
    logger.debug("cypher_try", { cypher: preview(cypher), params });
    const session = this.driver.session(this.sessionConfig());
    try {
      const result = await session.run(cypher, params);
      const rows = result.records.map((r) => r.toObject());
      logger.info("cypher_ok", { cypher: preview(cypher), rowCount: rows.length });
      return rows;
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.driver.close();
  }

  private sessionConfig(): { database?: string } {
    return this.database ? { database: this.database } : {};
  }
}

export type ConnectOptions = {
  // Swapped out in tests; defaults to a real neo4j-driver adapter.
  create?: (settings: GraphSettings) => GraphAdapter;
};

/**
 * Opens the process-wide graph connection.
 *
 * Resolves to `null` (mock mode) when credentials are incomplete or the
 * server cannot be reached. Never rejects.
 */
export async function connectGraph(
  settings: Partial<GraphSettings>,
  opts: ConnectOptions = {}
): Promise<GraphAdapter | null> {
  const { uri, username, password } = settings;
  if (!uri || !username || !password) {
    logger.warn("graph_not_configured", { mode: "mock" });
    return null;
  }
  const create = opts.create ?? ((s: GraphSettings) => Neo4jAdapter.fromSettings(s));

  let adapter: GraphAdapter;
  try {
    adapter = create({ ...settings, uri, username, password });
  } catch (err) {
    logger.error("graph_connect_failed", { uri, err, mode: "mock" });
    return null;
  }

  if (settings.verify) {
    try {
      await adapter.verifyConnectivity();
    } catch (err) {
      logger.error("graph_connect_failed", { uri, err, mode: "mock" });
      await adapter.close().catch((closeErr: unknown) => {
        logger.warn("graph_close_failed", { err: closeErr });
      });
      return null;
    }
  }

  logger.info("graph_connected", { uri, database: settings.database ?? "default" });
  return adapter;
}
